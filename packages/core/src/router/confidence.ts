import type { ClassificationResult } from './types'

/**
 * Map results under the threshold to `uncategorized`, keeping the original
 * label in `rawCategory`. Low confidence is an outcome, never an error.
 */
export function applyConfidenceFloor(
  result: ClassificationResult,
  threshold: number
): ClassificationResult {
  const rawCategory = result.rawCategory ?? result.category

  if (result.category === 'uncategorized' || result.confidence < threshold) {
    return { ...result, category: 'uncategorized', rawCategory }
  }

  return { ...result, rawCategory }
}
