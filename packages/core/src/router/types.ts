import type { Category } from './categories'

/**
 * Transcript entry as seen by classifiers and responders, oldest first.
 */
export interface TranscriptMessage {
  role: 'customer' | 'assistant' | 'system'
  content: string
}

export interface TokenUsage {
  inputTokens: number
  outputTokens: number
  totalTokens: number
}

export interface ClassificationResult {
  category: Category
  confidence: number
  reasoning: string
  /** Which implementation produced the result */
  classifier: string
  /** Category before the confidence floor was applied */
  rawCategory?: Category
  costUsd?: number
  usage?: TokenUsage
}

export interface Classifier {
  readonly name: string
  classify(messages: readonly TranscriptMessage[]): Promise<ClassificationResult>
}
