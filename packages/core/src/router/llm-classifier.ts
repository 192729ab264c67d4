import { generateObject } from 'ai'
import { z } from 'zod'
import type { LlmPricing } from '../config/triage'
import { toCategory } from './categories'
import type { ClassificationResult, Classifier, TokenUsage } from './types'

// Flat schema; category validation happens after generation so an unknown
// label degrades to uncategorized instead of failing the call
export const ClassifierOutputSchema = z.object({
  category: z.string(),
  confidence: z.number(),
  reasoning: z.string(),
})

export interface LlmClassifierOptions {
  model: string
  pricing: LlmPricing
}

export function estimateCostUsd(
  usage: TokenUsage | undefined,
  pricing: LlmPricing
): number {
  if (!usage) return 0
  return (
    (usage.inputTokens * pricing.inputPerMillion +
      usage.outputTokens * pricing.outputPerMillion) /
    1_000_000
  )
}

export function normalizeUsage(usage: {
  inputTokens?: number
  outputTokens?: number
  totalTokens?: number
}): TokenUsage | undefined {
  if (usage.inputTokens === undefined) return undefined
  const outputTokens = usage.outputTokens ?? 0
  return {
    inputTokens: usage.inputTokens,
    outputTokens,
    totalTokens: usage.totalTokens ?? usage.inputTokens + outputTokens,
  }
}

const PROMPT_HEADER = `Classify this subscription-box customer support conversation.

## Categories
- tracking: Where is my package, delivery status, shipping delays
- billing: Charges, payments, invoices, refunds already issued
- retention: Wants to cancel or leave, price complaints
- damage_claim: Items arrived damaged, broken or leaking
- subscription_change: Skip a month, pause, change frequency or address
- customization: Box contents, preferences, exclusions, allergies
- gratitude: Thanks, compliments, nothing to act on
- general: Anything else

Provide:
1. category: One of the categories above
2. confidence: Score 0-1 (>0.9 for clear cases, 0.7-0.9 for likely, <0.7 for uncertain)
3. reasoning: Brief explanation (1-2 sentences)`

/**
 * Model-backed classifier. The whole transcript goes into the prompt,
 * customer turns marked with →, our turns with ←.
 */
export function createLlmClassifier(options: LlmClassifierOptions): Classifier {
  return {
    name: 'llm',
    async classify(messages): Promise<ClassificationResult> {
      const transcript = messages
        .filter((m) => m.role !== 'system')
        .map((m) => `${m.role === 'customer' ? '→' : '←'} ${m.content}`)
        .join('\n\n')

      const result = await generateObject({
        model: options.model,
        prompt: `${PROMPT_HEADER}\n\n## Conversation (oldest first)\n${transcript}`,
        schema: ClassifierOutputSchema,
      })

      const usage = normalizeUsage(result.usage)
      const confidence = Math.min(1, Math.max(0, result.object.confidence))

      return {
        category: toCategory(result.object.category),
        confidence,
        reasoning: result.object.reasoning,
        classifier: 'llm',
        usage,
        costUsd: estimateCostUsd(usage, options.pricing),
      }
    },
  }
}
