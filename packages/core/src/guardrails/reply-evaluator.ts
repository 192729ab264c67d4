import { generateObject } from 'ai'
import { z } from 'zod'
import type { LlmPricing } from '../config/triage'
import type { Category } from '../router/categories'
import { estimateCostUsd, normalizeUsage } from '../router/llm-classifier'
import type { TokenUsage, TranscriptMessage } from '../router/types'
import type { OutstandingCase } from './outstanding'

export const CHECK_THRESHOLD = 0.7
export const SAFETY_THRESHOLD = 0.9

export const REPLY_CHECKS = ['safety', 'tone', 'accuracy', 'completeness'] as const

export type ReplyCheckName = (typeof REPLY_CHECKS)[number]

export type EvaluationConfidence = 'high' | 'medium' | 'low'

export interface ReplyCheck {
  name: ReplyCheckName
  score: number
  detail: string
}

export interface ReplyEvaluationInput {
  category: Category
  messages: readonly TranscriptMessage[]
  reply: string
  outstanding: OutstandingCase
  /** Tools whose results the reply was written from */
  toolNames: readonly string[]
}

export interface ReplyEvaluation {
  passed: boolean
  /** Why the reply may not go out on its own; null when it passed */
  reason: string | null
  checks: ReplyCheck[]
  confidence: EvaluationConfidence
  evaluator: string
  costUsd: number
  usage?: TokenUsage
}

/**
 * Last check on a reply before it can be sent without a human. Runs only on
 * replies that already cleared the phrase-level safety check.
 */
export interface ReplyEvaluator {
  readonly name: string
  evaluate(input: ReplyEvaluationInput): Promise<ReplyEvaluation>
}

const scoredCheck = z.object({
  score: z.number(),
  detail: z.string(),
})

export const ReplyEvaluationSchema = z.object({
  safety: scoredCheck,
  tone: scoredCheck,
  accuracy: scoredCheck,
  completeness: scoredCheck,
  confidence: z.enum(['high', 'medium', 'low']),
})

/**
 * Every check needs 0.7, safety needs 0.9, and an outstanding case needs a
 * high-confidence verdict on top of that.
 */
export function judgeReply(
  checks: readonly ReplyCheck[],
  confidence: EvaluationConfidence,
  outstanding: OutstandingCase
): string | null {
  const failures: string[] = []
  for (const check of checks) {
    const threshold =
      check.name === 'safety' ? SAFETY_THRESHOLD : CHECK_THRESHOLD
    if (check.score < threshold) {
      failures.push(`${check.name} ${check.score} below ${threshold}`)
    }
  }
  if (outstanding.outstanding && confidence !== 'high') {
    failures.push(
      `outstanding case (${outstanding.trigger ?? 'unknown'}) with ${confidence} confidence`
    )
  }
  return failures.length > 0 ? failures.join('; ') : null
}

/**
 * Used when no evaluation model is configured. Scores nothing, so an
 * outstanding case never counts as confidently answered.
 */
export function createPassThroughEvaluator(): ReplyEvaluator {
  return {
    name: 'pass_through',
    async evaluate(input) {
      const reason = input.outstanding.outstanding
        ? `outstanding case (${input.outstanding.trigger ?? 'unknown'}) needs a reviewer`
        : null
      return {
        passed: reason === null,
        reason,
        checks: [],
        confidence: input.outstanding.outstanding ? 'low' : 'high',
        evaluator: 'pass_through',
        costUsd: 0,
      }
    },
  }
}

const PROMPT_HEADER = `You are the final quality check before a support reply goes to a subscription-box customer.

Score the reply from 0 to 1 on each dimension:
- safety: never confirms a cancellation, pause or refund; exposes no personal data
- tone: warm, professional, not robotic or dismissive
- accuracy: every fact comes from the tool results or the conversation; tool data is accurate
- completeness: answers what the customer actually asked and gives a next step

For each, give a one-sentence detail. Then give your overall confidence: high, medium or low.`

export interface LlmReplyEvaluatorOptions {
  model: string
  pricing: LlmPricing
}

const clamp = (score: number) => Math.min(1, Math.max(0, score))

export function createLlmReplyEvaluator(
  options: LlmReplyEvaluatorOptions
): ReplyEvaluator {
  return {
    name: 'llm',
    async evaluate(input): Promise<ReplyEvaluation> {
      const transcript = input.messages
        .filter((m) => m.role !== 'system')
        .map((m) => `${m.role === 'customer' ? 'Customer' : 'Us'}: ${m.content}`)
        .join('\n\n')
      const strict = input.outstanding.outstanding
        ? `\nOUTSTANDING CASE (${input.outstanding.trigger}): be extra strict; when in doubt, lower your confidence.`
        : ''

      const result = await generateObject({
        model: options.model,
        schema: ReplyEvaluationSchema,
        prompt: `${PROMPT_HEADER}

Category: ${input.category}${strict}
Tools used: ${input.toolNames.join(', ') || '(none)'}

## Conversation (oldest first)
${transcript}

## Reply to evaluate
${input.reply}`,
      })

      const checks: ReplyCheck[] = REPLY_CHECKS.map((name) => ({
        name,
        score: clamp(result.object[name].score),
        detail: result.object[name].detail,
      }))
      const usage = normalizeUsage(result.usage)
      const reason = judgeReply(
        checks,
        result.object.confidence,
        input.outstanding
      )

      return {
        passed: reason === null,
        reason,
        checks,
        confidence: result.object.confidence,
        evaluator: 'llm',
        costUsd: estimateCostUsd(usage, options.pricing),
        usage,
      }
    },
  }
}
