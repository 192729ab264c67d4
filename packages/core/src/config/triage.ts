import { z } from 'zod'

const numberFromEnv = (fallback: number) =>
  z.coerce.number().nonnegative().default(fallback)

export const triageConfigSchema = z.object({
  TRIAGE_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  TRIAGE_APPROVAL_TIMEOUT_MS: numberFromEnv(24 * 60 * 60 * 1000),
  TRIAGE_DISPATCH_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  TRIAGE_DISPATCH_BACKOFF_BASE_MS: numberFromEnv(500),
  TRIAGE_MAX_RECOMPUTE_PASSES: z.coerce.number().int().min(1).default(3),
  TRIAGE_CLASSIFIER: z.enum(['rules', 'llm']).default('rules'),
  TRIAGE_RESPONDER: z.enum(['template', 'llm']).default('template'),
  /** `none` lets any safe reply through unless the case is outstanding */
  TRIAGE_EVALUATOR: z.enum(['none', 'llm']).default('none'),
  TRIAGE_CLASSIFIER_MODEL: z.string().default('anthropic/claude-haiku-4-5'),
  TRIAGE_RESPONDER_MODEL: z.string().default('anthropic/claude-haiku-4-5'),
  TRIAGE_EVALUATOR_MODEL: z.string().default('anthropic/claude-sonnet-4-5'),
  /** USD per million input tokens */
  TRIAGE_LLM_INPUT_PRICE: numberFromEnv(1),
  /** USD per million output tokens */
  TRIAGE_LLM_OUTPUT_PRICE: numberFromEnv(5),
})

export interface LlmPricing {
  inputPerMillion: number
  outputPerMillion: number
}

export interface TriageConfig {
  confidenceThreshold: number
  approvalTimeoutMs: number
  dispatch: {
    maxAttempts: number
    backoffBaseMs: number
  }
  maxRecomputePasses: number
  classifier: { kind: 'rules' | 'llm'; model: string }
  responder: { kind: 'template' | 'llm'; model: string }
  evaluator: { kind: 'none' | 'llm'; model: string }
  pricing: LlmPricing
}

export const DEFAULT_TRIAGE_CONFIG: TriageConfig = loadTriageConfig({})

/**
 * Read the TRIAGE_* tunables. Unset values take their defaults; malformed
 * values throw a ZodError naming the variable.
 */
export function loadTriageConfig(
  source: Record<string, string | undefined> = process.env
): TriageConfig {
  const parsed = triageConfigSchema.parse({
    TRIAGE_CONFIDENCE_THRESHOLD: source.TRIAGE_CONFIDENCE_THRESHOLD,
    TRIAGE_APPROVAL_TIMEOUT_MS: source.TRIAGE_APPROVAL_TIMEOUT_MS,
    TRIAGE_DISPATCH_MAX_ATTEMPTS: source.TRIAGE_DISPATCH_MAX_ATTEMPTS,
    TRIAGE_DISPATCH_BACKOFF_BASE_MS: source.TRIAGE_DISPATCH_BACKOFF_BASE_MS,
    TRIAGE_MAX_RECOMPUTE_PASSES: source.TRIAGE_MAX_RECOMPUTE_PASSES,
    TRIAGE_CLASSIFIER: source.TRIAGE_CLASSIFIER,
    TRIAGE_RESPONDER: source.TRIAGE_RESPONDER,
    TRIAGE_EVALUATOR: source.TRIAGE_EVALUATOR,
    TRIAGE_CLASSIFIER_MODEL: source.TRIAGE_CLASSIFIER_MODEL,
    TRIAGE_RESPONDER_MODEL: source.TRIAGE_RESPONDER_MODEL,
    TRIAGE_EVALUATOR_MODEL: source.TRIAGE_EVALUATOR_MODEL,
    TRIAGE_LLM_INPUT_PRICE: source.TRIAGE_LLM_INPUT_PRICE,
    TRIAGE_LLM_OUTPUT_PRICE: source.TRIAGE_LLM_OUTPUT_PRICE,
  })

  return {
    confidenceThreshold: parsed.TRIAGE_CONFIDENCE_THRESHOLD,
    approvalTimeoutMs: parsed.TRIAGE_APPROVAL_TIMEOUT_MS,
    dispatch: {
      maxAttempts: parsed.TRIAGE_DISPATCH_MAX_ATTEMPTS,
      backoffBaseMs: parsed.TRIAGE_DISPATCH_BACKOFF_BASE_MS,
    },
    maxRecomputePasses: parsed.TRIAGE_MAX_RECOMPUTE_PASSES,
    classifier: {
      kind: parsed.TRIAGE_CLASSIFIER,
      model: parsed.TRIAGE_CLASSIFIER_MODEL,
    },
    responder: {
      kind: parsed.TRIAGE_RESPONDER,
      model: parsed.TRIAGE_RESPONDER_MODEL,
    },
    evaluator: {
      kind: parsed.TRIAGE_EVALUATOR,
      model: parsed.TRIAGE_EVALUATOR_MODEL,
    },
    pricing: {
      inputPerMillion: parsed.TRIAGE_LLM_INPUT_PRICE,
      outputPerMillion: parsed.TRIAGE_LLM_OUTPUT_PRICE,
    },
  }
}
