import { describe, expect, it } from 'vitest'
import { ZodError } from 'zod'
import { loadTriageConfig } from './triage'

describe('loadTriageConfig', () => {
  it('uses defaults when nothing is set', () => {
    const config = loadTriageConfig({})

    expect(config.confidenceThreshold).toBe(0.7)
    expect(config.approvalTimeoutMs).toBe(86_400_000)
    expect(config.dispatch).toEqual({ maxAttempts: 3, backoffBaseMs: 500 })
    expect(config.maxRecomputePasses).toBe(3)
    expect(config.classifier).toEqual({
      kind: 'rules',
      model: 'anthropic/claude-haiku-4-5',
    })
    expect(config.responder.kind).toBe('template')
    expect(config.evaluator).toEqual({
      kind: 'none',
      model: 'anthropic/claude-sonnet-4-5',
    })
  })

  it('selects the model evaluator', () => {
    const config = loadTriageConfig({
      TRIAGE_EVALUATOR: 'llm',
      TRIAGE_EVALUATOR_MODEL: 'openai/gpt-5-mini',
    })

    expect(config.evaluator).toEqual({ kind: 'llm', model: 'openai/gpt-5-mini' })
  })

  it('rejects an unknown evaluator kind', () => {
    expect(() => loadTriageConfig({ TRIAGE_EVALUATOR: 'regex' })).toThrow(
      ZodError
    )
  })

  it('coerces numeric overrides', () => {
    const config = loadTriageConfig({
      TRIAGE_CONFIDENCE_THRESHOLD: '0.85',
      TRIAGE_APPROVAL_TIMEOUT_MS: '60000',
      TRIAGE_DISPATCH_MAX_ATTEMPTS: '5',
      TRIAGE_CLASSIFIER: 'llm',
    })

    expect(config.confidenceThreshold).toBe(0.85)
    expect(config.approvalTimeoutMs).toBe(60_000)
    expect(config.dispatch.maxAttempts).toBe(5)
    expect(config.classifier.kind).toBe('llm')
  })

  it('rejects a threshold outside 0..1', () => {
    expect(() =>
      loadTriageConfig({ TRIAGE_CONFIDENCE_THRESHOLD: '1.5' })
    ).toThrow(ZodError)
  })

  it('rejects an unknown classifier kind', () => {
    expect(() => loadTriageConfig({ TRIAGE_CLASSIFIER: 'magic' })).toThrow(
      ZodError
    )
  })
})
