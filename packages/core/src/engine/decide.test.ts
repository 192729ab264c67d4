import { describe, expect, it } from 'vitest'
import { checkReplySafety } from '../guardrails/safety'
import { decide, type DecisionInput } from './decide'

function input(overrides: Partial<DecisionInput> = {}): DecisionInput {
  const text = 'Your box is on its way.'
  return {
    safetySignals: [],
    executions: [],
    category: 'tracking',
    confidence: 0.9,
    confidenceThreshold: 0.7,
    autoResolvable: true,
    lookupsSucceeded: true,
    mutationPlanned: false,
    reply: { text, safety: checkReplySafety(text) },
    evaluation: { passed: true, reason: null },
    errors: [],
    ...overrides,
  }
}

describe('decide', () => {
  it('sends a confident, evaluated reply', () => {
    expect(decide(input())).toEqual({
      decision: 'send',
      rule: 'auto_resolved',
      reason: 'tracking resolved automatically',
    })
  })

  it('treats a whitespace-only reply as no reply', () => {
    const blank = '  \n\t '

    expect(
      decide(input({ reply: { text: blank, safety: checkReplySafety(blank) } }))
    ).toEqual({ decision: 'draft', rule: 'needs_review', reason: 'no reply' })
  })

  it('drafts when the evaluation held the reply back', () => {
    expect(
      decide(
        input({
          evaluation: {
            passed: false,
            reason: 'outstanding case (customs_hold) needs a reviewer',
          },
        })
      ).reason
    ).toBe(
      'reply evaluation: outstanding case (customs_hold) needs a reviewer'
    )
  })

  it('drafts a safe reply that was never evaluated', () => {
    expect(decide(input({ evaluation: null })).reason).toBe(
      'reply not evaluated'
    )
  })

  it('reports every blocker at once', () => {
    expect(
      decide(
        input({
          category: 'billing',
          autoResolvable: false,
          confidence: 0.6,
          lookupsSucceeded: false,
          reply: null,
          evaluation: null,
          errors: ['get_payment_history: timeout'],
        })
      ).reason
    ).toBe(
      'errors: get_payment_history: timeout, billing needs review, confidence 0.6 below 0.7, lookups incomplete, no reply'
    )
  })
})
