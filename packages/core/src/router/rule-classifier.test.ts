import { describe, expect, it } from 'vitest'
import { applyConfidenceFloor } from './confidence'
import { classifyByRules, createRuleClassifier } from './rule-classifier'
import type { TranscriptMessage } from './types'

const customer = (content: string): TranscriptMessage => ({
  role: 'customer',
  content,
})

describe('classifyByRules', () => {
  it('classifies a missing package as tracking', () => {
    const result = classifyByRules([customer('my package never arrived')])

    expect(result.category).toBe('tracking')
    expect(result.confidence).toBe(0.95)
    expect(result.classifier).toBe('rules')
  })

  it('classifies cancellation wording as retention', () => {
    const result = classifyByRules([
      customer("I want to cancel, it's too expensive"),
    ])

    expect(result.category).toBe('retention')
    expect(result.confidence).toBe(0.95)
  })

  it('gives a single keyword hit 0.9', () => {
    const result = classifyByRules([customer('Can I skip next month?')])

    expect(result.category).toBe('subscription_change')
    expect(result.confidence).toBe(0.9)
  })

  it('weights the latest customer message double', () => {
    const result = classifyByRules([
      customer('Where is my order?'),
      { role: 'assistant', content: 'It was delivered yesterday.' },
      customer('Also please refund the charge on my invoice'),
    ])

    expect(result.category).toBe('billing')
  })

  it('ignores assistant and system messages', () => {
    const result = classifyByRules([
      { role: 'assistant', content: 'Your package is in transit' },
      customer('ok'),
    ])

    expect(result.category).toBe('general')
    expect(result.confidence).toBe(0.4)
  })

  it('drops confidence on a tie', () => {
    const result = classifyByRules([customer('my box arrived damaged')])

    expect(result.category).toBe('damage_claim')
    expect(result.confidence).toBe(0.5)
  })

  it('is exposed through the Classifier interface', async () => {
    const classifier = createRuleClassifier()
    const result = await classifier.classify([customer('thank you so much!')])

    expect(classifier.name).toBe('rules')
    expect(result.category).toBe('gratitude')
  })
})

describe('applyConfidenceFloor', () => {
  it('keeps results at or above the threshold', () => {
    const result = applyConfidenceFloor(
      { category: 'tracking', confidence: 0.7, reasoning: 'x', classifier: 'rules' },
      0.7
    )

    expect(result.category).toBe('tracking')
    expect(result.rawCategory).toBe('tracking')
  })

  it('maps results below the threshold to uncategorized', () => {
    const result = applyConfidenceFloor(
      { category: 'billing', confidence: 0.69, reasoning: 'x', classifier: 'rules' },
      0.7
    )

    expect(result.category).toBe('uncategorized')
    expect(result.rawCategory).toBe('billing')
    expect(result.confidence).toBe(0.69)
  })
})
