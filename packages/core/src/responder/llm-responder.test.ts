import { beforeEach, describe, expect, it, vi } from 'vitest'
import { createLlmResponder } from './llm-responder'

// Mock AI SDK
vi.mock('ai', () => ({
  generateText: vi.fn(),
}))

import { generateText } from 'ai'

describe('createLlmResponder', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('returns trimmed text with cost from usage', async () => {
    vi.mocked(generateText).mockResolvedValue({
      text: '  Your package is on its way.  ',
      usage: { inputTokens: 2000, outputTokens: 100, totalTokens: 2100 },
    } as any)

    const responder = createLlmResponder({
      model: 'anthropic/claude-haiku-4-5',
      pricing: { inputPerMillion: 1, outputPerMillion: 5 },
    })
    const output = await responder.respond({
      category: 'tracking',
      messages: [{ role: 'customer', content: 'where is my box' }],
      toolResults: [
        { toolName: 'track_package', status: 'success', data: { carrier: 'Post' } },
        { toolName: 'get_subscription', status: 'failed', data: null },
      ],
    })

    expect(output.text).toBe('Your package is on its way.')
    expect(output.costUsd).toBeCloseTo(0.0025)
    expect(output.latencyMs).toBeGreaterThanOrEqual(0)

    const call = vi.mocked(generateText).mock.calls[0]?.[0]
    expect(call?.model).toBe('anthropic/claude-haiku-4-5')
    expect(call?.prompt).toContain('track_package: {"carrier":"Post"}')
    expect(call?.prompt).not.toContain('get_subscription')
    expect(call?.prompt).toContain('Customer: where is my box')
  })
})
