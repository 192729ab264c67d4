import { beforeEach, describe, expect, it, vi } from 'vitest'
import { StoreConflictError } from '../errors'
import { traceDispatch } from '../observability/axiom'
import { createMemoryStore } from '../store/memory-store'
import type { Decision } from '../store/types'
import { FakeChannel } from '../testing/fake-channel'
import {
  calculateBackoff,
  createDispatcher,
  dispatchToken,
  noteLabels,
  renderNote,
} from './dispatcher'

vi.mock('../observability/axiom', () => ({
  log: vi.fn(),
  traceDispatch: vi.fn(),
}))

async function setup(decision: Decision, reply = 'Your box ships Friday.') {
  let clock = new Date('2026-03-01T10:00:00Z')
  const now = () => clock
  const store = createMemoryStore({ now })
  const channel = new FakeChannel()
  const sleep = vi.fn(async (_ms: number) => undefined)
  const dispatcher = createDispatcher({
    store,
    channel,
    maxAttempts: 3,
    backoffBaseMs: 500,
    sleep,
    now,
  })

  await store.withSession(
    'cw_1',
    async (tx) => {
      await tx.appendMessage({ role: 'customer', content: 'where is my box?' })
      await tx.updateSession({ category: 'tracking', confidence: 0.9 })
      await tx.updateSession({ state: 'decided', decision })
      await tx.recordDecision({
        decision,
        rule: decision === 'send' ? 'auto_resolved' : 'needs_review',
        reason: decision === 'escalate' ? 'Safety signals: legal_threat' : 'ok',
        category: 'tracking',
        evaluatedThroughSeq: 1,
        reply,
      })
    },
    { create: { id: 'cw_1', channel: 'chatwoot', customerId: 'cust_1' } }
  )
  clock = new Date('2026-03-01T10:00:05Z')

  return { store, channel, sleep, dispatcher }
}

describe('calculateBackoff', () => {
  it('doubles exponentially from the base', () => {
    const strategy = { type: 'exponential' as const, base: 500 }
    expect(calculateBackoff(0, strategy)).toBe(500)
    expect(calculateBackoff(1, strategy)).toBe(1000)
    expect(calculateBackoff(2, strategy)).toBe(2000)
  })

  it('grows linearly', () => {
    expect(calculateBackoff(2, { type: 'linear', base: 500 })).toBe(1500)
  })
})

describe('renderNote', () => {
  it('renders a draft note with confidence', () => {
    expect(
      renderNote(
        'draft',
        { category: 'billing', confidence: 0.55 },
        { reason: 'confidence 0.55 below 0.7', reply: 'We refunded you.' }
      )
    ).toBe(
      '**AI Draft (needs review)**\n\nCategory: billing\nConfidence: 0.55\n\n---\n\nWe refunded you.'
    )
  })

  it('renders an escalation note with the reason', () => {
    expect(
      renderNote(
        'escalate',
        { category: 'damage_claim', confidence: 0.9 },
        { reason: 'Safety signals: legal_threat', reply: null }
      )
    ).toBe(
      '**AI Escalation**\n\nCategory: damage_claim\nReason: Safety signals: legal_threat\n\n---\n\nAI draft:\n(no draft available)'
    )
  })

  it('labels escalations as high priority', () => {
    expect(noteLabels('escalate', 'retention')).toEqual([
      'ai_escalation',
      'retention',
      'high_priority',
    ])
    expect(noteLabels('draft', null)).toEqual(['ai_draft', 'uncategorized'])
  })
})

describe('createDispatcher', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('sends a public reply and leaves the status alone', async () => {
    const { dispatcher, channel, store } = await setup('send')

    const result = await dispatcher.dispatch('cw_1', 'send')

    expect(result).toEqual({
      outcome: 'dispatched',
      token: 'cw_1:1:send',
      attempts: 1,
    })
    expect(channel.calls).toEqual([
      { kind: 'public_reply', sessionId: 'cw_1', text: 'Your box ships Friday.' },
    ])
    const session = await store.getSession('cw_1')
    expect(session).toMatchObject({
      state: 'dispatched',
      dispatchStatus: 'done',
      dispatchToken: 'cw_1:1:send',
      dispatchSteps: ['public_reply'],
      firstResponseMs: 5000,
      resolutionMs: 5000,
    })
  })

  it('posts a labelled note and opens the conversation for a draft', async () => {
    const { dispatcher, channel } = await setup('draft')

    await dispatcher.dispatch('cw_1', 'draft')

    expect(channel.calls.map((c) => c.kind)).toEqual(['private_note', 'status'])
    expect(channel.calls[0]).toMatchObject({ labels: ['ai_draft', 'tracking'] })
    expect(channel.calls[1]).toEqual({
      kind: 'status',
      sessionId: 'cw_1',
      status: 'open',
    })
  })

  it('does not write twice for the same token', async () => {
    const { dispatcher, channel } = await setup('send')

    await dispatcher.dispatch('cw_1', 'send')
    const second = await dispatcher.dispatch('cw_1', 'send')

    expect(second.outcome).toBe('already_dispatched')
    expect(second.attempts).toBe(0)
    expect(channel.calls).toHaveLength(1)
  })

  it('retries a failing step with backoff', async () => {
    const { dispatcher, channel, sleep } = await setup('send')
    channel.failNext(2)

    const result = await dispatcher.dispatch('cw_1', 'send')

    expect(result.outcome).toBe('dispatched')
    expect(result.attempts).toBe(3)
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([500, 1000])
    expect(channel.calls).toHaveLength(1)
  })

  it('marks the session failed and queues it for an operator', async () => {
    const { dispatcher, channel, store, sleep } = await setup('escalate')
    channel.failNext(3)

    const result = await dispatcher.dispatch('cw_1', 'escalate')

    expect(result.outcome).toBe('failed')
    expect(result.attempts).toBe(3)
    expect(result.error).toBe(
      'Channel unavailable after 3 attempts: channel unavailable'
    )
    expect(sleep).toHaveBeenCalledTimes(2)
    expect(channel.calls).toEqual([])

    const session = await store.getSession('cw_1')
    expect(session?.state).toBe('dispatch_failed')
    expect(session?.dispatchStatus).toBe('failed')
    const queue = await store.listOperatorQueue()
    expect(queue).toHaveLength(1)
    expect(queue[0]).toMatchObject({
      sessionId: 'cw_1',
      cycle: 1,
      reason: 'dispatch_failed',
    })
    expect(traceDispatch).toHaveBeenCalledWith(
      expect.objectContaining({ outcome: 'failed', attempts: 3 })
    )
  })

  it('resumes after the last confirmed step on retry', async () => {
    const { dispatcher, channel, store } = await setup('draft')
    // note succeeds, status toggle fails three times
    const original = channel.setConversationStatus.bind(channel)
    let statusFailures = 3
    channel.setConversationStatus = async (sessionId, status) => {
      if (statusFailures > 0) {
        statusFailures -= 1
        throw new Error('timeout')
      }
      return original(sessionId, status)
    }

    const first = await dispatcher.dispatch('cw_1', 'draft')
    expect(first.outcome).toBe('failed')
    expect((await store.getSession('cw_1'))?.dispatchSteps).toEqual([
      'private_note',
    ])

    const second = await dispatcher.dispatch('cw_1', 'draft')

    expect(second.outcome).toBe('dispatched')
    expect(second.attempts).toBe(1)
    expect(channel.calls.map((c) => c.kind)).toEqual(['private_note', 'status'])
    expect((await store.getSession('cw_1'))?.state).toBe('dispatched')
  })

  it('refuses to dispatch a decision the cycle did not make', async () => {
    const { dispatcher } = await setup('draft')

    await expect(dispatcher.dispatch('cw_1', 'send')).rejects.toThrow(
      StoreConflictError
    )
  })

  it('builds tokens from session, cycle and decision', () => {
    expect(dispatchToken('cw_9', 3, 'escalate')).toBe('cw_9:3:escalate')
  })
})
