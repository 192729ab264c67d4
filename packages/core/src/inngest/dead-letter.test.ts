import { beforeEach, describe, expect, it, vi } from 'vitest'
import { log } from '../observability/axiom'
import { createMemoryStore } from '../store/memory-store'
import { createDeadLetterHandler, sessionIdOf } from './dead-letter'

vi.mock('../observability/axiom', () => ({
  initializeAxiom: vi.fn(),
  log: vi.fn(),
}))

function failure(data: unknown) {
  return {
    error: new Error('database unavailable'),
    event: {
      data: { event: { name: 'triage/inbound.received', data } },
    },
  }
}

describe('createDeadLetterHandler', () => {
  const send = vi.fn(async () => undefined)

  beforeEach(() => {
    vi.clearAllMocks()
  })

  async function storeWithSession() {
    const store = createMemoryStore()
    await store.withSession('cw_7', async () => undefined, {
      create: { id: 'cw_7', channel: 'chatwoot', customerId: null },
    })
    return store
  }

  it('queues the session for an operator', async () => {
    const store = await storeWithSession()
    const handler = createDeadLetterHandler('handle-inbound-message', {
      getStore: () => store,
      send,
    })

    await handler(failure({ sessionId: 'cw_7', eventId: 'chatwoot:1' }))

    const queue = await store.listOperatorQueue()
    expect(queue).toHaveLength(1)
    expect(queue[0]).toMatchObject({
      sessionId: 'cw_7',
      cycle: 1,
      reason: 'workflow_failed',
      error: 'handle-inbound-message: database unavailable',
    })
  })

  it('emits a dead letter event', async () => {
    const store = await storeWithSession()
    const handler = createDeadLetterHandler('request-approval', {
      getStore: () => store,
      send,
    })

    await handler(failure({ sessionId: 'cw_7' }))

    expect(send).toHaveBeenCalledWith({
      name: 'triage/dead-letter',
      data: expect.objectContaining({
        functionName: 'request-approval',
        errorMessage: 'database unavailable',
        originalEventName: 'triage/inbound.received',
        sessionId: 'cw_7',
      }),
    })
  })

  it('still emits when the session cannot be queued', async () => {
    const store = createMemoryStore()
    const handler = createDeadLetterHandler('handle-inbound-message', {
      getStore: () => store,
      send,
    })

    await handler(failure({ sessionId: 'cw_404' }))

    expect(log).toHaveBeenCalledWith(
      'error',
      '[DLQ] Failed to queue session for an operator',
      expect.objectContaining({ sessionId: 'cw_404' })
    )
    expect(send).toHaveBeenCalledTimes(1)
  })

  it('skips the queue when the event names no session', async () => {
    const store = await storeWithSession()
    const getStore = vi.fn(() => store)
    const handler = createDeadLetterHandler('handle-inbound-message', {
      getStore,
      send,
    })

    await handler(failure({ eventId: 'chatwoot:1' }))

    expect(getStore).not.toHaveBeenCalled()
    expect(send).toHaveBeenCalledWith({
      name: 'triage/dead-letter',
      data: expect.objectContaining({ sessionId: null }),
    })
  })

  it('does not throw when the dead letter event cannot be sent', async () => {
    const store = await storeWithSession()
    const handler = createDeadLetterHandler('handle-inbound-message', {
      getStore: () => store,
      send: async () => {
        throw new Error('event api down')
      },
    })

    await expect(handler(failure({ sessionId: 'cw_7' }))).resolves.toBeUndefined()
    expect(log).toHaveBeenCalledWith(
      'error',
      '[DLQ] Failed to emit dead letter event',
      expect.objectContaining({ sendError: 'event api down' })
    )
  })
})

describe('sessionIdOf', () => {
  it('reads a string sessionId', () => {
    expect(sessionIdOf({ sessionId: 'cw_1' })).toBe('cw_1')
  })

  it('ignores anything else', () => {
    expect(sessionIdOf({ sessionId: 42 })).toBeNull()
    expect(sessionIdOf(null)).toBeNull()
    expect(sessionIdOf('cw_1')).toBeNull()
  })
})
