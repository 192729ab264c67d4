import { beforeEach, describe, expect, it, vi } from 'vitest'
import { InvalidTransitionError, StoreConflictError } from '../errors'
import { createMemoryStore } from '../store/memory-store'
import { createApprovalService, type ApprovalDecision } from './service'

vi.mock('../observability/axiom', () => ({
  log: vi.fn(),
}))

async function setup() {
  let clock = new Date('2026-03-01T10:00:00Z')
  const now = () => clock
  const store = createMemoryStore({ now })
  const published: ApprovalDecision[] = []
  const service = createApprovalService({
    store,
    publish: async (decision) => {
      published.push(decision)
    },
    now,
  })

  const execution = await store.withSession(
    'cw_1',
    (tx) =>
      tx.insertExecution({
        toolName: 'skip_month',
        input: { customerId: 'cust_1' },
        requiresApproval: true,
        status: 'pending',
      }),
    { create: { id: 'cw_1', channel: 'chatwoot', customerId: 'cust_1' } }
  )

  return {
    store,
    service,
    published,
    execution,
    advance: (ms: number) => {
      clock = new Date(clock.getTime() + ms)
    },
  }
}

describe('createApprovalService', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('lists pending executions with their session and wait time', async () => {
    const { service, execution, advance } = await setup()
    advance(90_000)

    const pending = await service.listPending()

    expect(pending).toHaveLength(1)
    expect(pending[0]?.execution.id).toBe(execution.id)
    expect(pending[0]?.session?.customerId).toBe('cust_1')
    expect(pending[0]?.waitingMs).toBe(90_000)
  })

  it('publishes a decision without resolving the execution', async () => {
    const { service, store, published, execution } = await setup()

    const decision = await service.decide(
      execution.id,
      'rejected',
      'agent_1',
      'customer already skipped'
    )

    expect(decision).toEqual({
      executionId: execution.id,
      sessionId: 'cw_1',
      outcome: 'rejected',
      reviewer: 'agent_1',
      reason: 'customer already skipped',
      decidedAt: '2026-03-01T10:00:00.000Z',
    })
    expect(published).toEqual([decision])
    expect((await store.getExecution(execution.id))?.status).toBe('pending')
  })

  it('refuses unknown or already resolved executions', async () => {
    const { service, store, execution } = await setup()
    await expect(service.decide('missing', 'approved', 'agent_1')).rejects.toThrow(
      StoreConflictError
    )

    await store.withSession('cw_1', (tx) =>
      tx.updateExecution(execution.id, { status: 'approved' })
    )
    await expect(
      service.decide(execution.id, 'approved', 'agent_1')
    ).rejects.toThrow(InvalidTransitionError)
  })
})
