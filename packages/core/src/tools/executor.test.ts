import { beforeEach, describe, expect, it, vi } from 'vitest'
import {
  ApprovalRejectedError,
  InvalidTransitionError,
  UnknownToolError,
} from '../errors'
import { createMemoryStore } from '../store/memory-store'
import { FakeCommerceBackend } from '../testing/fake-backend'
import { createToolExecutor } from './executor'
import { createToolRegistry } from './registry'

vi.mock('../observability/axiom', () => ({
  log: vi.fn(),
  traceApprovalResolved: vi.fn(),
}))

const DAY_MS = 24 * 60 * 60 * 1000

async function setup() {
  let clock = new Date('2026-03-01T10:00:00Z')
  const now = () => clock
  const store = createMemoryStore({ now })
  const backend = new FakeCommerceBackend()
  const executor = createToolExecutor({
    store,
    registry: createToolRegistry(),
    backend,
    approvalTimeoutMs: DAY_MS,
    now,
  })
  await store.withSession('cw_1', async () => undefined, {
    create: { id: 'cw_1', channel: 'chatwoot', customerId: 'cust_1' },
  })
  return {
    store,
    backend,
    executor,
    advance: (ms: number) => {
      clock = new Date(clock.getTime() + ms)
    },
  }
}

describe('createToolExecutor', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('runs lookups immediately and records success', async () => {
    const { executor, backend, store } = await setup()

    const outcome = await executor.invoke('cw_1', 'track_package', {
      customerId: 'cust_1',
    })

    expect(outcome.status).toBe('success')
    expect(backend.callsTo('trackPackage')).toHaveLength(1)
    const history = await store.listExecutionEvents(outcome.execution.id)
    expect(history.map((e) => e.toStatus)).toEqual(['success'])
    expect(outcome.execution.result).toMatchObject({ trackingNumber: 'TRK123' })
  })

  it('records a failed lookup with its reason', async () => {
    const { store } = await setup()
    const executor = createToolExecutor({
      store,
      registry: createToolRegistry(),
      backend: new FakeCommerceBackend({
        trackPackage: async () => {
          throw new Error('carrier timeout')
        },
      }),
      approvalTimeoutMs: DAY_MS,
    })

    const outcome = await executor.invoke('cw_1', 'track_package', {
      customerId: 'cust_1',
    })

    expect(outcome.status).toBe('failed')
    expect(outcome.execution.failureReason).toBe(
      'EXECUTION_ERROR: carrier timeout'
    )
  })

  it('throws UnknownToolError for names outside the registry', async () => {
    const { executor } = await setup()

    await expect(
      executor.invoke('cw_1', 'refund_everything', {})
    ).rejects.toThrow(UnknownToolError)
  })

  it('parks approval-gated tools as pending without calling the backend', async () => {
    const { executor, backend } = await setup()

    const outcome = await executor.invoke('cw_1', 'pause_subscription', {
      customerId: 'cust_1',
      months: 1,
    })

    expect(outcome.status).toBe('pending')
    expect(outcome.execution.requiresApproval).toBe(true)
    expect(backend.callsTo('pauseSubscription')).toHaveLength(0)
    expect(await executor.listPending()).toHaveLength(1)
  })

  it('records invalid mutation input as failed instead of parking it', async () => {
    const { executor } = await setup()

    const outcome = await executor.invoke('cw_1', 'change_frequency', {
      customerId: 'cust_1',
      frequency: 'weekly',
    })

    expect(outcome.status).toBe('failed')
    expect(await executor.listPending()).toHaveLength(0)
  })

  it('runs an approved mutation once and keeps the full history', async () => {
    const { executor, backend, store } = await setup()
    const parked = await executor.invoke('cw_1', 'skip_month', {
      customerId: 'cust_1',
    })

    const approved = await executor.resolveApproval(parked.execution.id, 'approved', {
      reviewer: 'agent@example.com',
    })
    expect(approved.reviewedBy).toBe('agent@example.com')

    const first = await executor.executeApproved(parked.execution.id)
    expect(first.status).toBe('success')
    await expect(executor.executeApproved(parked.execution.id)).rejects.toThrow(
      InvalidTransitionError
    )
    expect(backend.callsTo('skipMonth')).toHaveLength(1)

    const history = await store.listExecutionEvents(parked.execution.id)
    expect(history.map((e) => [e.fromStatus, e.toStatus])).toEqual([
      [null, 'pending'],
      ['pending', 'approved'],
      ['approved', 'success'],
    ])
  })

  it('refuses to execute a pending or rejected execution', async () => {
    const { executor } = await setup()
    const parked = await executor.invoke('cw_1', 'skip_month', {
      customerId: 'cust_1',
    })

    await expect(executor.executeApproved(parked.execution.id)).rejects.toThrow(
      InvalidTransitionError
    )

    await executor.resolveApproval(parked.execution.id, 'rejected', {
      reviewer: 'lead',
      reason: 'customer already paused',
    })
    const refused = executor.executeApproved(parked.execution.id)
    await expect(refused).rejects.toThrow(ApprovalRejectedError)
    await expect(refused).rejects.toThrow(
      `Execution ${parked.execution.id} was rejected: customer already paused`
    )
  })

  it('keeps a single gated execution per cycle', async () => {
    const { executor, store } = await setup()
    const first = await executor.invoke('cw_1', 'pause_subscription', {
      customerId: 'cust_1',
      months: 1,
    })

    const second = await executor.invoke('cw_1', 'skip_month', {
      customerId: 'cust_1',
    })

    expect(first.status).toBe('pending')
    expect(second).toEqual({ status: 'existing', execution: first.execution })
    expect(await store.listPendingExecutions()).toHaveLength(1)
  })

  it('parks once when two workers race for the same cycle', async () => {
    const { executor, store } = await setup()

    const outcomes = await Promise.all([
      executor.invoke('cw_1', 'pause_subscription', {
        customerId: 'cust_1',
        months: 1,
      }),
      executor.invoke('cw_1', 'pause_subscription', {
        customerId: 'cust_1',
        months: 1,
      }),
    ])

    expect(outcomes.map((o) => o.status).sort()).toEqual(['existing', 'pending'])
    expect(await store.listPendingExecutions()).toHaveLength(1)
  })

  it('rejects a second resolution', async () => {
    const { executor } = await setup()
    const parked = await executor.invoke('cw_1', 'skip_month', {
      customerId: 'cust_1',
    })
    await executor.resolveApproval(parked.execution.id, 'approved')

    await expect(
      executor.resolveApproval(parked.execution.id, 'approved')
    ).rejects.toThrow(InvalidTransitionError)
  })

  it('lists pending executions past the approval timeout', async () => {
    const { executor, advance } = await setup()
    await executor.invoke('cw_1', 'skip_month', { customerId: 'cust_1' })

    advance(DAY_MS - 1)
    expect(await executor.expirePending()).toHaveLength(0)

    advance(2)
    expect(await executor.expirePending()).toHaveLength(1)
  })
})
