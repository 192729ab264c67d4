import { beforeEach, describe, expect, it } from 'vitest'
import { CLIError, EXIT_CODES, UsageError } from '../core/errors'
import { type Harness, createHarness, seedPendingApproval } from '../testing/harness'
import {
  approvalsListAction,
  approvalsResolveAction,
  formatWaiting,
  parseVerdict,
} from './approvals'

describe('formatWaiting', () => {
  it('renders hours and minutes', () => {
    expect(formatWaiting(95 * 60_000)).toBe('1h 35m')
    expect(formatWaiting(5 * 60_000)).toBe('5m')
    expect(formatWaiting(30_000)).toBe('30s')
  })
})

describe('parseVerdict', () => {
  it('accepts short and past-tense forms', () => {
    expect(parseVerdict('approve')).toBe('approved')
    expect(parseVerdict('REJECTED')).toBe('rejected')
  })

  it('rejects anything else as a usage error', () => {
    expect(() => parseVerdict('maybe')).toThrow(UsageError)
  })
})

describe('approvals list', () => {
  let harness: Harness

  beforeEach(() => {
    harness = createHarness()
  })

  it('says so when nothing is pending', async () => {
    await approvalsListAction(harness.context('text'))

    expect(harness.stdout.text).toBe('')
    expect(harness.stderr.text).toBe('No pending approvals.\n')
  })

  it('lists pending executions with their wait time', async () => {
    const executionId = await seedPendingApproval(harness)

    await approvalsListAction(harness.context('json'))

    expect(JSON.parse(harness.stdout.text)).toEqual({
      columns: ['id', 'session', 'cycle', 'tool', 'customer', 'input', 'waiting'],
      rows: [
        {
          id: executionId,
          session: 'cw_5',
          cycle: 1,
          tool: 'pause_subscription',
          customer: 'pat@example.com',
          input: { subscriptionId: 'sub_1', weeks: 4 },
          waiting: '1h 35m',
        },
      ],
    })
  })
})

describe('approvals resolve', () => {
  let harness: Harness

  beforeEach(() => {
    harness = createHarness()
  })

  it('publishes the verdict with the reviewer', async () => {
    const executionId = await seedPendingApproval(harness)

    await approvalsResolveAction(harness.context('text'), executionId, 'approve', {
      reviewer: 'sam',
    })

    expect(harness.published).toEqual([
      {
        executionId,
        sessionId: 'cw_5',
        outcome: 'approved',
        reviewer: 'cli:sam',
        reason: null,
        decidedAt: '2026-03-01T11:35:00.000Z',
      },
    ])
    expect(harness.stderr.text).toBe(
      `SUCCESS: Approved ${executionId} for cw_5\n`
    )
  })

  it('prints the decision as JSON', async () => {
    const executionId = await seedPendingApproval(harness)

    await approvalsResolveAction(harness.context('json'), executionId, 'reject', {
      reviewer: 'sam',
      reason: 'customer asked twice',
    })

    expect(JSON.parse(harness.stdout.text)).toMatchObject({
      executionId,
      outcome: 'rejected',
      reason: 'customer asked twice',
    })
  })

  it('exits with the conflict code for an unknown execution', async () => {
    const error = await approvalsResolveAction(
      harness.context('text'),
      'exec_missing',
      'approve',
      { reviewer: 'sam' }
    ).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(CLIError)
    expect(error).toMatchObject({
      exitCode: EXIT_CODES.conflict,
      userMessage: 'Tool execution not found: exec_missing',
    })
    expect(harness.published).toEqual([])
  })

  it('refuses to decide twice', async () => {
    const executionId = await seedPendingApproval(harness)
    await harness.runtime.store.withSession('cw_5', (tx) =>
      tx.updateExecution(executionId, { status: 'rejected' })
    )

    const error = await approvalsResolveAction(
      harness.context('text'),
      executionId,
      'approve',
      { reviewer: 'sam' }
    ).catch((e: unknown) => e)

    expect(error).toMatchObject({
      exitCode: EXIT_CODES.conflict,
      userMessage: 'Invalid tool execution transition: rejected -> approved',
      suggestion: 'Run `triage approvals list` to see what is still pending.',
    })
  })
})
