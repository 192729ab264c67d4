import type { SessionRow, ToolExecutionRow } from '@support-triage/database'
import { describe, expect, it } from 'vitest'
import {
  isDuplicateKeyError,
  toExecution,
  toExecutionRowPatch,
  toSession,
  toSessionRowPatch,
} from './drizzle-store'

const row: SessionRow = {
  id: 'cw_7',
  channel: 'chatwoot',
  customer_id: 'cust_7',
  category: 'not-a-category',
  confidence: 0.5,
  state: 'decided',
  decision: 'draft',
  escalation_reason: null,
  cycle: 2,
  last_message_seq: 4,
  pending_execution_id: null,
  dispatch_token: 'cw_7:2:draft',
  dispatch_status: 'in_progress',
  dispatch_steps: ['private_note'],
  dispatch_attempts: 1,
  first_response_ms: 1200,
  resolution_ms: null,
  cycle_started_at: new Date('2026-01-01T00:00:00Z'),
  created_at: new Date('2026-01-01T00:00:00Z'),
  updated_at: new Date('2026-01-01T00:01:00Z'),
}

describe('drizzle row mapping', () => {
  it('maps a session row and collapses unknown categories', () => {
    const session = toSession(row)

    expect(session).toMatchObject({
      id: 'cw_7',
      customerId: 'cust_7',
      category: 'uncategorized',
      state: 'decided',
      dispatchSteps: ['private_note'],
      lastMessageSeq: 4,
    })
  })

  it('only writes the fields present in a patch', () => {
    expect(
      toSessionRowPatch({ state: 'dispatched', dispatchStatus: 'done' })
    ).toEqual({ state: 'dispatched', dispatch_status: 'done' })
  })

  it('keeps explicit nulls in a patch', () => {
    expect(toSessionRowPatch({ pendingExecutionId: null })).toEqual({
      pending_execution_id: null,
    })
  })
})

describe('tool execution rows', () => {
  const executionRow: ToolExecutionRow = {
    id: 'exec_3',
    seq: 41,
    session_id: 'cw_7',
    cycle: 2,
    tool_name: 'skip_month',
    input: { customerId: 'cust_7' },
    requires_approval: true,
    status: 'pending',
    result: null,
    failure_reason: null,
    cost_usd: null,
    duration_ms: null,
    reviewed_by: null,
    review_reason: null,
    approval_requested_at: new Date('2026-01-01T00:00:00.250Z'),
    created_at: new Date('2026-01-01T00:00:00.125Z'),
    resolved_at: null,
    started_at: null,
    completed_at: null,
  }

  it('maps the approval hand-off and keeps milliseconds', () => {
    const execution = toExecution(executionRow)

    expect(execution.approvalRequestedAt?.toISOString()).toBe(
      '2026-01-01T00:00:00.250Z'
    )
    expect(execution.createdAt.toISOString()).toBe('2026-01-01T00:00:00.125Z')
    expect(execution).not.toHaveProperty('seq')
  })

  it('writes the approval hand-off timestamp on its own', () => {
    const at = new Date('2026-01-01T00:00:01Z')

    expect(toExecutionRowPatch({ approvalRequestedAt: at })).toEqual({
      approval_requested_at: at,
    })
  })
})

describe('isDuplicateKeyError', () => {
  it('detects the driver error directly and through cause', () => {
    const driverError = Object.assign(new Error('Duplicate entry'), {
      code: 'ER_DUP_ENTRY',
    })

    expect(isDuplicateKeyError(driverError)).toBe(true)
    expect(isDuplicateKeyError(new Error('wrapped', { cause: driverError }))).toBe(
      true
    )
    expect(isDuplicateKeyError(new Error('other'))).toBe(false)
    expect(isDuplicateKeyError('ER_DUP_ENTRY')).toBe(false)
  })
})
