import { InvalidTransitionError } from '../errors'
import type { SessionState, ToolExecutionStatus } from './types'

const SESSION_TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  received: ['classified', 'decided'],
  classified: ['tool_pending', 'decided'],
  tool_pending: ['decided'],
  decided: ['dispatched', 'dispatch_failed'],
  dispatched: ['received'],
  dispatch_failed: ['dispatched', 'received'],
}

export const TERMINAL_SESSION_STATES: readonly SessionState[] = [
  'dispatched',
  'dispatch_failed',
]

export function isTerminalState(state: SessionState): boolean {
  return TERMINAL_SESSION_STATES.includes(state)
}

/**
 * `received` is only reachable from a terminal state, by opening a new cycle.
 * Staying in a non-terminal state is allowed so a recomputation can refresh
 * its fields.
 */
export function assertSessionTransition(
  from: SessionState,
  to: SessionState
): void {
  if (from === to && !isTerminalState(from) && from !== 'decided') return
  if (!SESSION_TRANSITIONS[from].includes(to)) {
    throw new InvalidTransitionError('session', from, to)
  }
}

/**
 * Approval-gated executions are born `pending` and only reach `success`
 * through `approved`. Ungated executions are recorded once they finish.
 */
export function assertExecutionTransition(
  from: ToolExecutionStatus | null,
  to: ToolExecutionStatus,
  requiresApproval: boolean
): void {
  const allowed = nextExecutionStatuses(from, requiresApproval)
  if (!allowed.includes(to)) {
    throw new InvalidTransitionError('tool execution', from, to)
  }
}

function nextExecutionStatuses(
  from: ToolExecutionStatus | null,
  requiresApproval: boolean
): readonly ToolExecutionStatus[] {
  switch (from) {
    case null:
      return requiresApproval ? ['pending', 'failed'] : ['success', 'failed']
    case 'pending':
      return ['approved', 'rejected']
    case 'approved':
      return ['success', 'failed']
    case 'rejected':
    case 'success':
    case 'failed':
      return []
  }
}
