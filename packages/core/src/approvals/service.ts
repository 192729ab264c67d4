import { InvalidTransitionError, StoreConflictError } from '../errors'
import { log } from '../observability/axiom'
import type { Session, SessionStore, ToolExecution } from '../store/types'
import type { ApprovalOutcome } from '../tools/executor'

export interface PendingApproval {
  execution: ToolExecution
  session: Session | null
  waitingMs: number
}

export interface ApprovalDecision {
  executionId: string
  sessionId: string
  outcome: ApprovalOutcome
  reviewer: string
  reason: string | null
  decidedAt: string
}

export interface ApprovalService {
  listPending(): Promise<PendingApproval[]>
  /**
   * Validate and publish a reviewer's verdict. The execution itself is
   * resolved by whoever consumes the published decision.
   */
  decide(
    executionId: string,
    outcome: ApprovalOutcome,
    reviewer: string,
    reason?: string | null
  ): Promise<ApprovalDecision>
}

export interface ApprovalServiceOptions {
  store: SessionStore
  publish: (decision: ApprovalDecision) => Promise<void>
  now?: () => Date
}

export function createApprovalService(
  options: ApprovalServiceOptions
): ApprovalService {
  const { store, publish } = options
  const now = options.now ?? (() => new Date())

  return {
    async listPending() {
      const executions = await store.listPendingExecutions()
      const at = now().getTime()
      return Promise.all(
        executions.map(async (execution) => ({
          execution,
          session: await store.getSession(execution.sessionId),
          waitingMs: at - execution.createdAt.getTime(),
        }))
      )
    },

    async decide(executionId, outcome, reviewer, reason = null) {
      const execution = await store.getExecution(executionId)
      if (!execution) {
        throw new StoreConflictError(`Tool execution not found: ${executionId}`)
      }
      if (execution.status !== 'pending') {
        throw new InvalidTransitionError(
          'tool execution',
          execution.status,
          outcome
        )
      }

      const decision: ApprovalDecision = {
        executionId,
        sessionId: execution.sessionId,
        outcome,
        reviewer,
        reason,
        decidedAt: now().toISOString(),
      }
      await publish(decision)
      await log('info', 'approval decision published', {
        sessionId: execution.sessionId,
        executionId,
        toolName: execution.toolName,
        outcome,
        reviewer,
      })
      return decision
    },
  }
}
