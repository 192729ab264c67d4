import type { ApprovalDecision } from '../../approvals/service'
import type { CycleResult, TriageEngine } from '../../engine/triage-engine'
import { InvalidTransitionError } from '../../errors'
import {
  initializeAxiom,
  log,
  traceStepBoundary,
} from '../../observability/axiom'
import { getRuntime } from '../../runtime'
import type { ToolExecutionStatus } from '../../store/types'
import { inngest } from '../client'
import { createDeadLetterHandler } from '../dead-letter'
import { TRIAGE_APPROVAL_DECIDED } from '../events'

export type ResumeOutcome =
  | {
      status: 'resolved'
      executionStatus: ToolExecutionStatus
      result: CycleResult | null
    }
  | { status: 'already_resolved'; executionId: string }

/**
 * Apply a published verdict. A second verdict for the same execution (a
 * double click, or the timeout racing a reviewer) is reported and dropped.
 */
export async function applyDecision(
  engine: TriageEngine,
  decision: ApprovalDecision
): Promise<ResumeOutcome> {
  try {
    const { execution, result } = await engine.resolveApproval(
      decision.executionId,
      decision.outcome,
      { reviewer: decision.reviewer, reason: decision.reason }
    )
    return { status: 'resolved', executionStatus: execution.status, result }
  } catch (error) {
    if (error instanceof InvalidTransitionError) {
      await log('warn', 'approval already resolved', {
        workflow: 'resume-after-approval',
        sessionId: decision.sessionId,
        executionId: decision.executionId,
        outcome: decision.outcome,
        error: error.message,
      })
      return { status: 'already_resolved', executionId: decision.executionId }
    }
    throw error
  }
}

/**
 * Resolves the execution named in an approval decision and re-enters its
 * cycle when the session is still waiting on it.
 *
 * Triggered by: triage/approval.decided
 */
export const resumeAfterApproval = inngest.createFunction(
  {
    id: 'resume-after-approval',
    name: 'Resume After Approval',
    retries: 3,
    concurrency: { key: 'event.data.sessionId', limit: 1 },
    onFailure: createDeadLetterHandler('resume-after-approval', {
      getStore: () => getRuntime().store,
    }),
  },
  { event: TRIAGE_APPROVAL_DECIDED },
  async ({ event, step }) => {
    initializeAxiom()
    const { sessionId, executionId } = event.data

    return step.run(
      'resolve-approval',
      traceStepBoundary(
        {
          workflowName: 'resume-after-approval',
          stepName: 'resolve-approval',
          sessionId,
          metadata: { executionId, outcome: event.data.outcome },
        },
        () => applyDecision(getRuntime().engine, event.data)
      )
    )
  }
)
