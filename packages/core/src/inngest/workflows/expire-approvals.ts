import type { CycleResult, TriageEngine } from '../../engine/triage-engine'
import { initializeAxiom, log } from '../../observability/axiom'
import { getRuntime } from '../../runtime'
import { inngest } from '../client'

export interface SweepReport {
  resumed: number
  statuses: CycleResult['status'][]
}

/**
 * Reject every overdue approval and re-enter its cycle. Catches approvals
 * whose request-approval run never started or died before its timeout.
 */
export async function runApprovalSweep(
  engine: TriageEngine,
  at?: Date
): Promise<SweepReport> {
  const results = await engine.expireApprovals(at)
  await log('info', 'approval sweep finished', {
    workflow: 'expire-approvals',
    resumed: results.length,
  })
  return {
    resumed: results.length,
    statuses: results.map((r) => r.status),
  }
}

/**
 * Cron backstop for the approval timeout.
 */
export const expireApprovalsWorkflow = inngest.createFunction(
  {
    id: 'expire-approvals',
    name: 'Expire Overdue Approvals',
    retries: 3,
    onFailure: async ({ error, event }) => {
      initializeAxiom()
      await log('error', 'expire-approvals workflow failed', {
        workflow: 'expire-approvals',
        error: error.message,
        eventName: event?.name,
      })
    },
  },
  { cron: '*/15 * * * *' }, // Every 15 minutes
  async ({ step }) => {
    initializeAxiom()
    return step.run('expire-approvals', () =>
      runApprovalSweep(getRuntime().engine)
    )
  }
)
