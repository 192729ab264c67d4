import type { ApprovalDecision } from '../../approvals/service'
import type { ApprovalRequest } from '../../engine/triage-engine'
import {
  initializeAxiom,
  log,
  traceStepBoundary,
} from '../../observability/axiom'
import { getRuntime } from '../../runtime'
import {
  buildApprovalBlocks,
  buildResolvedBlocks,
  formatToolName,
} from '../../slack/approval-blocks'
import {
  postApprovalMessage,
  updateApprovalMessage,
} from '../../slack/client'
import { inngest } from '../client'
import { createDeadLetterHandler } from '../dead-letter'
import {
  TRIAGE_APPROVAL_DECIDED,
  TRIAGE_APPROVAL_REQUESTED,
} from '../events'

export interface SlackPost {
  ts: string
  channel: string
}

/**
 * Post the approval card. Returns null when no review channel is
 * configured; reviewers then use the CLI or the HTTP API.
 */
export async function notifyReviewers(
  request: ApprovalRequest,
  channel: string | undefined = process.env.SLACK_APPROVAL_CHANNEL
): Promise<SlackPost | null> {
  if (!channel) {
    await log('warn', 'SLACK_APPROVAL_CHANNEL not configured, skipping card', {
      workflow: 'request-approval',
      sessionId: request.sessionId,
      executionId: request.executionId,
    })
    return null
  }

  return postApprovalMessage(
    channel,
    buildApprovalBlocks(request),
    `Approval needed for ${formatToolName(request.toolName)}`
  )
}

export async function markCardResolved(
  post: SlackPost,
  request: ApprovalRequest,
  decision: Pick<ApprovalDecision, 'outcome' | 'reviewer' | 'reason'>
): Promise<void> {
  await updateApprovalMessage(
    post.channel,
    post.ts,
    buildResolvedBlocks({
      toolName: request.toolName,
      outcome: decision.outcome,
      reviewer: decision.reviewer,
      reason: decision.reason,
    }),
    `${formatToolName(request.toolName)} ${decision.outcome}`
  )
}

/** Inngest wants a duration string, seconds are precise enough */
export function toTimeout(ms: number): `${number}s` {
  return `${Math.max(1, Math.ceil(ms / 1000))}s`
}

/**
 * Workflow: route a parked tool call to reviewers and enforce the timeout.
 *
 * Posts a Slack card, then waits for triage/approval.decided with the same
 * executionId. The decision itself is applied by resume-after-approval; this
 * workflow only keeps the card current. When the wait runs out the engine
 * rejects every overdue approval with reason `approval_timeout`.
 *
 * Triggered by: triage/approval.requested
 */
export const requestApproval = inngest.createFunction(
  {
    id: 'request-approval',
    name: 'Request Human Approval',
    retries: 3,
    onFailure: createDeadLetterHandler('request-approval', {
      getStore: () => getRuntime().store,
    }),
  },
  { event: TRIAGE_APPROVAL_REQUESTED },
  async ({ event, step }) => {
    initializeAxiom()
    const request = event.data
    const { sessionId, executionId } = request

    const post = await step.run(
      'send-slack-notification',
      traceStepBoundary(
        {
          workflowName: 'request-approval',
          stepName: 'send-slack-notification',
          sessionId,
          metadata: { executionId },
        },
        () => notifyReviewers(request)
      )
    )

    const decision = await step.waitForEvent('wait-for-approval-decision', {
      event: TRIAGE_APPROVAL_DECIDED,
      timeout: toTimeout(getRuntime().config.approvalTimeoutMs),
      match: 'data.executionId',
    })

    if (!decision) {
      const results = await step.run(
        'expire-approvals',
        traceStepBoundary(
          {
            workflowName: 'request-approval',
            stepName: 'expire-approvals',
            sessionId,
            metadata: { executionId },
          },
          () => getRuntime().engine.expireApprovals()
        )
      )

      if (post) {
        await step.run('update-slack-card', () =>
          markCardResolved(post, request, {
            outcome: 'rejected',
            reviewer: 'system',
            reason: 'approval_timeout',
          })
        )
      }

      return { result: 'timeout', executionId, resumed: results.length }
    }

    if (post) {
      await step.run('update-slack-card', () =>
        markCardResolved(post, request, decision.data)
      )
    }

    return { result: decision.data.outcome, executionId }
  }
)
