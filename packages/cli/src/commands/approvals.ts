import type { ApprovalOutcome, PendingApproval } from '@support-triage/core'
import type { CommandContext } from '../core/context'
import { UsageError, toCLIError } from '../core/errors'

export interface ApprovalsResolveOptions {
  reviewer?: string
  reason?: string
}

/**
 * '95m' -> '1h 35m'
 */
export function formatWaiting(ms: number): string {
  const minutes = Math.floor(ms / 60_000)
  if (minutes < 1) return `${Math.max(0, Math.floor(ms / 1000))}s`
  const hours = Math.floor(minutes / 60)
  if (hours === 0) return `${minutes}m`
  return `${hours}h ${minutes % 60}m`
}

export function parseVerdict(value: string): ApprovalOutcome {
  switch (value.toLowerCase()) {
    case 'approve':
    case 'approved':
      return 'approved'
    case 'reject':
    case 'rejected':
      return 'rejected'
    default:
      throw new UsageError({
        userMessage: `Unknown verdict "${value}"`,
        suggestion: 'Use approve or reject.',
      })
  }
}

function toRow(pending: PendingApproval) {
  const { execution, session, waitingMs } = pending
  return {
    id: execution.id,
    session: execution.sessionId,
    cycle: execution.cycle,
    tool: execution.toolName,
    customer: session?.customerId ?? '',
    input: execution.input,
    waiting: formatWaiting(waitingMs),
  }
}

export async function approvalsListAction(ctx: CommandContext): Promise<void> {
  const pending = await ctx.runtime().approvals.listPending()

  if (pending.length === 0 && ctx.format === 'text') {
    ctx.output.message('No pending approvals.')
    return
  }

  ctx.output.table(pending.map(toRow), [
    'id',
    'session',
    'cycle',
    'tool',
    'customer',
    'input',
    'waiting',
  ])
}

export async function approvalsResolveAction(
  ctx: CommandContext,
  executionId: string,
  verdict: string,
  options: ApprovalsResolveOptions
): Promise<void> {
  const outcome = parseVerdict(verdict)
  const reviewer = `cli:${options.reviewer ?? process.env.USER ?? 'operator'}`

  try {
    const decision = await ctx
      .runtime()
      .approvals.decide(executionId, outcome, reviewer, options.reason ?? null)

    if (ctx.format === 'json') {
      ctx.output.data(decision)
      return
    }
    ctx.output.success(
      `${outcome === 'approved' ? 'Approved' : 'Rejected'} ${executionId} for ${decision.sessionId}`
    )
  } catch (error) {
    throw toCLIError(error)
  }
}
