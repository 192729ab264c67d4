import { SessionNotFoundError } from '@support-triage/core'
import type {
  DecisionRecord,
  Message,
  Session,
  ToolExecution,
} from '@support-triage/core'
import type { CommandContext } from '../core/context'
import { toCLIError } from '../core/errors'

export interface SessionReport {
  session: Session
  messages: Message[]
  decisions: DecisionRecord[]
  pendingExecution: ToolExecution | null
}

export function renderSessionReport(report: SessionReport): string {
  const { session, messages, decisions, pendingExecution } = report
  const confidence =
    session.confidence === null ? '' : ` (${session.confidence})`

  const lines = [
    `Session ${session.id} (${session.channel})`,
    `Customer: ${session.customerId ?? 'unknown'}`,
    `State: ${session.state}  Cycle: ${session.cycle}  Category: ${session.category ?? 'uncategorized'}${confidence}`,
    `Decision: ${session.decision ?? 'none'}  Dispatch: ${session.dispatchStatus}`,
  ]
  if (session.escalationReason) {
    lines.push(`Escalation: ${session.escalationReason}`)
  }
  if (pendingExecution) {
    lines.push(
      `Awaiting approval: ${pendingExecution.toolName} (${pendingExecution.id})`
    )
  }

  lines.push('', 'Messages:')
  for (const message of messages) {
    lines.push(`  #${message.seq} ${message.role}: ${message.content}`)
  }

  lines.push('', 'Decisions:')
  if (decisions.length === 0) lines.push('  none')
  for (const decision of decisions) {
    lines.push(
      `  cycle ${decision.cycle}: ${decision.decision} (${decision.rule}) ${decision.reason}`
    )
  }

  return lines.join('\n')
}

export async function sessionsShowAction(
  ctx: CommandContext,
  sessionId: string
): Promise<void> {
  const { store } = ctx.runtime()
  const session = await store.getSession(sessionId)
  if (!session) {
    throw toCLIError(new SessionNotFoundError(sessionId))
  }

  const [messages, decisions, pendingExecution] = await Promise.all([
    store.listMessages(sessionId),
    store.listDecisions(sessionId),
    session.pendingExecutionId
      ? store.getExecution(session.pendingExecutionId)
      : Promise.resolve(null),
  ])
  const report: SessionReport = { session, messages, decisions, pendingExecution }

  if (ctx.format === 'json') {
    ctx.output.data(report)
    return
  }
  ctx.output.data(renderSessionReport(report))
}
