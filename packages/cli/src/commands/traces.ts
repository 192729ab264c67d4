import type { TraceQuery } from '@support-triage/core'
import type { CommandContext } from '../core/context'
import { UsageError } from '../core/errors'

export interface TracesExportOptions {
  since?: string
  session?: string
  limit?: string
}

export function toTraceQuery(options: TracesExportOptions): TraceQuery {
  const query: TraceQuery = {}

  if (options.since !== undefined) {
    const since = new Date(options.since)
    if (Number.isNaN(since.getTime())) {
      throw new UsageError({
        userMessage: `Invalid --since value "${options.since}"`,
        suggestion: 'Pass an ISO date such as 2026-03-01 or 2026-03-01T10:00:00Z.',
      })
    }
    query.since = since
  }

  if (options.limit !== undefined) {
    const limit = Number(options.limit)
    if (!Number.isInteger(limit) || limit < 1) {
      throw new UsageError({
        userMessage: `Invalid --limit value "${options.limit}"`,
        suggestion: 'Pass a positive whole number.',
      })
    }
    query.limit = limit
  }

  if (options.session) query.sessionId = options.session
  return query
}

/**
 * Write decision traces as JSON lines, oldest first, for offline analysis.
 */
export async function tracesExportAction(
  ctx: CommandContext,
  options: TracesExportOptions
): Promise<void> {
  const traces = await ctx.runtime().store.listTraces(toTraceQuery(options))
  ctx.output.lines(traces)
  ctx.output.message(`Exported ${traces.length} trace(s).`)
}
