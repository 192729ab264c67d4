import { traceDecision } from '../observability/axiom'
import type {
  NewTraceRecord,
  SessionStore,
  TraceQuery,
  TraceRecord,
} from '../store/types'

export interface TraceInput extends NewTraceRecord {
  /** Decision rule that fired, forwarded to Axiom only */
  rule?: string
  /** Recompute passes the cycle needed */
  passes?: number
  /** Outstanding-case trigger that tightened the reply gate */
  outstanding?: string | null
}

export interface TraceRecorder {
  record(sessionId: string, input: TraceInput): Promise<TraceRecord>
  list(query?: TraceQuery): Promise<TraceRecord[]>
}

/**
 * Append-only audit feed. Records land in the store first; the Axiom copy
 * is best effort.
 */
export function createTraceRecorder(store: SessionStore): TraceRecorder {
  return {
    async record(sessionId, input) {
      const { rule, passes, outstanding, ...trace } = input
      const record = await store.withSession(sessionId, (tx) =>
        tx.appendTrace(trace)
      )

      await traceDecision({
        sessionId,
        cycle: record.cycle,
        decision: record.decision ?? 'none',
        rule: rule ?? record.kind,
        category: record.category,
        toolExecutions: record.toolExecutions.length,
        costUsd: record.costUsd,
        durationMs: record.durationMs,
        errors: record.errors,
        passes,
        outstanding: outstanding ?? null,
      })

      return record
    },

    async list(query = {}) {
      return store.listTraces(query)
    },
  }
}
