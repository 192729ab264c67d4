import { randomUUID } from 'node:crypto'
import {
  type Database,
  DecisionsTable,
  type DecisionRow,
  MessagesTable,
  type MessageRow,
  type NewSessionRow,
  type NewToolExecutionRow,
  OperatorQueueTable,
  type OperatorQueueRow,
  SessionsTable,
  type SessionRow,
  ToolExecutionEventsTable,
  type ToolExecutionEventRow,
  ToolExecutionsTable,
  type ToolExecutionRow,
  TracesTable,
  type TraceRow,
  and,
  asc,
  eq,
  gte,
  isNull,
  lt,
} from '@support-triage/database'
import { SessionNotFoundError, StoreConflictError } from '../errors'
import { toCategory } from '../router/categories'
import { KeyedMutex } from './keyed-mutex'
import { assertExecutionTransition, assertSessionTransition } from './transitions'
import type {
  DecisionRecord,
  Message,
  OperatorQueueEntry,
  Session,
  SessionPatch,
  SessionStore,
  SessionTransaction,
  ToolExecution,
  ToolExecutionEvent,
  ToolExecutionPatch,
  TraceQuery,
  TraceRecord,
  WithSessionOptions,
} from './types'

type Transaction = Parameters<Parameters<Database['transaction']>[0]>[0]

// ============================================================================
// Row mapping
// ============================================================================

export function toSession(row: SessionRow): Session {
  return {
    id: row.id,
    channel: row.channel,
    customerId: row.customer_id,
    category: row.category ? toCategory(row.category) : null,
    confidence: row.confidence,
    state: row.state,
    decision: row.decision,
    escalationReason: row.escalation_reason,
    cycle: row.cycle,
    lastMessageSeq: row.last_message_seq,
    pendingExecutionId: row.pending_execution_id,
    dispatchToken: row.dispatch_token,
    dispatchStatus: row.dispatch_status,
    dispatchSteps: row.dispatch_steps,
    dispatchAttempts: row.dispatch_attempts,
    firstResponseMs: row.first_response_ms,
    resolutionMs: row.resolution_ms,
    cycleStartedAt: row.cycle_started_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

export function toSessionRowPatch(patch: SessionPatch): Partial<NewSessionRow> {
  const row: Partial<NewSessionRow> = {}
  if (patch.customerId !== undefined) row.customer_id = patch.customerId
  if (patch.category !== undefined) row.category = patch.category
  if (patch.confidence !== undefined) row.confidence = patch.confidence
  if (patch.state !== undefined) row.state = patch.state
  if (patch.decision !== undefined) row.decision = patch.decision
  if (patch.escalationReason !== undefined) {
    row.escalation_reason = patch.escalationReason
  }
  if (patch.cycle !== undefined) row.cycle = patch.cycle
  if (patch.pendingExecutionId !== undefined) {
    row.pending_execution_id = patch.pendingExecutionId
  }
  if (patch.dispatchToken !== undefined) row.dispatch_token = patch.dispatchToken
  if (patch.dispatchStatus !== undefined) {
    row.dispatch_status = patch.dispatchStatus
  }
  if (patch.dispatchSteps !== undefined) row.dispatch_steps = patch.dispatchSteps
  if (patch.dispatchAttempts !== undefined) {
    row.dispatch_attempts = patch.dispatchAttempts
  }
  if (patch.firstResponseMs !== undefined) {
    row.first_response_ms = patch.firstResponseMs
  }
  if (patch.resolutionMs !== undefined) row.resolution_ms = patch.resolutionMs
  if (patch.cycleStartedAt !== undefined) {
    row.cycle_started_at = patch.cycleStartedAt
  }
  return row
}

export function toMessage(row: MessageRow): Message {
  return {
    id: row.id,
    sessionId: row.session_id,
    seq: row.seq,
    role: row.role,
    content: row.content,
    eventId: row.event_id,
    costUsd: row.cost_usd,
    latencyMs: row.latency_ms,
    createdAt: row.created_at,
  }
}

export function toExecution(row: ToolExecutionRow): ToolExecution {
  return {
    id: row.id,
    sessionId: row.session_id,
    cycle: row.cycle,
    toolName: row.tool_name,
    input: row.input,
    requiresApproval: row.requires_approval,
    status: row.status,
    result: row.result,
    failureReason: row.failure_reason,
    costUsd: row.cost_usd,
    durationMs: row.duration_ms,
    reviewedBy: row.reviewed_by,
    reviewReason: row.review_reason,
    approvalRequestedAt: row.approval_requested_at,
    createdAt: row.created_at,
    resolvedAt: row.resolved_at,
    startedAt: row.started_at,
    completedAt: row.completed_at,
  }
}

export function toExecutionRowPatch(
  patch: ToolExecutionPatch
): Partial<NewToolExecutionRow> {
  const row: Partial<NewToolExecutionRow> = {}
  if (patch.status !== undefined) row.status = patch.status
  if (patch.result !== undefined) row.result = patch.result
  if (patch.failureReason !== undefined) row.failure_reason = patch.failureReason
  if (patch.costUsd !== undefined) row.cost_usd = patch.costUsd
  if (patch.durationMs !== undefined) row.duration_ms = patch.durationMs
  if (patch.reviewedBy !== undefined) row.reviewed_by = patch.reviewedBy
  if (patch.reviewReason !== undefined) row.review_reason = patch.reviewReason
  if (patch.approvalRequestedAt !== undefined) {
    row.approval_requested_at = patch.approvalRequestedAt
  }
  if (patch.resolvedAt !== undefined) row.resolved_at = patch.resolvedAt
  if (patch.startedAt !== undefined) row.started_at = patch.startedAt
  if (patch.completedAt !== undefined) row.completed_at = patch.completedAt
  return row
}

function toExecutionEvent(row: ToolExecutionEventRow): ToolExecutionEvent {
  return {
    id: row.id,
    executionId: row.execution_id,
    fromStatus: row.from_status,
    toStatus: row.to_status,
    createdAt: row.created_at,
  }
}

export function toDecisionRecord(row: DecisionRow): DecisionRecord {
  return {
    id: row.id,
    sessionId: row.session_id,
    cycle: row.cycle,
    decision: row.decision,
    rule: row.rule,
    reason: row.reason,
    category: row.category ? toCategory(row.category) : null,
    evaluatedThroughSeq: row.evaluated_through_seq,
    reply: row.reply,
    createdAt: row.created_at,
  }
}

export function toTraceRecord(row: TraceRow): TraceRecord {
  return {
    id: row.id,
    sessionId: row.session_id,
    cycle: row.cycle,
    kind: row.kind,
    decision: row.decision,
    category: row.category ? toCategory(row.category) : null,
    toolExecutions: row.tool_executions,
    errors: row.errors,
    costUsd: row.cost_usd,
    durationMs: row.duration_ms,
    createdAt: row.created_at,
  }
}

function toOperatorQueueEntry(row: OperatorQueueRow): OperatorQueueEntry {
  return {
    id: row.id,
    sessionId: row.session_id,
    cycle: row.cycle,
    reason: row.reason,
    error: row.error,
    createdAt: row.created_at,
    resolvedAt: row.resolved_at,
  }
}

/**
 * mysql2 reports unique violations as ER_DUP_ENTRY; drizzle may wrap the
 * driver error in `cause`.
 */
export function isDuplicateKeyError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false
  if ('code' in error && error.code === 'ER_DUP_ENTRY') return true
  return 'cause' in error && isDuplicateKeyError(error.cause)
}

// ============================================================================
// Store
// ============================================================================

export interface DrizzleStoreOptions {
  now?: () => Date
}

/**
 * MySQL-backed store. Each `withSession` call is one database transaction
 * that starts by locking the session row with SELECT ... FOR UPDATE, so
 * workers in other processes serialize on the same row.
 */
export class DrizzleSessionStore implements SessionStore {
  private readonly mutex = new KeyedMutex()
  private readonly now: () => Date

  constructor(
    private readonly db: Database,
    options: DrizzleStoreOptions = {}
  ) {
    this.now = options.now ?? (() => new Date())
  }

  async withSession<T>(
    sessionId: string,
    fn: (tx: SessionTransaction) => Promise<T>,
    options: WithSessionOptions = {}
  ): Promise<T> {
    return this.mutex.run(sessionId, () =>
      this.db.transaction(async (tx) => {
        if (options.create) {
          const now = this.now()
          await tx
            .insert(SessionsTable)
            .ignore()
            .values({
              id: sessionId,
              channel: options.create.channel,
              customer_id: options.create.customerId,
              state: 'received',
              cycle: 1,
              last_message_seq: 0,
              dispatch_status: 'idle',
              dispatch_steps: [],
              dispatch_attempts: 0,
              cycle_started_at: now,
              created_at: now,
              updated_at: now,
            })
        }

        const [row] = await tx
          .select()
          .from(SessionsTable)
          .where(eq(SessionsTable.id, sessionId))
          .for('update')

        if (!row) {
          throw new SessionNotFoundError(sessionId)
        }

        return fn(this.createTransaction(tx, toSession(row)))
      })
    )
  }

  private createTransaction(
    tx: Transaction,
    initial: Session
  ): SessionTransaction {
    let current = initial
    const now = this.now
    const sessionId = initial.id

    const loadExecution = async (executionId: string) => {
      const [row] = await tx
        .select()
        .from(ToolExecutionsTable)
        .where(
          and(
            eq(ToolExecutionsTable.id, executionId),
            eq(ToolExecutionsTable.session_id, sessionId)
          )
        )
      return row ? toExecution(row) : null
    }

    const appendEvent = async (
      executionId: string,
      fromStatus: ToolExecution['status'] | null,
      toStatus: ToolExecution['status']
    ) => {
      await tx.insert(ToolExecutionEventsTable).values({
        id: randomUUID(),
        execution_id: executionId,
        from_status: fromStatus,
        to_status: toStatus,
        created_at: now(),
      })
    }

    return {
      get session() {
        return current
      },

      async updateSession(patch) {
        if (patch.state !== undefined) {
          assertSessionTransition(current.state, patch.state)
        }
        const updatedAt = now()
        await tx
          .update(SessionsTable)
          .set({ ...toSessionRowPatch(patch), updated_at: updatedAt })
          .where(eq(SessionsTable.id, sessionId))
        current = { ...current, ...patch, updatedAt }
        return current
      },

      async listMessages() {
        const rows = await tx
          .select()
          .from(MessagesTable)
          .where(eq(MessagesTable.session_id, sessionId))
          .orderBy(asc(MessagesTable.seq))
        return rows.map(toMessage)
      },

      async findMessageByEventId(eventId) {
        const [row] = await tx
          .select()
          .from(MessagesTable)
          .where(eq(MessagesTable.event_id, eventId))
        return row ? toMessage(row) : null
      },

      async appendMessage(input) {
        const seq = current.lastMessageSeq + 1
        const createdAt = now()
        const id = randomUUID()

        try {
          await tx.insert(MessagesTable).values({
            id,
            session_id: sessionId,
            seq,
            role: input.role,
            content: input.content,
            event_id: input.eventId ?? null,
            cost_usd: input.costUsd ?? null,
            latency_ms: input.latencyMs ?? null,
            created_at: createdAt,
          })
        } catch (error) {
          if (isDuplicateKeyError(error)) {
            throw new StoreConflictError(
              `Duplicate message for session ${sessionId} (event ${input.eventId ?? 'none'})`,
              sessionId,
              error
            )
          }
          throw error
        }

        await tx
          .update(SessionsTable)
          .set({ last_message_seq: seq, updated_at: createdAt })
          .where(eq(SessionsTable.id, sessionId))
        current = { ...current, lastMessageSeq: seq, updatedAt: createdAt }

        return {
          id,
          sessionId,
          seq,
          role: input.role,
          content: input.content,
          eventId: input.eventId ?? null,
          costUsd: input.costUsd ?? null,
          latencyMs: input.latencyMs ?? null,
          createdAt,
        }
      },

      async listExecutions(filter = {}) {
        const rows = await tx
          .select()
          .from(ToolExecutionsTable)
          .where(
            filter.cycle === undefined
              ? eq(ToolExecutionsTable.session_id, sessionId)
              : and(
                  eq(ToolExecutionsTable.session_id, sessionId),
                  eq(ToolExecutionsTable.cycle, filter.cycle)
                )
          )
          .orderBy(asc(ToolExecutionsTable.seq))
        return rows.map(toExecution)
      },

      getExecution: loadExecution,

      async insertExecution(input) {
        assertExecutionTransition(null, input.status, input.requiresApproval)
        const execution: ToolExecution = {
          id: randomUUID(),
          sessionId,
          cycle: current.cycle,
          toolName: input.toolName,
          input: input.input,
          requiresApproval: input.requiresApproval,
          status: input.status,
          result: input.result ?? null,
          failureReason: input.failureReason ?? null,
          costUsd: input.costUsd ?? null,
          durationMs: input.durationMs ?? null,
          reviewedBy: null,
          reviewReason: null,
          approvalRequestedAt: null,
          createdAt: now(),
          resolvedAt: null,
          startedAt: null,
          completedAt: input.completedAt ?? null,
        }

        await tx.insert(ToolExecutionsTable).values({
          id: execution.id,
          session_id: sessionId,
          cycle: execution.cycle,
          tool_name: execution.toolName,
          input: execution.input,
          requires_approval: execution.requiresApproval,
          status: execution.status,
          result: execution.result,
          failure_reason: execution.failureReason,
          cost_usd: execution.costUsd,
          duration_ms: execution.durationMs,
          created_at: execution.createdAt,
          completed_at: execution.completedAt,
        })
        await appendEvent(execution.id, null, execution.status)

        return execution
      },

      async updateExecution(executionId, patch) {
        const existing = await loadExecution(executionId)
        if (!existing) {
          throw new StoreConflictError(
            `Tool execution ${executionId} does not belong to session ${sessionId}`,
            sessionId
          )
        }

        if (patch.status !== undefined && patch.status !== existing.status) {
          assertExecutionTransition(
            existing.status,
            patch.status,
            existing.requiresApproval
          )
          await appendEvent(executionId, existing.status, patch.status)
        }

        await tx
          .update(ToolExecutionsTable)
          .set(toExecutionRowPatch(patch))
          .where(eq(ToolExecutionsTable.id, executionId))

        return { ...existing, ...patch }
      },

      async getDecision(cycle) {
        const [row] = await tx
          .select()
          .from(DecisionsTable)
          .where(
            and(
              eq(DecisionsTable.session_id, sessionId),
              eq(DecisionsTable.cycle, cycle)
            )
          )
        return row ? toDecisionRecord(row) : null
      },

      async recordDecision(input) {
        const record: DecisionRecord = {
          ...input,
          id: randomUUID(),
          sessionId,
          cycle: current.cycle,
          createdAt: now(),
        }

        try {
          await tx.insert(DecisionsTable).values({
            id: record.id,
            session_id: sessionId,
            cycle: record.cycle,
            decision: record.decision,
            rule: record.rule,
            reason: record.reason,
            category: record.category,
            evaluated_through_seq: record.evaluatedThroughSeq,
            reply: record.reply,
            created_at: record.createdAt,
          })
        } catch (error) {
          if (isDuplicateKeyError(error)) {
            throw new StoreConflictError(
              `Cycle ${record.cycle} of session ${sessionId} already has a decision`,
              sessionId,
              error
            )
          }
          throw error
        }

        return record
      },

      async appendTrace(input) {
        const record: TraceRecord = {
          ...input,
          id: randomUUID(),
          sessionId,
          createdAt: now(),
        }
        await tx.insert(TracesTable).values({
          id: record.id,
          session_id: sessionId,
          cycle: record.cycle,
          kind: record.kind,
          decision: record.decision,
          category: record.category,
          tool_executions: record.toolExecutions,
          errors: record.errors,
          cost_usd: record.costUsd,
          duration_ms: record.durationMs,
          created_at: record.createdAt,
        })
        return record
      },

      async enqueueOperator(input) {
        const entry: OperatorQueueEntry = {
          id: randomUUID(),
          sessionId,
          cycle: current.cycle,
          reason: input.reason,
          error: input.error,
          createdAt: now(),
          resolvedAt: null,
        }
        await tx.insert(OperatorQueueTable).values({
          id: entry.id,
          session_id: sessionId,
          cycle: entry.cycle,
          reason: entry.reason,
          error: entry.error,
          created_at: entry.createdAt,
        })
        return entry
      },
    }
  }

  async getSession(sessionId: string): Promise<Session | null> {
    const [row] = await this.db
      .select()
      .from(SessionsTable)
      .where(eq(SessionsTable.id, sessionId))
    return row ? toSession(row) : null
  }

  async findMessageByEventId(eventId: string): Promise<Message | null> {
    const [row] = await this.db
      .select()
      .from(MessagesTable)
      .where(eq(MessagesTable.event_id, eventId))
    return row ? toMessage(row) : null
  }

  async listMessages(sessionId: string): Promise<Message[]> {
    const rows = await this.db
      .select()
      .from(MessagesTable)
      .where(eq(MessagesTable.session_id, sessionId))
      .orderBy(asc(MessagesTable.seq))
    return rows.map(toMessage)
  }

  async getExecution(executionId: string): Promise<ToolExecution | null> {
    const [row] = await this.db
      .select()
      .from(ToolExecutionsTable)
      .where(eq(ToolExecutionsTable.id, executionId))
    return row ? toExecution(row) : null
  }

  async listPendingExecutions(
    options: { createdBefore?: Date } = {}
  ): Promise<ToolExecution[]> {
    const pending = eq(ToolExecutionsTable.status, 'pending')
    const rows = await this.db
      .select()
      .from(ToolExecutionsTable)
      .where(
        options.createdBefore
          ? and(pending, lt(ToolExecutionsTable.created_at, options.createdBefore))
          : pending
      )
      .orderBy(asc(ToolExecutionsTable.seq))
    return rows.map(toExecution)
  }

  async listExecutionEvents(executionId: string): Promise<ToolExecutionEvent[]> {
    const rows = await this.db
      .select()
      .from(ToolExecutionEventsTable)
      .where(eq(ToolExecutionEventsTable.execution_id, executionId))
      .orderBy(asc(ToolExecutionEventsTable.seq))
    return rows.map(toExecutionEvent)
  }

  async listDecisions(sessionId: string): Promise<DecisionRecord[]> {
    const rows = await this.db
      .select()
      .from(DecisionsTable)
      .where(eq(DecisionsTable.session_id, sessionId))
      .orderBy(asc(DecisionsTable.cycle))
    return rows.map(toDecisionRecord)
  }

  async listTraces(query: TraceQuery = {}): Promise<TraceRecord[]> {
    const conditions = [
      query.sessionId ? eq(TracesTable.session_id, query.sessionId) : undefined,
      query.since ? gte(TracesTable.created_at, query.since) : undefined,
    ]
    const rows = await this.db
      .select()
      .from(TracesTable)
      .where(and(...conditions))
      .orderBy(asc(TracesTable.seq))
      .limit(query.limit ?? 1000)
    return rows.map(toTraceRecord)
  }

  async listOperatorQueue(
    options: { includeResolved?: boolean } = {}
  ): Promise<OperatorQueueEntry[]> {
    const rows = await this.db
      .select()
      .from(OperatorQueueTable)
      .where(
        options.includeResolved ? undefined : isNull(OperatorQueueTable.resolved_at)
      )
      .orderBy(asc(OperatorQueueTable.created_at))
    return rows.map(toOperatorQueueEntry)
  }
}

export function createDrizzleStore(
  db: Database,
  options?: DrizzleStoreOptions
): DrizzleSessionStore {
  return new DrizzleSessionStore(db, options)
}
