import { sql } from 'drizzle-orm'
import {
  boolean,
  datetime,
  double,
  int,
  json,
  mysqlTable,
  serial,
  text,
  unique,
  varchar,
} from 'drizzle-orm/mysql-core'

/** Millisecond precision so rows written within one second keep their order */
const timestamp = (name: string) => datetime(name, { mode: 'date', fsp: 3 })

const createdAt = () =>
  timestamp('created_at').default(sql`CURRENT_TIMESTAMP(3)`).notNull()

export const SESSION_STATES = [
  'received',
  'classified',
  'tool_pending',
  'decided',
  'dispatched',
  'dispatch_failed',
] as const

export const DECISIONS = ['send', 'draft', 'escalate'] as const

export const MESSAGE_ROLES = ['customer', 'assistant', 'system'] as const

export const TOOL_EXECUTION_STATUSES = [
  'pending',
  'approved',
  'rejected',
  'success',
  'failed',
] as const

export const DISPATCH_STATUSES = [
  'idle',
  'in_progress',
  'done',
  'failed',
] as const

/**
 * One conversation thread, from first customer message to terminal dispatch.
 * `cycle` increments when a new customer message arrives after a terminal dispatch.
 */
export const SessionsTable = mysqlTable('TRIAGE_sessions', {
  id: varchar('id', { length: 255 }).primaryKey(),
  channel: varchar('channel', { length: 50 }).notNull(),
  customer_id: varchar('customer_id', { length: 255 }),

  category: varchar('category', { length: 50 }),
  confidence: double('confidence'),
  state: varchar('state', { length: 50, enum: SESSION_STATES })
    .notNull()
    .default('received'),
  decision: varchar('decision', { length: 20, enum: DECISIONS }),
  escalation_reason: text('escalation_reason'),

  cycle: int('cycle').notNull().default(1),
  last_message_seq: int('last_message_seq').notNull().default(0),
  pending_execution_id: varchar('pending_execution_id', { length: 255 }),

  dispatch_token: varchar('dispatch_token', { length: 255 }),
  dispatch_status: varchar('dispatch_status', {
    length: 20,
    enum: DISPATCH_STATUSES,
  })
    .notNull()
    .default('idle'),
  dispatch_steps: json('dispatch_steps').$type<string[]>().notNull(),
  dispatch_attempts: int('dispatch_attempts').notNull().default(0),

  first_response_ms: int('first_response_ms'),
  resolution_ms: int('resolution_ms'),

  cycle_started_at: timestamp('cycle_started_at').notNull(),
  created_at: createdAt(),
  updated_at: timestamp('updated_at')
    .default(sql`CURRENT_TIMESTAMP(3)`)
    .$onUpdateFn(() => new Date())
    .notNull(),
})

/**
 * Conversation messages. `seq` (not wall clock) is the authoritative order.
 * `event_id` is the inbound delivery id; redelivery hits the unique constraint.
 */
export const MessagesTable = mysqlTable(
  'TRIAGE_messages',
  {
    id: varchar('id', { length: 255 }).primaryKey(),
    session_id: varchar('session_id', { length: 255 })
      .notNull()
      .references(() => SessionsTable.id),
    seq: int('seq').notNull(),
    role: varchar('role', { length: 20, enum: MESSAGE_ROLES }).notNull(),
    content: text('content').notNull(),
    event_id: varchar('event_id', { length: 255 }).unique(),

    cost_usd: double('cost_usd'),
    latency_ms: int('latency_ms'),

    created_at: createdAt(),
  },
  (table) => ({
    sessionSeqUnique: unique().on(table.session_id, table.seq),
  })
)

/**
 * Tool calls with the approval workflow.
 * `requires_approval` is copied from the tool definition at creation time.
 */
export const ToolExecutionsTable = mysqlTable('TRIAGE_tool_executions', {
  id: varchar('id', { length: 255 }).primaryKey(),
  /** Insertion order; `created_at` can tie */
  seq: serial('seq'),
  session_id: varchar('session_id', { length: 255 })
    .notNull()
    .references(() => SessionsTable.id),
  cycle: int('cycle').notNull(),

  tool_name: varchar('tool_name', { length: 255 }).notNull(),
  input: json('input').$type<Record<string, unknown>>().notNull(),
  requires_approval: boolean('requires_approval').notNull(),
  status: varchar('status', {
    length: 20,
    enum: TOOL_EXECUTION_STATUSES,
  }).notNull(),

  result: json('result').$type<Record<string, unknown>>(),
  failure_reason: text('failure_reason'),
  cost_usd: double('cost_usd'),
  duration_ms: int('duration_ms'),

  reviewed_by: varchar('reviewed_by', { length: 255 }),
  review_reason: text('review_reason'),
  approval_requested_at: timestamp('approval_requested_at'),

  created_at: createdAt(),
  resolved_at: timestamp('resolved_at'),
  started_at: timestamp('started_at'),
  completed_at: timestamp('completed_at'),
})

/**
 * Append-only status history per tool execution, used to replay the approval trail.
 */
export const ToolExecutionEventsTable = mysqlTable(
  'TRIAGE_tool_execution_events',
  {
    id: varchar('id', { length: 255 }).primaryKey(),
    seq: serial('seq'),
    execution_id: varchar('execution_id', { length: 255 })
      .notNull()
      .references(() => ToolExecutionsTable.id),
    from_status: varchar('from_status', {
      length: 20,
      enum: TOOL_EXECUTION_STATUSES,
    }),
    to_status: varchar('to_status', {
      length: 20,
      enum: TOOL_EXECUTION_STATUSES,
    }).notNull(),
    created_at: createdAt(),
  }
)

/**
 * Decision history: one row per (session, cycle), never updated.
 */
export const DecisionsTable = mysqlTable(
  'TRIAGE_decisions',
  {
    id: varchar('id', { length: 255 }).primaryKey(),
    session_id: varchar('session_id', { length: 255 })
      .notNull()
      .references(() => SessionsTable.id),
    cycle: int('cycle').notNull(),
    decision: varchar('decision', { length: 20, enum: DECISIONS }).notNull(),
    rule: varchar('rule', { length: 100 }).notNull(),
    reason: text('reason').notNull(),
    category: varchar('category', { length: 50 }),
    evaluated_through_seq: int('evaluated_through_seq').notNull(),
    reply: text('reply'),
    created_at: createdAt(),
  },
  (table) => ({
    sessionCycleUnique: unique().on(table.session_id, table.cycle),
  })
)

/**
 * Append-only trace feed consumed by analytics.
 */
export const TracesTable = mysqlTable('TRIAGE_traces', {
  id: varchar('id', { length: 255 }).primaryKey(),
  seq: serial('seq'),
  session_id: varchar('session_id', { length: 255 })
    .notNull()
    .references(() => SessionsTable.id),
  cycle: int('cycle').notNull(),
  kind: varchar('kind', { length: 50 }).notNull(),
  decision: varchar('decision', { length: 20, enum: DECISIONS }),
  category: varchar('category', { length: 50 }),
  tool_executions: json('tool_executions')
    .$type<
      Array<{
        id: string
        toolName: string
        status: string
        durationMs: number | null
        costUsd: number | null
      }>
    >()
    .notNull(),
  errors: json('errors').$type<string[]>().notNull(),
  cost_usd: double('cost_usd').notNull().default(0),
  duration_ms: int('duration_ms').notNull().default(0),
  created_at: createdAt(),
})

/**
 * Sessions whose dispatch exhausted its retries, awaiting an operator.
 */
export const OperatorQueueTable = mysqlTable('TRIAGE_operator_queue', {
  id: varchar('id', { length: 255 }).primaryKey(),
  session_id: varchar('session_id', { length: 255 })
    .notNull()
    .references(() => SessionsTable.id),
  cycle: int('cycle').notNull(),
  reason: varchar('reason', { length: 100 }).notNull(),
  error: text('error'),
  created_at: createdAt(),
  resolved_at: timestamp('resolved_at'),
})

// Type exports for type-safe database operations
export type SessionRow = typeof SessionsTable.$inferSelect
export type NewSessionRow = typeof SessionsTable.$inferInsert

export type MessageRow = typeof MessagesTable.$inferSelect
export type NewMessageRow = typeof MessagesTable.$inferInsert

export type ToolExecutionRow = typeof ToolExecutionsTable.$inferSelect
export type NewToolExecutionRow = typeof ToolExecutionsTable.$inferInsert

export type ToolExecutionEventRow = typeof ToolExecutionEventsTable.$inferSelect

export type DecisionRow = typeof DecisionsTable.$inferSelect
export type NewDecisionRow = typeof DecisionsTable.$inferInsert

export type TraceRow = typeof TracesTable.$inferSelect
export type NewTraceRow = typeof TracesTable.$inferInsert

export type OperatorQueueRow = typeof OperatorQueueTable.$inferSelect
