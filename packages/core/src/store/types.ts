import type {
  DECISIONS,
  DISPATCH_STATUSES,
  MESSAGE_ROLES,
  SESSION_STATES,
  TOOL_EXECUTION_STATUSES,
} from '@support-triage/database'
import type { Category } from '../router/categories'

export type SessionState = (typeof SESSION_STATES)[number]
export type Decision = (typeof DECISIONS)[number]
export type MessageRole = (typeof MESSAGE_ROLES)[number]
export type ToolExecutionStatus = (typeof TOOL_EXECUTION_STATUSES)[number]
export type DispatchStatus = (typeof DISPATCH_STATUSES)[number]

export interface Session {
  id: string
  channel: string
  customerId: string | null
  category: Category | null
  confidence: number | null
  state: SessionState
  decision: Decision | null
  escalationReason: string | null
  cycle: number
  lastMessageSeq: number
  pendingExecutionId: string | null
  dispatchToken: string | null
  dispatchStatus: DispatchStatus
  dispatchSteps: string[]
  dispatchAttempts: number
  firstResponseMs: number | null
  resolutionMs: number | null
  cycleStartedAt: Date
  createdAt: Date
  updatedAt: Date
}

/** Fields the engine and dispatcher may change; identity fields are fixed */
export type SessionPatch = Partial<
  Omit<Session, 'id' | 'channel' | 'createdAt' | 'updatedAt' | 'lastMessageSeq'>
>

export interface NewSession {
  id: string
  channel: string
  customerId: string | null
}

export interface Message {
  id: string
  sessionId: string
  seq: number
  role: MessageRole
  content: string
  eventId: string | null
  costUsd: number | null
  latencyMs: number | null
  createdAt: Date
}

export interface AppendMessageInput {
  role: MessageRole
  content: string
  eventId?: string
  costUsd?: number
  latencyMs?: number
}

export interface ToolExecution {
  id: string
  sessionId: string
  cycle: number
  toolName: string
  input: Record<string, unknown>
  requiresApproval: boolean
  status: ToolExecutionStatus
  result: Record<string, unknown> | null
  failureReason: string | null
  costUsd: number | null
  durationMs: number | null
  reviewedBy: string | null
  reviewReason: string | null
  /** Set once the approval request was handed to reviewers */
  approvalRequestedAt: Date | null
  createdAt: Date
  resolvedAt: Date | null
  startedAt: Date | null
  completedAt: Date | null
}

export interface NewToolExecution {
  toolName: string
  input: Record<string, unknown>
  requiresApproval: boolean
  status: ToolExecutionStatus
  result?: Record<string, unknown> | null
  failureReason?: string | null
  costUsd?: number | null
  durationMs?: number | null
  completedAt?: Date | null
}

export type ToolExecutionPatch = Partial<
  Pick<
    ToolExecution,
    | 'status'
    | 'result'
    | 'failureReason'
    | 'costUsd'
    | 'durationMs'
    | 'reviewedBy'
    | 'reviewReason'
    | 'approvalRequestedAt'
    | 'resolvedAt'
    | 'startedAt'
    | 'completedAt'
  >
>

export interface ToolExecutionEvent {
  id: string
  executionId: string
  fromStatus: ToolExecutionStatus | null
  toStatus: ToolExecutionStatus
  createdAt: Date
}

export interface DecisionRecord {
  id: string
  sessionId: string
  cycle: number
  decision: Decision
  rule: string
  reason: string
  category: Category | null
  evaluatedThroughSeq: number
  reply: string | null
  createdAt: Date
}

export type NewDecisionRecord = Omit<
  DecisionRecord,
  'id' | 'sessionId' | 'cycle' | 'createdAt'
>

export interface TraceToolExecution {
  id: string
  toolName: string
  status: string
  durationMs: number | null
  costUsd: number | null
}

export interface TraceRecord {
  id: string
  sessionId: string
  cycle: number
  kind: string
  decision: Decision | null
  category: Category | null
  toolExecutions: TraceToolExecution[]
  errors: string[]
  costUsd: number
  durationMs: number
  createdAt: Date
}

export type NewTraceRecord = Omit<TraceRecord, 'id' | 'sessionId' | 'createdAt'>

export interface OperatorQueueEntry {
  id: string
  sessionId: string
  cycle: number
  reason: string
  error: string | null
  createdAt: Date
  resolvedAt: Date | null
}

export interface TraceQuery {
  sessionId?: string
  since?: Date
  limit?: number
}

/**
 * Operations available while holding one session's lock. Every write made
 * through a transaction commits together or not at all.
 */
export interface SessionTransaction {
  /** Current session, reflecting writes made earlier in this transaction */
  readonly session: Session

  updateSession(patch: SessionPatch): Promise<Session>

  listMessages(): Promise<Message[]>
  findMessageByEventId(eventId: string): Promise<Message | null>
  /** Assigns the next sequence number and advances `lastMessageSeq` */
  appendMessage(input: AppendMessageInput): Promise<Message>

  listExecutions(filter?: { cycle?: number }): Promise<ToolExecution[]>
  getExecution(executionId: string): Promise<ToolExecution | null>
  insertExecution(input: NewToolExecution): Promise<ToolExecution>
  /** Status changes are validated and appended to the execution history */
  updateExecution(
    executionId: string,
    patch: ToolExecutionPatch
  ): Promise<ToolExecution>

  getDecision(cycle: number): Promise<DecisionRecord | null>
  /** Throws StoreConflictError when the cycle already has a decision */
  recordDecision(input: NewDecisionRecord): Promise<DecisionRecord>

  appendTrace(input: NewTraceRecord): Promise<TraceRecord>
  enqueueOperator(input: {
    reason: string
    error: string | null
  }): Promise<OperatorQueueEntry>
}

export interface WithSessionOptions {
  /** Create the session inside the lock when it does not exist yet */
  create?: NewSession
}

export interface SessionStore {
  /**
   * Run `fn` while holding the session's lock. Throws SessionNotFoundError
   * when the session does not exist and `create` is not given.
   */
  withSession<T>(
    sessionId: string,
    fn: (tx: SessionTransaction) => Promise<T>,
    options?: WithSessionOptions
  ): Promise<T>

  getSession(sessionId: string): Promise<Session | null>
  findMessageByEventId(eventId: string): Promise<Message | null>
  listMessages(sessionId: string): Promise<Message[]>
  getExecution(executionId: string): Promise<ToolExecution | null>
  listPendingExecutions(options?: { createdBefore?: Date }): Promise<ToolExecution[]>
  listExecutionEvents(executionId: string): Promise<ToolExecutionEvent[]>
  listDecisions(sessionId: string): Promise<DecisionRecord[]>
  listTraces(query?: TraceQuery): Promise<TraceRecord[]>
  listOperatorQueue(options?: { includeResolved?: boolean }): Promise<OperatorQueueEntry[]>
}
