export const ERROR_CODES = {
  unknownTool: 'unknown_tool',
  toolExecutionFailed: 'tool_execution_failed',
  approvalRejected: 'approval_rejected',
  invalidTransition: 'invalid_transition',
  dispatchChannelUnavailable: 'dispatch_channel_unavailable',
  storeConflict: 'store_conflict',
  sessionNotFound: 'session_not_found',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export interface TriageErrorOptions {
  message: string
  code: ErrorCode
  sessionId?: string
  cause?: unknown
}

/**
 * Base class for every error the triage core raises on purpose.
 * `code` is stable and safe to log or branch on; `message` is for operators.
 */
export class TriageError extends Error {
  readonly code: ErrorCode
  readonly sessionId?: string

  constructor({ message, code, sessionId, cause }: TriageErrorOptions) {
    super(message)

    if (cause !== undefined) {
      this.cause = cause
    }

    this.name = 'TriageError'
    this.code = code
    this.sessionId = sessionId
  }
}

export class UnknownToolError extends TriageError {
  readonly toolName: string

  constructor(toolName: string) {
    super({
      message: `Unknown tool: ${toolName}`,
      code: ERROR_CODES.unknownTool,
    })
    this.name = 'UnknownToolError'
    this.toolName = toolName
  }
}

export class ToolExecutionFailedError extends TriageError {
  readonly toolName: string

  constructor(toolName: string, reason: string, cause?: unknown) {
    super({
      message: `Tool ${toolName} failed: ${reason}`,
      code: ERROR_CODES.toolExecutionFailed,
      cause,
    })
    this.name = 'ToolExecutionFailedError'
    this.toolName = toolName
  }
}

export class ApprovalRejectedError extends TriageError {
  readonly executionId: string

  constructor(executionId: string, reason?: string) {
    super({
      message: `Execution ${executionId} was rejected${reason ? `: ${reason}` : ''}`,
      code: ERROR_CODES.approvalRejected,
    })
    this.name = 'ApprovalRejectedError'
    this.executionId = executionId
  }
}

export class InvalidTransitionError extends TriageError {
  readonly from: string | null
  readonly to: string

  constructor(entity: string, from: string | null, to: string) {
    super({
      message: `Invalid ${entity} transition: ${from ?? 'none'} -> ${to}`,
      code: ERROR_CODES.invalidTransition,
    })
    this.name = 'InvalidTransitionError'
    this.from = from
    this.to = to
  }
}

export class DispatchChannelUnavailableError extends TriageError {
  readonly attempts: number

  constructor(sessionId: string, attempts: number, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause)
    super({
      message: `Channel unavailable after ${attempts} attempts: ${detail}`,
      code: ERROR_CODES.dispatchChannelUnavailable,
      sessionId,
      cause,
    })
    this.name = 'DispatchChannelUnavailableError'
    this.attempts = attempts
  }
}

export class StoreConflictError extends TriageError {
  constructor(message: string, sessionId?: string, cause?: unknown) {
    super({ message, code: ERROR_CODES.storeConflict, sessionId, cause })
    this.name = 'StoreConflictError'
  }
}

export class SessionNotFoundError extends TriageError {
  constructor(sessionId: string) {
    super({
      message: `Session not found: ${sessionId}`,
      code: ERROR_CODES.sessionNotFound,
      sessionId,
    })
    this.name = 'SessionNotFoundError'
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name
  }
  return String(error)
}
