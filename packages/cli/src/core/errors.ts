import {
  ApprovalRejectedError,
  InvalidTransitionError,
  SessionNotFoundError,
  StoreConflictError,
  ToolExecutionFailedError,
} from '@support-triage/core'

export const EXIT_CODES = {
  success: 0,
  error: 1,
  usage: 2,
  notFound: 3,
  conflict: 4,
} as const

export interface CLIErrorOptions {
  userMessage: string
  exitCode?: number
  suggestion?: string
  cause?: unknown
}

export class CLIError extends Error {
  userMessage: string
  exitCode: number
  suggestion?: string

  constructor({
    userMessage,
    exitCode = EXIT_CODES.error,
    suggestion,
    cause,
  }: CLIErrorOptions) {
    super(userMessage)

    if (cause !== undefined) {
      this.cause = cause
    }

    this.name = 'CLIError'
    this.userMessage = userMessage
    this.exitCode = exitCode
    this.suggestion = suggestion
  }
}

export class UsageError extends CLIError {
  constructor(options: Omit<CLIErrorOptions, 'exitCode'>) {
    super({ ...options, exitCode: EXIT_CODES.usage })
    this.name = 'UsageError'
  }
}

/**
 * Map engine errors onto exit codes an operator script can branch on.
 */
export function toCLIError(error: unknown): CLIError {
  if (error instanceof CLIError) return error
  if (error instanceof SessionNotFoundError) {
    return new CLIError({
      userMessage: error.message,
      exitCode: EXIT_CODES.notFound,
      cause: error,
    })
  }
  if (error instanceof InvalidTransitionError) {
    return new CLIError({
      userMessage: error.message,
      exitCode: EXIT_CODES.conflict,
      suggestion: 'Run `triage approvals list` to see what is still pending.',
      cause: error,
    })
  }
  if (error instanceof ApprovalRejectedError) {
    return new CLIError({
      userMessage: error.message,
      exitCode: EXIT_CODES.conflict,
      suggestion: 'A rejected execution never runs; the cycle escalates instead.',
      cause: error,
    })
  }
  if (error instanceof ToolExecutionFailedError) {
    return new CLIError({
      userMessage: error.message,
      suggestion: `Check the commerce backend, then resume the session to retry ${error.toolName}.`,
      cause: error,
    })
  }
  if (error instanceof StoreConflictError) {
    return new CLIError({
      userMessage: error.message,
      exitCode: EXIT_CODES.conflict,
      cause: error,
    })
  }
  return new CLIError({
    userMessage:
      error instanceof Error && error.message
        ? error.message
        : 'An unexpected error occurred.',
    cause: error,
  })
}

export function formatError(error: unknown): string {
  const cliError = toCLIError(error)
  if (cliError.suggestion) {
    return `${cliError.userMessage}\nSuggestion: ${cliError.suggestion}`
  }
  return cliError.userMessage
}
