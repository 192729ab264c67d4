import type { z } from 'zod'
import type { CommerceBackend } from './backend'

export type ToolKind = 'lookup' | 'mutation'

/**
 * Execution context passed to tool handlers.
 */
export interface ToolContext {
  sessionId: string
  /** Execution row this call is recorded under, once one exists */
  executionId?: string
  customerId: string | null
  backend: CommerceBackend
  /** Reviewer who approved the call, for approval-gated tools */
  approvedBy?: string | null
}

/**
 * Discriminated union for tool execution results.
 */
export type ToolResult<T> =
  | {
      success: true
      data: T
    }
  | {
      success: false
      error: {
        code: 'VALIDATION_ERROR' | 'EXECUTION_ERROR'
        message: string
        details?: unknown
      }
    }

/**
 * What the registry and executor see of a tool. Parameters arrive untyped and
 * are validated by the tool itself.
 */
export interface RegisteredTool {
  /**
   * Unique tool identifier (snake_case)
   */
  readonly name: string
  readonly description: string
  readonly kind: ToolKind
  /**
   * Fixed per tool; copied onto every execution row
   */
  readonly requiresApproval: boolean
  /**
   * Flat cost charged per successful call, in USD
   */
  readonly costUsd?: number

  validate(params: unknown): ToolResult<unknown>
  execute(params: unknown, context: ToolContext): Promise<ToolResult<unknown>>
}

/**
 * Core tool interface for support actions.
 *
 * @typeParam TOutput - Parameters after Zod parsing, with defaults applied
 * @typeParam TResult - Expected result type on success
 */
export interface SupportTool<TOutput = unknown, TResult = unknown>
  extends RegisteredTool {
  readonly parameters: z.ZodType<TOutput>
  execute(params: unknown, context: ToolContext): Promise<ToolResult<TResult>>
}
