import { z } from 'zod'
import type { SupportTool, ToolContext, ToolKind, ToolResult } from './types'

/**
 * Configuration for creating a support tool.
 *
 * @typeParam TOutput - Parameters after Zod parsing, with defaults applied
 * @typeParam TResult - Tool result type
 */
export interface CreateToolConfig<TOutput, TResult> {
  name: string
  description: string
  kind: ToolKind
  requiresApproval: boolean
  costUsd?: number
  parameters: z.ZodType<TOutput>
  execute: (params: TOutput, context: ToolContext) => Promise<TResult>
}

/**
 * Audit logging hooks
 */
export interface AuditHooks {
  onPreExecute?: (config: {
    toolName: string
    params: unknown
    context: ToolContext
  }) => Promise<void> | void

  onPostExecute?: (config: {
    toolName: string
    params: unknown
    result: unknown
    durationMs: number
    context: ToolContext
  }) => Promise<void> | void

  onError?: (config: {
    toolName: string
    params: unknown
    error: Error
    durationMs: number
    context: ToolContext
  }) => Promise<void> | void
}

/**
 * Global audit hooks registry
 */
let globalAuditHooks: AuditHooks = {}

/**
 * Register global audit hooks for all tools.
 */
export function setAuditHooks(hooks: AuditHooks): void {
  globalAuditHooks = hooks
}

async function runHook(label: string, hook: () => Promise<void> | void) {
  try {
    await hook()
  } catch (hookError) {
    // audit failures never block the tool
    console.error(`[create-tool] ${label} audit hook failed:`, hookError)
  }
}

function validationFailure(error: z.ZodError): ToolResult<never> {
  return {
    success: false,
    error: {
      code: 'VALIDATION_ERROR',
      message: 'Invalid parameters',
      details: z.treeifyError(error),
    },
  }
}

/**
 * Create a type-safe support tool with parameter validation and error handling.
 *
 * @example
 * ```typescript
 * const trackPackage = createTool({
 *   name: 'track_package',
 *   description: 'Latest shipment status for the customer',
 *   kind: 'lookup',
 *   requiresApproval: false,
 *   parameters: z.object({ customerId: z.string() }),
 *   execute: ({ customerId }, { backend }) => backend.trackPackage(customerId),
 * })
 * ```
 */
export function createTool<TOutput, TResult>(
  config: CreateToolConfig<TOutput, TResult>
): SupportTool<TOutput, TResult> {
  return {
    name: config.name,
    description: config.description,
    kind: config.kind,
    requiresApproval: config.requiresApproval,
    costUsd: config.costUsd,
    parameters: config.parameters,

    validate(params) {
      const parsed = config.parameters.safeParse(params)
      return parsed.success
        ? { success: true, data: parsed.data }
        : validationFailure(parsed.error)
    },

    async execute(params, context): Promise<ToolResult<TResult>> {
      const parsed = config.parameters.safeParse(params)
      if (!parsed.success) {
        return validationFailure(parsed.error)
      }

      const validatedParams = parsed.data
      const startTime = Date.now()

      await runHook('Pre-execution', () =>
        globalAuditHooks.onPreExecute?.({
          toolName: config.name,
          params: validatedParams,
          context,
        })
      )

      try {
        const result = await config.execute(validatedParams, context)

        await runHook('Post-execution', () =>
          globalAuditHooks.onPostExecute?.({
            toolName: config.name,
            params: validatedParams,
            result,
            durationMs: Date.now() - startTime,
            context,
          })
        )

        return { success: true, data: result }
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error))

        await runHook('Error', () =>
          globalAuditHooks.onError?.({
            toolName: config.name,
            params: validatedParams,
            error: err,
            durationMs: Date.now() - startTime,
            context,
          })
        )

        return {
          success: false,
          error: {
            code: 'EXECUTION_ERROR',
            message: err.message,
            details: err.stack,
          },
        }
      }
    },
  }
}
