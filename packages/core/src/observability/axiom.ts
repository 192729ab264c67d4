/**
 * Axiom tracing instrumentation for observability
 *
 * Wraps webhook handlers, engine cycles, tool executions, dispatches and
 * Inngest steps with structured traces keyed by sessionId and cycle.
 */

import { Axiom } from '@axiomhq/js'
import type { LogLevel, TraceAttributes } from './types'

let axiomClient: Axiom | null = null

const DEFAULT_DATASET = 'support-triage'

/**
 * Initialize Axiom client (call once at app startup)
 */
export function initializeAxiom(): void {
  const token = process.env.AXIOM_TOKEN

  if (!token) {
    console.warn('[Axiom] AXIOM_TOKEN not set, tracing disabled')
    return
  }

  axiomClient = new Axiom({ token })
}

/**
 * Flush buffered events. Call before process exit.
 */
export async function flushAxiom(): Promise<void> {
  if (!axiomClient) return
  try {
    await axiomClient.flush()
  } catch (error) {
    console.error('[Axiom] Failed to flush traces:', error)
  }
}

/**
 * Wrap a function execution with tracing
 */
export async function withTracing<T>(
  name: string,
  fn: () => Promise<T>,
  attributes?: TraceAttributes
): Promise<T> {
  const startTime = Date.now()

  try {
    const result = await fn()

    await sendTrace({
      name,
      status: 'success',
      durationMs: Date.now() - startTime,
      ...attributes,
    })

    return result
  } catch (error) {
    await sendTrace({
      name,
      status: 'error',
      durationMs: Date.now() - startTime,
      error: error instanceof Error ? error.message : String(error),
      errorStack: error instanceof Error ? error.stack : undefined,
      ...attributes,
    })

    throw error
  }
}

/**
 * Send trace data to Axiom
 */
async function sendTrace(trace: Record<string, unknown>): Promise<void> {
  if (!axiomClient) {
    // Silently skip if not initialized (e.g., in dev without AXIOM_TOKEN)
    return
  }

  const dataset = process.env.AXIOM_DATASET || DEFAULT_DATASET

  try {
    await axiomClient.ingest(dataset, {
      _time: new Date().toISOString(),
      ...trace,
    })
  } catch (error) {
    // observability failures never reach the caller
    console.error('[Axiom] Failed to send trace:', error)
  }
}

// ============================================================================
// Generic logging
// ============================================================================

/**
 * Log a message to Axiom with optional metadata.
 *
 * Levels map to success/status for error-rate calculations:
 * - debug/info/warn => success=true, status='success'
 * - error           => success=false, status='error'
 */
export async function log(
  level: LogLevel,
  message: string,
  metadata?: Record<string, unknown>
): Promise<void> {
  const isError = level === 'error'
  const reservedFields = {
    name: 'log',
    type: 'log',
    status: isError ? 'error' : 'success',
    success: !isError,
    level,
    message,
  }

  await sendTrace({
    ...metadata,
    ...reservedFields,
  })
}

// ============================================================================
// Rich trace functions with high cardinality
// ============================================================================

/**
 * Trace a classification result
 */
export async function traceClassification(data: {
  sessionId: string
  cycle: number
  category: string
  confidence: number
  rawCategory: string
  classifier: string
  durationMs: number
  messageCount: number
  costUsd?: number
  usage?: {
    inputTokens: number
    outputTokens: number
    totalTokens: number
  }
}): Promise<void> {
  await sendTrace({
    name: 'classifier.run',
    type: 'classification',
    ...data,
  })
}

/**
 * Trace a tool execution
 */
export async function traceToolExecution(data: {
  sessionId?: string
  toolName: string
  success: boolean
  durationMs: number
  error?: string
}): Promise<void> {
  await sendTrace({
    name: `tool.${data.toolName}`,
    type: 'tool',
    ...data,
  })
}

/**
 * Trace approval request sent
 */
export async function traceApprovalRequested(data: {
  sessionId: string
  cycle: number
  executionId: string
  toolName: string
  customerId?: string | null
}): Promise<void> {
  await sendTrace({
    name: 'approval.requested',
    type: 'approval',
    ...data,
  })
}

/**
 * Trace an approval resolution (human or timeout)
 */
export async function traceApprovalResolved(data: {
  sessionId: string
  executionId: string
  toolName: string
  outcome: 'approved' | 'rejected'
  reviewer: string | null
  reason?: string | null
  waitedMs: number
}): Promise<void> {
  await sendTrace({
    name: 'approval.resolved',
    type: 'approval',
    ...data,
  })
}

/**
 * Trace a committed decision, one per cycle
 */
export async function traceDecision(data: {
  sessionId: string
  cycle: number
  decision: string
  rule: string
  category: string | null
  toolExecutions: number
  costUsd: number
  durationMs: number
  errors: string[]
  passes?: number
  outstanding?: string | null
}): Promise<void> {
  await sendTrace({
    name: 'engine.decision',
    type: 'decision',
    ...data,
  })
}

/**
 * Trace a dispatch attempt outcome
 */
export async function traceDispatch(data: {
  sessionId: string
  cycle: number
  decision: string
  outcome: 'dispatched' | 'already_dispatched' | 'in_flight' | 'failed'
  attempts: number
  durationMs: number
  error?: string
}): Promise<void> {
  await sendTrace({
    name: 'dispatch.run',
    type: 'dispatch',
    success: data.outcome !== 'failed',
    ...data,
  })
}

/**
 * Trace workflow step (generic step timing)
 */
export async function traceWorkflowStep(data: {
  sessionId?: string
  workflowName: string
  stepName: string
  durationMs: number
  success: boolean
  error?: string
  metadata?: Record<string, unknown>
}): Promise<void> {
  await sendTrace({
    name: `workflow.step.${data.stepName}`,
    type: 'workflow-step',
    ...data,
  })
}

/**
 * Wrap an Inngest step.run() callback with automatic structured logging.
 *
 * Records start/end timing, success/failure, and emits both a `log()` entry
 * and a `traceWorkflowStep()` trace. Errors are re-thrown after logging.
 *
 * Usage:
 *   const result = await step.run('classify', traceStepBoundary({
 *     workflowName: 'handle-inbound-message',
 *     stepName: 'classify',
 *     sessionId,
 *   }, async () => {
 *     return { ok: true }
 *   }))
 */
export function traceStepBoundary<T>(
  context: {
    workflowName: string
    stepName: string
    sessionId?: string
    eventId?: string
    /** Extra metadata to include in the trace on success */
    metadata?: Record<string, unknown>
  },
  fn: () => Promise<T>
): () => Promise<T> {
  return async () => {
    const stepStartTime = Date.now()
    const base = {
      workflow: context.workflowName,
      step: context.stepName,
      sessionId: context.sessionId,
      eventId: context.eventId,
    }

    await log('debug', `${context.stepName} step started`, base)

    try {
      const result = await fn()
      const durationMs = Date.now() - stepStartTime

      await log('info', `${context.stepName} step completed`, {
        ...base,
        durationMs,
        success: true,
        ...context.metadata,
      })

      await traceWorkflowStep({
        workflowName: context.workflowName,
        sessionId: context.sessionId,
        stepName: context.stepName,
        durationMs,
        success: true,
        metadata: context.metadata,
      })

      return result
    } catch (error) {
      const durationMs = Date.now() - stepStartTime
      const errorMsg = error instanceof Error ? error.message : String(error)

      await log('error', `${context.stepName} step failed`, {
        ...base,
        durationMs,
        success: false,
        error: errorMsg,
      })

      await traceWorkflowStep({
        workflowName: context.workflowName,
        sessionId: context.sessionId,
        stepName: context.stepName,
        durationMs,
        success: false,
        error: errorMsg,
        metadata: context.metadata,
      })

      throw error
    }
  }
}
