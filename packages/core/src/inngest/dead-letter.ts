import { errorMessage } from '../errors'
import { initializeAxiom, log } from '../observability/axiom'
import type { SessionStore } from '../store/types'
import { inngest } from './client'
import { TRIAGE_DEAD_LETTER } from './events'

/**
 * Shape of the `inngest/function.failed` payload this handler reads.
 * Only the fields used here are declared.
 */
export interface FailurePayload {
  error: Error
  event: {
    data?: {
      event?: {
        name?: string
        data?: unknown
      }
    }
  }
}

export interface DeadLetterDeps {
  /** Resolved lazily so building a workflow never opens a connection */
  getStore: () => SessionStore
  send?: (payload: {
    name: typeof TRIAGE_DEAD_LETTER
    data: {
      functionName: string
      errorMessage: string
      errorStack?: string
      originalEventName: string
      sessionId: string | null
      failedAt: string
    }
  }) => Promise<unknown>
}

export function sessionIdOf(data: unknown): string | null {
  if (typeof data !== 'object' || data === null) return null
  if (!('sessionId' in data)) return null
  return typeof data.sessionId === 'string' ? data.sessionId : null
}

/**
 * Creates an `onFailure` handler for use in Inngest function config.
 *
 * When a function exhausts its retries the handler logs the failure, puts
 * the session (when the event names one) on the operator queue with reason
 * `workflow_failed`, and emits `triage/dead-letter` for alerting.
 *
 * ```typescript
 * inngest.createFunction(
 *   { id: 'my-function', onFailure: createDeadLetterHandler('my-function', deps) },
 *   { event: MY_EVENT },
 *   async ({ event, step }) => { ... }
 * )
 * ```
 */
export function createDeadLetterHandler(fnName: string, deps: DeadLetterDeps) {
  const send = deps.send ?? ((payload) => inngest.send(payload))

  return async ({ error, event }: FailurePayload): Promise<void> => {
    initializeAxiom()

    const failedAt = new Date().toISOString()
    const original = event.data?.event
    const originalEventName = original?.name ?? 'unknown'
    const sessionId = sessionIdOf(original?.data)

    await log('error', '[DLQ] Function failed after retries exhausted', {
      workflow: 'dead-letter-queue',
      functionName: fnName,
      error: error.message,
      errorStack: error.stack,
      originalEventName,
      sessionId,
      failedAt,
    })

    if (sessionId) {
      try {
        await deps.getStore().withSession(sessionId, (tx) =>
          tx.enqueueOperator({
            reason: 'workflow_failed',
            error: `${fnName}: ${error.message}`,
          })
        )
      } catch (queueError) {
        await log('error', '[DLQ] Failed to queue session for an operator', {
          workflow: 'dead-letter-queue',
          functionName: fnName,
          sessionId,
          queueError: errorMessage(queueError),
        })
      }
    }

    try {
      await send({
        name: TRIAGE_DEAD_LETTER,
        data: {
          functionName: fnName,
          errorMessage: error.message,
          errorStack: error.stack,
          originalEventName,
          sessionId,
          failedAt,
        },
      })
    } catch (sendError) {
      await log('error', '[DLQ] Failed to emit dead letter event', {
        workflow: 'dead-letter-queue',
        functionName: fnName,
        sendError: errorMessage(sendError),
      })
    }
  }
}
