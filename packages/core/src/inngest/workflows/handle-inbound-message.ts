import type { CycleResult, InboundEvent, TriageEngine } from '../../engine/triage-engine'
import { initializeAxiom, log, traceStepBoundary } from '../../observability/axiom'
import { getRuntime } from '../../runtime'
import { inngest } from '../client'
import { createDeadLetterHandler } from '../dead-letter'
import { TRIAGE_INBOUND_RECEIVED } from '../events'

export async function runInboundCycle(
  engine: TriageEngine,
  inbound: InboundEvent
): Promise<CycleResult> {
  const result = await engine.handleInbound(inbound)
  await log('info', 'inbound cycle finished', {
    workflow: 'handle-inbound-message',
    sessionId: inbound.sessionId,
    eventId: inbound.eventId,
    status: result.status,
  })
  return result
}

/**
 * Runs one evaluation cycle for an inbound customer message.
 *
 * Deliveries for the same session run one at a time; the store lock covers
 * the rest. Redelivered events come back as `duplicate`.
 *
 * Triggered by: triage/inbound.received
 */
export const handleInboundMessage = inngest.createFunction(
  {
    id: 'handle-inbound-message',
    name: 'Handle Inbound Message',
    retries: 3,
    concurrency: { key: 'event.data.sessionId', limit: 1 },
    onFailure: createDeadLetterHandler('handle-inbound-message', {
      getStore: () => getRuntime().store,
    }),
  },
  { event: TRIAGE_INBOUND_RECEIVED },
  async ({ event, step }) => {
    initializeAxiom()
    const { sessionId, eventId } = event.data

    return step.run(
      'run-cycle',
      traceStepBoundary(
        {
          workflowName: 'handle-inbound-message',
          stepName: 'run-cycle',
          sessionId,
          eventId,
        },
        () => runInboundCycle(getRuntime().engine, event.data)
      )
    )
  }
)
