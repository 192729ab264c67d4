/**
 * Inngest module for the triage engine.
 *
 * Exports the typed client, event names, the dead-letter handler and every
 * workflow. Servers mount them with the adapter for their framework:
 *
 * ```typescript
 * import { serve } from 'inngest/fastify'
 * import { allWorkflows, inngest } from '@support-triage/core/inngest'
 *
 * app.route({ method: ['GET', 'POST', 'PUT'], url: '/api/inngest', handler: serve({ client: inngest, functions: allWorkflows }) })
 * ```
 */

export { inngest } from './client'
export type {
  Events,
  TriageApprovalDecidedEvent,
  TriageApprovalRequestedEvent,
  TriageDeadLetterEvent,
  TriageInboundReceivedEvent,
} from './events'
export {
  TRIAGE_APPROVAL_DECIDED,
  TRIAGE_APPROVAL_REQUESTED,
  TRIAGE_DEAD_LETTER,
  TRIAGE_INBOUND_RECEIVED,
} from './events'
export { createDeadLetterHandler, sessionIdOf } from './dead-letter'
export type { DeadLetterDeps, FailurePayload } from './dead-letter'
export {
  allWorkflows,
  handleInboundMessage,
  requestApproval,
  resumeAfterApproval,
} from './workflows'
