import { EventSchemas, Inngest } from 'inngest'
import type { Events } from './events'

/**
 * Inngest client for the triage engine.
 *
 * Event key is pulled from INNGEST_EVENT_KEY env var.
 *
 * Usage:
 * ```typescript
 * inngest.send({
 *   name: 'triage/inbound.received',
 *   data: { eventId, sessionId, channel, messageText, customerId }
 * })
 * ```
 */
export const inngest = new Inngest({
  id: 'support-triage',
  schemas: new EventSchemas().fromRecord<Events>(),
})
