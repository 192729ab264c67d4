/**
 * Typed event definitions for the triage workflows.
 *
 * Event names are exported as const so `createFunction` triggers and
 * `inngest.send` payloads are checked against the same record.
 */

import type { ApprovalDecision } from '../approvals/service'
import type { ApprovalRequest, InboundEvent } from '../engine/triage-engine'

/** A customer message arrived on a support channel */
export const TRIAGE_INBOUND_RECEIVED = 'triage/inbound.received' as const

export type TriageInboundReceivedEvent = {
  name: typeof TRIAGE_INBOUND_RECEIVED
  data: InboundEvent
}

/** The engine parked a cycle on a mutation that needs a reviewer */
export const TRIAGE_APPROVAL_REQUESTED = 'triage/approval.requested' as const

export type TriageApprovalRequestedEvent = {
  name: typeof TRIAGE_APPROVAL_REQUESTED
  data: ApprovalRequest
}

/** A reviewer approved or rejected a pending tool execution */
export const TRIAGE_APPROVAL_DECIDED = 'triage/approval.decided' as const

export type TriageApprovalDecidedEvent = {
  name: typeof TRIAGE_APPROVAL_DECIDED
  data: ApprovalDecision
}

/** A workflow exhausted its retries */
export const TRIAGE_DEAD_LETTER = 'triage/dead-letter' as const

export type TriageDeadLetterEvent = {
  name: typeof TRIAGE_DEAD_LETTER
  data: {
    functionName: string
    errorMessage: string
    errorStack?: string
    originalEventName: string
    sessionId: string | null
    failedAt: string
  }
}

export type Events = {
  [TRIAGE_INBOUND_RECEIVED]: TriageInboundReceivedEvent
  [TRIAGE_APPROVAL_REQUESTED]: TriageApprovalRequestedEvent
  [TRIAGE_APPROVAL_DECIDED]: TriageApprovalDecidedEvent
  [TRIAGE_DEAD_LETTER]: TriageDeadLetterEvent
}
