/**
 * All Inngest workflows, for the serve handler.
 */

export { expireApprovalsWorkflow } from './expire-approvals'
export { handleInboundMessage } from './handle-inbound-message'
export { requestApproval } from './request-approval'
export { resumeAfterApproval } from './resume-after-approval'

import { expireApprovalsWorkflow } from './expire-approvals'
import { handleInboundMessage } from './handle-inbound-message'
import { requestApproval } from './request-approval'
import { resumeAfterApproval } from './resume-after-approval'

export const allWorkflows = [
  handleInboundMessage,
  requestApproval,
  resumeAfterApproval,
  expireApprovalsWorkflow,
]
