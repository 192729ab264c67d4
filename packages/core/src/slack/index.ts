export {
  APPROVE_ACTION_ID,
  REJECT_ACTION_ID,
  buildApprovalBlocks,
  buildResolvedBlocks,
  formatToolName,
  parseApprovalAction,
} from './approval-blocks'
export type {
  ApprovalAction,
  ApprovalBlocksInput,
  ApprovalMetadata,
} from './approval-blocks'
export {
  getSlackClient,
  postApprovalMessage,
  resetSlackClient,
  updateApprovalMessage,
} from './client'
