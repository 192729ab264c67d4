export type {
  ParsedSignature,
  VerificationOptions,
  VerificationResult,
  WebhookHeaders,
} from './types'
export { SIGNATURE_HEADER } from './types'

export {
  computeSignature,
  parseSignatureHeader,
  signPayload,
  verifySignature,
  verifyTimestamp,
  verifyWebhook,
} from './verify'

export {
  ChatwootWebhookSchema,
  parseChatwootWebhook,
  type ChatwootWebhook,
  type ParsedWebhook,
} from './chatwoot'
