export const SIGNATURE_HEADER = 'x-chatwoot-signature'

/**
 * Lower-cased request headers
 */
export type WebhookHeaders = Record<string, string | undefined>

export interface ParsedSignature {
  /** Unix seconds at signing time */
  timestamp: number
  /** Hex signatures; more than one during a secret rotation */
  signatures: string[]
}

export type VerificationResult =
  | { valid: true }
  | { valid: false; error: string }

export interface VerificationOptions {
  /** Every secret is tried, so old and new secrets overlap during rotation */
  secrets: string[]
  /** Default: 5 minutes */
  maxAgeMs?: number
  signatureHeader?: string
  now?: () => number
}
