import { createHmac, timingSafeEqual } from 'node:crypto'
import {
  SIGNATURE_HEADER,
  type ParsedSignature,
  type VerificationOptions,
  type VerificationResult,
  type WebhookHeaders,
} from './types'

const DEFAULT_MAX_AGE_MS = 5 * 60 * 1000
const CLOCK_SKEW_SECONDS = 5

/**
 * Parse `timestamp=<unix>,v1=<hex>[,v1=<hex>...]`. `t=` is accepted as a
 * short form of `timestamp=`.
 */
export function parseSignatureHeader(header: string): ParsedSignature {
  let timestamp: number | undefined
  const signatures: string[] = []

  for (const part of header.split(',')) {
    const [key, value] = part.trim().split('=')
    if (!key || !value) {
      throw new Error('Invalid signature header format')
    }

    if (key === 't' || key === 'timestamp') {
      timestamp = Number.parseInt(value, 10)
      if (Number.isNaN(timestamp)) {
        throw new Error('Invalid timestamp in signature header')
      }
    } else if (key === 'v1') {
      signatures.push(value)
    }
  }

  if (timestamp === undefined) {
    throw new Error('Missing timestamp in signature header')
  }
  if (signatures.length === 0) {
    throw new Error('Missing signatures in signature header')
  }

  return { timestamp, signatures }
}

export function computeSignature(payload: string, secret: string): string {
  return createHmac('sha256', secret).update(payload).digest('hex')
}

/**
 * Build a header value for `body`, as the sender would.
 */
export function signPayload(
  body: string,
  secret: string,
  timestamp: number = Math.floor(Date.now() / 1000)
): string {
  return `timestamp=${timestamp},v1=${computeSignature(`${timestamp}.${body}`, secret)}`
}

export function verifySignature(
  payload: string,
  signature: string,
  secret: string
): boolean {
  const expected = Buffer.from(computeSignature(payload, secret), 'hex')
  const actual = Buffer.from(signature, 'hex')

  if (expected.length !== actual.length) {
    return false
  }
  return timingSafeEqual(expected, actual)
}

export function verifyTimestamp(
  timestamp: number,
  maxAgeMs: number = DEFAULT_MAX_AGE_MS,
  nowMs: number = Date.now()
): boolean {
  const ageSeconds = Math.floor(nowMs / 1000) - timestamp
  if (ageSeconds < -CLOCK_SKEW_SECONDS) {
    return false
  }
  return ageSeconds <= Math.floor(maxAgeMs / 1000)
}

/**
 * Check the signature header of a raw webhook body against every configured
 * secret, rejecting replays outside the age window.
 */
export function verifyWebhook(
  body: string,
  headers: WebhookHeaders,
  options: VerificationOptions
): VerificationResult {
  const {
    secrets,
    maxAgeMs = DEFAULT_MAX_AGE_MS,
    signatureHeader = SIGNATURE_HEADER,
    now = Date.now,
  } = options

  if (secrets.length === 0) {
    return { valid: false, error: 'No webhook secrets provided' }
  }

  const header = headers[signatureHeader]
  if (!header) {
    return { valid: false, error: `Missing ${signatureHeader} header` }
  }

  let parsed: ParsedSignature
  try {
    parsed = parseSignatureHeader(header)
  } catch (error) {
    return {
      valid: false,
      error: error instanceof Error ? error.message : 'Invalid signature header',
    }
  }

  if (!verifyTimestamp(parsed.timestamp, maxAgeMs, now())) {
    return {
      valid: false,
      error: 'Webhook timestamp outside acceptable window (replay protection)',
    }
  }

  const signed = `${parsed.timestamp}.${body}`
  const matches = secrets.some((secret) =>
    parsed.signatures.some((signature) =>
      verifySignature(signed, signature, secret)
    )
  )

  return matches ? { valid: true } : { valid: false, error: 'No valid signature found' }
}
