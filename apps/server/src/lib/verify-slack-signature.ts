import { createHmac, timingSafeEqual } from 'node:crypto'

const MAX_AGE_SECONDS = 5 * 60

/**
 * Verifies a Slack request signature.
 *
 * The signature is `v0=` + hex HMAC-SHA256 of `v0:{timestamp}:{rawBody}`.
 * Requests older than five minutes are rejected as replays.
 */
export function verifySlackSignature(opts: {
  signature: string
  timestamp: string
  body: string
  secret: string
  nowSeconds?: number
}): boolean {
  const { signature, timestamp, body, secret } = opts

  if (!signature.startsWith('v0=')) {
    return false
  }

  const requestTimestamp = Number.parseInt(timestamp, 10)
  const now = opts.nowSeconds ?? Math.floor(Date.now() / 1000)
  if (
    Number.isNaN(requestTimestamp) ||
    Math.abs(now - requestTimestamp) > MAX_AGE_SECONDS
  ) {
    return false
  }

  const expected =
    'v0=' +
    createHmac('sha256', secret).update(`v0:${timestamp}:${body}`).digest('hex')

  if (signature.length !== expected.length) {
    return false
  }
  return timingSafeEqual(Buffer.from(signature), Buffer.from(expected))
}
