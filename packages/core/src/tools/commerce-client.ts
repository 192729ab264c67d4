import { createHmac } from 'node:crypto'
import type { z } from 'zod'
import {
  BoxContentsSchema,
  type CommerceBackend,
  CustomerHistorySchema,
  MutationResultSchema,
  PaymentHistorySchema,
  SubscriptionSchema,
  TrackingInfoSchema,
} from './backend'

export class CommerceApiError extends Error {
  constructor(
    message: string,
    public readonly status: number
  ) {
    super(message)
    this.name = 'CommerceApiError'
  }
}

/**
 * Client for the commerce backend with HMAC-signed requests.
 *
 * All requests POST to one endpoint with the action in the body, signed as
 * `timestamp=<unix>,v1=<hex>` over `<timestamp>.<body>`.
 *
 * @example
 * ```typescript
 * const client = new CommerceClient({
 *   baseUrl: 'https://shop.example.com/api/support',
 *   webhookSecret: 'test-secret',
 * })
 *
 * const tracking = await client.trackPackage('cust_123')
 * ```
 */
export class CommerceClient implements CommerceBackend {
  private readonly baseUrl: string
  private readonly webhookSecret: string
  private readonly fetchImpl: typeof fetch

  constructor(config: {
    baseUrl: string
    webhookSecret: string
    fetch?: typeof fetch
  }) {
    // Strip trailing slash for consistent URL construction
    this.baseUrl = config.baseUrl.replace(/\/$/, '')
    this.webhookSecret = config.webhookSecret
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init))
  }

  private generateSignature(body: string): string {
    const timestamp = Math.floor(Date.now() / 1000)
    const signature = createHmac('sha256', this.webhookSecret)
      .update(`${timestamp}.${body}`)
      .digest('hex')

    return `timestamp=${timestamp},v1=${signature}`
  }

  private async request<T>(
    action: string,
    payload: Record<string, unknown>,
    schema: z.ZodType<T>
  ): Promise<T> {
    const body = JSON.stringify({ action, ...payload })

    const response = await this.fetchImpl(this.baseUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'X-Triage-Signature': this.generateSignature(body),
      },
      body,
    })

    const json: unknown = await response.json().catch(() => null)

    if (!response.ok) {
      const message =
        json !== null &&
        typeof json === 'object' &&
        'error' in json &&
        typeof json.error === 'string'
          ? json.error
          : `Commerce request failed: ${response.status} ${response.statusText}`
      throw new CommerceApiError(message, response.status)
    }

    const parsed = schema.safeParse(json)
    if (!parsed.success) {
      throw new CommerceApiError(
        `Unexpected ${action} response: ${parsed.error.message}`,
        response.status
      )
    }
    return parsed.data
  }

  getSubscription(customerId: string) {
    return this.request('getSubscription', { customerId }, SubscriptionSchema)
  }

  trackPackage(customerId: string) {
    return this.request('trackPackage', { customerId }, TrackingInfoSchema)
  }

  getPaymentHistory(customerId: string) {
    return this.request('getPaymentHistory', { customerId }, PaymentHistorySchema)
  }

  getCustomerHistory(customerId: string) {
    return this.request(
      'getCustomerHistory',
      { customerId },
      CustomerHistorySchema
    )
  }

  getBoxContents(customerId: string) {
    return this.request('getBoxContents', { customerId }, BoxContentsSchema)
  }

  pauseSubscription(customerId: string, months: number) {
    return this.request(
      'pauseSubscription',
      { customerId, months },
      MutationResultSchema
    )
  }

  skipMonth(customerId: string) {
    return this.request('skipMonth', { customerId }, MutationResultSchema)
  }

  changeFrequency(customerId: string, frequency: string) {
    return this.request(
      'changeFrequency',
      { customerId, frequency },
      MutationResultSchema
    )
  }

  changeAddress(customerId: string, newAddress: string) {
    return this.request(
      'changeAddress',
      { customerId, newAddress },
      MutationResultSchema
    )
  }

  createDamageClaim(customerId: string, description: string) {
    return this.request(
      'createDamageClaim',
      { customerId, description },
      MutationResultSchema
    )
  }
}
