import { createHmac } from 'node:crypto'
import { describe, expect, it, vi } from 'vitest'
import { CommerceApiError, CommerceClient } from './commerce-client'

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  })
}

describe('CommerceClient', () => {
  it('signs the body and validates the response', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse({
        trackingNumber: 'TRK9',
        carrier: 'Post',
        status: 'delivered',
        statusDescription: 'Delivered',
        estimatedDelivery: null,
        trackingUrl: null,
      })
    )
    const client = new CommerceClient({
      baseUrl: 'https://shop.example.com/api/support/',
      webhookSecret: 'test-secret',
      fetch: fetchMock,
    })

    const tracking = await client.trackPackage('cust_1')

    expect(tracking.status).toBe('delivered')
    const [url, init] = fetchMock.mock.calls[0] ?? []
    expect(url).toBe('https://shop.example.com/api/support')
    const body = String(init?.body)
    expect(JSON.parse(body)).toEqual({ action: 'trackPackage', customerId: 'cust_1' })

    const headers = new Headers(init?.headers)
    const signature = headers.get('X-Triage-Signature') ?? ''
    const match = /^timestamp=(\d+),v1=([0-9a-f]+)$/.exec(signature)
    expect(match).not.toBeNull()
    const expected = createHmac('sha256', 'test-secret')
      .update(`${match?.[1]}.${body}`)
      .digest('hex')
    expect(match?.[2]).toBe(expected)
  })

  it('surfaces the error message from a failed response', async () => {
    const client = new CommerceClient({
      baseUrl: 'https://shop.example.com',
      webhookSecret: 'test-secret',
      fetch: vi.fn<typeof fetch>().mockResolvedValue(
        jsonResponse({ error: 'customer not found' }, 404)
      ),
    })

    await expect(client.getSubscription('nobody')).rejects.toThrow(
      new CommerceApiError('customer not found', 404)
    )
  })

  it('rejects a response that does not match the schema', async () => {
    const client = new CommerceClient({
      baseUrl: 'https://shop.example.com',
      webhookSecret: 'test-secret',
      fetch: vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ month: 3 })),
    })

    await expect(client.getBoxContents('cust_1')).rejects.toThrow(
      /Unexpected getBoxContents response/
    )
  })
})
