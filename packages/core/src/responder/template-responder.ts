import {
  BoxContentsSchema,
  PaymentHistorySchema,
  SubscriptionSchema,
  TrackingInfoSchema,
} from '../tools/backend'
import type { z } from 'zod'
import type { Responder, ResponderInput, ToolResultSummary } from './types'

const FALLBACK_REPLY =
  'Thanks for reaching out! A member of our team will get back to you shortly.'

function findData<T>(
  results: readonly ToolResultSummary[],
  toolName: string,
  schema: z.ZodType<T>
): T | null {
  const result = results.find(
    (r) => r.toolName === toolName && r.status === 'success'
  )
  if (!result?.data) return null
  const parsed = schema.safeParse(result.data)
  return parsed.success ? parsed.data : null
}

function listItems(items: string[]): string {
  if (items.length <= 1) return items.join('')
  return `${items.slice(0, -1).join(', ')} and ${items[items.length - 1]}`
}

/**
 * Render a reply from the category and tool data alone.
 */
export function renderTemplateReply(input: ResponderInput): string {
  const { category, toolResults } = input

  switch (category) {
    case 'tracking': {
      const tracking = findData(toolResults, 'track_package', TrackingInfoSchema)
      if (!tracking) return FALLBACK_REPLY
      let text = `Thanks for reaching out! Your package (${tracking.carrier} ${tracking.trackingNumber}) is currently: ${tracking.statusDescription}.`
      if (tracking.estimatedDelivery) {
        text += ` Estimated delivery: ${tracking.estimatedDelivery}.`
      }
      if (tracking.trackingUrl) {
        text += ` You can follow it here: ${tracking.trackingUrl}`
      }
      return text
    }

    case 'billing': {
      const history = findData(
        toolResults,
        'get_payment_history',
        PaymentHistorySchema
      )
      const latest = history?.payments[0]
      if (!latest) return FALLBACK_REPLY
      let text = `Thanks for reaching out! Your most recent charge was ${latest.amount.toFixed(2)} ${latest.currency} on ${latest.date} (${latest.status}).`
      const subscription = findData(
        toolResults,
        'get_subscription',
        SubscriptionSchema
      )
      if (subscription?.nextChargeDate) {
        text += ` Your next charge is scheduled for ${subscription.nextChargeDate}.`
      }
      return text
    }

    case 'customization': {
      const box = findData(toolResults, 'get_box_contents', BoxContentsSchema)
      if (!box || box.items.length === 0) return FALLBACK_REPLY
      return `Your ${box.month} box includes ${listItems(box.items)}. If you'd like to update your preferences, just reply here and we'll take care of it.`
    }

    case 'gratitude':
      return "Thank you so much for your kind words! We're so glad you're enjoying your boxes."

    case 'retention':
      return "We're sorry to hear you're thinking of leaving. A member of our team will review your account and follow up with options shortly."

    case 'damage_claim':
      return "We're so sorry your box arrived damaged. We've passed the details to our team, who will follow up about a replacement shortly."

    case 'subscription_change':
      return 'Thanks for letting us know. A member of our team will review your request and confirm the change shortly.'

    case 'general':
    case 'uncategorized':
      return FALLBACK_REPLY
  }
}

export function createTemplateResponder(): Responder {
  return {
    name: 'template',
    async respond(input) {
      const startTime = Date.now()
      const text = renderTemplateReply(input)
      return { text, costUsd: 0, latencyMs: Date.now() - startTime }
    },
  }
}
