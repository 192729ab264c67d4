import { z } from 'zod'
import { toChatwootSessionId } from '../channel/chatwoot-client'
import type { InboundEvent } from '../engine/triage-engine'

export const ChatwootWebhookSchema = z.object({
  event: z.string(),
  id: z.number().nullish(),
  content: z.string().nullish(),
  message_type: z.string().nullish(),
  private: z.boolean().default(false),
  sender: z
    .object({
      id: z.number().nullish(),
      email: z.string().nullish(),
      name: z.string().nullish(),
    })
    .nullish(),
  conversation: z
    .object({
      id: z.number(),
      channel: z.string().nullish(),
    })
    .nullish(),
})

export type ChatwootWebhook = z.infer<typeof ChatwootWebhookSchema>

export type ParsedWebhook =
  | { kind: 'inbound'; event: InboundEvent }
  | { kind: 'ignored'; reason: string }

/**
 * Turn a Chatwoot webhook into an inbound event. Only public, non-empty
 * `message_created` messages from the customer are kept.
 */
export function parseChatwootWebhook(body: unknown): ParsedWebhook {
  const parsed = ChatwootWebhookSchema.safeParse(body)
  if (!parsed.success) {
    return { kind: 'ignored', reason: 'invalid payload' }
  }
  const payload = parsed.data

  if (payload.event !== 'message_created') {
    return { kind: 'ignored', reason: `event=${payload.event}` }
  }
  if (payload.message_type !== 'incoming') {
    return { kind: 'ignored', reason: 'not incoming message' }
  }
  if (payload.private) {
    return { kind: 'ignored', reason: 'private note' }
  }
  const content = payload.content?.trim()
  if (!content) {
    return { kind: 'ignored', reason: 'empty content' }
  }
  if (!payload.conversation) {
    return { kind: 'ignored', reason: 'no conversation id' }
  }
  if (payload.id === undefined || payload.id === null) {
    return { kind: 'ignored', reason: 'no message id' }
  }

  return {
    kind: 'inbound',
    event: {
      eventId: `chatwoot:${payload.id}`,
      sessionId: toChatwootSessionId(payload.conversation.id),
      channel: payload.conversation.channel ?? 'chatwoot',
      messageText: content,
      customerId: payload.sender?.email ?? null,
    },
  }
}
