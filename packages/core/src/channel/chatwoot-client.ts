import { z } from 'zod'
import type { ConversationStatus, SupportChannel } from './types'

export const CHATWOOT_SESSION_PREFIX = 'cw_'

export const ChatwootMessageSchema = z.object({
  id: z.number(),
  content: z.string().nullable().optional(),
  private: z.boolean().optional(),
})

export const ChatwootStatusSchema = z.object({
  payload: z
    .object({
      success: z.boolean().optional(),
      current_status: z.string().optional(),
    })
    .optional(),
})

export const ChatwootLabelsSchema = z.object({
  payload: z.array(z.string()),
})

export type ChatwootMessage = z.infer<typeof ChatwootMessageSchema>

export class ChatwootApiError extends Error {
  constructor(
    message: string,
    readonly status: number
  ) {
    super(message)
    this.name = 'ChatwootApiError'
  }
}

export function toChatwootSessionId(conversationId: number | string): string {
  return `${CHATWOOT_SESSION_PREFIX}${conversationId}`
}

/**
 * Parse `cw_<id>` back to the numeric conversation id.
 */
export function parseChatwootSessionId(sessionId: string): number {
  const match = /^cw_(\d+)$/.exec(sessionId)
  if (!match) {
    throw new ChatwootApiError(`Not a Chatwoot session id: ${sessionId}`, 0)
  }
  return Number(match[1])
}

export interface ChatwootClientOptions {
  baseUrl: string
  apiToken: string
  accountId: string | number
  fetch?: typeof fetch
}

/**
 * Create a Chatwoot API client for one account.
 */
export function createChatwootClient(options: ChatwootClientOptions) {
  const fetchImpl: typeof fetch =
    options.fetch ?? ((input, init) => fetch(input, init))
  const prefix = `${options.baseUrl.replace(/\/$/, '')}/api/v1/accounts/${options.accountId}`
  const headers = {
    api_access_token: options.apiToken,
    'Content-Type': 'application/json',
  }

  async function postJson<T>(
    path: string,
    body: unknown,
    schema: z.ZodType<T>
  ): Promise<T> {
    const response = await fetchImpl(`${prefix}${path}`, {
      method: 'POST',
      headers,
      body: JSON.stringify(body),
    })

    if (!response.ok) {
      const text = await response.text()
      throw new ChatwootApiError(
        `Chatwoot API error: ${response.status} ${response.statusText} - ${text}`,
        response.status
      )
    }

    const parsed = schema.safeParse(await response.json())
    if (!parsed.success) {
      throw new ChatwootApiError(
        `Chatwoot API schema validation failed: ${parsed.error.message}`,
        response.status
      )
    }
    return parsed.data
  }

  return {
    /**
     * Post a message; `isPrivate` makes it a note only agents can see.
     */
    async sendMessage(
      conversationId: number,
      content: string,
      isPrivate = false
    ): Promise<ChatwootMessage> {
      return postJson(
        `/conversations/${conversationId}/messages`,
        { content, message_type: 'outgoing', private: isPrivate },
        ChatwootMessageSchema
      )
    },

    async toggleStatus(
      conversationId: number,
      status: ConversationStatus
    ): Promise<void> {
      await postJson(
        `/conversations/${conversationId}/toggle_status`,
        { status },
        ChatwootStatusSchema
      )
    },

    async addLabels(
      conversationId: number,
      labels: readonly string[]
    ): Promise<string[]> {
      const data = await postJson(
        `/conversations/${conversationId}/labels`,
        { labels },
        ChatwootLabelsSchema
      )
      return data.payload
    },
  }
}

export type ChatwootClient = ReturnType<typeof createChatwootClient>

/**
 * SupportChannel backed by Chatwoot. Notes get their labels before the note
 * itself is posted so the conversation is filterable as soon as it appears.
 */
export function createChatwootChannel(client: ChatwootClient): SupportChannel {
  return {
    name: 'chatwoot',

    async sendPublicReply(sessionId, text) {
      await client.sendMessage(parseChatwootSessionId(sessionId), text, false)
    },

    async createPrivateNote(sessionId, text, labels) {
      const conversationId = parseChatwootSessionId(sessionId)
      if (labels.length > 0) {
        await client.addLabels(conversationId, labels)
      }
      await client.sendMessage(conversationId, text, true)
    },

    async setConversationStatus(sessionId, status) {
      await client.toggleStatus(parseChatwootSessionId(sessionId), status)
    },
  }
}
