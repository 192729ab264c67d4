import type { KnownBlock } from '@slack/types'
import { WebClient } from '@slack/web-api'

let client: WebClient | null = null

/**
 * Lazily created WebClient.
 * @throws {Error} If SLACK_BOT_TOKEN is not set
 */
export function getSlackClient(): WebClient {
  if (!client) {
    const token = process.env.SLACK_BOT_TOKEN
    if (!token) {
      throw new Error('SLACK_BOT_TOKEN not set')
    }
    client = new WebClient(token)
  }
  return client
}

/**
 * @internal For testing only
 */
export function resetSlackClient(): void {
  client = null
}

export async function postApprovalMessage(
  channel: string,
  blocks: KnownBlock[],
  text: string
): Promise<{ ts: string; channel: string }> {
  const result = await getSlackClient().chat.postMessage({
    channel,
    blocks,
    text,
  })

  if (!result.ok || !result.ts) {
    throw new Error('Failed to post message to Slack')
  }

  return { ts: result.ts, channel: result.channel ?? channel }
}

export async function updateApprovalMessage(
  channel: string,
  ts: string,
  blocks: KnownBlock[],
  text: string
): Promise<void> {
  const result = await getSlackClient().chat.update({
    channel,
    ts,
    blocks,
    text,
  })

  if (!result.ok) {
    throw new Error('Failed to update message in Slack')
  }
}
