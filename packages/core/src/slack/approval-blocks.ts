/**
 * Slack Block Kit messages for tool executions waiting on a reviewer.
 *
 * @see https://api.slack.com/block-kit
 */

import type { KnownBlock } from '@slack/types'
import { z } from 'zod'

export type ApprovalBlocksInput = {
  executionId: string
  sessionId: string
  cycle: number
  toolName: string
  input: Record<string, unknown>
  customerId: string | null
  /** Link to the conversation in the support desk */
  conversationUrl?: string
}

/**
 * Embedded in the button values and handed back on click.
 */
export const ApprovalMetadataSchema = z.object({
  executionId: z.string(),
  sessionId: z.string(),
})

export type ApprovalMetadata = z.infer<typeof ApprovalMetadataSchema>

export const APPROVE_ACTION_ID = 'approve_execution'
export const REJECT_ACTION_ID = 'reject_execution'

/**
 * 'pause_subscription' -> 'Pause Subscription'
 */
export function formatToolName(toolName: string): string {
  return toolName
    .split('_')
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ')
}

// Already shown in the context line
const HIDDEN_INPUT_KEYS = new Set(['customerId'])

function formatKeyName(key: string): string {
  return key
    .replace(/_/g, ' ')
    .replace(/([A-Z])/g, ' $1')
    .trim()
    .split(' ')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ')
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return 'N/A'
  const str = typeof value === 'object' ? JSON.stringify(value) : String(value)
  return str.length > 100 ? `${str.slice(0, 100)}...` : str
}

function formatInput(
  input: Record<string, unknown>
): Array<{ type: 'mrkdwn'; text: string }> {
  return Object.entries(input)
    .filter(([key]) => !HIDDEN_INPUT_KEYS.has(key))
    .map(([key, value]) => ({
      type: 'mrkdwn' as const,
      text: `*${formatKeyName(key)}:* ${formatValue(value)}`,
    }))
}

export function buildApprovalBlocks(input: ApprovalBlocksInput): KnownBlock[] {
  const metadata: ApprovalMetadata = {
    executionId: input.executionId,
    sessionId: input.sessionId,
  }
  const value = JSON.stringify(metadata)
  const fields = formatInput(input.input)

  const context = [
    `*Session:* ${input.sessionId}`,
    `*Cycle:* ${input.cycle}`,
    `*Customer:* ${input.customerId ?? 'unknown'}`,
  ]

  return [
    {
      type: 'header',
      text: {
        type: 'plain_text',
        text: `${formatToolName(input.toolName)} Approval Request`,
        emoji: true,
      },
    },
    {
      type: 'context',
      elements: [{ type: 'mrkdwn', text: context.join('  |  ') }],
    },
    ...(fields.length > 0 ? [{ type: 'section' as const, fields }] : []),
    {
      type: 'actions',
      elements: [
        ...(input.conversationUrl
          ? [
              {
                type: 'button' as const,
                text: {
                  type: 'plain_text' as const,
                  text: 'Open conversation',
                  emoji: true,
                },
                url: input.conversationUrl,
              },
            ]
          : []),
        {
          type: 'button',
          text: { type: 'plain_text', text: 'Approve', emoji: true },
          style: 'primary',
          action_id: APPROVE_ACTION_ID,
          value,
        },
        {
          type: 'button',
          text: { type: 'plain_text', text: 'Reject', emoji: true },
          style: 'danger',
          action_id: REJECT_ACTION_ID,
          value,
        },
      ],
    },
  ]
}

/**
 * Replacement for the request once a verdict is in; the buttons go away.
 */
export function buildResolvedBlocks(input: {
  toolName: string
  outcome: 'approved' | 'rejected'
  reviewer: string | null
  reason?: string | null
}): KnownBlock[] {
  const verdict = input.outcome === 'approved' ? 'Approved' : 'Rejected'
  const by = input.reviewer ? ` by ${input.reviewer}` : ''
  const why = input.reason ? `\n>${input.reason}` : ''

  return [
    {
      type: 'section',
      text: {
        type: 'mrkdwn',
        text: `*${formatToolName(input.toolName)}*: ${verdict}${by}${why}`,
      },
    },
  ]
}

const InteractionSchema = z.object({
  type: z.literal('block_actions'),
  user: z.object({ id: z.string(), username: z.string().optional() }),
  actions: z
    .array(z.object({ action_id: z.string(), value: z.string().optional() }))
    .min(1),
})

export interface ApprovalAction extends ApprovalMetadata {
  outcome: 'approved' | 'rejected'
  reviewer: string
}

/**
 * Read an approve/reject click from a Slack interaction payload.
 * Returns null for anything else.
 */
export function parseApprovalAction(payload: unknown): ApprovalAction | null {
  const parsed = InteractionSchema.safeParse(payload)
  if (!parsed.success) return null

  const action = parsed.data.actions[0]
  if (
    !action?.value ||
    (action.action_id !== APPROVE_ACTION_ID &&
      action.action_id !== REJECT_ACTION_ID)
  ) {
    return null
  }

  let raw: unknown
  try {
    raw = JSON.parse(action.value)
  } catch {
    return null
  }
  const metadata = ApprovalMetadataSchema.safeParse(raw)
  if (!metadata.success) return null

  return {
    ...metadata.data,
    outcome: action.action_id === APPROVE_ACTION_ID ? 'approved' : 'rejected',
    reviewer: `slack:${parsed.data.user.username ?? parsed.data.user.id}`,
  }
}
