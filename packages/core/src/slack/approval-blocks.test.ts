import { describe, expect, it } from 'vitest'
import {
  buildApprovalBlocks,
  buildResolvedBlocks,
  formatToolName,
  parseApprovalAction,
} from './approval-blocks'

const input = {
  executionId: 'exec_1',
  sessionId: 'cw_42',
  cycle: 2,
  toolName: 'pause_subscription',
  input: { customerId: 'cust_1', months: 2 },
  customerId: 'cust_1',
}

function click(actionId: string, value: string) {
  return {
    type: 'block_actions',
    user: { id: 'U1', username: 'riley' },
    actions: [{ action_id: actionId, value }],
  }
}

describe('buildApprovalBlocks', () => {
  it('renders header, context, input and buttons', () => {
    const blocks = buildApprovalBlocks(input)

    expect(blocks.map((b) => b.type)).toEqual([
      'header',
      'context',
      'section',
      'actions',
    ])
    expect(blocks[0]).toMatchObject({
      text: { text: 'Pause Subscription Approval Request' },
    })
    expect(blocks[1]).toMatchObject({
      elements: [
        { type: 'mrkdwn', text: '*Session:* cw_42  |  *Cycle:* 2  |  *Customer:* cust_1' },
      ],
    })
    expect(blocks[2]).toMatchObject({
      fields: [{ type: 'mrkdwn', text: '*Months:* 2' }],
    })
    expect(blocks[3]).toMatchObject({
      elements: [
        {
          action_id: 'approve_execution',
          style: 'primary',
          value: '{"executionId":"exec_1","sessionId":"cw_42"}',
        },
        { action_id: 'reject_execution', style: 'danger' },
      ],
    })
  })

  it('adds a link button when the conversation url is known', () => {
    const blocks = buildApprovalBlocks({
      ...input,
      conversationUrl: 'https://desk.example.com/conversations/42',
    })
    expect(blocks[3]).toMatchObject({
      elements: [{ url: 'https://desk.example.com/conversations/42' }, {}, {}],
    })
  })
})

describe('buildResolvedBlocks', () => {
  it('states the verdict, reviewer and reason', () => {
    expect(
      buildResolvedBlocks({
        toolName: 'skip_month',
        outcome: 'rejected',
        reviewer: 'slack:riley',
        reason: 'already skipped',
      })
    ).toEqual([
      {
        type: 'section',
        text: {
          type: 'mrkdwn',
          text: '*Skip Month*: Rejected by slack:riley\n>already skipped',
        },
      },
    ])
  })
})

describe('parseApprovalAction', () => {
  const value = JSON.stringify({ executionId: 'exec_1', sessionId: 'cw_42' })

  it('reads approve and reject clicks', () => {
    expect(parseApprovalAction(click('approve_execution', value))).toEqual({
      executionId: 'exec_1',
      sessionId: 'cw_42',
      outcome: 'approved',
      reviewer: 'slack:riley',
    })
    expect(parseApprovalAction(click('reject_execution', value))?.outcome).toBe(
      'rejected'
    )
  })

  it('ignores other actions and malformed values', () => {
    expect(parseApprovalAction(click('open_link', value))).toBeNull()
    expect(parseApprovalAction(click('approve_execution', 'not json'))).toBeNull()
    expect(parseApprovalAction({ type: 'view_submission' })).toBeNull()
  })

  it('formats tool names', () => {
    expect(formatToolName('create_damage_claim')).toBe('Create Damage Claim')
  })
})
