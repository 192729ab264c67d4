import { describe, expect, it } from 'vitest'
import {
  CATEGORY_CONFIG,
  isAutoResolvable,
  planSubscriptionChange,
  planTools,
} from './category-config'

describe('planTools', () => {
  it('plans read-only lookups for tracking', () => {
    const plan = planTools(
      'tracking',
      [{ role: 'customer', content: 'my package never arrived' }],
      'cust_1'
    )

    expect(plan.lookups).toEqual([
      { toolName: 'get_subscription', input: { customerId: 'cust_1' } },
      { toolName: 'track_package', input: { customerId: 'cust_1' } },
    ])
    expect(plan.mutation).toBeNull()
    expect(plan.autoResolvable).toBe(true)
  })

  it('plans a pause for retention', () => {
    const plan = planTools(
      'retention',
      [{ role: 'customer', content: 'I want to cancel' }],
      'cust_1'
    )

    expect(plan.mutation).toEqual({
      toolName: 'pause_subscription',
      input: { customerId: 'cust_1', months: 1 },
    })
    expect(plan.autoResolvable).toBe(false)
  })

  it('uses the latest customer message for damage claims', () => {
    const plan = planTools(
      'damage_claim',
      [
        { role: 'customer', content: 'hello' },
        { role: 'customer', content: 'the jar was smashed' },
      ],
      'cust_2'
    )

    expect(plan.mutation).toEqual({
      toolName: 'create_damage_claim',
      input: { customerId: 'cust_2', description: 'the jar was smashed' },
    })
  })

  it('flags a missing customer when tools are needed', () => {
    const plan = planTools('billing', [], null)

    expect(plan.lookups).toEqual([])
    expect(plan.missingCustomer).toBe(true)
  })

  it('does not flag a missing customer for gratitude', () => {
    expect(planTools('gratitude', [], null).missingCustomer).toBe(false)
  })

  it('freezes the table', () => {
    expect(Object.isFrozen(CATEGORY_CONFIG)).toBe(true)
    expect(isAutoResolvable('uncategorized')).toBe(false)
  })
})

describe('planSubscriptionChange', () => {
  it.each([
    ['Please skip next month', { toolName: 'skip_month', input: { customerId: 'c' } }],
    [
      'Can you pause for 2 months?',
      { toolName: 'pause_subscription', input: { customerId: 'c', months: 2 } },
    ],
    [
      'Switch me to every other month',
      { toolName: 'change_frequency', input: { customerId: 'c', frequency: 'bimonthly' } },
    ],
    [
      'My new address is 12 Elm St, Springfield',
      {
        toolName: 'change_address',
        input: { customerId: 'c', newAddress: '12 Elm St, Springfield' },
      },
    ],
  ])('maps %j', (text, expected) => {
    expect(planSubscriptionChange('c', text)).toEqual(expected)
  })

  it('returns null for vague wording', () => {
    expect(planSubscriptionChange('c', 'I want to change something')).toBeNull()
  })
})
