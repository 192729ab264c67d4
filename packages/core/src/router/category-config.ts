import type { Category } from './categories'
import type { TranscriptMessage } from './types'

export interface PlannedToolCall {
  toolName: string
  input: Record<string, unknown>
}

export interface ToolPlan {
  category: Category
  lookups: PlannedToolCall[]
  mutation: PlannedToolCall | null
  autoResolvable: boolean
  /** Tools were needed but there is no customer to run them for */
  missingCustomer: boolean
}

interface CategoryConfig {
  lookups: string[]
  autoResolvable: boolean
  mutation?: (
    customerId: string,
    latest: string
  ) => PlannedToolCall | null
}

const NO_TOOLS: CategoryConfig = { lookups: [], autoResolvable: false }

const categoryConfig: Record<Category, CategoryConfig> = {
  tracking: {
    lookups: ['get_subscription', 'track_package'],
    autoResolvable: true,
  },
  billing: {
    lookups: ['get_subscription', 'get_payment_history'],
    autoResolvable: true,
  },
  customization: {
    lookups: ['get_subscription', 'get_box_contents'],
    autoResolvable: true,
  },
  gratitude: { lookups: [], autoResolvable: true },
  retention: {
    lookups: ['get_subscription', 'get_customer_history'],
    autoResolvable: false,
    mutation: (customerId) => ({
      toolName: 'pause_subscription',
      input: { customerId, months: 1 },
    }),
  },
  damage_claim: {
    lookups: ['get_subscription'],
    autoResolvable: false,
    mutation: (customerId, latest) => ({
      toolName: 'create_damage_claim',
      input: { customerId, description: latest.slice(0, 2000) },
    }),
  },
  subscription_change: {
    lookups: ['get_subscription'],
    autoResolvable: false,
    mutation: planSubscriptionChange,
  },
  general: NO_TOOLS,
  uncategorized: NO_TOOLS,
}

export const CATEGORY_CONFIG: Readonly<Record<Category, CategoryConfig>> =
  Object.freeze(categoryConfig)

const ADDRESS_PATTERN =
  /\b(?:new address is|address to|ship(?:ping)? to|moving to)[:\s]+(.+)$/im

/**
 * Pick the subscription mutation the customer's wording asks for.
 * Returns null when the request is too vague to act on.
 */
export function planSubscriptionChange(
  customerId: string,
  latest: string
): PlannedToolCall | null {
  if (/\bskip\b/i.test(latest)) {
    return { toolName: 'skip_month', input: { customerId } }
  }

  if (/\bpause\b/i.test(latest)) {
    const months = /\b(\d{1,2})\s*months?\b/i.exec(latest)
    return {
      toolName: 'pause_subscription',
      input: { customerId, months: months ? Number(months[1]) : 1 },
    }
  }

  const address = ADDRESS_PATTERN.exec(latest)
  if (address?.[1]) {
    return {
      toolName: 'change_address',
      input: { customerId, newAddress: address[1].trim() },
    }
  }

  const frequency = parseFrequency(latest)
  if (frequency) {
    return { toolName: 'change_frequency', input: { customerId, frequency } }
  }

  return null
}

function parseFrequency(
  text: string
): 'monthly' | 'bimonthly' | 'quarterly' | null {
  if (/\bevery other month\b|\bbi-?monthly\b/i.test(text)) return 'bimonthly'
  if (/\bquarterly\b|\bevery (?:three|3) months\b/i.test(text)) {
    return 'quarterly'
  }
  if (/\bmonthly\b|\bevery month\b/i.test(text)) return 'monthly'
  return null
}

export function isAutoResolvable(category: Category): boolean {
  return CATEGORY_CONFIG[category].autoResolvable
}

/**
 * Tools to run for a classified session: read-only lookups first, then at
 * most one mutation that waits for human approval.
 */
export function planTools(
  category: Category,
  messages: readonly TranscriptMessage[],
  customerId: string | null
): ToolPlan {
  const config = CATEGORY_CONFIG[category]
  const needsTools = config.lookups.length > 0 || config.mutation !== undefined

  if (!customerId) {
    return {
      category,
      lookups: [],
      mutation: null,
      autoResolvable: config.autoResolvable,
      missingCustomer: needsTools,
    }
  }

  const latest =
    [...messages].reverse().find((m) => m.role === 'customer')?.content ?? ''

  return {
    category,
    lookups: config.lookups.map((toolName) => ({
      toolName,
      input: { customerId },
    })),
    mutation: config.mutation ? config.mutation(customerId, latest) : null,
    autoResolvable: config.autoResolvable,
    missingCustomer: false,
  }
}
