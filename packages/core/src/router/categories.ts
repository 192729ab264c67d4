export const CATEGORIES = [
  'tracking',
  'billing',
  'retention',
  'damage_claim',
  'subscription_change',
  'customization',
  'gratitude',
  'general',
  'uncategorized',
] as const

export type Category = (typeof CATEGORIES)[number]

const categorySet = new Set<string>(CATEGORIES)

export function isCategory(value: unknown): value is Category {
  return typeof value === 'string' && categorySet.has(value)
}

/**
 * Parse a stored or model-produced label. Anything outside the closed
 * taxonomy collapses to `uncategorized`.
 */
export function toCategory(value: string | null | undefined): Category {
  return isCategory(value) ? value : 'uncategorized'
}
