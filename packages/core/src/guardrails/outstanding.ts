import type { Category } from '../router/categories'
import type { TranscriptMessage } from '../router/types'

/**
 * A case that is answerable but exceptional enough that an automatic reply
 * needs a stricter gate.
 */
export interface OutstandingCase {
  outstanding: boolean
  /** Name of the trigger that fired, null when not outstanding */
  trigger: string | null
}

export const NOT_OUTSTANDING: OutstandingCase = {
  outstanding: false,
  trigger: null,
}

type Trigger = [RegExp, string]

const ANY_CATEGORY: Trigger[] = [
  [/\b(passed away|deceased|bereavement)\b/i, 'bereavement'],
  [/\b(hospital|hospitali[sz]ed|chemo\w*)\b/i, 'medical_hardship'],
]

const BY_CATEGORY: Partial<Record<Category, Trigger[]>> = {
  billing: [
    [/\b(charged|billed)( me)? (twice|two times|double)\b/i, 'double_charge'],
    [/\bdouble[- ]charged?\b/i, 'double_charge'],
    [/\bunauthori[sz]ed (charge|payment)\b/i, 'unauthorized_charge'],
  ],
  retention: [
    [/\balready (cancell?ed|unsubscribed)\b/i, 'charged_after_cancel'],
    [/\bstill (being )?(charged|billed)\b/i, 'charged_after_cancel'],
  ],
  tracking: [
    [/\bstolen\b/i, 'package_stolen'],
    [/\breturned to (the )?sender\b/i, 'returned_to_sender'],
    [/\bcustoms\b/i, 'customs_hold'],
  ],
  damage_claim: [
    [/\b(injur(ed|y)|cut (myself|my (hand|finger)))\b/i, 'injury'],
    [/\b(mold|mould|spoiled|expired)\b/i, 'food_safety'],
  ],
  customization: [
    [/\b(allerg(y|ies|ic)|anaphyla\w*|celiac)\b/i, 'allergy'],
  ],
  subscription_change: [
    [/\bgift\b/i, 'gift_subscription'],
  ],
}

/**
 * Check the customer turns of the current cycle against the category's
 * triggers, then the triggers that apply to every category.
 */
export function detectOutstanding(
  category: Category,
  messages: readonly TranscriptMessage[]
): OutstandingCase {
  const triggers = [...(BY_CATEGORY[category] ?? []), ...ANY_CATEGORY]
  const texts = messages
    .filter((m) => m.role === 'customer')
    .map((m) => m.content)

  for (const [pattern, trigger] of triggers) {
    if (texts.some((text) => pattern.test(text))) {
      return { outstanding: true, trigger }
    }
  }
  return NOT_OUTSTANDING
}
