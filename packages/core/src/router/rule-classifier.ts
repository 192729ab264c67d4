import type { Category } from './categories'
import type { ClassificationResult, Classifier, TranscriptMessage } from './types'

type ScoredCategory = Exclude<Category, 'general' | 'uncategorized'>

/**
 * Keyword patterns per category. Order of the record is the tie-break order.
 */
const CATEGORY_PATTERNS: Record<ScoredCategory, RegExp[]> = {
  damage_claim: [
    /\bdamaged?\b/i,
    /\bbroken\b/i,
    /\bcrack(ed)?\b/i,
    /\bleak(ed|ing)?\b/i,
    /\bsmashed\b/i,
    /\bcrushed\b/i,
    /\bspill(ed)?\b/i,
  ],
  retention: [
    /\bcancel/i,
    /\bunsubscribe\b/i,
    /\btoo expensive\b/i,
    /\bcan'?t afford\b/i,
    /\b(stop|end) my subscription\b/i,
  ],
  subscription_change: [
    /\bskip\b/i,
    /\bpause\b/i,
    /\bfrequency\b/i,
    /\bevery other month\b/i,
    /\bbi-?monthly\b/i,
    /\bquarterly\b/i,
    /\b(change|update) (my |the )?(shipping )?address\b/i,
    /\bnew address\b/i,
    /\bmoving\b/i,
  ],
  billing: [
    /\bcharged?\b/i,
    /\bpayments?\b/i,
    /\binvoice\b/i,
    /\breceipt\b/i,
    /\bbilling\b/i,
    /\brefund/i,
    /\bcredit card\b/i,
  ],
  tracking: [
    /\bpackage\b/i,
    /\bparcel\b/i,
    /\bshipment\b/i,
    /\btracking\b/i,
    /\bdeliver(y|ed)?\b/i,
    /\barriv(e|ed)\b/i,
    /\bwhere is my (box|order)\b/i,
    /\bin transit\b/i,
  ],
  customization: [
    /\bno alcohol\b/i,
    /\bexclude\b/i,
    /\ballerg/i,
    /\bbox contents\b/i,
    /\bwhat'?s in (my|the|this) box\b/i,
    /\bcustomi[sz]e\b/i,
    /\bpreferences?\b/i,
  ],
  gratitude: [
    /\bthank(s| you)\b/i,
    /\bgrateful\b/i,
    /\bappreciate\b/i,
    /\blove (the|my|this) box\b/i,
  ],
}

const SCORED_CATEGORIES = Object.keys(CATEGORY_PATTERNS).filter(
  (key): key is ScoredCategory => key in CATEGORY_PATTERNS
)

function countHits(patterns: RegExp[], text: string): number {
  return patterns.filter((pattern) => pattern.test(text)).length
}

/**
 * Score each category over the customer's messages. The latest message
 * counts double so a thread that drifts is classified by where it ended up.
 */
export function scoreCategories(
  messages: readonly TranscriptMessage[]
): Map<ScoredCategory, number> {
  const customerMessages = messages.filter((m) => m.role === 'customer')
  const latestIndex = customerMessages.length - 1
  const scores = new Map<ScoredCategory, number>()

  for (const category of SCORED_CATEGORIES) {
    const patterns = CATEGORY_PATTERNS[category]
    let score = 0
    customerMessages.forEach((message, index) => {
      const weight = index === latestIndex ? 2 : 1
      score += weight * countHits(patterns, message.content)
    })
    scores.set(category, score)
  }

  return scores
}

/**
 * Deterministic keyword classifier. Used when no model is configured and as
 * the fallback when the model classifier fails.
 */
export function createRuleClassifier(): Classifier {
  return {
    name: 'rules',
    async classify(messages) {
      return classifyByRules(messages)
    },
  }
}

export function classifyByRules(
  messages: readonly TranscriptMessage[]
): ClassificationResult {
  const scores = scoreCategories(messages)

  let top: ScoredCategory | null = null
  let topScore = 0
  let tied = false

  for (const category of SCORED_CATEGORIES) {
    const score = scores.get(category) ?? 0
    if (score > topScore) {
      top = category
      topScore = score
      tied = false
    } else if (score > 0 && score === topScore) {
      tied = true
    }
  }

  if (!top) {
    return {
      category: 'general',
      confidence: 0.4,
      reasoning: 'No category keywords matched',
      classifier: 'rules',
    }
  }

  if (tied) {
    return {
      category: top,
      confidence: 0.5,
      reasoning: `Keywords for several categories matched equally; ${top} ranks first`,
      classifier: 'rules',
    }
  }

  return {
    category: top,
    confidence: Math.round(Math.min(0.95, 0.6 + 0.15 * topScore) * 100) / 100,
    reasoning: `Matched ${top} keywords (score ${topScore})`,
    classifier: 'rules',
  }
}
