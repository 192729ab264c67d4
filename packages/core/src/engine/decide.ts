import type { ReplyEvaluation } from '../guardrails/reply-evaluator'
import type { ReplySafety, SafetySignal } from '../guardrails/safety'
import type { Category } from '../router/categories'
import type { Decision, ToolExecution } from '../store/types'

export type DecisionRule =
  | 'safety_signal'
  | 'approval_rejected'
  | 'auto_resolved'
  | 'needs_review'

export interface DecisionOutcome {
  decision: Decision
  rule: DecisionRule
  reason: string
}

export interface DecisionInput {
  safetySignals: readonly SafetySignal[]
  /** Executions of the current cycle */
  executions: readonly ToolExecution[]
  category: Category
  confidence: number
  confidenceThreshold: number
  autoResolvable: boolean
  /** Every planned lookup ran and succeeded */
  lookupsSucceeded: boolean
  /** A mutation was planned for this cycle */
  mutationPlanned: boolean
  reply: { text: string; safety: ReplySafety } | null
  /** Verdict on `reply`; null when no reply reached the evaluator */
  evaluation: Pick<ReplyEvaluation, 'passed' | 'reason'> | null
  /** Component failures recorded during the cycle */
  errors: readonly string[]
}

/**
 * Rules that end a cycle before classification even runs: safety signals,
 * then a rejected (or expired) mutation.
 */
export function decideEarly(
  safetySignals: readonly SafetySignal[],
  executions: readonly ToolExecution[]
): DecisionOutcome | null {
  if (safetySignals.length > 0) {
    return {
      decision: 'escalate',
      rule: 'safety_signal',
      reason: `Safety signals: ${safetySignals.map((s) => s.kind).join(', ')}`,
    }
  }

  const rejected = executions.find(
    (e) => e.requiresApproval && e.status === 'rejected'
  )
  if (rejected) {
    const why = rejected.reviewReason ? ` (${rejected.reviewReason})` : ''
    return {
      decision: 'escalate',
      rule: 'approval_rejected',
      reason: `${rejected.toolName} was rejected${why}`,
    }
  }

  return null
}

/**
 * First matching rule wins:
 * 1. safety signals → escalate
 * 2. rejected or expired mutation → escalate
 * 3. auto-resolvable, lookups ok, no mutation, confident, non-blank safe
 *    reply that passed evaluation → send
 * 4. everything else → draft
 */
export function decide(input: DecisionInput): DecisionOutcome {
  const early = decideEarly(input.safetySignals, input.executions)
  if (early) return early

  const blockers: string[] = []

  if (input.errors.length > 0) {
    blockers.push(`errors: ${input.errors.join('; ')}`)
  }
  if (input.category === 'uncategorized') {
    blockers.push('uncategorized')
  } else if (!input.autoResolvable) {
    blockers.push(`${input.category} needs review`)
  }
  if (input.confidence < input.confidenceThreshold) {
    blockers.push(
      `confidence ${input.confidence} below ${input.confidenceThreshold}`
    )
  }
  if (!input.lookupsSucceeded) {
    blockers.push('lookups incomplete')
  }
  if (input.mutationPlanned || input.executions.some((e) => e.requiresApproval)) {
    blockers.push('mutation involved')
  }
  if (input.executions.some((e) => e.status === 'pending')) {
    blockers.push('approval pending')
  }
  if (!input.reply || !input.reply.text.trim()) {
    blockers.push('no reply')
  } else if (!input.reply.safety.safe) {
    blockers.push(`unsafe reply: ${input.reply.safety.violation}`)
  } else if (!input.evaluation) {
    blockers.push('reply not evaluated')
  } else if (!input.evaluation.passed) {
    blockers.push(`reply evaluation: ${input.evaluation.reason ?? 'failed'}`)
  }

  if (blockers.length === 0) {
    return {
      decision: 'send',
      rule: 'auto_resolved',
      reason: `${input.category} resolved automatically`,
    }
  }

  return {
    decision: 'draft',
    rule: 'needs_review',
    reason: blockers.join(', '),
  }
}
