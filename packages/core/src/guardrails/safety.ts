import type { TranscriptMessage } from '../router/types'

export const SAFETY_SIGNAL_KINDS = [
  'death_threat',
  'legal_threat',
  'bank_dispute',
  'self_harm',
  'violence_threat',
  'abuse',
  'human_requested',
  'repeated_damage',
] as const

export type SafetySignalKind = (typeof SAFETY_SIGNAL_KINDS)[number]

export interface SafetySignal {
  kind: SafetySignalKind
  /** Text that triggered the signal */
  match: string
}

// First match per kind wins; order is the order signals are reported in
const RED_LINE_PATTERNS: Array<[RegExp, SafetySignalKind]> = [
  [/\b(kill|murder|die|death threat)\b/i, 'death_threat'],
  [/\b(sue|lawsuit|lawyer|attorney|legal action|court)\b/i, 'legal_threat'],
  [/\b(bank dispute|chargeback|dispute the charge)\b/i, 'bank_dispute'],
  [/\b(suicide|end my life|harm myself)\b/i, 'self_harm'],
  [/\b(bomb|weapon|attack)\b/i, 'violence_threat'],
  [/\b(idiots?|morons?|scammers?|fuck\w*|shit\w*)\b/i, 'abuse'],
  [
    /\b(speak|talk) (to|with) (a |an )?(human|real person|person|manager|supervisor)\b/i,
    'human_requested',
  ],
]

const DAMAGE_PATTERN = /\b(damaged|broken|smashed|crushed|cracked|leak(ed|ing)?)\b/i

const REPEATED_DAMAGE_PATTERNS = [
  /\b(second|third|fourth|fifth|2nd|3rd|4th|5th|another)\b[^.!?]{0,40}\b(damaged|broken|smashed|crushed|cracked)\b/i,
  /\b(damaged|broken|smashed|crushed|cracked)\b[^.!?]{0,40}\bagain\b/i,
]

/**
 * Scan every customer message for signals that force escalation.
 * Assistant and system messages are ignored.
 */
export function detectSafetySignals(
  messages: readonly TranscriptMessage[]
): SafetySignal[] {
  const customerTexts = messages
    .filter((m) => m.role === 'customer')
    .map((m) => m.content)

  const found = new Map<SafetySignalKind, SafetySignal>()

  for (const text of customerTexts) {
    for (const [pattern, kind] of RED_LINE_PATTERNS) {
      if (found.has(kind)) continue
      const match = pattern.exec(text)
      if (match) {
        found.set(kind, { kind, match: match[0] })
      }
    }

    if (!found.has('repeated_damage')) {
      for (const pattern of REPEATED_DAMAGE_PATTERNS) {
        const match = pattern.exec(text)
        if (match) {
          found.set('repeated_damage', { kind: 'repeated_damage', match: match[0] })
          break
        }
      }
    }
  }

  if (!found.has('repeated_damage')) {
    const damageReports = customerTexts.filter((text) => DAMAGE_PATTERN.test(text))
    if (damageReports.length >= 2) {
      found.set('repeated_damage', {
        kind: 'repeated_damage',
        match: `${damageReports.length} damage reports`,
      })
    }
  }

  return SAFETY_SIGNAL_KINDS.flatMap((kind) => {
    const signal = found.get(kind)
    return signal ? [signal] : []
  })
}

// Replies that claim an action only a human may take
const UNSAFE_REPLY_PATTERNS: Array<[RegExp, string]> = [
  [/(cancelled|canceled) your subscription/i, 'confirmed_cancellation'],
  [/subscription (has been|is now) (cancelled|canceled)/i, 'confirmed_cancellation'],
  [/(paused|suspended) your subscription/i, 'confirmed_pause'],
  [/subscription (has been|is now) (paused|suspended)/i, 'confirmed_pause'],
  [/(processed|issued|approved) (a |your )?(refund|reimbursement)/i, 'confirmed_refund'],
  [/refund (has been|is now|was) (processed|issued|approved)/i, 'confirmed_refund'],
]

export interface ReplySafety {
  safe: boolean
  violation: string | null
}

export function checkReplySafety(text: string): ReplySafety {
  for (const [pattern, violation] of UNSAFE_REPLY_PATTERNS) {
    if (pattern.test(text)) {
      return { safe: false, violation }
    }
  }
  return { safe: true, violation: null }
}
