import { generateText } from 'ai'
import type { LlmPricing } from '../config/triage'
import { estimateCostUsd, normalizeUsage } from '../router/llm-classifier'
import type { Responder, ResponderOutput } from './types'

const SYSTEM_PROMPT = `You write replies for a subscription-box customer support team.

Rules:
- Warm, concise, professional. Two to four sentences.
- Use only facts from the tool results. Never invent tracking numbers, dates or amounts.
- Never say a subscription was cancelled, paused or refunded. Those need a human; say the team will follow up.
- No signature, no placeholders.`

export interface LlmResponderOptions {
  model: string
  pricing: LlmPricing
}

export function createLlmResponder(options: LlmResponderOptions): Responder {
  return {
    name: 'llm',
    async respond(input): Promise<ResponderOutput> {
      const startTime = Date.now()

      const transcript = input.messages
        .filter((m) => m.role !== 'system')
        .map((m) => `${m.role === 'customer' ? 'Customer' : 'Us'}: ${m.content}`)
        .join('\n\n')

      const toolContext = input.toolResults
        .filter((r) => r.status === 'success')
        .map((r) => `${r.toolName}: ${JSON.stringify(r.data)}`)
        .join('\n')

      const result = await generateText({
        model: options.model,
        system: SYSTEM_PROMPT,
        prompt: `Category: ${input.category}

## Tool results
${toolContext || '(none)'}

## Conversation (oldest first)
${transcript}

Write the next reply to the customer.`,
      })

      const usage = normalizeUsage(result.usage)

      return {
        text: result.text.trim(),
        costUsd: estimateCostUsd(usage, options.pricing),
        latencyMs: Date.now() - startTime,
        usage,
      }
    },
  }
}
