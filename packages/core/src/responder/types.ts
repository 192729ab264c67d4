import type { Category } from '../router/categories'
import type { TokenUsage, TranscriptMessage } from '../router/types'

export interface ToolResultSummary {
  toolName: string
  status: 'success' | 'failed'
  data: Record<string, unknown> | null
}

export interface ResponderInput {
  category: Category
  messages: readonly TranscriptMessage[]
  toolResults: readonly ToolResultSummary[]
}

export interface ResponderOutput {
  text: string
  costUsd: number
  latencyMs: number
  usage?: TokenUsage
}

export interface Responder {
  readonly name: string
  respond(input: ResponderInput): Promise<ResponderOutput>
}
