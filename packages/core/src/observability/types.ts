/**
 * Observability types for Axiom tracing
 */

export interface TraceAttributes {
  sessionId?: string
  cycle?: number
  traceId?: string
  [key: string]: string | number | boolean | undefined
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'
