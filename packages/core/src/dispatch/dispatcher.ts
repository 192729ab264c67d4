import type { ConversationStatus, SupportChannel } from '../channel/types'
import {
  DispatchChannelUnavailableError,
  StoreConflictError,
  errorMessage,
} from '../errors'
import { log, traceDispatch } from '../observability/axiom'
import type { Category } from '../router/categories'
import type {
  Decision,
  DecisionRecord,
  Session,
  SessionStore,
} from '../store/types'

export type DispatchStep = 'public_reply' | 'private_note' | 'status_open'

export type DispatchOutcome =
  | 'dispatched'
  | 'already_dispatched'
  | 'in_flight'
  | 'failed'

export interface DispatchResult {
  outcome: DispatchOutcome
  token: string
  /** Channel calls made by this invocation, failed ones included */
  attempts: number
  error?: string
}

export interface BackoffStrategy {
  type: 'exponential' | 'linear'
  base: number
}

/**
 * Delay before retry number `attempt` (0-based).
 */
export function calculateBackoff(
  attempt: number,
  strategy: BackoffStrategy
): number {
  if (strategy.type === 'exponential') {
    return strategy.base * Math.pow(2, attempt)
  }
  return strategy.base * (attempt + 1)
}

export function dispatchToken(
  sessionId: string,
  cycle: number,
  decision: Decision
): string {
  return `${sessionId}:${cycle}:${decision}`
}

export const DISPATCH_STEPS: Readonly<Record<Decision, readonly DispatchStep[]>> =
  Object.freeze({
    send: ['public_reply'],
    draft: ['private_note', 'status_open'],
    escalate: ['private_note', 'status_open'],
  })

export function noteLabels(
  decision: Decision,
  category: Category | null
): string[] {
  const cat = category ?? 'uncategorized'
  if (decision === 'escalate') return ['ai_escalation', cat, 'high_priority']
  return ['ai_draft', cat]
}

export function renderNote(
  decision: Decision,
  session: Pick<Session, 'category' | 'confidence'>,
  record: Pick<DecisionRecord, 'reason' | 'reply'>
): string {
  const category = session.category ?? 'uncategorized'
  const reply = record.reply ?? '(no draft available)'

  if (decision === 'escalate') {
    return `**AI Escalation**\n\nCategory: ${category}\nReason: ${record.reason}\n\n---\n\nAI draft:\n${reply}`
  }
  return `**AI Draft (needs review)**\n\nCategory: ${category}\nConfidence: ${session.confidence ?? 0}\n\n---\n\n${reply}`
}

export interface Dispatcher {
  dispatch(sessionId: string, decision: Decision): Promise<DispatchResult>
}

export interface DispatcherOptions {
  store: SessionStore
  channel: SupportChannel
  maxAttempts: number
  backoffBaseMs: number
  sleep?: (ms: number) => Promise<void>
  now?: () => Date
}

type Claim =
  | { kind: 'skip'; outcome: 'already_dispatched' | 'in_flight' }
  | {
      kind: 'claimed'
      session: Session
      record: DecisionRecord
      completed: DispatchStep[]
    }

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms))

/**
 * Delivers a committed decision to the support channel exactly once per
 * token. Each completed step is persisted, so a retry resumes after the last
 * confirmed write.
 */
export function createDispatcher(options: DispatcherOptions): Dispatcher {
  const { store, channel, maxAttempts, backoffBaseMs } = options
  const sleep = options.sleep ?? defaultSleep
  const now = options.now ?? (() => new Date())
  const backoff: BackoffStrategy = { type: 'exponential', base: backoffBaseMs }

  async function claim(sessionId: string, decision: Decision): Promise<Claim> {
    return store.withSession(sessionId, async (tx) => {
      const session = tx.session
      const token = dispatchToken(sessionId, session.cycle, decision)

      if (session.dispatchToken === token) {
        if (session.dispatchStatus === 'done') {
          return { kind: 'skip', outcome: 'already_dispatched' }
        }
        if (session.dispatchStatus === 'in_progress') {
          return { kind: 'skip', outcome: 'in_flight' }
        }
      }

      if (session.state !== 'decided' && session.state !== 'dispatch_failed') {
        throw new StoreConflictError(
          `Session ${sessionId} is ${session.state}, nothing to dispatch`,
          sessionId
        )
      }

      const record = await tx.getDecision(session.cycle)
      if (!record || record.decision !== decision) {
        throw new StoreConflictError(
          `Cycle ${session.cycle} of ${sessionId} has no ${decision} decision`,
          sessionId
        )
      }

      const completed =
        session.dispatchToken === token ? parseSteps(session.dispatchSteps) : []
      const updated = await tx.updateSession({
        dispatchToken: token,
        dispatchStatus: 'in_progress',
        dispatchSteps: completed,
      })
      return { kind: 'claimed', session: updated, record, completed }
    })
  }

  async function runStep(
    step: DispatchStep,
    session: Session,
    record: DecisionRecord
  ): Promise<void> {
    switch (step) {
      case 'public_reply':
        return channel.sendPublicReply(session.id, record.reply ?? '')
      case 'private_note':
        return channel.createPrivateNote(
          session.id,
          renderNote(record.decision, session, record),
          noteLabels(record.decision, session.category)
        )
      case 'status_open': {
        const status: ConversationStatus = 'open'
        return channel.setConversationStatus(session.id, status)
      }
    }
  }

  return {
    async dispatch(sessionId, decision) {
      const started = Date.now()
      const claimed = await claim(sessionId, decision)
      if (claimed.kind === 'skip') {
        const session = await store.getSession(sessionId)
        const token = dispatchToken(sessionId, session?.cycle ?? 0, decision)
        return { outcome: claimed.outcome, token, attempts: 0 }
      }

      const { session, record } = claimed
      const token = dispatchToken(sessionId, session.cycle, decision)
      const completed = [...claimed.completed]
      let attempts = 0

      for (const step of DISPATCH_STEPS[decision]) {
        if (completed.includes(step)) continue

        let lastError: unknown = null
        let succeeded = false
        for (let attempt = 0; attempt < maxAttempts; attempt++) {
          attempts += 1
          try {
            await runStep(step, session, record)
            succeeded = true
            break
          } catch (error) {
            lastError = error
            await log('warn', 'dispatch step failed', {
              sessionId,
              cycle: session.cycle,
              step,
              attempt: attempt + 1,
              error: errorMessage(error),
            })
            if (attempt < maxAttempts - 1) {
              await sleep(calculateBackoff(attempt, backoff))
            }
          }
        }

        if (!succeeded) {
          const failure = new DispatchChannelUnavailableError(
            sessionId,
            attempts,
            lastError
          )
          await store.withSession(sessionId, async (tx) => {
            await tx.updateSession({
              ...(tx.session.state === 'dispatch_failed'
                ? {}
                : { state: 'dispatch_failed' as const }),
              dispatchStatus: 'failed',
              dispatchAttempts: tx.session.dispatchAttempts + attempts,
            })
            await tx.enqueueOperator({
              reason: 'dispatch_failed',
              error: failure.message,
            })
          })
          await log('error', 'dispatch exhausted retries', {
            sessionId,
            cycle: session.cycle,
            decision,
            step,
            attempts,
            error: failure.message,
          })
          await traceDispatch({
            sessionId,
            cycle: session.cycle,
            decision,
            outcome: 'failed',
            attempts,
            durationMs: Date.now() - started,
            error: failure.message,
          })
          return { outcome: 'failed', token, attempts, error: failure.message }
        }

        completed.push(step)
        const steps = [...completed]
        await store.withSession(sessionId, (tx) =>
          tx.updateSession({ dispatchSteps: steps })
        )
      }

      await store.withSession(sessionId, async (tx) => {
        const finishedAt = now().getTime()
        const elapsed = finishedAt - tx.session.cycleStartedAt.getTime()
        await tx.updateSession({
          state: 'dispatched',
          dispatchStatus: 'done',
          dispatchAttempts: tx.session.dispatchAttempts + attempts,
          firstResponseMs: tx.session.firstResponseMs ?? elapsed,
          resolutionMs: elapsed,
        })
      })

      await traceDispatch({
        sessionId,
        cycle: session.cycle,
        decision,
        outcome: 'dispatched',
        attempts,
        durationMs: Date.now() - started,
      })
      return { outcome: 'dispatched', token, attempts }
    },
  }
}

function parseSteps(steps: readonly string[]): DispatchStep[] {
  return steps.filter(
    (step): step is DispatchStep =>
      step === 'public_reply' || step === 'private_note' || step === 'status_open'
  )
}
