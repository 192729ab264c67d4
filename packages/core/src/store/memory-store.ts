import { randomUUID } from 'node:crypto'
import { SessionNotFoundError, StoreConflictError } from '../errors'
import { KeyedMutex } from './keyed-mutex'
import { assertExecutionTransition, assertSessionTransition } from './transitions'
import type {
  DecisionRecord,
  Message,
  OperatorQueueEntry,
  Session,
  SessionStore,
  SessionTransaction,
  ToolExecution,
  ToolExecutionEvent,
  TraceQuery,
  TraceRecord,
  WithSessionOptions,
} from './types'

interface SessionData {
  session: Session
  messages: Message[]
  executions: ToolExecution[]
  events: ToolExecutionEvent[]
  decisions: DecisionRecord[]
  traces: TraceRecord[]
  queue: OperatorQueueEntry[]
}

export interface MemoryStoreOptions {
  now?: () => Date
}

function cloneData(data: SessionData): SessionData {
  return structuredClone(data)
}

/**
 * In-process store for tests and local development. Each transaction works on
 * a copy of the session's data and swaps it in only when `fn` resolves.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, SessionData>()
  private readonly mutex = new KeyedMutex()
  private readonly now: () => Date

  constructor(options: MemoryStoreOptions = {}) {
    this.now = options.now ?? (() => new Date())
  }

  async withSession<T>(
    sessionId: string,
    fn: (tx: SessionTransaction) => Promise<T>,
    options: WithSessionOptions = {}
  ): Promise<T> {
    return this.mutex.run(sessionId, async () => {
      const existing = this.sessions.get(sessionId)
      let staged: SessionData

      if (existing) {
        staged = cloneData(existing)
      } else if (options.create) {
        const now = this.now()
        staged = {
          session: {
            id: sessionId,
            channel: options.create.channel,
            customerId: options.create.customerId,
            category: null,
            confidence: null,
            state: 'received',
            decision: null,
            escalationReason: null,
            cycle: 1,
            lastMessageSeq: 0,
            pendingExecutionId: null,
            dispatchToken: null,
            dispatchStatus: 'idle',
            dispatchSteps: [],
            dispatchAttempts: 0,
            firstResponseMs: null,
            resolutionMs: null,
            cycleStartedAt: now,
            createdAt: now,
            updatedAt: now,
          },
          messages: [],
          executions: [],
          events: [],
          decisions: [],
          traces: [],
          queue: [],
        }
      } else {
        throw new SessionNotFoundError(sessionId)
      }

      const result = await fn(this.createTransaction(staged))
      this.sessions.set(sessionId, staged)
      return result
    })
  }

  private createTransaction(data: SessionData): SessionTransaction {
    const now = this.now
    const findEventGlobally = (eventId: string) => this.findEventSync(eventId)

    const findExecution = (executionId: string): ToolExecution => {
      const execution = data.executions.find((e) => e.id === executionId)
      if (!execution) {
        throw new StoreConflictError(
          `Tool execution ${executionId} does not belong to session ${data.session.id}`,
          data.session.id
        )
      }
      return execution
    }

    return {
      get session() {
        return data.session
      },

      async updateSession(patch) {
        if (patch.state !== undefined) {
          assertSessionTransition(data.session.state, patch.state)
        }
        data.session = { ...data.session, ...patch, updatedAt: now() }
        return data.session
      },

      async listMessages() {
        return [...data.messages]
      },

      async findMessageByEventId(eventId) {
        return (
          data.messages.find((m) => m.eventId === eventId) ??
          findEventGlobally(eventId)
        )
      },

      async appendMessage(input) {
        if (input.eventId !== undefined) {
          const duplicate =
            data.messages.find((m) => m.eventId === input.eventId) ??
            findEventGlobally(input.eventId)
          if (duplicate) {
            throw new StoreConflictError(
              `Duplicate inbound event ${input.eventId}`,
              data.session.id
            )
          }
        }

        const seq = data.session.lastMessageSeq + 1
        const message: Message = {
          id: randomUUID(),
          sessionId: data.session.id,
          seq,
          role: input.role,
          content: input.content,
          eventId: input.eventId ?? null,
          costUsd: input.costUsd ?? null,
          latencyMs: input.latencyMs ?? null,
          createdAt: now(),
        }
        data.messages.push(message)
        data.session = { ...data.session, lastMessageSeq: seq, updatedAt: now() }
        return message
      },

      async listExecutions(filter = {}) {
        return data.executions.filter(
          (e) => filter.cycle === undefined || e.cycle === filter.cycle
        )
      },

      async getExecution(executionId) {
        return data.executions.find((e) => e.id === executionId) ?? null
      },

      async insertExecution(input) {
        assertExecutionTransition(null, input.status, input.requiresApproval)
        const execution: ToolExecution = {
          id: randomUUID(),
          sessionId: data.session.id,
          cycle: data.session.cycle,
          toolName: input.toolName,
          input: input.input,
          requiresApproval: input.requiresApproval,
          status: input.status,
          result: input.result ?? null,
          failureReason: input.failureReason ?? null,
          costUsd: input.costUsd ?? null,
          durationMs: input.durationMs ?? null,
          reviewedBy: null,
          reviewReason: null,
          approvalRequestedAt: null,
          createdAt: now(),
          resolvedAt: null,
          startedAt: null,
          completedAt: input.completedAt ?? null,
        }
        data.executions.push(execution)
        data.events.push({
          id: randomUUID(),
          executionId: execution.id,
          fromStatus: null,
          toStatus: execution.status,
          createdAt: execution.createdAt,
        })
        return execution
      },

      async updateExecution(executionId, patch) {
        const current = findExecution(executionId)
        if (patch.status !== undefined && patch.status !== current.status) {
          assertExecutionTransition(
            current.status,
            patch.status,
            current.requiresApproval
          )
          data.events.push({
            id: randomUUID(),
            executionId,
            fromStatus: current.status,
            toStatus: patch.status,
            createdAt: now(),
          })
        }
        const updated = { ...current, ...patch }
        data.executions = data.executions.map((e) =>
          e.id === executionId ? updated : e
        )
        return updated
      },

      async getDecision(cycle) {
        return data.decisions.find((d) => d.cycle === cycle) ?? null
      },

      async recordDecision(input) {
        const cycle = data.session.cycle
        if (data.decisions.some((d) => d.cycle === cycle)) {
          throw new StoreConflictError(
            `Cycle ${cycle} of session ${data.session.id} already has a decision`,
            data.session.id
          )
        }
        const record: DecisionRecord = {
          ...input,
          id: randomUUID(),
          sessionId: data.session.id,
          cycle,
          createdAt: now(),
        }
        data.decisions.push(record)
        return record
      },

      async appendTrace(input) {
        const record: TraceRecord = {
          ...input,
          id: randomUUID(),
          sessionId: data.session.id,
          createdAt: now(),
        }
        data.traces.push(record)
        return record
      },

      async enqueueOperator(input) {
        const entry: OperatorQueueEntry = {
          id: randomUUID(),
          sessionId: data.session.id,
          cycle: data.session.cycle,
          reason: input.reason,
          error: input.error,
          createdAt: now(),
          resolvedAt: null,
        }
        data.queue.push(entry)
        return entry
      },
    }
  }

  private findEventSync(eventId: string): Message | null {
    for (const data of this.sessions.values()) {
      const message = data.messages.find((m) => m.eventId === eventId)
      if (message) return message
    }
    return null
  }

  async getSession(sessionId: string): Promise<Session | null> {
    return this.sessions.get(sessionId)?.session ?? null
  }

  async findMessageByEventId(eventId: string): Promise<Message | null> {
    return this.findEventSync(eventId)
  }

  async listMessages(sessionId: string): Promise<Message[]> {
    return [...(this.sessions.get(sessionId)?.messages ?? [])]
  }

  async getExecution(executionId: string): Promise<ToolExecution | null> {
    for (const data of this.sessions.values()) {
      const execution = data.executions.find((e) => e.id === executionId)
      if (execution) return execution
    }
    return null
  }

  async listPendingExecutions(
    options: { createdBefore?: Date } = {}
  ): Promise<ToolExecution[]> {
    const { createdBefore } = options
    return [...this.sessions.values()]
      .flatMap((data) => data.executions)
      .filter(
        (e) =>
          e.status === 'pending' &&
          (!createdBefore || e.createdAt.getTime() < createdBefore.getTime())
      )
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
  }

  async listExecutionEvents(executionId: string): Promise<ToolExecutionEvent[]> {
    return [...this.sessions.values()]
      .flatMap((data) => data.events)
      .filter((event) => event.executionId === executionId)
  }

  async listDecisions(sessionId: string): Promise<DecisionRecord[]> {
    return [...(this.sessions.get(sessionId)?.decisions ?? [])]
  }

  async listTraces(query: TraceQuery = {}): Promise<TraceRecord[]> {
    const { sessionId, since, limit } = query
    const traces = [...this.sessions.values()]
      .flatMap((data) => data.traces)
      .filter(
        (t) =>
          (!sessionId || t.sessionId === sessionId) &&
          (!since || t.createdAt.getTime() >= since.getTime())
      )
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
    return limit === undefined ? traces : traces.slice(0, limit)
  }

  async listOperatorQueue(
    options: { includeResolved?: boolean } = {}
  ): Promise<OperatorQueueEntry[]> {
    return [...this.sessions.values()]
      .flatMap((data) => data.queue)
      .filter((entry) => options.includeResolved || entry.resolvedAt === null)
  }
}

export function createMemoryStore(options?: MemoryStoreOptions): InMemorySessionStore {
  return new InMemorySessionStore(options)
}
