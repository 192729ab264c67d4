import {
  DEFAULT_TRIAGE_CONFIG,
  type ApprovalDecision,
  type TriageRuntime,
  createMemoryStore,
  createTriageRuntime,
} from '@support-triage/core'
import { FakeChannel, FakeCommerceBackend } from '@support-triage/core/testing'
import { vi } from 'vitest'
import { type CommandContext, createContext } from '../core/context'
import type { OutputFormat, OutputStream } from '../core/output'

export class CapturedStream implements OutputStream {
  readonly chunks: string[] = []
  isTTY = false

  write(chunk: string): boolean {
    this.chunks.push(chunk)
    return true
  }

  get text(): string {
    return this.chunks.join('')
  }

  get lines(): string[] {
    return this.text.split('\n').filter((line) => line.length > 0)
  }
}

export interface Harness {
  runtime: TriageRuntime
  published: ApprovalDecision[]
  stdout: CapturedStream
  stderr: CapturedStream
  context(format?: OutputFormat): CommandContext
  clock: { now: Date }
}

export function createHarness(): Harness {
  const clock = { now: new Date('2026-03-01T12:00:00Z') }
  const now = () => clock.now
  const published: ApprovalDecision[] = []
  const runtime = createTriageRuntime({
    store: createMemoryStore({ now }),
    channel: new FakeChannel(),
    backend: new FakeCommerceBackend(),
    config: DEFAULT_TRIAGE_CONFIG,
    publishDecision: vi.fn(async (decision: ApprovalDecision) => {
      published.push(decision)
    }),
    sleep: async () => undefined,
    now,
  })
  const stdout = new CapturedStream()
  const stderr = new CapturedStream()

  return {
    runtime,
    published,
    stdout,
    stderr,
    clock,
    context: (format = 'text') =>
      createContext({ stdout, stderr, format, runtime: () => runtime, now }),
  }
}

/**
 * Session cw_5 parked on a pause_subscription call created at 10:00.
 */
export async function seedPendingApproval(harness: Harness): Promise<string> {
  const { store } = harness.runtime
  harness.clock.now = new Date('2026-03-01T10:00:00Z')
  const execution = await store.withSession(
    'cw_5',
    async (tx) => {
      await tx.appendMessage({
        role: 'customer',
        content: 'please pause my subscription',
      })
      const created = await tx.insertExecution({
        toolName: 'pause_subscription',
        input: { subscriptionId: 'sub_1', weeks: 4 },
        requiresApproval: true,
        status: 'pending',
      })
      await tx.updateSession({
        category: 'retention',
        confidence: 0.92,
        state: 'classified',
      })
      await tx.updateSession({
        state: 'tool_pending',
        pendingExecutionId: created.id,
      })
      return created
    },
    { create: { id: 'cw_5', channel: 'chatwoot', customerId: 'pat@example.com' } }
  )
  harness.clock.now = new Date('2026-03-01T11:35:00Z')
  return execution.id
}
