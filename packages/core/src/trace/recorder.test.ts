import { beforeEach, describe, expect, it, vi } from 'vitest'
import { traceDecision } from '../observability/axiom'
import { createMemoryStore } from '../store/memory-store'
import { createTraceRecorder } from './recorder'

vi.mock('../observability/axiom', () => ({
  traceDecision: vi.fn(),
}))

async function setup() {
  let clock = new Date('2026-03-01T10:00:00Z')
  const store = createMemoryStore({ now: () => clock })
  for (const id of ['cw_1', 'cw_2']) {
    await store.withSession(id, async () => undefined, {
      create: { id, channel: 'chatwoot', customerId: null },
    })
  }
  return {
    store,
    recorder: createTraceRecorder(store),
    setClock: (iso: string) => {
      clock = new Date(iso)
    },
  }
}

const baseTrace = {
  cycle: 1,
  kind: 'decision',
  decision: 'send' as const,
  category: 'tracking' as const,
  toolExecutions: [
    {
      id: 'exec_1',
      toolName: 'track_package',
      status: 'success',
      durationMs: 12,
      costUsd: 0,
    },
  ],
  errors: [],
  costUsd: 0.0012,
  durationMs: 340,
}

describe('createTraceRecorder', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('stores the record and forwards a summary to Axiom', async () => {
    const { recorder } = await setup()

    const record = await recorder.record('cw_1', {
      ...baseTrace,
      rule: 'auto_resolved',
      passes: 1,
      outstanding: 'double_charge',
    })

    expect(record).toMatchObject({ sessionId: 'cw_1', kind: 'decision' })
    expect(record).not.toHaveProperty('rule')
    expect(record).not.toHaveProperty('outstanding')
    expect(traceDecision).toHaveBeenCalledWith({
      sessionId: 'cw_1',
      cycle: 1,
      decision: 'send',
      rule: 'auto_resolved',
      category: 'tracking',
      toolExecutions: 1,
      costUsd: 0.0012,
      durationMs: 340,
      errors: [],
      passes: 1,
      outstanding: 'double_charge',
    })
  })

  it('filters the feed by session, time and limit', async () => {
    const { recorder, setClock } = await setup()
    setClock('2026-03-01T10:00:00Z')
    await recorder.record('cw_1', baseTrace)
    setClock('2026-03-02T10:00:00Z')
    await recorder.record('cw_2', baseTrace)
    setClock('2026-03-03T10:00:00Z')
    await recorder.record('cw_1', { ...baseTrace, cycle: 2 })

    expect(await recorder.list({ sessionId: 'cw_1' })).toHaveLength(2)
    const recent = await recorder.list({
      since: new Date('2026-03-02T00:00:00Z'),
    })
    expect(recent.map((t) => t.sessionId)).toEqual(['cw_2', 'cw_1'])
    expect(await recorder.list({ limit: 1 })).toHaveLength(1)
  })
})
