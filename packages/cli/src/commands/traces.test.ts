import { beforeEach, describe, expect, it } from 'vitest'
import { UsageError } from '../core/errors'
import { type Harness, createHarness } from '../testing/harness'
import { toTraceQuery, tracesExportAction } from './traces'

async function seedTrace(harness: Harness, sessionId: string, at: string) {
  harness.clock.now = new Date(at)
  await harness.runtime.store.withSession(
    sessionId,
    (tx) =>
      tx.appendTrace({
        cycle: 1,
        kind: 'decision',
        decision: 'send',
        category: 'tracking',
        toolExecutions: [],
        errors: [],
        costUsd: 0,
        durationMs: 12,
      }),
    { create: { id: sessionId, channel: 'chatwoot', customerId: null } }
  )
}

describe('toTraceQuery', () => {
  it('parses every filter', () => {
    expect(
      toTraceQuery({ since: '2026-03-01', session: 'cw_1', limit: '10' })
    ).toEqual({
      since: new Date('2026-03-01T00:00:00.000Z'),
      sessionId: 'cw_1',
      limit: 10,
    })
  })

  it('returns an empty query without options', () => {
    expect(toTraceQuery({})).toEqual({})
  })

  it('rejects a malformed date', () => {
    expect(() => toTraceQuery({ since: 'yesterday' })).toThrow(UsageError)
  })

  it('rejects a limit that is not a positive integer', () => {
    expect(() => toTraceQuery({ limit: '0' })).toThrow(
      'Invalid --limit value "0"'
    )
    expect(() => toTraceQuery({ limit: '2.5' })).toThrow(UsageError)
  })
})

describe('traces export', () => {
  let harness: Harness

  beforeEach(async () => {
    harness = createHarness()
    await seedTrace(harness, 'cw_1', '2026-03-01T10:00:00Z')
    await seedTrace(harness, 'cw_2', '2026-03-01T11:00:00Z')
  })

  it('writes one JSON document per line, oldest first', async () => {
    await tracesExportAction(harness.context('text'), {})

    const rows = harness.stdout.lines.map((line) => JSON.parse(line))
    expect(rows.map((row) => row.sessionId)).toEqual(['cw_1', 'cw_2'])
    expect(rows[0]).toMatchObject({
      cycle: 1,
      kind: 'decision',
      decision: 'send',
      category: 'tracking',
      durationMs: 12,
      createdAt: '2026-03-01T10:00:00.000Z',
    })
    expect(harness.stderr.text).toBe('Exported 2 trace(s).\n')
  })

  it('filters by time', async () => {
    await tracesExportAction(harness.context('json'), {
      since: '2026-03-01T10:30:00Z',
    })

    expect(harness.stdout.lines).toHaveLength(1)
    expect(JSON.parse(harness.stdout.lines[0] ?? '{}').sessionId).toBe('cw_2')
  })

  it('filters by session', async () => {
    await tracesExportAction(harness.context('json'), { session: 'cw_1' })

    expect(harness.stdout.lines).toHaveLength(1)
    expect(JSON.parse(harness.stdout.lines[0] ?? '{}').sessionId).toBe('cw_1')
  })
})
