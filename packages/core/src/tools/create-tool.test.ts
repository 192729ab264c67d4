import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { z } from 'zod'
import { FakeCommerceBackend } from '../testing/fake-backend'
import { createTool, setAuditHooks } from './create-tool'
import type { ToolContext } from './types'

describe('createTool', () => {
  const context: ToolContext = {
    sessionId: 'cw_1',
    customerId: 'cust_1',
    backend: new FakeCommerceBackend(),
  }

  const upperTool = createTool({
    name: 'upper',
    description: 'Uppercase the input',
    kind: 'lookup',
    requiresApproval: false,
    parameters: z.object({ input: z.string() }),
    execute: async ({ input }) => ({ output: input.toUpperCase() }),
  })

  beforeEach(() => {
    vi.clearAllMocks()
  })

  afterEach(() => {
    setAuditHooks({})
  })

  it('validates parameters and returns data', async () => {
    const result = await upperTool.execute({ input: 'hello' }, context)

    expect(result).toEqual({ success: true, data: { output: 'HELLO' } })
  })

  it('returns a validation error without running the handler', async () => {
    const execute = vi.fn()
    const tool = createTool({
      name: 'strict',
      description: 'Needs a number',
      kind: 'lookup',
      requiresApproval: false,
      parameters: z.object({ n: z.number() }),
      execute,
    })

    const result = await tool.execute({ n: 'nope' }, context)

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.code).toBe('VALIDATION_ERROR')
    }
    expect(execute).not.toHaveBeenCalled()
  })

  it('captures handler errors as EXECUTION_ERROR', async () => {
    const tool = createTool({
      name: 'broken',
      description: 'Always fails',
      kind: 'lookup',
      requiresApproval: false,
      parameters: z.object({}),
      execute: async () => {
        throw new Error('backend down')
      },
    })

    const result = await tool.execute({}, context)

    expect(result).toMatchObject({
      success: false,
      error: { code: 'EXECUTION_ERROR', message: 'backend down' },
    })
  })

  it('calls audit hooks with timing', async () => {
    const onPreExecute = vi.fn()
    const onPostExecute = vi.fn()
    setAuditHooks({ onPreExecute, onPostExecute })

    await upperTool.execute({ input: 'a' }, context)

    expect(onPreExecute).toHaveBeenCalledWith({
      toolName: 'upper',
      params: { input: 'a' },
      context,
    })
    expect(onPostExecute).toHaveBeenCalledWith(
      expect.objectContaining({
        toolName: 'upper',
        result: { output: 'A' },
        durationMs: expect.any(Number),
      })
    )
  })

  it('keeps running when an audit hook throws', async () => {
    const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
    setAuditHooks({
      onPreExecute: () => {
        throw new Error('audit store offline')
      },
    })

    const result = await upperTool.execute({ input: 'b' }, context)

    expect(result).toEqual({ success: true, data: { output: 'B' } })
    expect(consoleSpy).toHaveBeenCalled()
    consoleSpy.mockRestore()
  })

  it('exposes validate for pre-flight checks', () => {
    expect(upperTool.validate({ input: 'x' })).toEqual({
      success: true,
      data: { input: 'x' },
    })
    expect(upperTool.validate({}).success).toBe(false)
  })
})
