import {
  ApprovalRejectedError,
  InvalidTransitionError,
  StoreConflictError,
} from '../errors'
import { log, traceApprovalResolved } from '../observability/axiom'
import type { SessionStore, ToolExecution } from '../store/types'
import type { CommerceBackend } from './backend'
import type { ToolRegistry } from './registry'
import type { RegisteredTool, ToolResult } from './types'

export type InvokeOutcome =
  | { status: 'pending'; execution: ToolExecution }
  /** The cycle already holds a gated execution; nothing was inserted */
  | { status: 'existing'; execution: ToolExecution }
  | { status: 'success'; execution: ToolExecution; data: unknown }
  | { status: 'failed'; execution: ToolExecution; error: string }
  /** Another worker already claimed the approved execution */
  | { status: 'skipped'; execution: ToolExecution }

export type ApprovalOutcome = 'approved' | 'rejected'

export interface ResolveApprovalOptions {
  reviewer?: string | null
  reason?: string | null
}

export interface ToolExecutor {
  invoke(
    sessionId: string,
    toolName: string,
    input: Record<string, unknown>
  ): Promise<InvokeOutcome>
  resolveApproval(
    executionId: string,
    outcome: ApprovalOutcome,
    options?: ResolveApprovalOptions
  ): Promise<ToolExecution>
  executeApproved(executionId: string): Promise<InvokeOutcome>
  /** Pending executions created before `now - approvalTimeoutMs` */
  expirePending(now?: Date): Promise<ToolExecution[]>
  listPending(): Promise<ToolExecution[]>
}

export interface ToolExecutorOptions {
  store: SessionStore
  registry: ToolRegistry
  backend: CommerceBackend
  approvalTimeoutMs: number
  now?: () => Date
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function toResultRecord(data: unknown): Record<string, unknown> {
  return isRecord(data) ? data : { value: data }
}

function describeFailure(result: ToolResult<unknown>): string {
  return result.success ? '' : `${result.error.code}: ${result.error.message}`
}

export function createToolExecutor(options: ToolExecutorOptions): ToolExecutor {
  const { store, registry, backend, approvalTimeoutMs } = options
  const now = options.now ?? (() => new Date())

  async function loadExecution(executionId: string): Promise<ToolExecution> {
    const execution = await store.getExecution(executionId)
    if (!execution) {
      throw new StoreConflictError(`Tool execution not found: ${executionId}`)
    }
    return execution
  }

  async function recordInvalidInput(
    sessionId: string,
    tool: RegisteredTool,
    input: Record<string, unknown>,
    reason: string
  ): Promise<InvokeOutcome> {
    const execution = await store.withSession(sessionId, (tx) =>
      tx.insertExecution({
        toolName: tool.name,
        input,
        requiresApproval: tool.requiresApproval,
        status: 'failed',
        failureReason: reason,
        completedAt: now(),
      })
    )
    await log('warn', 'tool input rejected', {
      sessionId,
      toolName: tool.name,
      reason,
    })
    return { status: 'failed', execution, error: reason }
  }

  return {
    async invoke(sessionId, toolName, input) {
      const tool = registry.get(toolName)
      const validation = tool.validate(input)
      if (!validation.success) {
        return recordInvalidInput(
          sessionId,
          tool,
          input,
          describeFailure(validation)
        )
      }

      if (tool.requiresApproval) {
        // Persisted before anything runs; one gated execution per cycle
        return store.withSession(sessionId, async (tx): Promise<InvokeOutcome> => {
          const executions = await tx.listExecutions({ cycle: tx.session.cycle })
          const existing = executions.find((e) => e.requiresApproval)
          if (existing) {
            await log('info', 'cycle already has a gated execution', {
              sessionId,
              toolName: tool.name,
              executionId: existing.id,
              status: existing.status,
            })
            return { status: 'existing', execution: existing }
          }
          const execution = await tx.insertExecution({
            toolName: tool.name,
            input,
            requiresApproval: true,
            status: 'pending',
          })
          return { status: 'pending', execution }
        })
      }

      const session = await store.getSession(sessionId)
      const startedAt = now()
      const result = await tool.execute(input, {
        sessionId,
        customerId: session?.customerId ?? null,
        backend,
      })
      const completedAt = now()
      const durationMs = completedAt.getTime() - startedAt.getTime()

      const execution = await store.withSession(sessionId, (tx) =>
        tx.insertExecution({
          toolName: tool.name,
          input,
          requiresApproval: false,
          status: result.success ? 'success' : 'failed',
          result: result.success ? toResultRecord(result.data) : null,
          failureReason: result.success ? null : describeFailure(result),
          costUsd: result.success ? (tool.costUsd ?? 0) : 0,
          durationMs,
          completedAt,
        })
      )

      return result.success
        ? { status: 'success', execution, data: result.data }
        : { status: 'failed', execution, error: describeFailure(result) }
    },

    async resolveApproval(executionId, outcome, resolveOptions = {}) {
      const existing = await loadExecution(executionId)

      const resolved = await store.withSession(existing.sessionId, async (tx) => {
        const current = await tx.getExecution(executionId)
        if (!current || current.status !== 'pending') {
          throw new InvalidTransitionError(
            'tool execution',
            current?.status ?? null,
            outcome
          )
        }
        return tx.updateExecution(executionId, {
          status: outcome,
          reviewedBy: resolveOptions.reviewer ?? null,
          reviewReason: resolveOptions.reason ?? null,
          resolvedAt: now(),
        })
      })

      await traceApprovalResolved({
        sessionId: resolved.sessionId,
        executionId,
        toolName: resolved.toolName,
        outcome,
        reviewer: resolved.reviewedBy,
        reason: resolved.reviewReason,
        waitedMs:
          (resolved.resolvedAt ?? now()).getTime() -
          resolved.createdAt.getTime(),
      })

      return resolved
    },

    async executeApproved(executionId) {
      const existing = await loadExecution(executionId)
      const tool = registry.get(existing.toolName)

      const claim = await store.withSession(existing.sessionId, async (tx) => {
        const current = await tx.getExecution(executionId)
        if (current?.status === 'rejected') {
          throw new ApprovalRejectedError(
            executionId,
            current.reviewReason ?? undefined
          )
        }
        if (!current || current.status !== 'approved') {
          throw new InvalidTransitionError(
            'tool execution',
            current?.status ?? null,
            'success'
          )
        }
        if (current.startedAt) {
          return { claimed: false as const, execution: current }
        }
        const execution = await tx.updateExecution(executionId, {
          startedAt: now(),
        })
        return {
          claimed: true as const,
          execution,
          customerId: tx.session.customerId,
        }
      })

      if (!claim.claimed) {
        return { status: 'skipped', execution: claim.execution }
      }

      const startedAt = claim.execution.startedAt ?? now()
      const result = await tool.execute(claim.execution.input, {
        sessionId: existing.sessionId,
        executionId,
        customerId: claim.customerId,
        backend,
        approvedBy: claim.execution.reviewedBy,
      })
      const completedAt = now()

      const execution = await store.withSession(existing.sessionId, (tx) =>
        tx.updateExecution(executionId, {
          status: result.success ? 'success' : 'failed',
          result: result.success ? toResultRecord(result.data) : null,
          failureReason: result.success ? null : describeFailure(result),
          costUsd: result.success ? (tool.costUsd ?? 0) : 0,
          durationMs: completedAt.getTime() - startedAt.getTime(),
          completedAt,
        })
      )

      if (!result.success) {
        await log('warn', 'approved tool execution failed', {
          sessionId: existing.sessionId,
          executionId,
          toolName: tool.name,
          error: describeFailure(result),
        })
        return { status: 'failed', execution, error: describeFailure(result) }
      }

      return { status: 'success', execution, data: result.data }
    },

    async expirePending(at = now()) {
      return store.listPendingExecutions({
        createdBefore: new Date(at.getTime() - approvalTimeoutMs),
      })
    },

    async listPending() {
      return store.listPendingExecutions()
    },
  }
}
