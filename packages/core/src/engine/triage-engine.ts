import type { Dispatcher, DispatchResult } from '../dispatch/dispatcher'
import {
  InvalidTransitionError,
  StoreConflictError,
  ToolExecutionFailedError,
  errorMessage,
} from '../errors'
import {
  NOT_OUTSTANDING,
  detectOutstanding,
  type OutstandingCase,
} from '../guardrails/outstanding'
import {
  createPassThroughEvaluator,
  type ReplyEvaluation,
  type ReplyEvaluator,
} from '../guardrails/reply-evaluator'
import {
  checkReplySafety,
  detectSafetySignals,
  type ReplySafety,
} from '../guardrails/safety'
import {
  log,
  traceApprovalRequested,
  traceClassification,
  withTracing,
} from '../observability/axiom'
import type { ResponderOutput, Responder, ToolResultSummary } from '../responder/types'
import type { Category } from '../router/categories'
import { planTools, type PlannedToolCall } from '../router/category-config'
import { applyConfidenceFloor } from '../router/confidence'
import { createRuleClassifier } from '../router/rule-classifier'
import type {
  ClassificationResult,
  Classifier,
  TranscriptMessage,
} from '../router/types'
import { isTerminalState } from '../store/transitions'
import type {
  Decision,
  DecisionRecord,
  Message,
  Session,
  SessionState,
  SessionStore,
  SessionTransaction,
  ToolExecution,
} from '../store/types'
import type {
  ApprovalOutcome,
  InvokeOutcome,
  ResolveApprovalOptions,
  ToolExecutor,
} from '../tools/executor'
import type { TraceRecorder } from '../trace/recorder'
import { decide, decideEarly, type DecisionOutcome } from './decide'

export interface InboundEvent {
  eventId: string
  sessionId: string
  channel: string
  messageText: string
  customerId?: string | null
}

export interface ApprovalRequest {
  sessionId: string
  cycle: number
  executionId: string
  toolName: string
  input: Record<string, unknown>
  customerId: string | null
}

export type CycleResult =
  | { status: 'duplicate'; sessionId: string; eventId: string }
  | {
      status: 'awaiting_approval'
      sessionId: string
      cycle: number
      executionId: string
    }
  | {
      status: 'decided'
      sessionId: string
      cycle: number
      decision: Decision
      rule: string
      reason: string
      dispatch: DispatchResult
    }
  /** Nothing to do: the cycle is terminal or another worker holds it */
  | { status: 'idle'; sessionId: string; cycle: number; state: SessionState }
  /** Messages kept arriving faster than the cycle could be evaluated */
  | { status: 'superseded'; sessionId: string; cycle: number }

export interface TriageEngineOptions {
  store: SessionStore
  classifier: Classifier
  /** Used when `classifier` throws; defaults to the rule classifier */
  fallbackClassifier?: Classifier
  responder: Responder
  /** Gate for automatic replies; defaults to a pass-through evaluator */
  evaluator?: ReplyEvaluator
  executor: ToolExecutor
  dispatcher: Dispatcher
  recorder: TraceRecorder
  confidenceThreshold: number
  maxRecomputePasses: number
  onApprovalRequested?: (request: ApprovalRequest) => Promise<void>
  now?: () => Date
}

export interface TriageEngine {
  handleInbound(event: InboundEvent): Promise<CycleResult>
  resume(sessionId: string): Promise<CycleResult>
  /** Rejects approvals older than the timeout and re-enters their cycles */
  expireApprovals(now?: Date): Promise<CycleResult[]>
  /**
   * Record a reviewer's verdict and re-enter the cycle when it is still
   * waiting on that execution.
   */
  resolveApproval(
    executionId: string,
    outcome: ApprovalOutcome,
    options?: ResolveApprovalOptions
  ): Promise<{ execution: ToolExecution; result: CycleResult | null }>
}

interface Snapshot {
  session: Session
  transcript: TranscriptMessage[]
  cycleMessages: Message[]
  executions: ToolExecution[]
}

interface PassContext {
  snapshot: Snapshot
  pass: number
  startedAt: number
  errors: string[]
  costUsd: number
  category?: Category
  outstanding: OutstandingCase
}

type PassOutcome =
  | { kind: 'stale' }
  | { kind: 'done'; result: CycleResult }

type CommitOutcome =
  | { kind: 'stale' }
  | { kind: 'superseded'; cycle: number }
  | {
      kind: 'committed'
      record: DecisionRecord
      executions: ToolExecution[]
      fresh: boolean
    }

interface Evaluation {
  outcome: DecisionOutcome
  reply: { text: string; safety: ReplySafety } | null
  replyMeta: ResponderOutput | null
}

function latestByTool(
  executions: readonly ToolExecution[]
): Map<string, ToolExecution> {
  const byTool = new Map<string, ToolExecution>()
  for (const execution of executions) {
    byTool.set(execution.toolName, execution)
  }
  return byTool
}

function toSummary(execution: ToolExecution): ToolResultSummary | null {
  if (execution.status !== 'success' && execution.status !== 'failed') {
    return null
  }
  return {
    toolName: execution.toolName,
    status: execution.status,
    data: execution.result,
  }
}

export function createTriageEngine(options: TriageEngineOptions): TriageEngine {
  const {
    store,
    classifier,
    responder,
    executor,
    dispatcher,
    recorder,
    confidenceThreshold,
    maxRecomputePasses,
  } = options
  const fallbackClassifier = options.fallbackClassifier ?? createRuleClassifier()
  const evaluator = options.evaluator ?? createPassThroughEvaluator()
  const now = options.now ?? (() => new Date())

  async function openCycle(tx: SessionTransaction): Promise<Session> {
    const next = tx.session.cycle + 1
    await log('info', 'opening new cycle', {
      sessionId: tx.session.id,
      cycle: next,
    })
    return tx.updateSession({
      state: 'received',
      cycle: next,
      cycleStartedAt: now(),
      decision: null,
      escalationReason: null,
      pendingExecutionId: null,
      dispatchToken: null,
      dispatchStatus: 'idle',
      dispatchSteps: [],
    })
  }

  async function takeSnapshot(sessionId: string): Promise<Snapshot> {
    return store.withSession(sessionId, async (tx) => {
      const session = tx.session
      const messages = await tx.listMessages()
      const previous =
        session.cycle > 1 ? await tx.getDecision(session.cycle - 1) : null
      const through = previous?.evaluatedThroughSeq ?? 0

      return {
        session,
        transcript: messages.map((m) => ({ role: m.role, content: m.content })),
        cycleMessages: messages.filter((m) => m.seq > through),
        executions: await tx.listExecutions({ cycle: session.cycle }),
      }
    })
  }

  async function classify(
    ctx: PassContext
  ): Promise<ClassificationResult> {
    const { session, transcript } = ctx.snapshot
    const started = Date.now()
    let result: ClassificationResult
    try {
      result = await classifier.classify(transcript)
    } catch (error) {
      ctx.errors.push(`classifier: ${errorMessage(error)}`)
      await log('warn', 'classifier failed, using fallback', {
        sessionId: session.id,
        cycle: session.cycle,
        classifier: classifier.name,
        error: errorMessage(error),
      })
      result = await fallbackClassifier.classify(transcript)
    }

    const floored = applyConfidenceFloor(result, confidenceThreshold)
    ctx.costUsd += floored.costUsd ?? 0

    await traceClassification({
      sessionId: session.id,
      cycle: session.cycle,
      category: floored.category,
      confidence: floored.confidence,
      rawCategory: floored.rawCategory ?? floored.category,
      classifier: floored.classifier,
      durationMs: Date.now() - started,
      messageCount: transcript.length,
      costUsd: floored.costUsd,
      usage: floored.usage,
    })
    return floored
  }

  async function invokeSafely(
    ctx: PassContext,
    call: PlannedToolCall
  ): Promise<InvokeOutcome | null> {
    try {
      const outcome = await executor.invoke(
        ctx.snapshot.session.id,
        call.toolName,
        call.input
      )
      if (outcome.status === 'failed') {
        await recordToolFailure(
          ctx,
          new ToolExecutionFailedError(call.toolName, outcome.error)
        )
      }
      return outcome
    } catch (error) {
      await recordToolFailure(
        ctx,
        new ToolExecutionFailedError(call.toolName, errorMessage(error), error)
      )
      return null
    }
  }

  async function recordToolFailure(
    ctx: PassContext,
    failure: ToolExecutionFailedError
  ): Promise<void> {
    ctx.errors.push(failure.message)
    await log('warn', 'tool call failed', {
      sessionId: ctx.snapshot.session.id,
      cycle: ctx.snapshot.session.cycle,
      toolName: failure.toolName,
      code: failure.code,
      error: failure.message,
    })
  }

  async function evaluateReply(
    ctx: PassContext,
    reply: string,
    toolResults: readonly ToolResultSummary[]
  ): Promise<ReplyEvaluation | null> {
    const { session, transcript } = ctx.snapshot
    const category = ctx.category ?? 'uncategorized'
    try {
      const evaluation = await withTracing(
        'engine.reply_evaluation',
        () =>
          evaluator.evaluate({
            category,
            messages: transcript,
            reply,
            outstanding: ctx.outstanding,
            toolNames: toolResults.map((r) => r.toolName),
          }),
        {
          sessionId: session.id,
          cycle: session.cycle,
          evaluator: evaluator.name,
          outstanding: ctx.outstanding.trigger ?? undefined,
        }
      )
      ctx.costUsd += evaluation.costUsd
      if (!evaluation.passed) {
        await log('info', 'reply held back by evaluation', {
          sessionId: session.id,
          cycle: session.cycle,
          evaluator: evaluation.evaluator,
          reason: evaluation.reason,
        })
      }
      return evaluation
    } catch (error) {
      ctx.errors.push(`evaluator: ${errorMessage(error)}`)
      await log('warn', 'reply evaluation failed', {
        sessionId: session.id,
        cycle: session.cycle,
        evaluator: evaluator.name,
        error: errorMessage(error),
      })
      return null
    }
  }

  /**
   * Write a decision if the snapshot is still current. A decision another
   * worker already committed for this cycle is returned as is.
   */
  async function commit(
    ctx: PassContext,
    evaluate: (executions: ToolExecution[]) => Evaluation | null
  ): Promise<CommitOutcome> {
    const { session: seen } = ctx.snapshot
    return store.withSession(seen.id, async (tx) => {
      const session = tx.session
      if (session.cycle !== seen.cycle) {
        return { kind: 'superseded', cycle: session.cycle }
      }

      const executions = await tx.listExecutions({ cycle: session.cycle })
      if (session.state === 'decided' || isTerminalState(session.state)) {
        const existing = await tx.getDecision(session.cycle)
        if (!existing) {
          throw new StoreConflictError(
            `Session ${session.id} is ${session.state} without a decision`,
            session.id
          )
        }
        return { kind: 'committed', record: existing, executions, fresh: false }
      }

      if (session.lastMessageSeq !== seen.lastMessageSeq) {
        return { kind: 'stale' }
      }

      const evaluation = evaluate(executions)
      if (!evaluation) return { kind: 'stale' }

      const { outcome, reply, replyMeta } = evaluation
      const record = await tx.recordDecision({
        decision: outcome.decision,
        rule: outcome.rule,
        reason: outcome.reason,
        category: session.category,
        evaluatedThroughSeq: seen.lastMessageSeq,
        reply: reply?.text ?? null,
      })
      await tx.updateSession({
        state: 'decided',
        decision: outcome.decision,
        escalationReason:
          outcome.decision === 'escalate' ? outcome.reason : null,
        pendingExecutionId: null,
      })
      if (reply && replyMeta) {
        await tx.appendMessage({
          role: 'assistant',
          content: reply.text,
          costUsd: replyMeta.costUsd,
          latencyMs: replyMeta.latencyMs,
        })
      }
      return { kind: 'committed', record, executions, fresh: true }
    })
  }

  async function finish(
    ctx: PassContext,
    committed: Extract<CommitOutcome, { kind: 'committed' }>
  ): Promise<CycleResult> {
    const { record, executions } = committed
    const sessionId = ctx.snapshot.session.id

    if (committed.fresh) {
      const toolCost = executions.reduce((sum, e) => sum + (e.costUsd ?? 0), 0)
      await recorder.record(sessionId, {
        cycle: record.cycle,
        kind: 'decision',
        decision: record.decision,
        category: record.category,
        toolExecutions: executions.map((e) => ({
          id: e.id,
          toolName: e.toolName,
          status: e.status,
          durationMs: e.durationMs,
          costUsd: e.costUsd,
        })),
        errors: ctx.errors,
        costUsd: ctx.costUsd + toolCost,
        durationMs: Date.now() - ctx.startedAt,
        rule: record.rule,
        passes: ctx.pass,
        outstanding: ctx.outstanding.trigger,
      })
      await log('info', 'cycle decided', {
        sessionId,
        cycle: record.cycle,
        decision: record.decision,
        rule: record.rule,
        reason: record.reason,
      })
    }

    const dispatch = await dispatcher.dispatch(sessionId, record.decision)
    const result: CycleResult = {
      status: 'decided',
      sessionId,
      cycle: record.cycle,
      decision: record.decision,
      rule: record.rule,
      reason: record.reason,
      dispatch,
    }

    const rolledOver = await rolloverIfPending(sessionId)
    return rolledOver ? runCycle(sessionId) : result
  }

  /**
   * Open the next cycle when customer messages arrived after the decision
   * that just went out.
   */
  async function rolloverIfPending(sessionId: string): Promise<boolean> {
    return store.withSession(sessionId, async (tx) => {
      if (!isTerminalState(tx.session.state)) return false
      const record = await tx.getDecision(tx.session.cycle)
      const through = record?.evaluatedThroughSeq ?? 0
      const messages = await tx.listMessages()
      if (!messages.some((m) => m.role === 'customer' && m.seq > through)) {
        return false
      }
      await openCycle(tx)
      return true
    })
  }

  async function park(
    ctx: PassContext,
    execution: ToolExecution
  ): Promise<PassOutcome> {
    const { session } = ctx.snapshot
    const parked = await store.withSession(session.id, async (tx) => {
      if (tx.session.cycle !== session.cycle) return false
      if (tx.session.state === 'decided' || isTerminalState(tx.session.state)) {
        return false
      }
      await tx.updateSession({
        state: 'tool_pending',
        pendingExecutionId: execution.id,
      })
      return true
    })
    if (!parked) return { kind: 'stale' }

    await recorder.record(session.id, {
      cycle: session.cycle,
      kind: 'awaiting_approval',
      decision: null,
      category: ctx.category ?? session.category,
      toolExecutions: [
        {
          id: execution.id,
          toolName: execution.toolName,
          status: execution.status,
          durationMs: null,
          costUsd: null,
        },
      ],
      errors: ctx.errors,
      costUsd: ctx.costUsd,
      durationMs: Date.now() - ctx.startedAt,
      passes: ctx.pass,
    })
    await requestApproval(session, execution)

    return {
      kind: 'done',
      result: {
        status: 'awaiting_approval',
        sessionId: session.id,
        cycle: session.cycle,
        executionId: execution.id,
      },
    }
  }

  /**
   * Hand a parked execution to reviewers. `approvalRequestedAt` is set only
   * once the hand-off went through, so a failed one is retried on resume.
   */
  async function requestApproval(
    session: Session,
    execution: ToolExecution
  ): Promise<void> {
    await traceApprovalRequested({
      sessionId: session.id,
      cycle: session.cycle,
      executionId: execution.id,
      toolName: execution.toolName,
      customerId: session.customerId,
    })
    if (options.onApprovalRequested) {
      await options.onApprovalRequested({
        sessionId: session.id,
        cycle: session.cycle,
        executionId: execution.id,
        toolName: execution.toolName,
        input: execution.input,
        customerId: session.customerId,
      })
    }
    await store.withSession(session.id, (tx) =>
      tx.updateExecution(execution.id, { approvalRequestedAt: now() })
    )
  }

  async function evaluatePass(
    sessionId: string,
    pass: number,
    startedAt: number,
    resuming: boolean
  ): Promise<PassOutcome> {
    const snapshot = await takeSnapshot(sessionId)
    const { session } = snapshot
    const ctx: PassContext = {
      snapshot,
      pass,
      startedAt,
      errors: [],
      costUsd: 0,
      outstanding: NOT_OUTSTANDING,
    }

    if (isTerminalState(session.state)) {
      return {
        kind: 'done',
        result: {
          status: 'idle',
          sessionId,
          cycle: session.cycle,
          state: session.state,
        },
      }
    }

    if (session.state === 'decided') {
      const decided = await commit(ctx, () => null)
      return settle(ctx, decided)
    }

    const safetySignals = detectSafetySignals(
      snapshot.cycleMessages.map((m) => ({ role: m.role, content: m.content }))
    )
    if (decideEarly(safetySignals, snapshot.executions)) {
      const committed = await commit(ctx, (executions) => {
        const outcome = decideEarly(safetySignals, executions)
        return outcome ? { outcome, reply: null, replyMeta: null } : null
      })
      return settle(ctx, committed)
    }

    const pending = snapshot.executions.find((e) => e.status === 'pending')
    if (pending) {
      if (resuming && pending.approvalRequestedAt === null) {
        await log('info', 'approval request was never confirmed, sending again', {
          sessionId,
          cycle: session.cycle,
          executionId: pending.id,
        })
        await requestApproval(session, pending)
      }
      return {
        kind: 'done',
        result: {
          status: 'awaiting_approval',
          sessionId,
          cycle: session.cycle,
          executionId: pending.id,
        },
      }
    }

    // A parked cycle keeps the category it was parked under
    let category = session.category ?? 'uncategorized'
    let confidence = session.confidence ?? 0
    if (session.state !== 'tool_pending') {
      const classification = await classify(ctx)
      category = classification.category
      confidence = classification.confidence

      const stored = await store.withSession(sessionId, async (tx) => {
        if (
          tx.session.cycle !== session.cycle ||
          tx.session.lastMessageSeq !== session.lastMessageSeq ||
          tx.session.state === 'decided' ||
          isTerminalState(tx.session.state)
        ) {
          return false
        }
        await tx.updateSession({
          category,
          confidence,
          ...(tx.session.state === 'received'
            ? { state: 'classified' as const }
            : {}),
        })
        return true
      })
      if (!stored) return { kind: 'stale' }
    }
    ctx.category = category
    ctx.outstanding = detectOutstanding(
      category,
      snapshot.cycleMessages.map((m) => ({ role: m.role, content: m.content }))
    )

    const plan = planTools(category, snapshot.transcript, session.customerId)
    if (plan.missingCustomer) {
      ctx.errors.push('missing customer id for tool calls')
    }

    const previous = latestByTool(
      snapshot.executions.filter((e) => !e.requiresApproval)
    )
    const toolResults: ToolResultSummary[] = []
    let lookupsSucceeded = true

    for (const lookup of plan.lookups) {
      const earlier = previous.get(lookup.toolName)
      if (earlier?.status === 'success') {
        const summary = toSummary(earlier)
        if (summary) toolResults.push(summary)
        continue
      }
      const outcome = await invokeSafely(ctx, lookup)
      if (!outcome || outcome.status !== 'success') {
        lookupsSucceeded = false
      }
      const summary = outcome ? toSummary(outcome.execution) : null
      if (summary) toolResults.push(summary)
    }

    const gated = snapshot.executions.find((e) => e.requiresApproval)
    if (!gated && plan.mutation) {
      const outcome = await invokeSafely(ctx, plan.mutation)
      if (outcome?.status === 'pending') {
        return park(ctx, outcome.execution)
      }
      // Another worker parked this cycle first; the next pass waits on it
      if (outcome?.status === 'existing') return { kind: 'stale' }
    } else if (gated?.status === 'approved') {
      try {
        const outcome = await executor.executeApproved(gated.id)
        if (outcome.status === 'skipped') {
          return {
            kind: 'done',
            result: {
              status: 'idle',
              sessionId,
              cycle: session.cycle,
              state: session.state,
            },
          }
        }
        if (outcome.status === 'failed') {
          await recordToolFailure(
            ctx,
            new ToolExecutionFailedError(gated.toolName, outcome.error)
          )
        }
        const summary = toSummary(outcome.execution)
        if (summary) toolResults.push(summary)
      } catch (error) {
        await recordToolFailure(
          ctx,
          new ToolExecutionFailedError(gated.toolName, errorMessage(error), error)
        )
      }
    } else if (gated) {
      const summary = toSummary(gated)
      if (summary) toolResults.push(summary)
      if (gated.status === 'failed') {
        ctx.errors.push(
          new ToolExecutionFailedError(
            gated.toolName,
            gated.failureReason ?? 'failed'
          ).message
        )
      }
    }

    let replyMeta: ResponderOutput | null = null
    try {
      replyMeta = await responder.respond({
        category,
        messages: snapshot.transcript,
        toolResults,
      })
      ctx.costUsd += replyMeta.costUsd
    } catch (error) {
      ctx.errors.push(`responder: ${errorMessage(error)}`)
      await log('warn', 'responder failed', {
        sessionId,
        cycle: session.cycle,
        responder: responder.name,
        error: errorMessage(error),
      })
    }
    // A blank reply is no reply: nothing to send, nothing to draft from
    if (replyMeta && !replyMeta.text.trim()) {
      await log('warn', 'responder returned a blank reply', {
        sessionId,
        cycle: session.cycle,
        responder: responder.name,
      })
      replyMeta = null
    }
    const reply = replyMeta
      ? { text: replyMeta.text, safety: checkReplySafety(replyMeta.text) }
      : null
    const evaluation =
      reply && reply.safety.safe
        ? await evaluateReply(ctx, reply.text, toolResults)
        : null

    const committed = await commit(ctx, (executions) => {
      if (executions.some((e) => e.status === 'pending')) return null
      return {
        outcome: decide({
          safetySignals,
          executions,
          category,
          confidence,
          confidenceThreshold,
          autoResolvable: plan.autoResolvable,
          lookupsSucceeded,
          mutationPlanned: plan.mutation !== null,
          reply,
          evaluation,
          errors: ctx.errors,
        }),
        reply,
        replyMeta,
      }
    })
    return settle(ctx, committed)
  }

  async function settle(
    ctx: PassContext,
    committed: CommitOutcome
  ): Promise<PassOutcome> {
    if (committed.kind === 'stale') return { kind: 'stale' }
    if (committed.kind === 'superseded') {
      return {
        kind: 'done',
        result: {
          status: 'superseded',
          sessionId: ctx.snapshot.session.id,
          cycle: committed.cycle,
        },
      }
    }
    return { kind: 'done', result: await finish(ctx, committed) }
  }

  /**
   * `resuming` marks a re-entry after an earlier run may have stopped part
   * way, which re-sends approval requests that never went out.
   */
  async function runCycle(
    sessionId: string,
    resuming = false
  ): Promise<CycleResult> {
    const startedAt = Date.now()
    let cycle = 0
    for (let pass = 1; pass <= maxRecomputePasses; pass++) {
      const outcome = await evaluatePass(sessionId, pass, startedAt, resuming)
      if (outcome.kind === 'done') return outcome.result
      const session = await store.getSession(sessionId)
      cycle = session?.cycle ?? cycle
      await log('info', 'snapshot went stale, recomputing', {
        sessionId,
        cycle,
        pass,
      })
    }

    await log('warn', 'recompute passes exhausted', {
      sessionId,
      cycle,
      passes: maxRecomputePasses,
    })
    return { status: 'superseded', sessionId, cycle }
  }

  return {
    async handleInbound(event) {
      const duplicate: CycleResult = {
        status: 'duplicate',
        sessionId: event.sessionId,
        eventId: event.eventId,
      }

      // A redelivery may follow a run that stored the message and then
      // failed; finish that cycle instead of dropping the event
      const redelivered = async (): Promise<CycleResult> => {
        const session = await store.getSession(event.sessionId)
        if (session && !isTerminalState(session.state)) {
          await log('info', 'duplicate inbound event, resuming unfinished cycle', {
            sessionId: event.sessionId,
            eventId: event.eventId,
            cycle: session.cycle,
            state: session.state,
          })
          return runCycle(event.sessionId, true)
        }
        await log('info', 'duplicate inbound event ignored', {
          sessionId: event.sessionId,
          eventId: event.eventId,
        })
        return duplicate
      }

      if (await store.findMessageByEventId(event.eventId)) {
        return redelivered()
      }

      let appended: boolean
      try {
        appended = await store.withSession(
          event.sessionId,
          async (tx) => {
            if (await tx.findMessageByEventId(event.eventId)) return false
            if (isTerminalState(tx.session.state)) {
              await openCycle(tx)
            }
            if (event.customerId && !tx.session.customerId) {
              await tx.updateSession({ customerId: event.customerId })
            }
            await tx.appendMessage({
              role: 'customer',
              content: event.messageText,
              eventId: event.eventId,
            })
            return true
          },
          {
            create: {
              id: event.sessionId,
              channel: event.channel,
              customerId: event.customerId ?? null,
            },
          }
        )
      } catch (error) {
        // Lost a race with a concurrent delivery of the same event
        if (
          error instanceof StoreConflictError &&
          (await store.findMessageByEventId(event.eventId))
        ) {
          appended = false
        } else {
          throw error
        }
      }

      if (!appended) return redelivered()

      return runCycle(event.sessionId)
    },

    resume(sessionId) {
      return runCycle(sessionId, true)
    },

    async expireApprovals(at = now()) {
      const expired = await executor.expirePending(at)
      const results: CycleResult[] = []

      for (const execution of expired) {
        try {
          const { result } = await resolveAndResume(execution.id, 'rejected', {
            reviewer: 'system',
            reason: 'approval_timeout',
          })
          if (result) results.push(result)
        } catch (error) {
          // A reviewer got there first
          if (!(error instanceof InvalidTransitionError)) throw error
          await log('info', 'expired approval already resolved', {
            sessionId: execution.sessionId,
            executionId: execution.id,
          })
        }
      }
      return results
    },

    resolveApproval(executionId, outcome, resolveOptions) {
      return resolveAndResume(executionId, outcome, resolveOptions)
    },
  }

  async function resolveAndResume(
    executionId: string,
    outcome: ApprovalOutcome,
    resolveOptions: ResolveApprovalOptions = {}
  ): Promise<{ execution: ToolExecution; result: CycleResult | null }> {
    const execution = await executor.resolveApproval(
      executionId,
      outcome,
      resolveOptions
    )
    const session = await store.getSession(execution.sessionId)

    if (
      !session ||
      session.cycle !== execution.cycle ||
      session.state === 'decided' ||
      isTerminalState(session.state)
    ) {
      await log('info', 'approval recorded for a closed cycle', {
        sessionId: execution.sessionId,
        cycle: execution.cycle,
        executionId,
        outcome,
      })
      return { execution, result: null }
    }

    return { execution, result: await runCycle(execution.sessionId) }
  }
}
