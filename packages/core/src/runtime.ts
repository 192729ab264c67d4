import { getDb } from '@support-triage/database'
import {
  type ApprovalDecision,
  type ApprovalService,
  createApprovalService,
} from './approvals/service'
import {
  createChatwootChannel,
  createChatwootClient,
} from './channel/chatwoot-client'
import type { SupportChannel } from './channel/types'
import { env } from './config/env'
import { type TriageConfig, loadTriageConfig } from './config/triage'
import { createDispatcher } from './dispatch/dispatcher'
import {
  type ReplyEvaluator,
  createLlmReplyEvaluator,
  createPassThroughEvaluator,
} from './guardrails/reply-evaluator'
import {
  type ApprovalRequest,
  type TriageEngine,
  createTriageEngine,
} from './engine/triage-engine'
import { inngest } from './inngest/client'
import {
  TRIAGE_APPROVAL_DECIDED,
  TRIAGE_APPROVAL_REQUESTED,
} from './inngest/events'
import { traceToolExecution } from './observability/axiom'
import { createTemplateResponder } from './responder/template-responder'
import type { Responder } from './responder/types'
import { createLlmResponder } from './responder/llm-responder'
import { createLlmClassifier } from './router/llm-classifier'
import { createRuleClassifier } from './router/rule-classifier'
import type { Classifier } from './router/types'
import { createDrizzleStore } from './store/drizzle-store'
import type { SessionStore } from './store/types'
import type { CommerceBackend } from './tools/backend'
import { CommerceClient } from './tools/commerce-client'
import { setAuditHooks } from './tools/create-tool'
import { type ToolExecutor, createToolExecutor } from './tools/executor'
import { createToolRegistry } from './tools/registry'
import { type TraceRecorder, createTraceRecorder } from './trace/recorder'

export interface TriageRuntime {
  config: TriageConfig
  store: SessionStore
  engine: TriageEngine
  executor: ToolExecutor
  approvals: ApprovalService
  recorder: TraceRecorder
}

export interface TriageRuntimeDeps {
  store: SessionStore
  channel: SupportChannel
  backend: CommerceBackend
  config?: TriageConfig
  /** Overrides the classifier named in `config` */
  classifier?: Classifier
  /** Overrides the responder named in `config` */
  responder?: Responder
  /** Overrides the evaluator named in `config` */
  evaluator?: ReplyEvaluator
  onApprovalRequested?: (request: ApprovalRequest) => Promise<void>
  publishDecision?: (decision: ApprovalDecision) => Promise<void>
  sleep?: (ms: number) => Promise<void>
  now?: () => Date
}

export function classifierFromConfig(config: TriageConfig): Classifier {
  if (config.classifier.kind === 'llm') {
    return createLlmClassifier({
      model: config.classifier.model,
      pricing: config.pricing,
    })
  }
  return createRuleClassifier()
}

export function responderFromConfig(config: TriageConfig): Responder {
  if (config.responder.kind === 'llm') {
    return createLlmResponder({
      model: config.responder.model,
      pricing: config.pricing,
    })
  }
  return createTemplateResponder()
}

export function evaluatorFromConfig(config: TriageConfig): ReplyEvaluator {
  if (config.evaluator.kind === 'llm') {
    return createLlmReplyEvaluator({
      model: config.evaluator.model,
      pricing: config.pricing,
    })
  }
  return createPassThroughEvaluator()
}

/**
 * Wire the engine and its collaborators. Nothing here reads the
 * environment, so tests build a runtime from in-memory parts.
 */
export function createTriageRuntime(deps: TriageRuntimeDeps): TriageRuntime {
  const config = deps.config ?? loadTriageConfig()
  const { store, now } = deps

  const executor = createToolExecutor({
    store,
    registry: createToolRegistry(),
    backend: deps.backend,
    approvalTimeoutMs: config.approvalTimeoutMs,
    now,
  })
  const dispatcher = createDispatcher({
    store,
    channel: deps.channel,
    maxAttempts: config.dispatch.maxAttempts,
    backoffBaseMs: config.dispatch.backoffBaseMs,
    sleep: deps.sleep,
    now,
  })
  const recorder = createTraceRecorder(store)
  const engine = createTriageEngine({
    store,
    classifier: deps.classifier ?? classifierFromConfig(config),
    responder: deps.responder ?? responderFromConfig(config),
    evaluator: deps.evaluator ?? evaluatorFromConfig(config),
    executor,
    dispatcher,
    recorder,
    confidenceThreshold: config.confidenceThreshold,
    maxRecomputePasses: config.maxRecomputePasses,
    onApprovalRequested: deps.onApprovalRequested,
    now,
  })
  const approvals = createApprovalService({
    store,
    publish: deps.publishDecision ?? (async () => undefined),
    now,
  })

  return { config, store, engine, executor, approvals, recorder }
}

/**
 * Channel used when Chatwoot credentials are missing. Every write fails, so
 * decisions land in dispatch_failed and the operator queue instead of
 * silently disappearing.
 */
function unconfiguredChannel(): SupportChannel {
  const fail = async (): Promise<void> => {
    throw new Error('Chatwoot channel is not configured')
  }
  return {
    name: 'unconfigured',
    sendPublicReply: fail,
    createPrivateNote: fail,
    setConversationStatus: fail,
  }
}

function channelFromEnv(): SupportChannel {
  if (!env.CHATWOOT_URL || !env.CHATWOOT_API_TOKEN || !env.CHATWOOT_ACCOUNT_ID) {
    return unconfiguredChannel()
  }
  return createChatwootChannel(
    createChatwootClient({
      baseUrl: env.CHATWOOT_URL,
      apiToken: env.CHATWOOT_API_TOKEN,
      accountId: env.CHATWOOT_ACCOUNT_ID,
    })
  )
}

function backendFromEnv(): CommerceBackend {
  if (!env.COMMERCE_API_URL || !env.COMMERCE_WEBHOOK_SECRET) {
    throw new Error(
      'COMMERCE_API_URL and COMMERCE_WEBHOOK_SECRET are required to run tools'
    )
  }
  return new CommerceClient({
    baseUrl: env.COMMERCE_API_URL,
    webhookSecret: env.COMMERCE_WEBHOOK_SECRET,
  })
}

/**
 * Production wiring: MySQL store, Chatwoot channel, commerce backend, and
 * Inngest events for approval hand-offs.
 */
export function createProductionRuntime(): TriageRuntime {
  setAuditHooks({
    onPostExecute: ({ toolName, result, durationMs, context }) =>
      traceToolExecution({
        sessionId: context.sessionId,
        toolName,
        success: isSuccessResult(result),
        durationMs,
      }),
    onError: ({ toolName, error, durationMs, context }) =>
      traceToolExecution({
        sessionId: context.sessionId,
        toolName,
        success: false,
        durationMs,
        error: error.message,
      }),
  })

  return createTriageRuntime({
    store: createDrizzleStore(getDb()),
    channel: channelFromEnv(),
    backend: backendFromEnv(),
    onApprovalRequested: async (request) => {
      // One request event per execution, however often it is re-sent
      await inngest.send({
        name: TRIAGE_APPROVAL_REQUESTED,
        id: `approval:${request.executionId}`,
        data: request,
      })
    },
    publishDecision: async (decision) => {
      await inngest.send({ name: TRIAGE_APPROVAL_DECIDED, data: decision })
    },
  })
}

function isSuccessResult(result: unknown): boolean {
  return (
    typeof result === 'object' &&
    result !== null &&
    'success' in result &&
    result.success === true
  )
}

let runtime: TriageRuntime | null = null

/**
 * Lazily build the production runtime. Database and API clients are only
 * created on first use so importing a workflow has no side effects.
 */
export function getRuntime(): TriageRuntime {
  if (!runtime) {
    runtime = createProductionRuntime()
  }
  return runtime
}

/** Replace the shared runtime, or clear it with null */
export function setRuntime(next: TriageRuntime | null): void {
  runtime = next
}
