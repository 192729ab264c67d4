/**
 * @support-triage/core
 *
 * Core exports for the triage engine. Prefer package.json exports for the
 * heavier surfaces: import { inngest } from '@support-triage/core/inngest'
 */

/** Package version, injected at build time */
export const VERSION = '0.0.0'

// Errors
export {
  ERROR_CODES,
  TriageError,
  UnknownToolError,
  ToolExecutionFailedError,
  ApprovalRejectedError,
  InvalidTransitionError,
  DispatchChannelUnavailableError,
  StoreConflictError,
  SessionNotFoundError,
  errorMessage,
} from './errors'
export type { ErrorCode } from './errors'

// Config
export { env } from './config/env'
export { loadTriageConfig, DEFAULT_TRIAGE_CONFIG } from './config/triage'
export type { TriageConfig, LlmPricing } from './config/triage'

// Engine
export { createTriageEngine } from './engine/triage-engine'
export type {
  ApprovalRequest,
  CycleResult,
  InboundEvent,
  TriageEngine,
  TriageEngineOptions,
} from './engine/triage-engine'
export { decide, decideEarly } from './engine/decide'
export type { DecisionOutcome, DecisionRule } from './engine/decide'

// Runtime
export {
  createTriageRuntime,
  createProductionRuntime,
  classifierFromConfig,
  responderFromConfig,
  evaluatorFromConfig,
  getRuntime,
  setRuntime,
} from './runtime'
export type { TriageRuntime, TriageRuntimeDeps } from './runtime'

// Approvals
export { createApprovalService } from './approvals/service'
export type {
  ApprovalDecision,
  ApprovalService,
  PendingApproval,
} from './approvals/service'

// Router
export { CATEGORIES, isCategory, toCategory } from './router/categories'
export type { Category } from './router/categories'
export { createRuleClassifier, classifyByRules } from './router/rule-classifier'
export { createLlmClassifier } from './router/llm-classifier'
export { planTools, CATEGORY_CONFIG } from './router/category-config'
export { applyConfidenceFloor } from './router/confidence'
export type { Classifier, ClassificationResult } from './router/types'

// Guardrails
export { detectSafetySignals, checkReplySafety } from './guardrails/safety'
export type { SafetySignal, SafetySignalKind } from './guardrails/safety'
export { detectOutstanding } from './guardrails/outstanding'
export type { OutstandingCase } from './guardrails/outstanding'
export {
  createLlmReplyEvaluator,
  createPassThroughEvaluator,
  judgeReply,
} from './guardrails/reply-evaluator'
export type {
  ReplyCheck,
  ReplyEvaluation,
  ReplyEvaluator,
} from './guardrails/reply-evaluator'

// Responders
export { createTemplateResponder } from './responder/template-responder'
export { createLlmResponder } from './responder/llm-responder'
export type { Responder, ResponderInput, ResponderOutput } from './responder/types'

// Tools
export { createTool, setAuditHooks } from './tools/create-tool'
export { createToolRegistry } from './tools/registry'
export { SUPPORT_TOOLS } from './tools/support-tools'
export { createToolExecutor } from './tools/executor'
export type { ApprovalOutcome, ToolExecutor } from './tools/executor'
export { CommerceClient, CommerceApiError } from './tools/commerce-client'
export type { CommerceBackend } from './tools/backend'

// Store
export { createMemoryStore } from './store/memory-store'
export { createDrizzleStore } from './store/drizzle-store'
export { isTerminalState } from './store/transitions'
export type {
  Decision,
  DecisionRecord,
  Message,
  OperatorQueueEntry,
  Session,
  SessionState,
  SessionStore,
  ToolExecution,
  TraceQuery,
  TraceRecord,
} from './store/types'

// Dispatch
export { createDispatcher, dispatchToken, renderNote } from './dispatch/dispatcher'
export type { Dispatcher, DispatchResult } from './dispatch/dispatcher'
export {
  createChatwootClient,
  createChatwootChannel,
  toChatwootSessionId,
  parseChatwootSessionId,
} from './channel/chatwoot-client'
export type { SupportChannel, ConversationStatus } from './channel/types'

// Traces
export { createTraceRecorder } from './trace/recorder'
export type { TraceRecorder } from './trace/recorder'

// Observability
export {
  initializeAxiom,
  flushAxiom,
  log,
  withTracing,
} from './observability/axiom'
