/**
 * Orchestrator module: public API exports.
 */

export type { Orchestrator, OrchestratorOptions, ReviewDecision } from './orchestrator.js'
export {
  PLANNING_MESSAGE_TYPE,
  TOOL_CALL_MESSAGE_TYPE,
  WAIT_MESSAGE_TYPE,
  REVIEW_MESSAGE_TYPE,
} from './orchestrator.js'
export type { OrchestratorDeps } from './orchestrator-impl.js'
export {
  OrchestratorImpl,
  createOrchestrator,
  DEFAULT_ORCHESTRATOR_OPTIONS,
  planningJobId,
  waitJobId,
  reviewJobId,
} from './orchestrator-impl.js'
export type { LlmMessage, LlmProvider, LlmRequest, LlmResponse, JsonOutputSchema } from './llm-provider.js'
export { UnconfiguredLlmProvider } from './llm-provider.js'
export type { OpenAiProviderOptions } from './openai-provider.js'
export { OpenAiProvider, createLlmProvider } from './openai-provider.js'
export type { PlannedCall, ReviewOutput } from './plan-schema.js'
export { parsePlan, parseReview, findCycle, NO_ACTIONABLE_PLAN } from './plan-schema.js'
export type { Tool, ToolContext, ToolDescriptor, ToolSpec } from './tool-registry.js'
export { ToolRegistry, defineTool } from './tool-registry.js'
export type { BuiltinToolDeps } from './builtin-tools.js'
export { registerBuiltinTools, searchDocumentsTool, getDocumentTool } from './builtin-tools.js'
