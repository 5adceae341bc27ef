/**
 * Orchestrator: plan, execute and review a goal with an LLM and a set of
 * tools, as the `orchestrate` step action.
 *
 * Every phase is its own job under the step:
 *   orchestrator_planning  ask the model for tool calls, create them
 *   tool_call              run one tool; failures stay independent
 *   orchestrator_wait      poll until the iteration's tool calls settle
 *   orchestrator_review    judge the results; finish the step or plan again
 *
 * The step is deferred: the executor leaves it running and the review (or a
 * failed phase) settles it.
 */

import type { HandlerRegistry } from '../worker-pool/handler-registry.js'
import type { StepAction } from '../executor/action-registry.js'

export const PLANNING_MESSAGE_TYPE = 'orchestrator_planning'
export const TOOL_CALL_MESSAGE_TYPE = 'tool_call'
export const WAIT_MESSAGE_TYPE = 'orchestrator_wait'
export const REVIEW_MESSAGE_TYPE = 'orchestrator_review'

export interface OrchestratorOptions {
  /** Delay between visits of a wait job */
  waitIntervalMs: number
  /** Time after which a wait cancels unfinished tool calls */
  waitTimeoutMs: number
  /** Re-plans allowed after the first review */
  maxReplans: number
}

/** What a review decided for its step */
export type ReviewDecision = 'achieved' | 'replan' | 'partial'

export interface Orchestrator extends StepAction {
  /** Register the four phase handlers */
  register(registry: HandlerRegistry): void
}
