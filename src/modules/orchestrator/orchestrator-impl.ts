/**
 * OrchestratorImpl: the planner/executor/reviewer loop over the durable queue.
 *
 * Each phase handler only creates the jobs of the next phase; they are
 * enqueued from the phase's onSettled hook, in the transaction in which the
 * pool records the phase as terminal. The step therefore never sees a running phase job when
 * the review completes it. Job ids are derived from the step and iteration,
 * so a redelivered phase recreates nothing.
 */

import { z } from 'zod'
import type { Clock, JobId } from '../../core/types.js'
import { isTerminalStatus, systemClock } from '../../core/types.js'
import { TerminalError } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import { deriveId } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { DurableQueue } from '../queue/durable-queue.js'
import type { JobStore } from '../job-store/job-store.js'
import { parseJobConfig } from '../job-store/job-types.js'
import type { JobConfigMap } from '../job-store/job-types.js'
import type { JobRecord } from '../job-store/types.js'
import { Outcome } from '../worker-pool/handler-registry.js'
import type { HandlerContext, HandlerOutcome, HandlerRegistry } from '../worker-pool/handler-registry.js'
import type { ActionContext, ActionResult } from '../executor/action-registry.js'
import type { JobExecutor } from '../executor/job-executor.js'
import type { LlmProvider } from './llm-provider.js'
import { parsePlan, parseReview, ReviewOutputSchema } from './plan-schema.js'
import { buildPlanningMessages, buildReviewMessages, planOutputSchema, REVIEW_OUTPUT_SCHEMA } from './prompts.js'
import type { ToolCallOutcome } from './prompts.js'
import type { ToolRegistry } from './tool-registry.js'
import {
  PLANNING_MESSAGE_TYPE,
  REVIEW_MESSAGE_TYPE,
  TOOL_CALL_MESSAGE_TYPE,
  WAIT_MESSAGE_TYPE,
} from './orchestrator.js'
import type { Orchestrator, OrchestratorOptions, ReviewDecision } from './orchestrator.js'

const logger = createLogger('orchestrator')

export const DEFAULT_ORCHESTRATOR_OPTIONS: OrchestratorOptions = {
  waitIntervalMs: 5_000,
  waitTimeoutMs: 600_000,
  maxReplans: 1,
}

const WaitCheckpointSchema = z.object({
  waiting_on: z.array(z.string()),
  next_check_at: z.number(),
  deadline: z.number(),
})

type WaitCheckpoint = z.infer<typeof WaitCheckpointSchema>

const ReviewResultSchema = ReviewOutputSchema.extend({
  decision: z.enum(['achieved', 'replan', 'partial']),
  iteration: z.number().int().min(0),
})

type ReviewResult = z.infer<typeof ReviewResultSchema>

type PlanningConfig = JobConfigMap['orchestrator_planning']

interface StepSettings {
  goal: string
  tools: string[]
  maxReplans: number
  waitIntervalMs: number
  waitTimeoutMs: number
}

export interface OrchestratorDeps {
  store: JobStore
  queue: DurableQueue
  executor: Pick<JobExecutor, 'advance'>
  llm: LlmProvider
  tools: ToolRegistry
  eventBus?: TypedEventBus
  clock?: Clock
  options?: Partial<OrchestratorOptions>
}

export class OrchestratorImpl implements Orchestrator {
  readonly mode = 'deferred' as const

  private readonly _store: JobStore
  private readonly _queue: DurableQueue
  private readonly _executor: Pick<JobExecutor, 'advance'>
  private readonly _llm: LlmProvider
  private readonly _tools: ToolRegistry
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _clock: Clock
  private readonly _options: OrchestratorOptions

  constructor(deps: OrchestratorDeps) {
    this._store = deps.store
    this._queue = deps.queue
    this._executor = deps.executor
    this._llm = deps.llm
    this._tools = deps.tools
    this._eventBus = deps.eventBus
    this._clock = deps.clock ?? systemClock
    this._options = { ...DEFAULT_ORCHESTRATOR_OPTIONS, ...deps.options }
  }

  /** Step action: validate the tools and start the first planning job */
  async run(ctx: ActionContext): Promise<ActionResult> {
    const settings = this._settings(ctx.step)
    this._tools.describe(settings.tools)

    const planning = this._createPlanning(ctx.step, { goal: settings.goal, tools: settings.tools, iteration: 0 })
    this._enqueueJob(PLANNING_MESSAGE_TYPE, planning.id)
    ctx.log('info', `Planning with ${String(settings.tools.length)} tool(s): ${settings.goal}`)
    return {}
  }

  register(registry: HandlerRegistry): void {
    registry.register(PLANNING_MESSAGE_TYPE, (ctx) => this._handlePlanning(ctx), {
      onSettled: (job) => {
        this._onPlanningSettled(job)
      },
    })
    registry.register(TOOL_CALL_MESSAGE_TYPE, (ctx) => this._handleToolCall(ctx), {
      onSettled: (job) => {
        this._onToolCallSettled(job)
      },
    })
    registry.register(WAIT_MESSAGE_TYPE, (ctx) => this._handleWait(ctx), {
      onSettled: (job) => {
        this._onWaitSettled(job)
      },
    })
    registry.register(REVIEW_MESSAGE_TYPE, (ctx) => this._handleReview(ctx), {
      onSettled: (job) => {
        this._onReviewSettled(job)
      },
    })
  }

  // -------------------------------------------------------------------------
  // Planning
  // -------------------------------------------------------------------------

  private async _handlePlanning(ctx: HandlerContext): Promise<HandlerOutcome> {
    const job = ownedJob(ctx)
    const config = parseJobConfig('orchestrator_planning', job.config)
    const step = this._parentStep(job)
    const settings = this._settings(step)

    const response = await this._llm.complete({
      messages: buildPlanningMessages(config.goal, this._tools.describe(config.tools), config.context),
      output: planOutputSchema(config.tools),
      signal: ctx.signal,
    })
    const calls = parsePlan(response.content, config.tools)
    const iteration = config.iteration
    const toolJobId = (callId: string): JobId => deriveId(step.id, `tool:${String(iteration)}:${callId}`)

    this._store.transaction(() => {
      const toolJobIds = calls.map(
        (call) =>
          this._store.createJob({
            id: toolJobId(call.id),
            parentId: step.id,
            type: 'tool_call',
            name: call.tool,
            config: {
              tool: call.tool,
              params: call.params,
              depends_on: call.depends_on.map(toolJobId),
              plan_call_id: call.id,
              iteration,
            },
            definitionId: step.definitionId,
          }).job.id,
      )
      this._store.createJob({
        id: waitJobId(step.id, iteration),
        parentId: step.id,
        type: 'orchestrator_wait',
        name: `wait ${String(iteration)}`,
        config: {
          iteration,
          tool_job_ids: toolJobIds,
          interval_ms: settings.waitIntervalMs,
          timeout_ms: settings.waitTimeoutMs,
        },
        definitionId: step.definitionId,
      })
    })

    ctx.log('info', `Planned ${String(calls.length)} tool call(s): ${calls.map((c) => `${c.id}=${c.tool}`).join(', ')}`)
    this._eventBus?.emit('orchestrator:planned', { stepId: step.id, iteration, toolCalls: calls.length })
    return Outcome.completed({ iteration, model: response.model, tool_calls: calls }, calls.length)
  }

  private _onPlanningSettled(job: JobRecord): void {
    const step = this._runningStepOf(job)
    if (step === undefined) return
    if (job.state.status !== 'completed') {
      this._failStep(step, job)
      return
    }
    const { iteration } = parseJobConfig('orchestrator_planning', job.config)
    this._enqueueReadyToolCalls(step.id, iteration)
    this._enqueueJob(WAIT_MESSAGE_TYPE, waitJobId(step.id, iteration))
  }

  private _createPlanning(step: JobRecord, config: PlanningConfig): JobRecord {
    return this._store.createJob({
      id: planningJobId(step.id, config.iteration),
      parentId: step.id,
      type: 'orchestrator_planning',
      name: `plan ${String(config.iteration)}`,
      config,
      definitionId: step.definitionId,
    }).job
  }

  // -------------------------------------------------------------------------
  // Tool execution
  // -------------------------------------------------------------------------

  private async _handleToolCall(ctx: HandlerContext): Promise<HandlerOutcome> {
    const job = ownedJob(ctx)
    const config = parseJobConfig('tool_call', job.config)
    const tool = this._tools.get(config.tool)
    if (tool === undefined) {
      const err = new TerminalError(`Unknown tool "${config.tool}"`, 'UNKNOWN_TOOL', { tool: config.tool })
      return Outcome.failed(err, err.code)
    }

    const dependencies: Record<string, unknown> = {}
    for (const id of config.depends_on) {
      const dep = this._store.getJob(id)
      if (dep?.state.status === 'completed') {
        dependencies[parseJobConfig('tool_call', dep.config).plan_call_id] = dep.state.result
      }
    }

    const result = await tool.run(config.params, {
      jobId: job.id,
      signal: ctx.signal,
      dependencies,
      log: ctx.log,
    })
    return Outcome.completed(result, 1)
  }

  /** Start dependents that just became ready; wake the wait once nothing is left */
  private _onToolCallSettled(job: JobRecord): void {
    const step = this._runningStepOf(job)
    if (step === undefined) return
    const { iteration } = parseJobConfig('tool_call', job.config)
    this._enqueueReadyToolCalls(step.id, iteration)

    const active = this._toolCalls(step.id).filter(
      (call) => call.config.iteration === iteration && !isTerminalStatus(call.job.state.status),
    )
    const wait = this._store.getJob(waitJobId(step.id, iteration))
    if (active.length === 0 && wait !== undefined && !isTerminalStatus(wait.state.status)) {
      this._queue.enqueue(
        { type: WAIT_MESSAGE_TYPE, jobId: wait.id },
        { dedupKey: `job:${wait.id}`, advanceDuplicate: true },
      )
    }
  }

  /**
   * Enqueue pending tool calls of one iteration whose dependencies have all
   * settled. Returns how many were enqueued.
   */
  private _enqueueReadyToolCalls(stepId: JobId, iteration: number): number {
    let enqueued = 0
    for (const { job, config } of this._toolCalls(stepId)) {
      if (config.iteration !== iteration || job.state.status !== 'pending') continue
      if (!config.depends_on.every((id) => this._isSettled(id))) continue
      if (this._enqueueJob(TOOL_CALL_MESSAGE_TYPE, job.id)) enqueued++
    }
    return enqueued
  }

  // -------------------------------------------------------------------------
  // Wait
  // -------------------------------------------------------------------------

  private async _handleWait(ctx: HandlerContext): Promise<HandlerOutcome> {
    const job = ownedJob(ctx)
    const config = parseJobConfig('orchestrator_wait', job.config)
    const step = this._parentStep(job)
    const now = this._clock.now()
    const previous = WaitCheckpointSchema.safeParse(job.state.checkpoint)
    const deadline = previous.success ? previous.data.deadline : (job.state.startedAt ?? now) + config.timeout_ms

    this._enqueueReadyToolCalls(step.id, config.iteration)
    const waitingOn = config.tool_job_ids.filter((id) => !this._isSettled(id))

    if (waitingOn.length > 0 && now < deadline) {
      const delayMs = Math.min(config.interval_ms, deadline - now)
      const checkpoint: WaitCheckpoint = { waiting_on: waitingOn, next_check_at: now + delayMs, deadline }
      this._store.saveCheckpoint(job.id, checkpoint)
      return Outcome.requeue(delayMs)
    }

    if (waitingOn.length > 0) {
      for (const id of waitingOn) {
        this._store.cancel(id, 'tool wait timed out')
      }
      ctx.log(
        'warn',
        `Wait timed out after ${String(config.timeout_ms)}ms; cancelled ${String(waitingOn.length)} tool call(s)`,
      )
    }
    const checkpoint: WaitCheckpoint = { waiting_on: [], next_check_at: now, deadline }
    this._store.saveCheckpoint(job.id, checkpoint)

    const settings = this._settings(step)
    this._store.createJob({
      id: reviewJobId(step.id, config.iteration),
      parentId: step.id,
      type: 'orchestrator_review',
      name: `review ${String(config.iteration)}`,
      config: { goal: settings.goal, iteration: config.iteration },
      definitionId: step.definitionId,
    })

    const counts = countStatuses(config.tool_job_ids.map((id) => this._store.getJob(id)?.state.status ?? 'cancelled'))
    return Outcome.completed({ ...counts, timed_out: waitingOn.length }, config.tool_job_ids.length)
  }

  private _onWaitSettled(job: JobRecord): void {
    const step = this._runningStepOf(job)
    if (step === undefined) return
    if (job.state.status !== 'completed') {
      this._failStep(step, job)
      return
    }
    const { iteration } = parseJobConfig('orchestrator_wait', job.config)
    this._enqueueJob(REVIEW_MESSAGE_TYPE, reviewJobId(step.id, iteration))
  }

  // -------------------------------------------------------------------------
  // Review
  // -------------------------------------------------------------------------

  private async _handleReview(ctx: HandlerContext): Promise<HandlerOutcome> {
    const job = ownedJob(ctx)
    const config = parseJobConfig('orchestrator_review', job.config)
    const step = this._parentStep(job)
    const settings = this._settings(step)

    const response = await this._llm.complete({
      messages: buildReviewMessages(config.goal, this._collectOutcomes(step.id)),
      output: REVIEW_OUTPUT_SCHEMA,
      signal: ctx.signal,
    })
    const review = parseReview(response.content)

    let decision: ReviewDecision
    if (review.goal_achieved) {
      decision = 'achieved'
    } else if (review.recovery_actions.length > 0 && config.iteration < settings.maxReplans) {
      decision = 'replan'
    } else {
      decision = 'partial'
    }

    if (decision === 'replan') {
      this._createPlanning(step, {
        goal: config.goal,
        tools: settings.tools,
        iteration: config.iteration + 1,
        context: {
          previous_summary: review.summary,
          missing_data: review.missing_data,
          recovery_actions: review.recovery_actions,
        },
      })
    }

    ctx.log(
      'info',
      `Review ${decision}: confidence ${review.confidence.toFixed(2)}; ${review.summary}`,
    )
    this._eventBus?.emit('orchestrator:reviewed', {
      stepId: step.id,
      iteration: config.iteration,
      goalAchieved: review.goal_achieved,
      confidence: review.confidence,
    })
    const result: ReviewResult = { ...review, decision, iteration: config.iteration }
    return Outcome.completed(result, 1)
  }

  private _onReviewSettled(job: JobRecord): void {
    const step = this._runningStepOf(job)
    if (step === undefined) return
    const parsed = ReviewResultSchema.safeParse(job.state.result)
    if (job.state.status !== 'completed' || !parsed.success) {
      this._failStep(step, job)
      return
    }
    const review = parsed.data
    if (review.decision === 'replan') {
      this._enqueueJob(PLANNING_MESSAGE_TYPE, planningJobId(step.id, review.iteration + 1))
      return
    }
    this._completeStep(step, review)
  }

  // -------------------------------------------------------------------------
  // Step settlement
  // -------------------------------------------------------------------------

  private _completeStep(step: JobRecord, review: ReviewResult): void {
    const outcomes = this._collectOutcomes(step.id)
    const completedCalls = outcomes.filter((o) => o.status === 'completed').length
    const outcome = review.decision === 'achieved' ? 'achieved' : 'partial'

    this._store.updateStatus(step.id, 'completed', {
      result: {
        outcome,
        summary: review.summary,
        confidence: review.confidence,
        missing_data: review.missing_data,
        iterations: review.iteration + 1,
        tool_calls: outcomes.length,
        failed_tool_calls: outcomes.length - completedCalls,
      },
      resultCount: completedCalls,
    })
    this._store.appendLog(
      step.id,
      outcome === 'achieved' ? 'info' : 'warn',
      outcome === 'achieved'
        ? `Goal achieved after ${String(review.iteration + 1)} iteration(s)`
        : `Goal partially achieved after ${String(review.iteration + 1)} iteration(s): ${review.summary}`,
    )
    logger.info({ stepId: step.id, outcome, iterations: review.iteration + 1 }, 'Orchestration finished')
    this._advanceManager(step)
  }

  /** Fail the step with the error of the phase job that failed */
  private _failStep(step: JobRecord, phase: JobRecord): void {
    const error = phase.state.error ?? `${phase.type} job ${phase.id} ${phase.state.status}`
    const code = phase.state.errorCode ?? 'ORCHESTRATION_FAILED'
    this._store.updateStatus(step.id, 'failed', { error, errorCode: code })
    this._store.appendLog(step.id, 'error', `${phase.name} ${phase.state.status}: ${error}`)
    logger.warn({ stepId: step.id, phaseId: phase.id, code }, 'Orchestration failed')
    this._advanceManager(step)
  }

  private _advanceManager(step: JobRecord): void {
    if (step.managerId !== null) {
      this._executor.advance(step.managerId)
    }
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private _settings(step: JobRecord): StepSettings {
    if (step.type !== 'step') {
      throw new TerminalError(`Job ${step.id} is a ${step.type} job, not a step`, 'INVALID_TREE')
    }
    const { step: definition } = parseJobConfig('step', step.config)
    if (definition.type !== 'orchestrate') {
      throw new TerminalError(`Orchestrator cannot run a ${definition.type} step`, 'INVALID_STEP')
    }
    const config = definition.config
    return {
      goal: config.goal,
      tools: config.tools,
      maxReplans: config.max_replans ?? this._options.maxReplans,
      waitIntervalMs: config.wait_interval_ms ?? this._options.waitIntervalMs,
      waitTimeoutMs: config.wait_timeout_ms ?? this._options.waitTimeoutMs,
    }
  }

  /** @throws {TerminalError} (INVALID_TREE) when the phase job has no step parent */
  private _parentStep(job: JobRecord): JobRecord {
    const step = job.parentId === null ? undefined : this._store.getJob(job.parentId)
    if (step === undefined || step.type !== 'step') {
      throw new TerminalError(`${job.type} job ${job.id} is not under a step`, 'INVALID_TREE')
    }
    return step
  }

  private _runningStepOf(job: JobRecord): JobRecord | undefined {
    const step = job.parentId === null ? undefined : this._store.getJob(job.parentId)
    if (step === undefined || step.type !== 'step' || step.state.status !== 'running') {
      return undefined
    }
    return step
  }

  private _toolCalls(stepId: JobId): { job: JobRecord; config: JobConfigMap['tool_call'] }[] {
    return this._store
      .listChildren(stepId)
      .filter((child) => child.type === 'tool_call')
      .map((job) => ({ job, config: parseJobConfig('tool_call', job.config) }))
  }

  private _collectOutcomes(stepId: JobId): ToolCallOutcome[] {
    return this._toolCalls(stepId).map(({ job, config }) => ({
      id: config.plan_call_id,
      iteration: config.iteration,
      tool: config.tool,
      params: config.params,
      status: job.state.status,
      ...(job.state.status === 'completed' ? { result: job.state.result } : {}),
      ...(job.state.error === null ? {} : { error: job.state.error }),
    }))
  }

  private _isSettled(jobId: JobId): boolean {
    const job = this._store.getJob(jobId)
    return job === undefined || isTerminalStatus(job.state.status)
  }

  private _enqueueJob(type: string, jobId: JobId): boolean {
    return this._queue.enqueue({ type, jobId }, { dedupKey: `job:${jobId}` }).created
  }
}

// ---------------------------------------------------------------------------
// Module helpers
// ---------------------------------------------------------------------------

export function planningJobId(stepId: JobId, iteration: number): JobId {
  return deriveId(stepId, `plan:${String(iteration)}`)
}

export function waitJobId(stepId: JobId, iteration: number): JobId {
  return deriveId(stepId, `wait:${String(iteration)}`)
}

export function reviewJobId(stepId: JobId, iteration: number): JobId {
  return deriveId(stepId, `review:${String(iteration)}`)
}

function ownedJob(ctx: HandlerContext): JobRecord {
  if (ctx.job === null) {
    throw new TerminalError(`Message ${ctx.message.id} has no job`, 'NO_JOB')
  }
  return ctx.job
}

function countStatuses(statuses: string[]): { completed: number; failed: number; cancelled: number } {
  return {
    completed: statuses.filter((s) => s === 'completed').length,
    failed: statuses.filter((s) => s === 'failed').length,
    cancelled: statuses.filter((s) => s === 'cancelled').length,
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
  return new OrchestratorImpl(deps)
}
