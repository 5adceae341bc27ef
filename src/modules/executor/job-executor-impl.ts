/**
 * JobExecutorImpl: manager/step/advance handlers over the durable queue.
 *
 * A manager never runs its steps itself. Every state change that could let
 * it move on (a step settling, a probe confirming a fan-out, a pre-job
 * finishing, the manager timeout) enqueues a `job_advance`, and advancing is
 * idempotent: it looks at the steps in order, starts the first pending one,
 * waits on a running one, and finalizes the manager once all are terminal.
 */

import { z } from 'zod'
import type { Clock, JobId } from '../../core/types.js'
import { isTerminalStatus, systemClock } from '../../core/types.js'
import {
  ConveyorError,
  InvalidStateTransitionError,
  JobValidationError,
  TerminalError,
  TimeoutError,
  errorCode,
  formatErrorMessage,
  isRetryable,
} from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import { deriveId, generateId } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { DurableQueue } from '../queue/durable-queue.js'
import { computeBackoff } from '../queue/backoff.js'
import type { JobStore } from '../job-store/job-store.js'
import { parseJobConfig } from '../job-store/job-types.js'
import type { JobConfigMap } from '../job-store/job-types.js'
import type { JobRecord } from '../job-store/types.js'
import type { CompletionProbe, ProbeVerdict } from '../completion-probe/completion-probe.js'
import { Outcome } from '../worker-pool/handler-registry.js'
import type { HandlerContext, HandlerOutcome, HandlerRegistry } from '../worker-pool/handler-registry.js'
import type { ActionContext, ActionRegistry } from './action-registry.js'
import { validateDefinition } from './definition-schema.js'
import type { JobDefinition, StepDefinition } from './definition-schema.js'
import type { DefinitionStore } from './definition-store.js'
import {
  ADVANCE_MESSAGE_TYPE,
  MANAGER_MESSAGE_TYPE,
  STEP_MESSAGE_TYPE,
} from './job-executor.js'
import type {
  ExecuteOptions,
  ExecuteResult,
  JobExecutor,
  JobExecutorOptions,
} from './job-executor.js'

const logger = createLogger('executor')

const DEFAULT_EXECUTOR_OPTIONS: JobExecutorOptions = {
  retryMaxMs: 60_000,
}

const ManagerCheckpointSchema = z.object({ pre_job_ids: z.array(z.string()) }).passthrough()
const StepCheckpointSchema = z.object({ attempts: z.number().int().min(0) }).passthrough()

type ManagerConfig = JobConfigMap['manager']

export interface JobExecutorDeps {
  store: JobStore
  queue: DurableQueue
  definitions: DefinitionStore
  actions: ActionRegistry
  probe: CompletionProbe
  eventBus?: TypedEventBus
  clock?: Clock
  options?: Partial<JobExecutorOptions>
  random?: () => number
}

export class JobExecutorImpl implements JobExecutor {
  private readonly _store: JobStore
  private readonly _queue: DurableQueue
  private readonly _definitions: DefinitionStore
  private readonly _actions: ActionRegistry
  private readonly _probe: CompletionProbe
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _clock: Clock
  private readonly _options: JobExecutorOptions
  private readonly _random: () => number

  constructor(deps: JobExecutorDeps) {
    this._store = deps.store
    this._queue = deps.queue
    this._definitions = deps.definitions
    this._actions = deps.actions
    this._probe = deps.probe
    this._eventBus = deps.eventBus
    this._clock = deps.clock ?? systemClock
    this._options = { ...DEFAULT_EXECUTOR_OPTIONS, ...deps.options }
    this._random = deps.random ?? Math.random

    this._probe.setDelegate({
      decide: (job) => this._decideFanOut(job),
      onSettled: (job) => {
        this._onStepSettled(job)
      },
      timeoutMs: (job) => this._stepTimeout(job),
    })
  }

  // -------------------------------------------------------------------------
  // Public API
  // -------------------------------------------------------------------------

  execute(input: string | JobDefinition | Record<string, unknown>, options: ExecuteOptions = {}): ExecuteResult {
    const definition = this._resolveDefinition(input)
    const managerId = options.managerId ?? generateId()
    const config: ManagerConfig = {
      definition,
      trigger: options.trigger ?? 'manual',
      ...(options.triggeredBy === undefined ? {} : { triggered_by: options.triggeredBy }),
    }

    const result = this._store.transaction((): ExecuteResult => {
      const { created } = this._store.createJob({
        id: managerId,
        type: 'manager',
        name: definition.name,
        config,
        definitionId: definition.id,
      })
      if (!created) {
        return { managerId, stepIds: this._orderedSteps(managerId).map((s) => s.id), created: false }
      }
      const stepIds = definition.steps.map(
        (step, index) =>
          this._store.createJob({
            id: deriveId(managerId, `step:${String(index)}`),
            parentId: managerId,
            type: 'step',
            name: step.name,
            config: { step, index },
            definitionId: definition.id,
          }).job.id,
      )
      return { managerId, stepIds, created: true }
    })

    if (result.created) {
      logger.info(
        { managerId, definitionId: definition.id, steps: result.stepIds.length, trigger: config.trigger },
        'Execution created',
      )
      if (options.enqueue !== false) {
        this.start(managerId)
      }
    }
    return result
  }

  start(managerId: JobId): void {
    const manager = this._store.requireJob(managerId)
    if (manager.type !== 'manager') {
      throw new JobValidationError(`Job ${managerId} is a ${manager.type} job, not a manager`, { jobId: managerId })
    }
    if (manager.state.status !== 'pending') {
      throw new InvalidStateTransitionError(managerId, manager.state.status, 'running')
    }
    this._queue.enqueue({ type: MANAGER_MESSAGE_TYPE, jobId: managerId }, { dedupKey: `manager:${managerId}` })
  }

  advance(managerId: JobId, delayMs = 0): void {
    this._queue.enqueue({ type: ADVANCE_MESSAGE_TYPE, jobId: managerId }, { delayMs })
  }

  register(registry: HandlerRegistry): void {
    registry.register(MANAGER_MESSAGE_TYPE, (ctx) => this._handleManager(ctx), {
      onSettled: (job) => {
        this._onManagerSettled(job)
      },
    })
    registry.register(STEP_MESSAGE_TYPE, (ctx) => this._handleStep(ctx), {
      onSettled: (job) => {
        this._onStepSettled(job)
      },
      resolveTimeoutMs: (job) => this._stepTimeout(job),
    })
    registry.register(ADVANCE_MESSAGE_TYPE, (ctx) => this._handleAdvance(ctx), { lifecycle: 'control' })
  }

  // -------------------------------------------------------------------------
  // job_manager
  // -------------------------------------------------------------------------

  private async _handleManager(ctx: HandlerContext): Promise<HandlerOutcome> {
    const manager = ownedJob(ctx)
    const { definition } = parseJobConfig('manager', manager.config)

    if (definition.pre_jobs.length > 0 && readPreJobIds(manager) === null) {
      const preJobIds: JobId[] = []
      for (const id of definition.pre_jobs) {
        const resolution = this._definitions.resolve(id)
        if (!resolution.ok) {
          ctx.log('warn', `Skipping pre-job ${id}: ${resolution.message}`)
          continue
        }
        const { managerId } = this.execute(resolution.definition, {
          trigger: 'pre_job',
          triggeredBy: manager.id,
          managerId: deriveId(manager.id, `pre:${id}`),
        })
        preJobIds.push(managerId)
      }
      this._store.saveCheckpoint(manager.id, { ...(manager.state.checkpoint ?? {}), pre_job_ids: preJobIds })
    }

    if (definition.timeout_ms !== undefined) {
      const elapsed = this._clock.now() - (manager.state.startedAt ?? this._clock.now())
      this._queue.enqueue(
        { type: ADVANCE_MESSAGE_TYPE, jobId: manager.id, payload: { reason: 'timeout' } },
        { delayMs: Math.max(0, definition.timeout_ms - elapsed), dedupKey: `timeout:${manager.id}` },
      )
    }

    ctx.log('info', `Started ${String(definition.steps.length)} step(s) of definition ${definition.id}`)
    this.advance(manager.id)
    return Outcome.waiting()
  }

  // -------------------------------------------------------------------------
  // job_advance
  // -------------------------------------------------------------------------

  private async _handleAdvance(ctx: HandlerContext): Promise<HandlerOutcome> {
    const manager = ctx.job
    if (manager === null || manager.type !== 'manager' || manager.state.status !== 'running') {
      return Outcome.completed()
    }
    const { definition } = parseJobConfig('manager', manager.config)

    const timeoutMs = definition.timeout_ms
    const startedAt = manager.state.startedAt ?? manager.createdAt
    if (timeoutMs !== undefined && this._clock.now() - startedAt >= timeoutMs) {
      this._failManager(manager, new TimeoutError(manager.id, timeoutMs))
      return Outcome.completed()
    }

    if (this._countActivePreJobs(manager) > 0) {
      return Outcome.completed()
    }

    const steps = this._orderedSteps(manager.id)
    for (const [index, step] of steps.entries()) {
      switch (step.state.status) {
        case 'running':
          return Outcome.completed()
        case 'pending':
          this._enqueueStep(manager, step, index, steps.length)
          return Outcome.completed()
        case 'failed':
        case 'cancelled': {
          const { step: stepDef } = parseJobConfig('step', step.config)
          if (stepDef.on_error === 'continue') {
            continue
          }
          this._failManager(
            manager,
            new TerminalError(
              `Step "${step.name}" ${step.state.status}: ${step.state.error ?? 'no error recorded'}`,
              'STEP_FAILED',
              { stepId: step.id },
            ),
          )
          return Outcome.completed()
        }
        case 'completed':
          continue
      }
    }

    this._completeManager(manager, definition, steps)
    return Outcome.completed()
  }

  private _enqueueStep(manager: JobRecord, step: JobRecord, index: number, total: number): void {
    const { created } = this._queue.enqueue(
      { type: STEP_MESSAGE_TYPE, jobId: step.id },
      { dedupKey: `step:${step.id}` },
    )
    if (!created) return
    this._store.appendLog(manager.id, 'info', `Starting step ${String(index + 1)}/${String(total)}: ${step.name}`)
    this._eventBus?.emit('step:advanced', { managerId: manager.id, stepId: step.id, stepName: step.name, index })
  }

  private _completeManager(manager: JobRecord, definition: JobDefinition, steps: JobRecord[]): void {
    const summary = steps.map((s) => ({ name: s.name, status: s.state.status, result_count: s.state.resultCount }))
    const failedSteps = steps.filter((s) => s.state.status !== 'completed').length
    const resultCount = steps.reduce((sum, s) => sum + s.state.resultCount, 0)

    // Completion, post-jobs and the trigger's advance commit together
    this._store.transaction(() => {
      this._store.updateStatus(manager.id, 'completed', {
        result: { steps: summary, failed_steps: failedSteps },
        resultCount,
      })
      this._store.appendLog(
        manager.id,
        'info',
        failedSteps === 0
          ? `Completed all ${String(steps.length)} step(s)`
          : `Completed with ${String(failedSteps)} of ${String(steps.length)} step(s) failed`,
      )
      this._firePostJobs(manager, definition)
      this._onManagerSettled(this._store.requireJob(manager.id))
    })
    logger.info({ managerId: manager.id, definitionId: definition.id, failedSteps }, 'Execution completed')
  }

  private _failManager(manager: JobRecord, err: ConveyorError): void {
    this._store.transaction(() => {
      this._store.updateStatus(manager.id, 'failed', { error: err, errorCode: err.code })
      this._store.appendLog(manager.id, 'error', formatErrorMessage(err))
      this._onManagerSettled(this._store.requireJob(manager.id))
    })
    logger.warn({ managerId: manager.id, code: err.code }, 'Execution failed')
  }

  /**
   * Execute each post-job as a new root with an id derived from the manager,
   * so a redelivered advance cannot fire it twice. A post-job whose definition
   * cannot run is logged and skipped; any other error propagates and rolls
   * back the manager's completion so the advance is retried.
   */
  private _firePostJobs(manager: JobRecord, definition: JobDefinition): void {
    for (const id of definition.post_jobs) {
      const resolution = this._definitions.resolve(id)
      if (!resolution.ok) {
        this._store.appendLog(manager.id, 'warn', `Skipping post-job ${id}: ${resolution.message}`)
        logger.warn({ managerId: manager.id, postJob: id, reason: resolution.reason }, 'Post-job skipped')
        continue
      }
      try {
        const { managerId, created } = this.execute(resolution.definition, {
          trigger: 'post_job',
          triggeredBy: manager.id,
          managerId: deriveId(manager.id, `post:${id}`),
        })
        if (created) {
          this._store.appendLog(manager.id, 'info', `Triggered post-job ${id} as ${managerId}`)
        }
      } catch (err) {
        if (isRetryable(err)) throw err
        this._store.appendLog(manager.id, 'warn', `Skipping post-job ${id}: ${formatErrorMessage(err)}`)
        logger.warn({ managerId: manager.id, postJob: id, err }, 'Post-job could not be started')
      }
    }
  }

  private _onManagerSettled(manager: JobRecord): void {
    if (manager.type !== 'manager') return
    const config = parseJobConfig('manager', manager.config)
    if (config.trigger === 'pre_job' && config.triggered_by !== undefined) {
      this.advance(config.triggered_by)
    }
  }

  private _countActivePreJobs(manager: JobRecord): number {
    const ids = readPreJobIds(manager) ?? []
    return ids.filter((id) => {
      const preJob = this._store.getJob(id)
      return preJob !== undefined && !isTerminalStatus(preJob.state.status)
    }).length
  }

  // -------------------------------------------------------------------------
  // job_step
  // -------------------------------------------------------------------------

  private async _handleStep(ctx: HandlerContext): Promise<HandlerOutcome> {
    const step = ownedJob(ctx)
    const { step: stepDef } = parseJobConfig('step', step.config)
    if (step.managerId === null) {
      throw new TerminalError(`Step job ${step.id} has no manager`, 'INVALID_TREE')
    }
    const manager = this._store.requireJob(step.managerId)

    const action = this._actions.resolve(stepDef.type, stepDef.action)
    if (action === undefined) {
      const err = new TerminalError(`No action registered for ${stepDef.type}:${stepDef.action}`, 'NO_ACTION')
      return Outcome.failed(err, err.code)
    }

    const actionCtx: ActionContext = {
      step,
      definition: stepDef,
      manager,
      signal: ctx.signal,
      log: ctx.log,
    }

    try {
      if (action.mode === 'fanout') {
        this._store.setAwaitingChildren(step.id, true)
      }
      const result = await action.run(actionCtx)
      switch (action.mode) {
        case 'inline':
          return Outcome.completed(result.result, result.resultCount)
        case 'fanout':
          ctx.log('info', `Fan-out started for step ${step.name}`)
          this._probe.schedule(step.id)
          return Outcome.waiting()
        case 'deferred':
          return Outcome.waiting()
      }
    } catch (err) {
      if (ctx.signal.aborted) {
        throw err
      }
      return this._onStepError(ctx, step, stepDef, err)
    }
  }

  /**
   * Apply the step's on_error policy. `retry` requeues the step message with
   * backoff until max_attempts; `fail` and `continue` fail the step and leave
   * the decision to the manager's advance.
   */
  private _onStepError(ctx: HandlerContext, step: JobRecord, stepDef: StepDefinition, err: unknown): HandlerOutcome {
    const current = this._store.requireJob(step.id)
    if (current.state.awaitingChildren) {
      this._store.setAwaitingChildren(step.id, false)
    }
    const text = formatErrorMessage(err)
    const code = errorCode(err)

    if (stepDef.on_error !== 'retry') {
      return Outcome.failed(err, code)
    }

    const attempts = readAttempts(current) + 1
    if (attempts >= stepDef.max_attempts) {
      return Outcome.failed(
        new TerminalError(`Step failed after ${String(attempts)} attempt(s): ${text}`, code),
        code,
      )
    }

    const delayMs = computeBackoff(attempts, {
      baseMs: stepDef.retry_delay_ms,
      maxMs: Math.max(stepDef.retry_delay_ms, this._options.retryMaxMs),
      random: this._random,
    })
    this._store.saveCheckpoint(step.id, { ...(current.state.checkpoint ?? {}), attempts, last_error: text })
    ctx.log(
      'warn',
      `Attempt ${String(attempts)}/${String(stepDef.max_attempts)} failed: ${text}; retrying in ${String(delayMs)}ms`,
    )
    return Outcome.requeue(delayMs)
  }

  private _onStepSettled(job: JobRecord): void {
    if (job.type === 'step' && job.managerId !== null) {
      this.advance(job.managerId)
    }
  }

  private _stepTimeout(job: JobRecord): number | undefined {
    if (job.type !== 'step') return undefined
    return parseJobConfig('step', job.config).step.timeout_ms
  }

  /** Verdict for a settled fan-out under the definition's error tolerance */
  private _decideFanOut(job: JobRecord): ProbeVerdict {
    if (job.type !== 'step' || job.managerId === null) {
      return { status: 'completed' }
    }
    const manager = this._store.getJob(job.managerId)
    if (manager === undefined) {
      return { status: 'completed' }
    }
    const tolerance = parseJobConfig('manager', manager.config).definition.error_tolerance
    const failed = job.state.progress.failed
    if (tolerance !== undefined && tolerance.failure_action === 'fail' && failed > tolerance.max_child_failures) {
      return {
        status: 'failed',
        error: `${String(failed)} child job(s) failed; tolerance is ${String(tolerance.max_child_failures)}`,
        code: 'CHILD_FAILURES',
      }
    }
    return { status: 'completed' }
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private _resolveDefinition(input: string | JobDefinition | Record<string, unknown>): JobDefinition {
    if (typeof input === 'string') {
      return this._definitions.require(input)
    }
    const validation = validateDefinition(input)
    if (!validation.ok) {
      throw new JobValidationError(`Invalid job definition: ${validation.error}`)
    }
    if (!validation.definition.enabled) {
      throw new JobValidationError(`Job definition ${validation.definition.id} is disabled`, {
        definitionId: validation.definition.id,
      })
    }
    return validation.definition
  }

  private _orderedSteps(managerId: JobId): JobRecord[] {
    return this._store
      .listChildren(managerId)
      .filter((child) => child.type === 'step')
      .map((child) => ({ child, index: parseJobConfig('step', child.config).index }))
      .sort((a, b) => a.index - b.index)
      .map(({ child }) => child)
  }
}

// ---------------------------------------------------------------------------
// Module helpers
// ---------------------------------------------------------------------------

function ownedJob(ctx: HandlerContext): JobRecord {
  if (ctx.job === null) {
    throw new TerminalError(`Message ${ctx.message.id} has no job`, 'NO_JOB')
  }
  return ctx.job
}

function readPreJobIds(manager: JobRecord): JobId[] | null {
  const parsed = ManagerCheckpointSchema.safeParse(manager.state.checkpoint)
  return parsed.success ? parsed.data.pre_job_ids : null
}

function readAttempts(step: JobRecord): number {
  const parsed = StepCheckpointSchema.safeParse(step.state.checkpoint)
  return parsed.success ? parsed.data.attempts : 0
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createJobExecutor(deps: JobExecutorDeps): JobExecutor {
  return new JobExecutorImpl(deps)
}
