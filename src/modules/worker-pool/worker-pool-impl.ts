/**
 * WorkerPoolImpl: concrete implementation of WorkerPool.
 *
 * Each message goes through: receive → route by type → claim the job (for
 * `job` handlers) → run under an AbortController with a heartbeat → record
 * the outcome. Retryable errors release the lease with backoff; terminal
 * errors delete the message and fail the job.
 *
 * A terminal transition, its onSettled hook and the message delete commit in
 * one store transaction. When any of them throws nothing is recorded and the
 * still-leased message is released for another delivery.
 */

import type { Clock, JobId } from '../../core/types.js'
import { isTerminalStatus, systemClock } from '../../core/types.js'
import {
  TerminalError,
  TimeoutError,
  errorCode,
  formatErrorMessage,
  isRetryable,
} from '../../core/errors.js'
import type { LogLevel } from '../../core/types.js'
import type { DurableQueue, LeasedMessage } from '../queue/durable-queue.js'
import { computeBackoff } from '../queue/backoff.js'
import type { JobStore } from '../job-store/job-store.js'
import type { JobRecord, UpdateStatusOptions } from '../job-store/types.js'
import { createLogger } from '../../utils/logger.js'
import { HandlerRegistry } from './handler-registry.js'
import type {
  HandlerContext,
  HandlerOptions,
  HandlerOutcome,
  HandlerRegistration,
  MessageHandler,
} from './handler-registry.js'
import { WorkerHandle } from './worker-handle.js'
import { DEFAULT_WORKER_POOL_OPTIONS } from './worker-pool.js'
import type { IdleAncestorHook, WorkerInfo, WorkerPool, WorkerPoolOptions } from './worker-pool.js'

const logger = createLogger('worker-pool')

/** Abort reason used when stop() gives up waiting for a handler */
export class WorkerShutdownError extends Error {
  constructor() {
    super('Worker pool shutting down')
    this.name = 'WorkerShutdownError'
  }
}

/**
 * Settle with `work`, or reject with the signal's reason once it aborts.
 */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(signal.reason)
    }
    if (signal.aborted) {
      onAbort()
    } else {
      signal.addEventListener('abort', onAbort, { once: true })
    }
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(err)
      },
    )
  })
}

// ---------------------------------------------------------------------------
// WorkerPoolImpl
// ---------------------------------------------------------------------------

export interface WorkerPoolDeps {
  queue: DurableQueue
  store: JobStore
  registry?: HandlerRegistry
  options?: Partial<WorkerPoolOptions>
  /** Called for each awaiting ancestor a recorded transition left without active descendants */
  onIdleAncestor?: IdleAncestorHook
  clock?: Clock
  random?: () => number
}

export class WorkerPoolImpl implements WorkerPool {
  private readonly _queue: DurableQueue
  private readonly _store: JobStore
  private readonly _registry: HandlerRegistry
  private readonly _options: WorkerPoolOptions
  private readonly _onIdleAncestor: IdleAncestorHook | undefined
  private readonly _clock: Clock
  private readonly _random: () => number

  private _workers: WorkerHandle[] = []
  private readonly _inFlight = new Map<string, AbortController>()

  constructor(deps: WorkerPoolDeps) {
    this._queue = deps.queue
    this._store = deps.store
    this._registry = deps.registry ?? new HandlerRegistry()
    this._options = { ...DEFAULT_WORKER_POOL_OPTIONS, ...deps.options }
    this._onIdleAncestor = deps.onIdleAncestor
    this._clock = deps.clock ?? systemClock
    this._random = deps.random ?? Math.random
  }

  // -------------------------------------------------------------------------
  // BaseService lifecycle
  // -------------------------------------------------------------------------

  async initialize(): Promise<void> {
    logger.debug({ handlers: this._registry.types }, 'WorkerPool initialized')
  }

  async shutdown(): Promise<void> {
    await this.stop()
  }

  // -------------------------------------------------------------------------
  // WorkerPool interface
  // -------------------------------------------------------------------------

  registerHandler(type: string, handler: MessageHandler, options?: HandlerOptions): void {
    this._registry.register(type, handler, options)
  }

  start(concurrency = this._options.concurrency): void {
    if (this._workers.length > 0) {
      logger.warn({ workers: this._workers.length }, 'WorkerPool already running')
      return
    }
    const count = Math.max(1, Math.floor(concurrency))
    for (let i = 0; i < count; i++) {
      const handle = new WorkerHandle(
        `worker-${String(i + 1)}`,
        (h) => this._processOne(h),
        this._options.pollIntervalMs,
      )
      this._workers.push(handle)
      handle.start()
    }
    logger.info({ concurrency: count, handlers: this._registry.types }, 'WorkerPool started')
  }

  async stop(timeoutMs = this._options.shutdownTimeoutMs): Promise<void> {
    if (this._workers.length === 0) {
      return
    }
    const workers = this._workers
    for (const worker of workers) {
      worker.requestStop()
    }

    const drained = Promise.all(workers.map((w) => w.done()))
    let timer: ReturnType<typeof setTimeout> | undefined
    const timedOut = await Promise.race([
      drained.then(() => false),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(true), timeoutMs)
      }),
    ])
    clearTimeout(timer)

    if (timedOut) {
      logger.warn({ inFlight: this._inFlight.size, timeoutMs }, 'Drain timed out; aborting in-flight handlers')
      for (const controller of this._inFlight.values()) {
        controller.abort(new WorkerShutdownError())
      }
      await drained
    }

    this._workers = []
    logger.info('WorkerPool stopped')
  }

  processNext(): Promise<boolean> {
    return this._processOne(null)
  }

  get isRunning(): boolean {
    return this._workers.length > 0
  }

  get activeCount(): number {
    return this._inFlight.size
  }

  getWorkers(): WorkerInfo[] {
    const now = this._clock.now()
    return this._workers.map((worker): WorkerInfo => {
      const current = worker.current
      return {
        workerId: worker.workerId,
        status: worker.stopping ? 'stopping' : current === null ? 'idle' : 'busy',
        messageId: current?.messageId ?? null,
        messageType: current?.type ?? null,
        jobId: current?.jobId ?? null,
        elapsedMs: current === null ? 0 : Math.max(0, now - current.startedAt.getTime()),
      }
    })
  }

  // -------------------------------------------------------------------------
  // Message processing
  // -------------------------------------------------------------------------

  private async _processOne(handle: WorkerHandle | null): Promise<boolean> {
    const message = this._queue.receive()
    if (message === null) {
      return false
    }
    handle?.setCurrent({ messageId: message.id, type: message.type, jobId: message.jobId, startedAt: new Date(this._clock.now()) })
    try {
      await this._dispatch(message)
    } finally {
      handle?.setCurrent(null)
    }
    return true
  }

  private async _dispatch(message: LeasedMessage): Promise<void> {
    const registration = this._registry.get(message.type)

    if (message.exhausted) {
      this._handleDeadLetter(message, registration)
      return
    }

    if (registration === undefined) {
      logger.error({ messageId: message.id, type: message.type }, 'No handler registered for message type')
      this._queue.delete(message.lease)
      if (message.jobId !== null) {
        this._failJob(
          message.jobId,
          new TerminalError(`No handler registered for message type "${message.type}"`, 'NO_HANDLER'),
        )
      }
      return
    }

    let job = message.jobId === null ? null : (this._store.getJob(message.jobId) ?? null)
    if (registration.lifecycle === 'job') {
      job = this._claim(message, job)
      if (job === null) {
        return
      }
    }

    await this._run(message, registration, job)
  }

  /**
   * Move the message's job to running. Returns null when the message should
   * not run (and has been dealt with).
   */
  private _claim(message: LeasedMessage, job: JobRecord | null): JobRecord | null {
    if (job === null) {
      logger.warn({ messageId: message.id, type: message.type, jobId: message.jobId }, 'Job not found; dropping message')
      this._queue.delete(message.lease)
      return null
    }
    if (isTerminalStatus(job.state.status)) {
      logger.debug({ messageId: message.id, jobId: job.id, status: job.state.status }, 'Job already terminal; dropping message')
      this._queue.delete(message.lease)
      return null
    }
    if (job.managerId !== null) {
      const manager = this._store.getJob(job.managerId)
      if (manager !== undefined && (manager.state.status === 'cancelled' || manager.state.status === 'failed')) {
        logger.info({ jobId: job.id, managerId: manager.id }, 'Manager no longer running; cancelling job')
        this._recordIdle(this._store.cancel(job.id, `manager ${manager.state.status}`).idleAncestors)
        this._queue.delete(message.lease)
        return null
      }
    }
    if (job.state.status === 'pending') {
      return this._store.updateStatus(job.id, 'running').job
    }
    return job
  }

  private async _run(message: LeasedMessage, registration: HandlerRegistration, job: JobRecord | null): Promise<void> {
    const owned = registration.lifecycle === 'job' ? job : null
    const controller = new AbortController()
    this._inFlight.set(message.id, controller)

    const heartbeat = setInterval(() => {
      this._heartbeat(message, owned?.id ?? null)
    }, this._options.heartbeatIntervalMs)

    let timeout: ReturnType<typeof setTimeout> | undefined
    const timeoutMs = owned === null ? undefined : registration.resolveTimeoutMs?.(owned)
    if (owned !== null && timeoutMs !== undefined) {
      const elapsed = this._clock.now() - (owned.state.startedAt ?? this._clock.now())
      const remaining = Math.max(0, timeoutMs - elapsed)
      timeout = setTimeout(() => {
        controller.abort(new TimeoutError(owned.id, timeoutMs))
      }, remaining)
    }

    const ctx: HandlerContext = {
      message,
      job,
      signal: controller.signal,
      log: (level, text) => {
        this._log(job?.id ?? null, level, text)
      },
    }

    let outcome: HandlerOutcome
    try {
      outcome = await raceAbort(registration.handler(ctx), controller.signal)
    } catch (err) {
      if (controller.signal.reason instanceof WorkerShutdownError) {
        logger.warn({ messageId: message.id, jobId: message.jobId }, 'Handler aborted by shutdown; message will be redelivered')
        return
      }
      this._onError(message, registration, owned, err)
      return
    } finally {
      clearInterval(heartbeat)
      clearTimeout(timeout)
      this._inFlight.delete(message.id)
    }

    try {
      this._settle(message, registration, owned, outcome)
    } catch (err) {
      this._onError(message, registration, owned, err)
    }
  }

  private _settle(
    message: LeasedMessage,
    registration: HandlerRegistration,
    job: JobRecord | null,
    outcome: HandlerOutcome,
  ): void {
    switch (outcome.kind) {
      case 'completed':
        this._store.transaction(() => {
          if (job !== null) {
            const options: UpdateStatusOptions = {}
            if (outcome.result !== undefined) options.result = outcome.result
            if (outcome.resultCount !== undefined) options.resultCount = outcome.resultCount
            registration.onSettled?.(this._transition(job.id, 'completed', options))
          }
          this._queue.delete(message.lease)
        })
        break
      case 'waiting':
        this._queue.delete(message.lease)
        break
      case 'requeue':
        if (!this._queue.requeue(message.lease, outcome.delayMs, outcome.payload)) {
          logger.warn({ messageId: message.id, jobId: message.jobId }, 'Requeue ignored: lease lost')
        }
        break
      case 'failed':
        if (job === null) {
          logger.warn({ messageId: message.id, type: message.type, error: formatErrorMessage(outcome.error) }, 'Control handler reported failure')
        }
        this._store.transaction(() => {
          if (job !== null) {
            this._failAndSettle(registration, job.id, outcome.error, outcome.code)
          }
          this._queue.delete(message.lease)
        })
        break
    }
  }

  private _onError(
    message: LeasedMessage,
    registration: HandlerRegistration,
    job: JobRecord | null,
    err: unknown,
  ): void {
    const text = formatErrorMessage(err)

    if (isRetryable(err)) {
      const delayMs = computeBackoff(message.receiveCount, {
        baseMs: this._options.retryBaseMs,
        maxMs: this._options.retryMaxMs,
        random: this._random,
      })
      this._queue.release(message.lease, delayMs, text)
      logger.warn(
        { messageId: message.id, type: message.type, jobId: message.jobId, attempt: message.receiveCount, delayMs, err },
        'Handler failed; message released for retry',
      )
      if (job !== null) {
        this._store.appendLog(job.id, 'warn', `Attempt ${String(message.receiveCount)} failed: ${text}; retrying in ${String(delayMs)}ms`)
      }
      return
    }

    logger.error({ messageId: message.id, type: message.type, jobId: message.jobId, code: errorCode(err), err }, 'Handler failed terminally')
    try {
      this._store.transaction(() => {
        if (job !== null) {
          this._failAndSettle(registration, job.id, err)
        }
        this._queue.delete(message.lease)
      })
    } catch (settleErr) {
      const delayMs = computeBackoff(message.receiveCount, {
        baseMs: this._options.retryBaseMs,
        maxMs: this._options.retryMaxMs,
        random: this._random,
      })
      this._queue.release(message.lease, delayMs, formatErrorMessage(settleErr))
      logger.warn({ messageId: message.id, jobId: message.jobId, delayMs, err: settleErr }, 'Could not record terminal failure; message released for retry')
    }
  }

  /**
   * The message already left the queue, so there is no redelivery to fall
   * back on: when the hook throws, the job still fails without it.
   */
  private _handleDeadLetter(message: LeasedMessage, registration: HandlerRegistration | undefined): void {
    if (registration?.onDeadLetter !== undefined) {
      registration.onDeadLetter(message)
      return
    }
    if (message.jobId === null || registration?.lifecycle === 'control') {
      return
    }
    const jobId = message.jobId
    const reason = message.lastError ?? 'no error recorded'
    const err = new TerminalError(
      `Message dead-lettered after ${String(message.receiveCount - 1)} deliveries: ${reason}`,
      'DEAD_LETTERED',
      { messageId: message.id },
    )
    if (registration === undefined) {
      this._failJob(jobId, err)
      return
    }
    try {
      this._store.transaction(() => {
        this._failAndSettle(registration, jobId, err)
      })
    } catch (hookErr) {
      logger.error({ messageId: message.id, jobId, err: hookErr }, 'onSettled failed for a dead-lettered job')
      this._failJob(jobId, err)
    }
  }

  // -------------------------------------------------------------------------
  // Job state helpers
  // -------------------------------------------------------------------------

  /**
   * Fail a job from whatever non-terminal status it is in. Returns the failed
   * job, or null when it was missing or already terminal.
   */
  private _failJob(jobId: JobId, err: unknown, code?: string): JobRecord | null {
    const job = this._store.getJob(jobId)
    if (job === undefined || isTerminalStatus(job.state.status)) {
      return null
    }
    if (job.state.status === 'pending') {
      this._store.updateStatus(jobId, 'running')
    }
    const failed = this._transition(jobId, 'failed', { error: err, errorCode: code ?? errorCode(err) })
    this._store.appendLog(jobId, 'error', formatErrorMessage(err))
    return failed
  }

  private _failAndSettle(registration: HandlerRegistration, jobId: JobId, err: unknown, code?: string): void {
    const failed = this._failJob(jobId, err, code)
    if (failed !== null) {
      registration.onSettled?.(failed)
    }
  }

  private _transition(jobId: JobId, status: 'completed' | 'failed', options: UpdateStatusOptions): JobRecord {
    const result = this._store.updateStatus(jobId, status, options)
    this._recordIdle(result.idleAncestors)
    return result.job
  }

  private _recordIdle(idleAncestors: JobId[]): void {
    for (const ancestorId of idleAncestors) {
      this._onIdleAncestor?.(ancestorId)
    }
  }

  private _heartbeat(message: LeasedMessage, jobId: JobId | null): void {
    try {
      if (!this._queue.extend(message.lease, this._options.leaseMs)) {
        logger.warn({ messageId: message.id, jobId }, 'Lease lost while handler running')
      }
      if (jobId !== null) {
        this._store.heartbeat(jobId)
      }
    } catch (err) {
      logger.warn({ messageId: message.id, jobId, err }, 'Heartbeat failed')
    }
  }

  private _log(jobId: JobId | null, level: LogLevel, text: string): void {
    logger[level]({ jobId }, text)
    if (jobId !== null) {
      this._store.appendLog(jobId, level, text)
    }
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createWorkerPool(deps: WorkerPoolDeps): WorkerPool {
  return new WorkerPoolImpl(deps)
}
