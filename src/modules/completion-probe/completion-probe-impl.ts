/**
 * CompletionProbeImpl: heartbeat-gated two-observation completion check.
 *
 * Probe state lives in the message payload so it survives redelivery:
 *   first_scheduled_at  when the current probe chain started
 *   zero_observed_at    when active == 0 was last observed, or null
 *
 * Visit outcomes, in order of precedence:
 *   job missing, terminal or no longer awaiting → drop
 *   past its timeout                             → fail with TIMEOUT
 *   older than maxAgeMs                          → force-complete, possibly incomplete
 *   active > 0                                   → recheck later (safety net)
 *   no zero observation yet                      → record one, wait the staleness gap
 *   gap not yet elapsed                          → wait the remainder
 *   heartbeat newer than the observation         → reset the observation
 *   otherwise                                    → confirmed complete
 */

import { z } from 'zod'
import type { Clock, JobId } from '../../core/types.js'
import { isTerminalStatus, systemClock } from '../../core/types.js'
import { TimeoutError, formatErrorMessage } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import { createLogger } from '../../utils/logger.js'
import type { DurableQueue, LeasedMessage } from '../queue/durable-queue.js'
import type { JobStore } from '../job-store/job-store.js'
import type { JobRecord } from '../job-store/types.js'
import { Outcome } from '../worker-pool/handler-registry.js'
import type { HandlerContext, HandlerOutcome, HandlerRegistry } from '../worker-pool/handler-registry.js'
import { DEFAULT_PROBE_OPTIONS, PROBE_MESSAGE_TYPE } from './completion-probe.js'
import type { CompletionProbe, CompletionProbeOptions, ProbeDelegate } from './completion-probe.js'

const logger = createLogger('completion-probe')

const ProbePayloadSchema = z.object({
  first_scheduled_at: z.number(),
  zero_observed_at: z.number().nullable().default(null),
})

type ProbePayload = z.infer<typeof ProbePayloadSchema>

export function probeDedupKey(jobId: JobId): string {
  return `probe:${jobId}`
}

export interface CompletionProbeDeps {
  store: JobStore
  queue: DurableQueue
  options?: Partial<CompletionProbeOptions>
  delegate?: ProbeDelegate
  eventBus?: TypedEventBus
  clock?: Clock
}

export class CompletionProbeImpl implements CompletionProbe {
  private readonly _store: JobStore
  private readonly _queue: DurableQueue
  private readonly _options: CompletionProbeOptions
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _clock: Clock
  private _delegate: ProbeDelegate

  constructor(deps: CompletionProbeDeps) {
    this._store = deps.store
    this._queue = deps.queue
    this._options = { ...DEFAULT_PROBE_OPTIONS, ...deps.options }
    this._delegate = deps.delegate ?? {}
    this._eventBus = deps.eventBus
    this._clock = deps.clock ?? systemClock
  }

  setDelegate(delegate: ProbeDelegate): void {
    this._delegate = delegate
  }

  register(registry: HandlerRegistry): void {
    registry.register(PROBE_MESSAGE_TYPE, (ctx) => this.handle(ctx), {
      lifecycle: 'control',
      onDeadLetter: (message) => {
        this.onDeadLetter(message)
      },
    })
  }

  schedule(jobId: JobId, delayMs = this._options.initialDelayMs): void {
    const payload: ProbePayload = { first_scheduled_at: this._clock.now(), zero_observed_at: null }
    const { created } = this._queue.enqueue(
      { type: PROBE_MESSAGE_TYPE, jobId, payload },
      { delayMs, dedupKey: probeDedupKey(jobId), advanceDuplicate: true },
    )
    logger.debug({ jobId, delayMs, created }, 'Completion probe scheduled')
  }

  async handle(ctx: HandlerContext): Promise<HandlerOutcome> {
    const { message } = ctx
    const job = message.jobId === null ? undefined : this._store.getJob(message.jobId)
    if (job === undefined || isTerminalStatus(job.state.status) || !job.state.awaitingChildren) {
      logger.debug({ jobId: message.jobId, status: job?.state.status }, 'Probe target settled or gone; dropping')
      return Outcome.completed()
    }

    const now = this._clock.now()
    const payload = this._readPayload(message, now)

    const timeoutMs = this._delegate.timeoutMs?.(job)
    const startedAt = job.state.startedAt ?? job.createdAt
    if (timeoutMs !== undefined && now - startedAt >= timeoutMs) {
      this._timeOut(job, timeoutMs)
      return Outcome.completed()
    }
    if (now - startedAt >= this._options.maxAgeMs) {
      this.forceComplete(job, `exceeded max age of ${String(this._options.maxAgeMs)}ms`)
      return Outcome.completed()
    }

    const active = job.state.progress.pending + job.state.progress.running
    if (active > 0) {
      // The last active child retriggers a probe; this one is only a safety net
      return Outcome.requeue(this._options.safetyRecheckMs, { ...payload, zero_observed_at: null })
    }

    const observedAt = payload.zero_observed_at
    if (observedAt === null) {
      return this._observe(job.id, payload, now, 'first-observation', this._options.stalenessMs)
    }

    const elapsed = now - observedAt
    if (elapsed < this._options.stalenessMs) {
      return Outcome.requeue(this._options.stalenessMs - elapsed, payload)
    }

    const lastHeartbeat = job.state.lastHeartbeat ?? 0
    if (lastHeartbeat > observedAt) {
      return this._observe(job.id, payload, now, 'heartbeat', Math.max(this._options.rescheduleDelayMs, this._options.stalenessMs))
    }

    this._confirm(job)
    return Outcome.completed()
  }

  onDeadLetter(message: LeasedMessage): void {
    if (message.jobId === null) return
    const job = this._store.getJob(message.jobId)
    if (job === undefined || isTerminalStatus(job.state.status)) return
    this.forceComplete(job, `probe dead-lettered: ${message.lastError ?? 'no error recorded'}`)
  }

  /**
   * Cancel whatever is still active beneath `job` and complete it flagged as
   * possibly incomplete.
   */
  forceComplete(job: JobRecord, reason: string): void {
    logger.warn({ jobId: job.id, reason }, 'Force-completing subtree')
    this._settle(job.id, true, () => {
      for (const child of this._store.listChildren(job.id)) {
        if (!isTerminalStatus(child.state.status)) {
          this._store.cancel(child.id, `parent force-completed: ${reason}`)
        }
      }
      this._store.updateStatus(job.id, 'completed', { possiblyIncomplete: true })
      this._store.appendLog(job.id, 'warn', `Completed without confirmation (${reason}); results may be incomplete`)
    })
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private _readPayload(message: LeasedMessage, now: number): ProbePayload {
    const parsed = ProbePayloadSchema.safeParse(message.payload)
    if (parsed.success) {
      return parsed.data
    }
    logger.warn({ messageId: message.id, jobId: message.jobId }, 'Malformed probe payload; starting a fresh observation')
    return { first_scheduled_at: now, zero_observed_at: null }
  }

  private _observe(
    jobId: JobId,
    payload: ProbePayload,
    now: number,
    reason: 'first-observation' | 'heartbeat',
    delayMs: number,
  ): HandlerOutcome {
    this._eventBus?.emit('probe:rescheduled', { jobId, reason, delayMs })
    logger.debug({ jobId, reason, delayMs }, 'Zero active children observed; awaiting confirmation')
    return Outcome.requeue(delayMs, { ...payload, zero_observed_at: now })
  }

  private _confirm(job: JobRecord): void {
    const verdict = this._delegate.decide?.(job) ?? { status: 'completed' }
    if (verdict.status === 'failed') {
      this._settle(job.id, false, () => {
        this._store.updateStatus(job.id, 'failed', { error: verdict.error, errorCode: verdict.code })
        this._store.appendLog(job.id, 'error', verdict.error)
      })
      logger.info({ jobId: job.id, code: verdict.code }, 'Subtree settled; job failed')
      return
    }
    this._settle(job.id, false, () => {
      this._store.updateStatus(job.id, 'completed')
      this._store.appendLog(job.id, 'info', `All ${String(job.state.progress.total)} child job(s) settled`)
    })
    logger.info({ jobId: job.id, progress: job.state.progress }, 'Subtree confirmed complete')
  }

  private _timeOut(job: JobRecord, timeoutMs: number): void {
    const err = new TimeoutError(job.id, timeoutMs)
    this._settle(job.id, false, () => {
      this._store.updateStatus(job.id, 'failed', { error: err, errorCode: err.code })
      this._store.appendLog(job.id, 'error', formatErrorMessage(err))
    })
    logger.warn({ jobId: job.id, timeoutMs }, 'Fan-out timed out')
  }

  /** Record the terminal status and run the delegate's hook in one transaction */
  private _settle(jobId: JobId, possiblyIncomplete: boolean, record: () => void): void {
    const job = this._store.transaction(() => {
      record()
      const settled = this._store.requireJob(jobId)
      this._delegate.onSettled?.(settled)
      return settled
    })
    if (job.state.status === 'completed') {
      this._eventBus?.emit('job:completed', { jobId, possiblyIncomplete })
    }
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createCompletionProbe(deps: CompletionProbeDeps): CompletionProbeImpl {
  return new CompletionProbeImpl(deps)
}
