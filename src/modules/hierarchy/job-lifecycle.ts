/**
 * JobLifecycle: operator actions on jobs: cancel, rerun, copy, start,
 * delete and retention cleanup.
 *
 * Rerun and copy never reopen a terminal job; they mint a new root with the
 * same type, name and config. A manager is re-executed from its definition
 * snapshot so it gets fresh step jobs.
 */

import type { Clock, JobId, JobStatus } from '../../core/types.js'
import { systemClock, isTerminalStatus } from '../../core/types.js'
import { InvalidStateTransitionError, JobRunningError, JobValidationError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { DurableQueue } from '../queue/durable-queue.js'
import type { JobStore } from '../job-store/job-store.js'
import { STANDALONE_JOB_TYPES, parseJobConfig } from '../job-store/job-types.js'
import type { JobRecord } from '../job-store/types.js'
import type { JobExecutor } from '../executor/job-executor.js'

const logger = createLogger('hierarchy:lifecycle')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CleanupOptions {
  olderThanHours: number
  statuses?: JobStatus[]
  dryRun?: boolean
}

export interface CleanupReport {
  dryRun: boolean
  /** Roots completed before this instant were selected */
  cutoff: number
  /** Selected root ids, oldest first */
  jobIds: JobId[]
  /** Rows deleted, descendants included; 0 on a dry run */
  deletedJobs: number
}

export interface JobLifecycleDeps {
  store: JobStore
  queue: DurableQueue
  executor: JobExecutor
  /** Called for each awaiting ancestor a cancellation left idle */
  onIdleAncestor?: (jobId: JobId) => void
  clock?: Clock
}

const DEFAULT_CLEANUP_STATUSES: JobStatus[] = ['completed', 'failed', 'cancelled']

// ---------------------------------------------------------------------------
// JobLifecycle
// ---------------------------------------------------------------------------

export class JobLifecycle {
  private readonly _store: JobStore
  private readonly _queue: DurableQueue
  private readonly _executor: JobExecutor
  private readonly _onIdleAncestor: ((jobId: JobId) => void) | undefined
  private readonly _clock: Clock

  constructor(deps: JobLifecycleDeps) {
    this._store = deps.store
    this._queue = deps.queue
    this._executor = deps.executor
    this._onIdleAncestor = deps.onIdleAncestor
    this._clock = deps.clock ?? systemClock
  }

  /**
   * Cancel a pending or running job and its active descendants.
   * @throws {JobNotFoundError}
   * @throws {InvalidStateTransitionError} when the job is already terminal
   */
  cancel(jobId: JobId, reason = 'cancelled by request'): JobRecord {
    // The cancellation and the follow-up probes and advance commit together
    const job = this._store.transaction(() => {
      const { job: cancelled, idleAncestors } = this._store.cancel(jobId, reason)
      for (const ancestorId of idleAncestors) {
        this._onIdleAncestor?.(ancestorId)
      }
      if (cancelled.managerId !== null && cancelled.type === 'step') {
        const manager = this._store.getJob(cancelled.managerId)
        if (manager?.state.status === 'running') {
          this._executor.advance(manager.id)
        }
      }
      return cancelled
    })
    logger.info({ jobId, reason }, 'Job cancelled')
    return job
  }

  /**
   * Mint a new root from a terminal job and enqueue it.
   * @throws {InvalidStateTransitionError} when the source is not terminal
   * @throws {JobValidationError} when the job type cannot run on its own
   */
  rerun(jobId: JobId): JobRecord {
    const source = this._store.requireJob(jobId)
    if (!isTerminalStatus(source.state.status)) {
      throw new InvalidStateTransitionError(jobId, source.state.status, 'rerun')
    }
    const job = this._clone(source, true)
    logger.info({ sourceId: jobId, jobId: job.id }, 'Job rerun')
    return job
  }

  /**
   * Mint a new pending root from a job without enqueueing it; see start().
   * @throws {JobValidationError} when the job type cannot run on its own
   */
  copy(jobId: JobId): JobRecord {
    const source = this._store.requireJob(jobId)
    const job = this._clone(source, false)
    logger.info({ sourceId: jobId, jobId: job.id }, 'Job copied')
    return job
  }

  /**
   * Enqueue a pending root, typically one created by copy().
   * @throws {InvalidStateTransitionError} when the job is not pending
   * @throws {JobValidationError} when the job is not a root
   */
  start(jobId: JobId): void {
    const job = this._store.requireJob(jobId)
    if (job.parentId !== null) {
      throw new JobValidationError(`Job ${jobId} is not a root job`, { jobId })
    }
    if (job.state.status !== 'pending') {
      throw new InvalidStateTransitionError(jobId, job.state.status, 'running')
    }
    if (job.type === 'manager') {
      this._executor.start(jobId)
      return
    }
    this._enqueueStandalone(job)
  }

  /**
   * Delete a job and its subtree. Returns the number of jobs removed.
   * @throws {JobNotFoundError}
   * @throws {JobRunningError} when the job or a descendant is running
   */
  delete(jobId: JobId): number {
    this._store.requireJob(jobId)
    const running = this._store.findRunningInSubtree(jobId)
    if (running !== undefined) {
      throw new JobRunningError(jobId, running)
    }
    return this._store.deleteJob(jobId)
  }

  /**
   * Delete terminal roots older than the cutoff, subtrees included.
   */
  cleanup(options: CleanupOptions): CleanupReport {
    const dryRun = options.dryRun ?? false
    const cutoff = this._clock.now() - options.olderThanHours * 3_600_000
    const statuses = (options.statuses ?? DEFAULT_CLEANUP_STATUSES).filter(isTerminalStatus)
    const roots = this._store.listExpiredRoots(cutoff, statuses)
    const jobIds = roots.map((root) => root.id)

    let deletedJobs = 0
    if (!dryRun) {
      for (const root of roots) {
        if (this._store.findRunningInSubtree(root.id) !== undefined) {
          logger.warn({ jobId: root.id }, 'Skipping expired root with a running descendant')
          continue
        }
        deletedJobs += this._store.deleteJob(root.id)
      }
    }

    logger.info({ cutoff, roots: jobIds.length, deletedJobs, dryRun }, 'Retention cleanup finished')
    return { dryRun, cutoff, jobIds, deletedJobs }
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private _clone(source: JobRecord, enqueue: boolean): JobRecord {
    if (source.type === 'manager') {
      const { definition } = parseJobConfig('manager', source.config)
      const { managerId } = this._executor.execute(definition, {
        trigger: 'rerun',
        triggeredBy: source.id,
        enqueue,
      })
      return this._store.requireJob(managerId)
    }

    if (!STANDALONE_JOB_TYPES.includes(source.type)) {
      throw new JobValidationError(`A ${source.type} job cannot run outside its workflow; rerun its manager instead`, {
        jobId: source.id,
        type: source.type,
      })
    }
    const { job } = this._store.createJob({
      type: source.type,
      name: source.name,
      config: source.config,
      definitionId: source.definitionId,
    })
    if (enqueue) {
      this._enqueueStandalone(job)
    }
    return job
  }

  private _enqueueStandalone(job: JobRecord): void {
    if (!STANDALONE_JOB_TYPES.includes(job.type)) {
      throw new JobValidationError(`A ${job.type} job cannot run outside its workflow`, { jobId: job.id })
    }
    this._queue.enqueue({ type: job.type, jobId: job.id }, { dedupKey: `job:${job.id}` })
  }
}

export function createJobLifecycle(deps: JobLifecycleDeps): JobLifecycle {
  return new JobLifecycle(deps)
}
