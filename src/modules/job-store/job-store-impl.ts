/**
 * SQLite-backed implementation of JobStore.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { ConveyorEvents } from '../../core/event-bus.types.js'
import {
  ActiveChildrenError,
  InvalidStateTransitionError,
  JobNotFoundError,
  JobValidationError,
  ParentTerminalError,
  formatErrorMessage,
} from '../../core/errors.js'
import type { Clock, JobId, JobStatus, LogLevel } from '../../core/types.js'
import {
  JOB_STATUSES,
  LOG_LEVELS,
  isJobStatus,
  isTerminalStatus,
  systemClock,
} from '../../core/types.js'
import {
  ZERO_DELTA,
  addResultCount,
  applyAncestorDelta,
  applyProgressDelta,
  casStatus,
  countChildrenByStatus,
  countDedup,
  deleteJobRow,
  findIdleAwaitingAncestors,
  findRunningInSubtree,
  getJobRow,
  insertDedup,
  insertJob,
  listAncestorIds,
  listChildRows,
  listDescendantRows,
  listExpiredRootRows,
  listJobRows,
  saveCheckpoint,
  setAwaitingChildren,
  touchHeartbeat,
} from '../../persistence/queries/jobs.js'
import type { JobRow, ProgressDelta } from '../../persistence/queries/jobs.js'
import { insertJobLog, listJobLogs, listSubtreeLogs } from '../../persistence/queries/job-logs.js'
import type { JobLogRow, LogQuery } from '../../persistence/queries/job-logs.js'
import { generateId, isPlainObject, parseJsonColumn } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { JobStore } from './job-store.js'
import { isJobType, parseJobSpec } from './job-types.js'
import type { JobType } from './job-types.js'
import type {
  ChildStatusCounts,
  CreateJobInput,
  CreateJobResult,
  JobLogEntry,
  JobProgress,
  JobRecord,
  ListJobsFilter,
  ListJobsResult,
  LogQueryOptions,
  TransitionResult,
  UpdateStatusOptions,
} from './types.js'

const logger = createLogger('job-store')

// ---------------------------------------------------------------------------
// Transition rules
// ---------------------------------------------------------------------------

export const VALID_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['running'],
  running: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
}

export function isValidTransition(from: JobStatus, to: JobStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to)
}

/** Counter delta for one job moving from `from` (null = newly created) to `to` */
function moveDelta(from: JobStatus | null, to: JobStatus): ProgressDelta {
  const delta: ProgressDelta = { ...ZERO_DELTA }
  if (from === null) {
    delta.total += 1
  } else {
    delta[from] -= 1
  }
  delta[to] += 1
  return delta
}

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

function toJobRecord(row: JobRow): JobRecord {
  if (!isJobType(row.type)) {
    throw new JobValidationError(`Stored job ${row.id} has unknown type "${row.type}"`, { jobId: row.id })
  }
  if (!isJobStatus(row.status)) {
    throw new JobValidationError(`Stored job ${row.id} has unknown status "${row.status}"`, { jobId: row.id })
  }
  const config = parseJsonColumn(row.config, {})
  const checkpoint = parseJsonColumn(row.checkpoint)
  return {
    id: row.id,
    parentId: row.parent_id,
    managerId: row.manager_id,
    type: row.type,
    name: row.name,
    config: isPlainObject(config) ? config : {},
    depth: row.depth,
    definitionId: row.definition_id,
    createdAt: row.created_at,
    state: {
      status: row.status,
      progress: {
        total: row.progress_total,
        pending: row.progress_pending,
        running: row.progress_running,
        completed: row.progress_completed,
        failed: row.progress_failed,
        cancelled: row.progress_cancelled,
      },
      startedAt: row.started_at,
      completedAt: row.completed_at,
      error: row.error,
      errorCode: row.error_code,
      resultCount: row.result_count,
      result: parseJsonColumn(row.result),
      lastHeartbeat: row.last_heartbeat,
      awaitingChildren: row.awaiting_children === 1,
      possiblyIncomplete: row.possibly_incomplete === 1,
      checkpoint: isPlainObject(checkpoint) ? checkpoint : null,
      updatedAt: row.updated_at,
    },
  }
}

function toLogEntry(row: JobLogRow): JobLogEntry {
  const level = LOG_LEVELS.find((l) => l === row.level) ?? 'info'
  return {
    id: row.id,
    jobId: row.job_id,
    level,
    message: row.message,
    createdAt: row.created_at,
  }
}

function toLogQuery(options: LogQueryOptions): LogQuery {
  const query: LogQuery = {}
  if (options.minLevel !== undefined) {
    query.levels = LOG_LEVELS.slice(LOG_LEVELS.indexOf(options.minLevel))
  }
  if (options.limit !== undefined) query.limit = options.limit
  if (options.afterId !== undefined) query.after_id = options.afterId
  return query
}

/**
 * Normalize a status filter (single, list, or comma-separated OR set).
 * @throws {JobValidationError} for unknown status names
 */
export function parseStatusFilter(status: JobStatus | JobStatus[] | string): JobStatus[] {
  const parts = Array.isArray(status) ? status : status.split(',')
  const result: JobStatus[] = []
  for (const part of parts) {
    const name = part.trim()
    if (name === '') continue
    if (!isJobStatus(name)) {
      throw new JobValidationError(`Unknown job status "${name}"`, { known: [...JOB_STATUSES] })
    }
    if (!result.includes(name)) result.push(name)
  }
  return result
}

type PendingEvent =
  | { event: 'job:created'; payload: ConveyorEvents['job:created'] }
  | { event: 'job:status'; payload: ConveyorEvents['job:status'] }

// ---------------------------------------------------------------------------
// SqliteJobStore
// ---------------------------------------------------------------------------

export interface JobStoreOptions {
  clock?: Clock
  eventBus?: TypedEventBus
}

export class SqliteJobStore implements JobStore {
  private readonly _db: BetterSqlite3Database
  private readonly _clock: Clock
  private readonly _eventBus: TypedEventBus | undefined

  constructor(db: BetterSqlite3Database, options: JobStoreOptions = {}) {
    this._db = db
    this._clock = options.clock ?? systemClock
    this._eventBus = options.eventBus
  }

  // -------------------------------------------------------------------------
  // Creation and reads
  // -------------------------------------------------------------------------

  createJob(input: CreateJobInput): CreateJobResult {
    const spec = parseJobSpec(input.type, input.config)
    const events: PendingEvent[] = []

    const create = this._db.transaction((): CreateJobResult => {
      const id = input.id ?? generateId()
      const existing = getJobRow(this._db, id)
      if (existing !== undefined) {
        return { job: toJobRecord(existing), created: false }
      }

      const parentId = input.parentId ?? null
      let parent: JobRow | undefined
      if (parentId !== null) {
        parent = getJobRow(this._db, parentId)
        if (parent === undefined) {
          throw new JobNotFoundError(parentId)
        }
        if (isJobStatus(parent.status) && isTerminalStatus(parent.status)) {
          throw new ParentTerminalError(parentId, parent.status)
        }
      }

      const now = this._clock.now()
      insertJob(this._db, {
        id,
        parent_id: parentId,
        manager_id: parent === undefined ? null : (parent.manager_id ?? parent.id),
        type: spec.type,
        name: input.name,
        config: JSON.stringify(spec.config),
        depth: parent === undefined ? 0 : parent.depth + 1,
        definition_id: input.definitionId ?? null,
        created_at: now,
      })
      if (parent !== undefined) {
        applyAncestorDelta(this._db, id, moveDelta(null, 'pending'), now)
      }

      events.push({
        event: 'job:created',
        payload: { jobId: id, parentId, type: spec.type, name: input.name },
      })
      return { job: this.requireJob(id), created: true }
    })

    const result = create()
    this._flush(events)
    if (result.created) {
      logger.debug({ jobId: result.job.id, type: result.job.type, parentId: result.job.parentId }, 'Job created')
    }
    return result
  }

  getJob(jobId: JobId): JobRecord | undefined {
    const row = getJobRow(this._db, jobId)
    return row === undefined ? undefined : toJobRecord(row)
  }

  requireJob(jobId: JobId): JobRecord {
    const job = this.getJob(jobId)
    if (job === undefined) {
      throw new JobNotFoundError(jobId)
    }
    return job
  }

  listJobs(filter: ListJobsFilter = {}): ListJobsResult {
    const types: JobType[] | undefined =
      filter.type === undefined ? undefined : Array.isArray(filter.type) ? filter.type : [filter.type]
    for (const type of types ?? []) {
      if (!isJobType(type)) {
        throw new JobValidationError(`Unknown job type "${String(type)}"`)
      }
    }

    const { rows, total } = listJobRows(this._db, {
      parent_id: filter.parentId === 'root' ? null : filter.parentId,
      manager_id: filter.managerId,
      statuses: filter.status === undefined ? undefined : parseStatusFilter(filter.status),
      types,
      created_after: filter.createdAfter,
      created_before: filter.createdBefore,
      limit: filter.limit,
      offset: filter.offset,
      order: filter.order,
    })
    return { jobs: rows.map(toJobRecord), totalCount: total }
  }

  listChildren(parentId: JobId): JobRecord[] {
    return listChildRows(this._db, parentId).map(toJobRecord)
  }

  listDescendants(jobId: JobId): JobRecord[] {
    return listDescendantRows(this._db, jobId).map(toJobRecord)
  }

  listAncestorIds(jobId: JobId): JobId[] {
    return listAncestorIds(this._db, jobId)
  }

  // -------------------------------------------------------------------------
  // Status transitions
  // -------------------------------------------------------------------------

  updateStatus(jobId: JobId, status: JobStatus, options: UpdateStatusOptions = {}): TransitionResult {
    const events: PendingEvent[] = []
    const update = this._db.transaction((): TransitionResult => {
      const job = this.requireJob(jobId)
      const from = job.state.status
      if (from === status) {
        return { changed: false, job, idleAncestors: [] }
      }
      if (!isValidTransition(from, status)) {
        throw new InvalidStateTransitionError(jobId, from, status)
      }
      if (status === 'completed') {
        const active = job.state.progress.pending + job.state.progress.running
        if (active > 0) {
          throw new ActiveChildrenError(jobId, active)
        }
      }
      if (status === 'failed' || status === 'cancelled') {
        this._cancelDescendants(jobId, status === 'failed' ? 'parent failed' : 'ancestor cancelled', events)
      }

      this._moveRow(job, status, options, events)

      return {
        changed: true,
        job: this.requireJob(jobId),
        idleAncestors: isTerminalStatus(status) ? findIdleAwaitingAncestors(this._db, jobId) : [],
      }
    })

    const result = update()
    this._flush(events)
    return result
  }

  cancel(jobId: JobId, reason = 'cancelled by request'): TransitionResult {
    const events: PendingEvent[] = []
    const cancel = this._db.transaction((): TransitionResult => {
      const job = this.requireJob(jobId)
      const from = job.state.status
      if (isTerminalStatus(from)) {
        throw new InvalidStateTransitionError(jobId, from, 'cancelled')
      }

      this._cancelDescendants(jobId, 'ancestor cancelled', events)
      this._cancelRow(job, { error: reason, errorCode: 'CANCELLED' }, events)

      return {
        changed: true,
        job: this.requireJob(jobId),
        idleAncestors: findIdleAwaitingAncestors(this._db, jobId),
      }
    })

    const result = cancel()
    this._flush(events)
    logger.info({ jobId }, 'Job cancelled')
    return result
  }

  /** Cancel every active descendant, deepest first. */
  private _cancelDescendants(jobId: JobId, reason: string, events: PendingEvent[]): void {
    const active = this.listDescendants(jobId)
      .filter((d) => !isTerminalStatus(d.state.status))
      .reverse()
    for (const descendant of active) {
      this._cancelRow(descendant, { error: reason, errorCode: 'CANCELLED' }, events)
    }
  }

  /**
   * pending jobs pass through running so only legal edges are recorded.
   */
  private _cancelRow(job: JobRecord, options: UpdateStatusOptions, events: PendingEvent[]): void {
    let current = job
    if (current.state.status === 'pending') {
      this._moveRow(current, 'running', {}, events)
      current = this.requireJob(job.id)
    }
    if (current.state.status === 'running') {
      this._moveRow(current, 'cancelled', options, events)
    }
  }

  /**
   * CAS one job from its current status to `to` and move ancestor counters.
   */
  private _moveRow(job: JobRecord, to: JobStatus, options: UpdateStatusOptions, events: PendingEvent[]): void {
    const now = this._clock.now()
    const from = job.state.status
    const error = options.error === undefined ? null : formatErrorMessage(options.error)
    const moved = casStatus(this._db, {
      job_id: job.id,
      from,
      to,
      now,
      error,
      error_code: options.errorCode ?? null,
      result: options.result === undefined ? null : JSON.stringify(options.result),
      result_count: options.resultCount ?? null,
      possibly_incomplete: options.possiblyIncomplete === true ? 1 : 0,
      require_idle: to === 'completed' ? 1 : 0,
    })
    if (!moved) {
      throw new InvalidStateTransitionError(job.id, from, to)
    }
    applyAncestorDelta(this._db, job.id, moveDelta(from, to), now)
    events.push({
      event: 'job:status',
      payload: error === null ? { jobId: job.id, from, to } : { jobId: job.id, from, to, error },
    })
  }

  // -------------------------------------------------------------------------
  // Counters, heartbeats, checkpoints
  // -------------------------------------------------------------------------

  incrementProgress(jobId: JobId, delta: Partial<JobProgress>): void {
    const changes = applyProgressDelta(this._db, jobId, { ...ZERO_DELTA, ...delta }, this._clock.now())
    if (changes === 0) {
      throw new JobNotFoundError(jobId)
    }
  }

  heartbeat(jobId: JobId): void {
    touchHeartbeat(this._db, jobId, this._clock.now())
  }

  setAwaitingChildren(jobId: JobId, awaiting: boolean): void {
    setAwaitingChildren(this._db, jobId, awaiting, this._clock.now())
  }

  saveCheckpoint(jobId: JobId, checkpoint: Record<string, unknown> | null): void {
    saveCheckpoint(this._db, jobId, checkpoint === null ? null : JSON.stringify(checkpoint), this._clock.now())
  }

  addResultCount(jobId: JobId, count: number): void {
    addResultCount(this._db, jobId, count, this._clock.now())
  }

  // -------------------------------------------------------------------------
  // Deletion and subtree queries
  // -------------------------------------------------------------------------

  deleteJob(jobId: JobId): number {
    const remove = this._db.transaction((): number => {
      const job = this.getJob(jobId)
      if (job === undefined) {
        return 0
      }
      const subtree = [job, ...this.listDescendants(jobId)]
      if (job.parentId !== null) {
        const delta: ProgressDelta = { ...ZERO_DELTA }
        for (const member of subtree) {
          delta.total -= 1
          delta[member.state.status] -= 1
        }
        applyAncestorDelta(this._db, jobId, delta, this._clock.now())
      }
      deleteJobRow(this._db, jobId)
      return subtree.length
    })

    const removed = remove()
    if (removed > 0) {
      logger.info({ jobId, removed }, 'Job deleted')
    }
    return removed
  }

  findRunningInSubtree(jobId: JobId): JobId | undefined {
    return findRunningInSubtree(this._db, jobId)
  }

  getChildStatusCounts(parentId: JobId): ChildStatusCounts {
    const counts: ChildStatusCounts = { pending: 0, running: 0, completed: 0, failed: 0, cancelled: 0 }
    for (const { status, n } of countChildrenByStatus(this._db, parentId)) {
      if (isJobStatus(status)) counts[status] = n
    }
    return counts
  }

  listExpiredRoots(cutoff: number, statuses: JobStatus[]): JobRecord[] {
    return listExpiredRootRows(this._db, cutoff, statuses).map(toJobRecord)
  }

  // -------------------------------------------------------------------------
  // Logs
  // -------------------------------------------------------------------------

  appendLog(jobId: JobId, level: LogLevel, message: string): void {
    insertJobLog(this._db, { job_id: jobId, level, message, created_at: this._clock.now() })
    this._eventBus?.emit('job:log', { jobId, level, message })
  }

  getLogs(jobId: JobId, options: LogQueryOptions = {}): JobLogEntry[] {
    return listJobLogs(this._db, jobId, toLogQuery(options)).map(toLogEntry)
  }

  getAggregatedLogs(jobId: JobId, options: LogQueryOptions = {}): JobLogEntry[] {
    return listSubtreeLogs(this._db, jobId, toLogQuery(options)).map(toLogEntry)
  }

  // -------------------------------------------------------------------------
  // Dedup
  // -------------------------------------------------------------------------

  claimDedup(scopeId: JobId, key: string, jobId: JobId): boolean {
    return insertDedup(this._db, scopeId, key, jobId, this._clock.now())
  }

  countDedup(scopeId: JobId): number {
    return countDedup(this._db, scopeId)
  }

  transaction<T>(fn: () => T): T {
    return this._db.transaction(fn)()
  }

  private _flush(events: PendingEvent[]): void {
    if (this._eventBus === undefined) return
    for (const item of events) {
      emitPending(this._eventBus, item)
    }
  }
}

function emitPending(bus: TypedEventBus, item: PendingEvent): void {
  switch (item.event) {
    case 'job:created':
      bus.emit(item.event, item.payload)
      break
    case 'job:status':
      bus.emit(item.event, item.payload)
      break
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createJobStore(db: BetterSqlite3Database, options: JobStoreOptions = {}): JobStore {
  return new SqliteJobStore(db, options)
}
