/**
 * JobStore: persistence of jobs, their runtime state and their logs.
 *
 * All mutations are synchronous single transactions. Status changes are
 * compare-and-swap updates against the legal edge map:
 *
 *   pending -> running -> completed | failed | cancelled
 *
 * and every child status change moves the ancestors' progress counters in
 * the same transaction.
 */

import type { JobId, JobStatus, LogLevel } from '../../core/types.js'
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

export interface JobStore {
  /**
   * Validate the job's type and config and insert it as pending. Idempotent
   * on id: an existing job is returned with `created: false`.
   * @throws {JobValidationError} for unknown types or invalid configs
   * @throws {JobNotFoundError} when the parent does not exist
   * @throws {ParentTerminalError} when the parent is already terminal
   */
  createJob(input: CreateJobInput): CreateJobResult

  getJob(jobId: JobId): JobRecord | undefined

  /** @throws {JobNotFoundError} */
  requireJob(jobId: JobId): JobRecord

  listJobs(filter?: ListJobsFilter): ListJobsResult

  listChildren(parentId: JobId): JobRecord[]

  /** Every descendant, shallowest first */
  listDescendants(jobId: JobId): JobRecord[]

  /** Ancestor ids, nearest first */
  listAncestorIds(jobId: JobId): JobId[]

  /**
   * Move a job along a legal edge. Re-applying the current status is a no-op.
   * Failing or cancelling cascades cancellation to active descendants.
   * @throws {InvalidStateTransitionError} for illegal edges
   * @throws {ActiveChildrenError} when completing with active descendants
   */
  updateStatus(jobId: JobId, status: JobStatus, options?: UpdateStatusOptions): TransitionResult

  /**
   * Cancel a pending or running job and its active descendants.
   * @throws {InvalidStateTransitionError} when the job is already terminal
   */
  cancel(jobId: JobId, reason?: string): TransitionResult

  /** Atomically add to the progress counters of a job and all its ancestors */
  incrementProgress(jobId: JobId, delta: Partial<JobProgress>): void

  /** Record activity on a job and all its ancestors */
  heartbeat(jobId: JobId): void

  setAwaitingChildren(jobId: JobId, awaiting: boolean): void

  saveCheckpoint(jobId: JobId, checkpoint: Record<string, unknown> | null): void

  addResultCount(jobId: JobId, count: number): void

  /** Delete a job and (by cascade) its descendants, logs and dedup records. Returns rows removed */
  deleteJob(jobId: JobId): number

  /** A running job in the subtree (root included), if any */
  findRunningInSubtree(jobId: JobId): JobId | undefined

  getChildStatusCounts(parentId: JobId): ChildStatusCounts

  /** Terminal roots whose completion is older than `cutoff` */
  listExpiredRoots(cutoff: number, statuses: JobStatus[]): JobRecord[]

  appendLog(jobId: JobId, level: LogLevel, message: string): void

  getLogs(jobId: JobId, options?: LogQueryOptions): JobLogEntry[]

  /** Logs of the job and all of its descendants, merged by time */
  getAggregatedLogs(jobId: JobId, options?: LogQueryOptions): JobLogEntry[]

  /** Claim a key within a scope; false if already claimed */
  claimDedup(scopeId: JobId, key: string, jobId: JobId): boolean

  countDedup(scopeId: JobId): number

  /** Run `fn` inside one database transaction (nests as a savepoint) */
  transaction<T>(fn: () => T): T
}
