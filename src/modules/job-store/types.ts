/**
 * Job store types.
 */

import type { JobId, JobStatus, LogLevel } from '../../core/types.js'
import type { JobType } from './job-types.js'

// ---------------------------------------------------------------------------
// Job and JobState
// ---------------------------------------------------------------------------

/** Counts of a job's descendants by status; total counts every descendant ever created */
export interface JobProgress {
  total: number
  pending: number
  running: number
  completed: number
  failed: number
  cancelled: number
}

/** Immutable part of a job */
export interface Job {
  id: JobId
  parentId: JobId | null
  /** Root of the tree; null for a root itself */
  managerId: JobId | null
  type: JobType
  name: string
  /** Validated against the job type's schema at creation */
  config: Record<string, unknown>
  /** 0 = manager, 1 = step, 2+ = work */
  depth: number
  definitionId: string | null
  createdAt: number
}

/** Mutable runtime state of a job */
export interface JobState {
  status: JobStatus
  progress: JobProgress
  startedAt: number | null
  completedAt: number | null
  error: string | null
  errorCode: string | null
  resultCount: number
  result: unknown
  lastHeartbeat: number | null
  /** Set while a fan-out is in progress; the completion probe clears it */
  awaitingChildren: boolean
  possiblyIncomplete: boolean
  checkpoint: Record<string, unknown> | null
  updatedAt: number
}

export interface JobRecord extends Job {
  state: JobState
}

// ---------------------------------------------------------------------------
// Inputs and results
// ---------------------------------------------------------------------------

export interface CreateJobInput {
  /** Deterministic id; a random one is generated when omitted */
  id?: JobId
  parentId?: JobId | null
  type: string
  name: string
  config: unknown
  definitionId?: string | null
}

export interface CreateJobResult {
  job: JobRecord
  /** False when a job with the same id already existed */
  created: boolean
}

export interface UpdateStatusOptions {
  error?: unknown
  errorCode?: string
  result?: unknown
  resultCount?: number
  possiblyIncomplete?: boolean
}

export interface TransitionResult {
  /** False when the job already had the requested status */
  changed: boolean
  job: JobRecord
  /**
   * Ancestors awaiting children whose active descendant count dropped to
   * zero with this transition, nearest first.
   */
  idleAncestors: JobId[]
}

export interface ListJobsFilter {
  /** A parent id, or 'root' for jobs without a parent */
  parentId?: JobId | 'root'
  managerId?: JobId
  /** One status, a list, or a comma-separated string */
  status?: JobStatus | JobStatus[] | string
  type?: JobType | JobType[]
  createdAfter?: number
  createdBefore?: number
  limit?: number
  offset?: number
  order?: 'asc' | 'desc'
}

export interface ListJobsResult {
  jobs: JobRecord[]
  totalCount: number
}

export interface JobLogEntry {
  id: number
  jobId: JobId
  level: LogLevel
  message: string
  createdAt: number
}

export interface LogQueryOptions {
  /** Minimum level to include */
  minLevel?: LogLevel
  limit?: number
  afterId?: number
}

export type ChildStatusCounts = Record<JobStatus, number>
