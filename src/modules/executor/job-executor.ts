/**
 * JobExecutor: runs job definitions as Manager → Step → Work trees.
 *
 * Message types it owns:
 *   job_manager  (job)      start a manager: pre-jobs, timeout watch, first advance
 *   job_step     (job)      run one step's action
 *   job_advance  (control)  move a manager to its next step or finalize it
 */

import type { JobId } from '../../core/types.js'
import type { JobTrigger } from '../job-store/job-types.js'
import type { HandlerRegistry } from '../worker-pool/handler-registry.js'
import type { JobDefinition } from './definition-schema.js'

export const MANAGER_MESSAGE_TYPE = 'job_manager'
export const STEP_MESSAGE_TYPE = 'job_step'
export const ADVANCE_MESSAGE_TYPE = 'job_advance'

export interface ExecuteOptions {
  trigger?: JobTrigger
  /** Job that caused this execution (pre/post-job parent, rerun source) */
  triggeredBy?: JobId
  /** Fixed manager id; execution is idempotent on it */
  managerId?: JobId
  /** Create the tree without enqueueing it (default true) */
  enqueue?: boolean
}

export interface ExecuteResult {
  managerId: JobId
  stepIds: JobId[]
  /** False when a manager with the given id already existed */
  created: boolean
}

export interface JobExecutorOptions {
  /** Upper bound of the backoff between step retries */
  retryMaxMs: number
}

export interface JobExecutor {
  /**
   * Validate a definition document (or look one up by id), create the
   * manager and its step jobs and enqueue the manager.
   * @throws {DefinitionNotFoundError} for an unknown id
   * @throws {JobValidationError} for a disabled or invalid definition
   */
  execute(definition: string | JobDefinition | Record<string, unknown>, options?: ExecuteOptions): ExecuteResult

  /** Enqueue a pending manager created with `enqueue: false` */
  start(managerId: JobId): void

  /** Ask a manager to re-evaluate its steps */
  advance(managerId: JobId, delayMs?: number): void

  /** Register the executor's message handlers */
  register(registry: HandlerRegistry): void
}
