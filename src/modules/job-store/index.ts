/**
 * Job store module: public API exports.
 */

export type { JobStore } from './job-store.js'
export { SqliteJobStore, createJobStore, VALID_TRANSITIONS, isValidTransition, parseStatusFilter } from './job-store-impl.js'
export type { JobStoreOptions } from './job-store-impl.js'
export {
  JOB_TYPES,
  STANDALONE_JOB_TYPES,
  isJobType,
  parseJobConfig,
  parseJobSpec,
} from './job-types.js'
export type { JobConfigMap, JobTrigger, JobType, ReplanContext } from './job-types.js'
export type {
  ChildStatusCounts,
  CreateJobInput,
  CreateJobResult,
  Job,
  JobLogEntry,
  JobProgress,
  JobRecord,
  JobState,
  ListJobsFilter,
  ListJobsResult,
  LogQueryOptions,
  TransitionResult,
  UpdateStatusOptions,
} from './types.js'
