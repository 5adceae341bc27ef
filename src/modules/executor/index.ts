/**
 * Executor module: public API exports.
 */

export type { JobExecutor, ExecuteOptions, ExecuteResult, JobExecutorOptions } from './job-executor.js'
export { ADVANCE_MESSAGE_TYPE, MANAGER_MESSAGE_TYPE, STEP_MESSAGE_TYPE } from './job-executor.js'
export { JobExecutorImpl, createJobExecutor } from './job-executor-impl.js'
export type { JobExecutorDeps } from './job-executor-impl.js'
export { ActionRegistry } from './action-registry.js'
export type { ActionContext, ActionMode, ActionResult, StepAction } from './action-registry.js'
export { SqliteDefinitionStore, createDefinitionStore } from './definition-store.js'
export type { DefinitionResolution, DefinitionStore, StoredDefinition } from './definition-store.js'
export {
  DefinitionParseError,
  DEFINITION_FILE_EXTENSIONS,
  detectFormat,
  parseDefinitionFile,
  parseDefinitionString,
} from './definition-parser.js'
export type { DefinitionFormat } from './definition-parser.js'
export {
  DEFINITION_ID_PATTERN,
  JobDefinitionSchema,
  StepDefinitionSchema,
  formatZodIssues,
  validateDefinition,
} from './definition-schema.js'
export type {
  CrawlStepConfig,
  DefinitionValidation,
  ErrorTolerance,
  JobDefinition,
  MaintenanceStepConfig,
  OnErrorPolicy,
  OrchestrateStepConfig,
  RawJobDefinition,
  StepDefinition,
  StepType,
} from './definition-schema.js'
