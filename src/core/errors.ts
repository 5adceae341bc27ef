/**
 * Error definitions for Conveyor
 * Provides structured error hierarchy for queue, store, executor and orchestrator operations
 */

/** Maximum length of an error string persisted on a job */
export const MAX_ERROR_LENGTH = 2000

/** Base error class for all Conveyor errors */
export class ConveyorError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'ConveyorError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConveyorError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when configuration is invalid */
export class ConfigError extends ConveyorError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when a job cannot be found */
export class JobNotFoundError extends ConveyorError {
  constructor(jobId: string) {
    super(`Job not found: ${jobId}`, 'JOB_NOT_FOUND', { jobId })
    this.name = 'JobNotFoundError'
  }
}

/** Error thrown when a job config or job definition fails validation */
export class JobValidationError extends ConveyorError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'JOB_VALIDATION_ERROR', context)
    this.name = 'JobValidationError'
  }
}

/** Error thrown when a status change is not a legal edge */
export class InvalidStateTransitionError extends ConveyorError {
  constructor(jobId: string, from: string, to: string) {
    super(`Invalid status transition for job ${jobId}: ${from} -> ${to}`, 'INVALID_TRANSITION', {
      jobId,
      from,
      to,
    })
    this.name = 'InvalidStateTransitionError'
  }
}

/** Error thrown when deleting a job whose subtree is still running */
export class JobRunningError extends ConveyorError {
  constructor(jobId: string, runningJobId: string) {
    super(
      runningJobId === jobId
        ? `Cannot delete running job: ${jobId}`
        : `Cannot delete job ${jobId}: descendant ${runningJobId} is running`,
      'JOB_RUNNING',
      { jobId, runningJobId }
    )
    this.name = 'JobRunningError'
  }
}

/** Error thrown when a job would complete while descendants are still active */
export class ActiveChildrenError extends ConveyorError {
  constructor(jobId: string, active: number) {
    super(`Job ${jobId} still has ${active} pending or running descendant(s)`, 'ACTIVE_CHILDREN', {
      jobId,
      active,
    })
    this.name = 'ActiveChildrenError'
  }
}

/** Error thrown when a child is created under a terminal parent */
export class ParentTerminalError extends ConveyorError {
  constructor(parentId: string, status: string) {
    super(`Parent job ${parentId} is ${status}; no further children accepted`, 'PARENT_TERMINAL', {
      parentId,
      status,
    })
    this.name = 'ParentTerminalError'
  }
}

/** Error thrown when a job definition cannot be found */
export class DefinitionNotFoundError extends ConveyorError {
  constructor(definitionId: string) {
    super(`Job definition not found: ${definitionId}`, 'DEFINITION_NOT_FOUND', { definitionId })
    this.name = 'DefinitionNotFoundError'
  }
}

/** Error thrown when a dead-letter entry cannot be found */
export class DeadLetterNotFoundError extends ConveyorError {
  constructor(id: string) {
    super(`Dead letter not found: ${id}`, 'DEAD_LETTER_NOT_FOUND', { id })
    this.name = 'DeadLetterNotFoundError'
  }
}

/** Handler failure that should be retried through queue redelivery */
export class RetryableError extends ConveyorError {
  constructor(message: string, context: Record<string, unknown> = {}, code = 'RETRYABLE') {
    super(message, code, context)
    this.name = 'RetryableError'
  }
}

/** Handler failure that must not be retried */
export class TerminalError extends ConveyorError {
  constructor(message: string, code = 'TERMINAL', context: Record<string, unknown> = {}) {
    super(message, code, context)
    this.name = 'TerminalError'
  }
}

/** Error thrown when the planner produces nothing that can be executed */
export class PlanError extends TerminalError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'NO_ACTIONABLE_PLAN', context)
    this.name = 'PlanError'
  }
}

/** Error thrown by an LLM provider call */
export class LlmError extends RetryableError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, context, 'LLM_ERROR')
    this.name = 'LlmError'
  }
}

/** Error thrown when a job exceeds its configured timeout */
export class TimeoutError extends TerminalError {
  constructor(jobId: string, timeoutMs: number) {
    super(`Job ${jobId} exceeded timeout of ${timeoutMs}ms`, 'TIMEOUT', { jobId, timeoutMs })
    this.name = 'TimeoutError'
  }
}

// ---------------------------------------------------------------------------
// Classification helpers
// ---------------------------------------------------------------------------

/**
 * Whether a handler error should be retried via redelivery.
 * Untagged errors count as transient; validation and terminal errors do not.
 */
export function isRetryable(err: unknown): boolean {
  if (err instanceof TerminalError) return false
  if (err instanceof JobValidationError) return false
  if (err instanceof InvalidStateTransitionError) return false
  if (err instanceof ParentTerminalError) return false
  if (err instanceof JobNotFoundError) return false
  if (err instanceof DefinitionNotFoundError) return false
  if (err instanceof Error && err.name === 'ZodError') return false
  return true
}

/** Machine-readable code of an error, or a generic one */
export function errorCode(err: unknown): string {
  if (err instanceof ConveyorError) return err.code
  return 'HANDLER_ERROR'
}

/** Non-empty error string, truncated for storage */
export function formatErrorMessage(err: unknown, maxLength = MAX_ERROR_LENGTH): string {
  const raw = err instanceof Error ? err.message : String(err)
  const message = raw.trim() === '' ? 'unknown error' : raw
  if (message.length <= maxLength) return message
  return message.slice(0, maxLength - 3) + '...'
}
