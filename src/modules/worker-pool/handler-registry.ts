/**
 * HandlerRegistry: message type → handler routing table for the worker pool.
 *
 * Built once at startup and injected into the pool. Registering the same
 * message type twice is a wiring bug and throws.
 */

import type { LogLevel } from '../../core/types.js'
import type { LeasedMessage } from '../queue/durable-queue.js'
import type { JobRecord } from '../job-store/types.js'

// ---------------------------------------------------------------------------
// Outcomes
// ---------------------------------------------------------------------------

/** What the pool records after a handler returns */
export type HandlerOutcome =
  | { kind: 'completed'; result?: unknown; resultCount?: number }
  /** The job stays running; something else will settle it */
  | { kind: 'waiting' }
  /** Reschedule the same message; the job stays running */
  | { kind: 'requeue'; delayMs: number; payload?: Record<string, unknown> }
  /** Handled failure: the job fails without retry */
  | { kind: 'failed'; error: unknown; code?: string }

export const Outcome = {
  completed(result?: unknown, resultCount?: number): HandlerOutcome {
    return { kind: 'completed', result, resultCount }
  },
  waiting(): HandlerOutcome {
    return { kind: 'waiting' }
  },
  requeue(delayMs: number, payload?: Record<string, unknown>): HandlerOutcome {
    return payload === undefined ? { kind: 'requeue', delayMs } : { kind: 'requeue', delayMs, payload }
  },
  failed(error: unknown, code?: string): HandlerOutcome {
    return code === undefined ? { kind: 'failed', error } : { kind: 'failed', error, code }
  },
} as const

// ---------------------------------------------------------------------------
// Handler types
// ---------------------------------------------------------------------------

export interface HandlerContext {
  message: LeasedMessage
  /**
   * For `job` handlers: the claimed job, already running.
   * For `control` handlers: the referenced job if it exists.
   */
  job: JobRecord | null
  /** Aborted on timeout or forced shutdown */
  signal: AbortSignal
  /** Log to the process logger and, when a job is attached, to its job log */
  log(level: LogLevel, message: string): void
}

export type MessageHandler = (ctx: HandlerContext) => Promise<HandlerOutcome>

/**
 * `job`: the message owns its job; the pool claims it pending→running before
 * dispatch and records the outcome on it.
 * `control`: the message refers to a job it does not own (probes, advances).
 */
export type HandlerLifecycle = 'job' | 'control'

export interface HandlerOptions {
  lifecycle?: HandlerLifecycle
  /** Called with the message instead of failing its job when the message is dead-lettered */
  onDeadLetter?: (message: LeasedMessage) => void
  /**
   * Called with a `job` handler's job once it is terminal, inside the store
   * transaction that records the status and deletes the message. Throwing
   * rolls all of it back.
   */
  onSettled?: (job: JobRecord) => void
  /** Run-time budget of a `job` handler's job, measured from its first start */
  resolveTimeoutMs?: (job: JobRecord) => number | undefined
}

export interface HandlerRegistration {
  type: string
  handler: MessageHandler
  lifecycle: HandlerLifecycle
  onDeadLetter?: (message: LeasedMessage) => void
  onSettled?: (job: JobRecord) => void
  resolveTimeoutMs?: (job: JobRecord) => number | undefined
}

// ---------------------------------------------------------------------------
// HandlerRegistry
// ---------------------------------------------------------------------------

export class HandlerRegistry {
  private readonly _handlers = new Map<string, HandlerRegistration>()

  /**
   * @throws {Error} if `type` already has a handler
   */
  register(type: string, handler: MessageHandler, options: HandlerOptions = {}): void {
    if (this._handlers.has(type)) {
      throw new Error(`Handler for message type "${type}" is already registered`)
    }
    const registration: HandlerRegistration = {
      type,
      handler,
      lifecycle: options.lifecycle ?? 'job',
    }
    if (options.onDeadLetter !== undefined) registration.onDeadLetter = options.onDeadLetter
    if (options.onSettled !== undefined) registration.onSettled = options.onSettled
    if (options.resolveTimeoutMs !== undefined) registration.resolveTimeoutMs = options.resolveTimeoutMs
    this._handlers.set(type, registration)
  }

  get(type: string): HandlerRegistration | undefined {
    return this._handlers.get(type)
  }

  has(type: string): boolean {
    return this._handlers.has(type)
  }

  get types(): string[] {
    return [...this._handlers.keys()]
  }
}
