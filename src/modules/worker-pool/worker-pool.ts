/**
 * WorkerPool: interface and supporting types for the worker pool.
 *
 * A fixed set of async workers pulls leased messages from the durable queue
 * and routes each one by type to its registered handler.
 */

import type { BaseService } from '../../core/di.js'
import type { HandlerOptions, MessageHandler } from './handler-registry.js'

// ---------------------------------------------------------------------------
// WorkerInfo
// ---------------------------------------------------------------------------

/**
 * Snapshot of a single worker's state.
 */
export interface WorkerInfo {
  workerId: string
  status: 'idle' | 'busy' | 'stopping'
  messageId: string | null
  messageType: string | null
  jobId: string | null
  /** Milliseconds spent on the current message */
  elapsedMs: number
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface WorkerPoolOptions {
  concurrency: number
  /** Sleep between receives while the queue is empty */
  pollIntervalMs: number
  /** How often a running handler extends its lease and heartbeats its job */
  heartbeatIntervalMs: number
  /** Lease extension applied on each heartbeat */
  leaseMs: number
  /** Default drain timeout for stop() */
  shutdownTimeoutMs: number
  retryBaseMs: number
  retryMaxMs: number
}

export const DEFAULT_WORKER_POOL_OPTIONS: WorkerPoolOptions = {
  concurrency: 4,
  pollIntervalMs: 200,
  heartbeatIntervalMs: 5_000,
  leaseMs: 30_000,
  shutdownTimeoutMs: 10_000,
  retryBaseMs: 1_000,
  retryMaxMs: 60_000,
}

/** Hook invoked for each awaiting ancestor that a transition left idle */
export type IdleAncestorHook = (jobId: string) => void

// ---------------------------------------------------------------------------
// WorkerPool interface
// ---------------------------------------------------------------------------

export interface WorkerPool extends BaseService {
  /**
   * @throws {Error} if the type already has a handler
   */
  registerHandler(type: string, handler: MessageHandler, options?: HandlerOptions): void

  /** Start `concurrency` worker loops (the configured count by default) */
  start(concurrency?: number): void

  /**
   * Stop receiving, wait for in-flight handlers up to `timeoutMs`, then abort
   * them. Aborted messages are redelivered once their lease expires.
   */
  stop(timeoutMs?: number): Promise<void>

  /**
   * Receive and process at most one message on the caller's turn.
   * Resolves false when nothing was visible.
   */
  processNext(): Promise<boolean>

  readonly isRunning: boolean

  /** Handlers currently executing */
  readonly activeCount: number

  getWorkers(): WorkerInfo[]
}
