/**
 * Worker Pool module: barrel exports
 */

export type { WorkerPool, WorkerInfo, WorkerPoolOptions, IdleAncestorHook } from './worker-pool.js'
export { DEFAULT_WORKER_POOL_OPTIONS } from './worker-pool.js'
export { HandlerRegistry, Outcome } from './handler-registry.js'
export type {
  HandlerContext,
  HandlerLifecycle,
  HandlerOptions,
  HandlerOutcome,
  HandlerRegistration,
  MessageHandler,
} from './handler-registry.js'
export { WorkerHandle } from './worker-handle.js'
export { WorkerPoolImpl, WorkerShutdownError, createWorkerPool } from './worker-pool-impl.js'
export type { WorkerPoolDeps } from './worker-pool-impl.js'
