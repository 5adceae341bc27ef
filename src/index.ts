/**
 * Conveyor - Main module exports
 * Public API surface for embedding the job runtime
 */

// Core types and errors
export * from './core/types.js'
export * from './core/errors.js'

// Utilities
export { createLogger, childLogger, logger } from './utils/logger.js'
export * from './utils/helpers.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type { ConveyorEvents } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Dependency Injection
export type { BaseService } from './core/di.js'
export { ServiceRegistry } from './core/di.js'

// Runtime
export type { Runtime, RuntimeOptions } from './core/runtime.js'
export { createRuntime } from './core/runtime-impl.js'

// Modules
export * from './modules/config/index.js'
export * from './modules/queue/index.js'
export * from './modules/worker-pool/index.js'
export * from './modules/job-store/index.js'
export * from './modules/hierarchy/index.js'
export * from './modules/completion-probe/index.js'
export * from './modules/executor/index.js'
export * from './modules/orchestrator/index.js'
export * from './modules/actions/index.js'
export * from './modules/documents/index.js'
