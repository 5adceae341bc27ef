/**
 * Service lifecycle registry.
 *
 * Provides:
 *  - BaseService interface with initialize/shutdown lifecycle
 *  - ServiceRegistry that starts services in registration order and stops
 *    them in reverse
 */

import { createLogger } from '../utils/logger.js'

const logger = createLogger('services')

// ---------------------------------------------------------------------------
// BaseService interface
// ---------------------------------------------------------------------------

/**
 * Lifecycle interface for long-lived runtime components (database, worker pool).
 */
export interface BaseService {
  initialize(): Promise<void>
  shutdown(): Promise<void>
}

// ---------------------------------------------------------------------------
// ServiceRegistry
// ---------------------------------------------------------------------------

/**
 * @example
 * const services = new ServiceRegistry()
 * services.register('database', databaseService)
 * services.register('workers', workerPool)
 * await services.initializeAll()
 * // ...
 * await services.shutdownAll()
 */
export class ServiceRegistry {
  private readonly _services = new Map<string, BaseService>()
  private readonly _order: string[] = []
  private readonly _initialized = new Set<string>()

  /**
   * @throws {Error} if a service with the same name is already registered.
   */
  register(name: string, service: BaseService): void {
    if (this._services.has(name)) {
      throw new Error(`Service "${name}" is already registered`)
    }
    this._services.set(name, service)
    this._order.push(name)
  }

  has(name: string): boolean {
    return this._services.has(name)
  }

  /**
   * Initialize services in registration order, failing fast on the first error.
   */
  async initializeAll(): Promise<void> {
    for (const name of this._order) {
      const service = this._services.get(name)
      if (service === undefined || this._initialized.has(name)) continue
      await service.initialize()
      this._initialized.add(name)
      logger.debug({ service: name }, 'Service initialized')
    }
  }

  /**
   * Shut down initialized services in reverse order. Errors are collected and
   * re-thrown as an AggregateError once every service had its turn.
   */
  async shutdownAll(): Promise<void> {
    const errors: Error[] = []
    for (const name of [...this._order].reverse()) {
      const service = this._services.get(name)
      if (service === undefined || !this._initialized.has(name)) continue
      try {
        await service.shutdown()
        logger.debug({ service: name }, 'Service shut down')
      } catch (err) {
        errors.push(err instanceof Error ? err : new Error(String(err)))
      } finally {
        this._initialized.delete(name)
      }
    }

    if (errors.length > 0) {
      throw new AggregateError(errors, `Shutdown errors in ${errors.length} service(s)`)
    }
  }

  get serviceNames(): string[] {
    return [...this._order]
  }
}
