/**
 * TypedEventBus: typed internal pub/sub for job notifications.
 *
 * Built on top of Node.js EventEmitter. Dispatch is synchronous; subscribers
 * observe state changes but never drive them.
 */

import { EventEmitter } from 'node:events'
import type { ConveyorEvents } from './event-bus.types.js'

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

/**
 * A typed publish-subscribe bus.
 *
 * All event names and payload types are enforced by the `ConveyorEvents` map.
 */
export interface TypedEventBus {
  /**
   * Emit an event with a strongly-typed payload.
   * All registered handlers run before emit() returns.
   */
  emit<K extends keyof ConveyorEvents>(event: K, payload: ConveyorEvents[K]): void

  on<K extends keyof ConveyorEvents>(
    event: K,
    handler: (payload: ConveyorEvents[K]) => void
  ): void

  /**
   * Unsubscribe a previously registered handler. No-op when not registered.
   */
  off<K extends keyof ConveyorEvents>(
    event: K,
    handler: (payload: ConveyorEvents[K]) => void
  ): void
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl
// ---------------------------------------------------------------------------

/**
 * Concrete implementation of TypedEventBus backed by Node.js EventEmitter.
 *
 * @example
 * const bus = new TypedEventBusImpl()
 * bus.on('job:status', ({ jobId, to }) => {
 *   console.log(`Job ${jobId} is now ${to}`)
 * })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter: EventEmitter

  constructor() {
    this._emitter = new EventEmitter()
    this._emitter.setMaxListeners(100)
  }

  emit<K extends keyof ConveyorEvents>(event: K, payload: ConveyorEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends keyof ConveyorEvents>(
    event: K,
    handler: (payload: ConveyorEvents[K]) => void
  ): void {
    this._emitter.on(event, handler)
  }

  off<K extends keyof ConveyorEvents>(
    event: K,
    handler: (payload: ConveyorEvents[K]) => void
  ): void {
    this._emitter.off(event, handler)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
