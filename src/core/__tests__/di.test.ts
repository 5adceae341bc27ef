/**
 * Tests for ServiceRegistry: ordered startup, reverse shutdown and error
 * collection.
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { ServiceRegistry } from '../di.js'
import type { BaseService } from '../di.js'

class RecordingService implements BaseService {
  constructor(
    private readonly _name: string,
    private readonly _events: string[],
    private readonly _failOn?: 'initialize' | 'shutdown',
  ) {}

  async initialize(): Promise<void> {
    this._events.push(`init:${this._name}`)
    if (this._failOn === 'initialize') throw new Error(`${this._name} failed to start`)
  }

  async shutdown(): Promise<void> {
    this._events.push(`stop:${this._name}`)
    if (this._failOn === 'shutdown') throw new Error(`${this._name} failed to stop`)
  }
}

describe('ServiceRegistry', () => {
  let services: ServiceRegistry
  let events: string[]

  beforeEach(() => {
    services = new ServiceRegistry()
    events = []
  })

  it('lists services in registration order', () => {
    services.register('database', new RecordingService('database', events))
    services.register('workers', new RecordingService('workers', events))

    expect(services.serviceNames).toEqual(['database', 'workers'])
    expect(services.has('database')).toBe(true)
    expect(services.has('queue')).toBe(false)
  })

  it('rejects a second service under the same name', () => {
    services.register('database', new RecordingService('database', events))

    expect(() => services.register('database', new RecordingService('other', events))).toThrow(
      'Service "database" is already registered',
    )
  })

  it('initializes in order and shuts down in reverse', async () => {
    services.register('database', new RecordingService('database', events))
    services.register('queue', new RecordingService('queue', events))
    services.register('workers', new RecordingService('workers', events))

    await services.initializeAll()
    await services.shutdownAll()

    expect(events).toEqual([
      'init:database',
      'init:queue',
      'init:workers',
      'stop:workers',
      'stop:queue',
      'stop:database',
    ])
  })

  it('initializes each service once across repeated calls', async () => {
    services.register('database', new RecordingService('database', events))

    await services.initializeAll()
    await services.initializeAll()

    expect(events).toEqual(['init:database'])
  })

  it('stops at the first failing service and shuts down only those that started', async () => {
    services.register('database', new RecordingService('database', events))
    services.register('queue', new RecordingService('queue', events, 'initialize'))
    services.register('workers', new RecordingService('workers', events))

    await expect(services.initializeAll()).rejects.toThrow('queue failed to start')
    await services.shutdownAll()

    expect(events).toEqual(['init:database', 'init:queue', 'stop:database'])
  })

  it('shuts every service down and reports all failures together', async () => {
    services.register('database', new RecordingService('database', events, 'shutdown'))
    services.register('workers', new RecordingService('workers', events, 'shutdown'))
    await services.initializeAll()

    const err: unknown = await services.shutdownAll().then(
      () => null,
      (e: unknown) => e,
    )

    expect(err).toBeInstanceOf(AggregateError)
    expect(err).toMatchObject({ message: 'Shutdown errors in 2 service(s)' })
    expect(err instanceof AggregateError ? err.errors.map((e: Error) => e.message) : []).toEqual([
      'workers failed to stop',
      'database failed to stop',
    ])
    expect(events.slice(2)).toEqual(['stop:workers', 'stop:database'])
  })

  it('does nothing on shutdown before initialization', async () => {
    services.register('database', new RecordingService('database', events))

    await services.shutdownAll()

    expect(events).toEqual([])
  })
})
