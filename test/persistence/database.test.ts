/**
 * Tests for DatabaseWrapper and DatabaseServiceImpl.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, mkdtempSync, rmSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { DatabaseWrapper, createDatabaseService } from '../../src/persistence/database.js'

// ---------------------------------------------------------------------------
// DatabaseWrapper
// ---------------------------------------------------------------------------

describe('DatabaseWrapper', () => {
  let wrapper: DatabaseWrapper

  beforeEach(() => {
    wrapper = new DatabaseWrapper(':memory:')
  })

  afterEach(() => {
    if (wrapper.isOpen) wrapper.close()
  })

  it('starts closed and rejects access to db', () => {
    expect(wrapper.isOpen).toBe(false)
    expect(() => wrapper.db).toThrow('database is not open')
  })

  it('returns the same instance on repeated open', () => {
    wrapper.open()
    const first = wrapper.db
    wrapper.open()
    expect(wrapper.db).toBe(first)
  })

  it('closes idempotently', () => {
    wrapper.open()
    wrapper.close()
    expect(() => wrapper.close()).not.toThrow()
    expect(wrapper.isOpen).toBe(false)
  })

  it('applies busy_timeout, synchronous and foreign_keys', () => {
    wrapper.open()
    expect(wrapper.db.pragma('busy_timeout', { simple: true })).toBe(5000)
    expect(wrapper.db.pragma('synchronous', { simple: true })).toBe(1)
    expect(wrapper.db.pragma('foreign_keys', { simple: true })).toBe(1)
  })
})

// ---------------------------------------------------------------------------
// File-backed databases
// ---------------------------------------------------------------------------

describe('DatabaseWrapper on disk', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'conveyor-db-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('creates missing parent directories and uses WAL', () => {
    const path = join(dir, 'nested', 'state', 'conveyor.db')
    const wrapper = new DatabaseWrapper(path)
    wrapper.open()
    expect(existsSync(path)).toBe(true)
    expect(wrapper.db.pragma('journal_mode', { simple: true })).toBe('wal')
    wrapper.close()
  })
})

// ---------------------------------------------------------------------------
// DatabaseService
// ---------------------------------------------------------------------------

describe('DatabaseService', () => {
  it('runs migrations on initialize and closes on shutdown', async () => {
    const service = createDatabaseService(':memory:')
    expect(service.isOpen).toBe(false)

    await service.initialize()
    expect(service.isOpen).toBe(true)
    const row = service.db.prepare('SELECT MAX(version) AS version FROM schema_migrations').get() as {
      version: number
    }
    expect(row.version).toBe(4)

    await service.shutdown()
    expect(service.isOpen).toBe(false)
  })
})
