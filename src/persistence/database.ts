/**
 * DatabaseWrapper: thin wrapper around better-sqlite3.
 *
 * Responsibilities:
 *  - Open a SQLite database with the required PRAGMAs (WAL, foreign keys)
 *  - Expose the raw BetterSqlite3.Database instance for use by query modules
 *  - Implement the DatabaseService lifecycle interface (initialize / shutdown)
 */

import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { BaseService } from '../core/di.js'
import { runMigrations } from './migrations/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('persistence:database')

/** Path that opens a private in-memory database */
export const IN_MEMORY_PATH = ':memory:'

// ---------------------------------------------------------------------------
// DatabaseWrapper
// ---------------------------------------------------------------------------

export class DatabaseWrapper {
  private _db: BetterSqlite3Database | null = null
  private readonly _path: string

  constructor(databasePath: string) {
    this._path = databasePath
  }

  /**
   * Open the database and apply PRAGMAs. Idempotent.
   */
  open(): void {
    if (this._db !== null) {
      return
    }

    if (this._path !== IN_MEMORY_PATH) {
      mkdirSync(dirname(this._path), { recursive: true })
    }

    logger.debug({ path: this._path }, 'Opening SQLite database')
    this._db = new BetterSqlite3(this._path)
    applyPragmas(this._db)
    logger.debug({ path: this._path }, 'SQLite database opened')
  }

  /**
   * Close the database. Idempotent.
   */
  close(): void {
    if (this._db === null) {
      return
    }

    this._db.close()
    this._db = null
    logger.debug({ path: this._path }, 'SQLite database closed')
  }

  /**
   * @throws {Error} if the database has not been opened yet.
   */
  get db(): BetterSqlite3Database {
    if (this._db === null) {
      throw new Error('DatabaseWrapper: database is not open. Call open() first.')
    }
    return this._db
  }

  get isOpen(): boolean {
    return this._db !== null
  }

  get path(): string {
    return this._path
  }
}

/**
 * PRAGMAs every connection needs: WAL for concurrent readers, a busy timeout
 * for writers on other connections, and enforced cascades.
 */
export function applyPragmas(db: BetterSqlite3Database): void {
  const walResult = db.pragma('journal_mode = WAL') as { journal_mode: string }[]
  if (walResult[0]?.journal_mode !== 'wal') {
    logger.debug({ result: walResult[0]?.journal_mode }, 'WAL not available for this database')
  }
  db.pragma('busy_timeout = 5000')
  db.pragma('synchronous = NORMAL')
  db.pragma('foreign_keys = ON')
}

// ---------------------------------------------------------------------------
// DatabaseService
// ---------------------------------------------------------------------------

export interface DatabaseService extends BaseService {
  readonly isOpen: boolean
  /** Raw BetterSqlite3 database instance: use for prepared statements */
  readonly db: BetterSqlite3Database
}

export class DatabaseServiceImpl implements DatabaseService {
  private readonly _wrapper: DatabaseWrapper

  constructor(databasePath: string) {
    this._wrapper = new DatabaseWrapper(databasePath)
  }

  get isOpen(): boolean {
    return this._wrapper.isOpen
  }

  get db(): BetterSqlite3Database {
    return this._wrapper.db
  }

  async initialize(): Promise<void> {
    this._wrapper.open()
    runMigrations(this._wrapper.db)
    logger.info({ path: this._wrapper.path }, 'DatabaseService initialized')
  }

  async shutdown(): Promise<void> {
    this._wrapper.close()
    logger.info('DatabaseService shut down')
  }
}

export function createDatabaseService(databasePath: string): DatabaseService {
  return new DatabaseServiceImpl(databasePath)
}
