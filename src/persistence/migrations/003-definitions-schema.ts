/**
 * Migration 003: job definitions.
 *
 * The raw body is stored even when it fails validation so that the
 * failure stays visible; validation_status records the outcome.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const definitionsSchemaMigration: Migration = {
  version: 3,
  name: '003-definitions-schema',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS job_definitions (
        id                TEXT PRIMARY KEY,
        name              TEXT NOT NULL,
        body              TEXT NOT NULL,
        enabled           INTEGER NOT NULL DEFAULT 1,
        validation_status TEXT NOT NULL CHECK (validation_status IN ('valid', 'invalid')),
        validation_error  TEXT,
        source_path       TEXT,
        created_at        INTEGER NOT NULL,
        updated_at        INTEGER NOT NULL
      );
    `)
  },
}
