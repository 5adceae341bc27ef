/**
 * Migration 004: crawled documents and their full-text index.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const documentsSchemaMigration: Migration = {
  version: 4,
  name: '004-documents-schema',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS documents (
        id            TEXT PRIMARY KEY,
        url           TEXT NOT NULL UNIQUE,
        title         TEXT,
        content       TEXT NOT NULL,
        source_job_id TEXT,
        fetched_at    INTEGER NOT NULL
      );

      CREATE VIRTUAL TABLE IF NOT EXISTS documents_fts USING fts5(
        doc_id UNINDEXED,
        title,
        content
      );
    `)
  },
}
