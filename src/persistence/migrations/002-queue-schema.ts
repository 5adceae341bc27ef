/**
 * Migration 002: durable queue.
 *
 *  - queue_messages  live messages; a message is leased while visible_at > now
 *                    and lease_token is set
 *  - dead_letters    messages that exceeded their redelivery budget
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const queueSchemaMigration: Migration = {
  version: 2,
  name: '002-queue-schema',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS queue_messages (
        id            TEXT PRIMARY KEY,
        type          TEXT NOT NULL,
        job_id        TEXT,
        payload       TEXT NOT NULL DEFAULT '{}',
        priority      INTEGER NOT NULL DEFAULT 0,
        visible_at    INTEGER NOT NULL,
        enqueued_at   INTEGER NOT NULL,
        receive_count INTEGER NOT NULL DEFAULT 0,
        lease_token   TEXT,
        dedup_key     TEXT UNIQUE,
        last_error    TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_queue_visible ON queue_messages(visible_at, priority);
      CREATE INDEX IF NOT EXISTS idx_queue_job ON queue_messages(job_id);

      CREATE TABLE IF NOT EXISTS dead_letters (
        id               TEXT PRIMARY KEY,
        type             TEXT NOT NULL,
        job_id           TEXT,
        payload          TEXT NOT NULL,
        receive_count    INTEGER NOT NULL,
        dedup_key        TEXT,
        last_error       TEXT,
        enqueued_at      INTEGER NOT NULL,
        dead_lettered_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_dead_letters_at ON dead_letters(dead_lettered_at);
    `)
  },
}
