/**
 * Migration 001: job tables.
 *
 *  - jobs        immutable job rows (tree via parent_id / manager_id)
 *  - job_state   mutable runtime state, one row per job
 *  - job_logs    per-job log lines
 *  - job_dedup   per-scope dedup keys (e.g. crawled URLs per step)
 *
 * Every child table cascades on job delete.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const jobsSchemaMigration: Migration = {
  version: 1,
  name: '001-jobs-schema',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS jobs (
        id            TEXT PRIMARY KEY,
        parent_id     TEXT REFERENCES jobs(id) ON DELETE CASCADE,
        manager_id    TEXT REFERENCES jobs(id) ON DELETE CASCADE,
        type          TEXT NOT NULL,
        name          TEXT NOT NULL,
        config        TEXT NOT NULL DEFAULT '{}',
        depth         INTEGER NOT NULL DEFAULT 0,
        definition_id TEXT,
        created_at    INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_jobs_parent ON jobs(parent_id);
      CREATE INDEX IF NOT EXISTS idx_jobs_manager ON jobs(manager_id);
      CREATE INDEX IF NOT EXISTS idx_jobs_type_created ON jobs(type, created_at);
      CREATE INDEX IF NOT EXISTS idx_jobs_created ON jobs(created_at);

      CREATE TABLE IF NOT EXISTS job_state (
        job_id              TEXT PRIMARY KEY REFERENCES jobs(id) ON DELETE CASCADE,
        status              TEXT NOT NULL DEFAULT 'pending'
                              CHECK (status IN ('pending', 'running', 'completed', 'failed', 'cancelled')),
        progress_total      INTEGER NOT NULL DEFAULT 0,
        progress_pending    INTEGER NOT NULL DEFAULT 0,
        progress_running    INTEGER NOT NULL DEFAULT 0,
        progress_completed  INTEGER NOT NULL DEFAULT 0,
        progress_failed     INTEGER NOT NULL DEFAULT 0,
        progress_cancelled  INTEGER NOT NULL DEFAULT 0,
        started_at          INTEGER,
        completed_at        INTEGER,
        error               TEXT,
        error_code          TEXT,
        result_count        INTEGER NOT NULL DEFAULT 0,
        result              TEXT,
        last_heartbeat      INTEGER,
        awaiting_children   INTEGER NOT NULL DEFAULT 0,
        possibly_incomplete INTEGER NOT NULL DEFAULT 0,
        checkpoint          TEXT,
        updated_at          INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_job_state_status ON job_state(status);

      CREATE TABLE IF NOT EXISTS job_logs (
        id         INTEGER PRIMARY KEY AUTOINCREMENT,
        job_id     TEXT NOT NULL REFERENCES jobs(id) ON DELETE CASCADE,
        level      TEXT NOT NULL CHECK (level IN ('debug', 'info', 'warn', 'error')),
        message    TEXT NOT NULL,
        created_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_job_logs_job ON job_logs(job_id, id);

      CREATE TABLE IF NOT EXISTS job_dedup (
        scope_id   TEXT NOT NULL REFERENCES jobs(id) ON DELETE CASCADE,
        key        TEXT NOT NULL,
        job_id     TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        PRIMARY KEY (scope_id, key)
      );
    `)
  },
}
