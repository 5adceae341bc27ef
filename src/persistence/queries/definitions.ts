/**
 * Job definition query functions for the SQLite persistence layer.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

export interface DefinitionRow {
  id: string
  name: string
  body: string
  enabled: number
  validation_status: 'valid' | 'invalid'
  validation_error: string | null
  source_path: string | null
  created_at: number
  updated_at: number
}

export type UpsertDefinitionInput = Omit<DefinitionRow, 'created_at' | 'updated_at'> & {
  now: number
}

/**
 * Insert or replace a definition, keeping its original created_at.
 */
export function upsertDefinitionRow(db: BetterSqlite3Database, input: UpsertDefinitionInput): void {
  db.prepare(`
    INSERT INTO job_definitions (
      id, name, body, enabled, validation_status, validation_error, source_path, created_at, updated_at
    ) VALUES (
      @id, @name, @body, @enabled, @validation_status, @validation_error, @source_path, @now, @now
    )
    ON CONFLICT(id) DO UPDATE SET
      name = excluded.name,
      body = excluded.body,
      enabled = excluded.enabled,
      validation_status = excluded.validation_status,
      validation_error = excluded.validation_error,
      source_path = excluded.source_path,
      updated_at = excluded.updated_at
  `).run(input)
}

export function getDefinitionRow(db: BetterSqlite3Database, id: string): DefinitionRow | undefined {
  return db.prepare('SELECT * FROM job_definitions WHERE id = ?').get(id) as
    | DefinitionRow
    | undefined
}

export function listDefinitionRows(db: BetterSqlite3Database): DefinitionRow[] {
  return db.prepare('SELECT * FROM job_definitions ORDER BY id ASC').all() as DefinitionRow[]
}

export function setDefinitionEnabled(
  db: BetterSqlite3Database,
  id: string,
  enabled: boolean,
  now: number,
): boolean {
  return (
    db
      .prepare('UPDATE job_definitions SET enabled = ?, updated_at = ? WHERE id = ?')
      .run(enabled ? 1 : 0, now, id).changes === 1
  )
}

export function deleteDefinitionRow(db: BetterSqlite3Database, id: string): boolean {
  return db.prepare('DELETE FROM job_definitions WHERE id = ?').run(id).changes === 1
}
