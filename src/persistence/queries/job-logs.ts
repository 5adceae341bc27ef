/**
 * Job log query functions for the SQLite persistence layer.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

// ---------------------------------------------------------------------------
// Log types
// ---------------------------------------------------------------------------

export interface JobLogRow {
  id: number
  job_id: string
  level: string
  message: string
  created_at: number
}

export interface LogQuery {
  levels?: string[]
  limit?: number
  /** Only entries with an id greater than this (for tailing) */
  after_id?: number
}

// ---------------------------------------------------------------------------
// Query functions
// ---------------------------------------------------------------------------

export function insertJobLog(
  db: BetterSqlite3Database,
  entry: Omit<JobLogRow, 'id'>,
): number {
  const result = db
    .prepare(`
      INSERT INTO job_logs (job_id, level, message, created_at)
      VALUES (@job_id, @level, @message, @created_at)
    `)
    .run(entry)
  return Number(result.lastInsertRowid)
}

function buildLogFilter(query: LogQuery, params: Record<string, string | number>): string {
  const clauses: string[] = []
  if (query.levels !== undefined && query.levels.length > 0) {
    const names = query.levels.map((level, i) => {
      params[`level_${i}`] = level
      return `@level_${i}`
    })
    clauses.push(`l.level IN (${names.join(', ')})`)
  }
  if (query.after_id !== undefined) {
    clauses.push('l.id > @after_id')
    params.after_id = query.after_id
  }
  params.limit = query.limit ?? -1
  return clauses.length > 0 ? `AND ${clauses.join(' AND ')}` : ''
}

/**
 * Log lines of one job, oldest first.
 */
export function listJobLogs(
  db: BetterSqlite3Database,
  jobId: string,
  query: LogQuery = {},
): JobLogRow[] {
  const params: Record<string, string | number> = { job_id: jobId }
  const filter = buildLogFilter(query, params)
  return db
    .prepare(`
      SELECT l.* FROM job_logs l
      WHERE l.job_id = @job_id ${filter}
      ORDER BY l.created_at ASC, l.id ASC
      LIMIT @limit
    `)
    .all(params) as JobLogRow[]
}

/**
 * Log lines of a job and all of its descendants, merged by time.
 */
export function listSubtreeLogs(
  db: BetterSqlite3Database,
  jobId: string,
  query: LogQuery = {},
): JobLogRow[] {
  const params: Record<string, string | number> = { job_id: jobId }
  const filter = buildLogFilter(query, params)
  return db
    .prepare(`
      WITH RECURSIVE subtree(id) AS (
        SELECT @job_id
        UNION ALL
        SELECT j.id FROM jobs j JOIN subtree t ON j.parent_id = t.id
      )
      SELECT l.* FROM job_logs l
      WHERE l.job_id IN (SELECT id FROM subtree) ${filter}
      ORDER BY l.created_at ASC, l.id ASC
      LIMIT @limit
    `)
    .all(params) as JobLogRow[]
}

export function countJobLogs(db: BetterSqlite3Database, jobId: string): number {
  const row = db.prepare('SELECT COUNT(*) AS n FROM job_logs WHERE job_id = ?').get(jobId) as {
    n: number
  }
  return row.n
}
