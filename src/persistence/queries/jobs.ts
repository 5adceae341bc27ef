/**
 * Job and job-state query functions for the SQLite persistence layer.
 *
 * All functions accept a raw BetterSqlite3 database instance and use
 * prepared statements. Counter changes are single UPDATE statements so that
 * concurrent finishers never lose an increment.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

// ---------------------------------------------------------------------------
// Row types
// ---------------------------------------------------------------------------

/** A job joined with its state row */
export interface JobRow {
  id: string
  parent_id: string | null
  manager_id: string | null
  type: string
  name: string
  config: string
  depth: number
  definition_id: string | null
  created_at: number
  status: string
  progress_total: number
  progress_pending: number
  progress_running: number
  progress_completed: number
  progress_failed: number
  progress_cancelled: number
  started_at: number | null
  completed_at: number | null
  error: string | null
  error_code: string | null
  result_count: number
  result: string | null
  last_heartbeat: number | null
  awaiting_children: number
  possibly_incomplete: number
  checkpoint: string | null
  updated_at: number
}

export interface InsertJobInput {
  id: string
  parent_id: string | null
  manager_id: string | null
  type: string
  name: string
  config: string
  depth: number
  definition_id: string | null
  created_at: number
}

/** Signed change to each progress counter */
export interface ProgressDelta {
  total: number
  pending: number
  running: number
  completed: number
  failed: number
  cancelled: number
}

export const ZERO_DELTA: ProgressDelta = {
  total: 0,
  pending: 0,
  running: 0,
  completed: 0,
  failed: 0,
  cancelled: 0,
}

export interface CasStatusInput {
  job_id: string
  from: string
  to: string
  now: number
  error: string | null
  error_code: string | null
  result: string | null
  result_count: number | null
  possibly_incomplete: number
  /** When 1, the update only applies while no descendant is pending or running */
  require_idle: number
}

export interface JobRowFilter {
  parent_id?: string | null
  manager_id?: string
  statuses?: string[]
  types?: string[]
  created_after?: number
  created_before?: number
  limit?: number
  offset?: number
  order?: 'asc' | 'desc'
}

const JOB_SELECT = `
  SELECT j.id, j.parent_id, j.manager_id, j.type, j.name, j.config, j.depth,
         j.definition_id, j.created_at,
         s.status, s.progress_total, s.progress_pending, s.progress_running,
         s.progress_completed, s.progress_failed, s.progress_cancelled,
         s.started_at, s.completed_at, s.error, s.error_code, s.result_count,
         s.result, s.last_heartbeat, s.awaiting_children, s.possibly_incomplete,
         s.checkpoint, s.updated_at
  FROM jobs j
  JOIN job_state s ON s.job_id = j.id
`

const ANCESTORS_CTE = `
  WITH RECURSIVE ancestors(id) AS (
    SELECT parent_id FROM jobs WHERE id = @job_id AND parent_id IS NOT NULL
    UNION ALL
    SELECT j.parent_id FROM jobs j JOIN ancestors a ON j.id = a.id WHERE j.parent_id IS NOT NULL
  )
`

// ---------------------------------------------------------------------------
// Inserts and reads
// ---------------------------------------------------------------------------

/**
 * Insert a job and its pending state row. Returns false when a job with the
 * same id already exists (the existing row is left untouched).
 */
export function insertJob(db: BetterSqlite3Database, input: InsertJobInput): boolean {
  const inserted = db
    .prepare(`
      INSERT OR IGNORE INTO jobs (
        id, parent_id, manager_id, type, name, config, depth, definition_id, created_at
      ) VALUES (
        @id, @parent_id, @manager_id, @type, @name, @config, @depth, @definition_id, @created_at
      )
    `)
    .run(input)

  if (inserted.changes === 0) {
    return false
  }

  db.prepare(`
    INSERT INTO job_state (job_id, status, last_heartbeat, updated_at)
    VALUES (?, 'pending', ?, ?)
  `).run(input.id, input.created_at, input.created_at)
  return true
}

export function getJobRow(db: BetterSqlite3Database, id: string): JobRow | undefined {
  return db.prepare(`${JOB_SELECT} WHERE j.id = ?`).get(id) as JobRow | undefined
}

export function listChildRows(db: BetterSqlite3Database, parentId: string): JobRow[] {
  return db
    .prepare(`${JOB_SELECT} WHERE j.parent_id = ? ORDER BY j.created_at ASC, j.rowid ASC`)
    .all(parentId) as JobRow[]
}

/**
 * All descendants of a job, shallowest first.
 */
export function listDescendantRows(db: BetterSqlite3Database, id: string): JobRow[] {
  return db
    .prepare(`
      WITH RECURSIVE subtree(id) AS (
        SELECT id FROM jobs WHERE parent_id = @job_id
        UNION ALL
        SELECT j.id FROM jobs j JOIN subtree t ON j.parent_id = t.id
      )
      ${JOB_SELECT}
      WHERE j.id IN (SELECT id FROM subtree)
      ORDER BY j.depth ASC, j.created_at ASC, j.rowid ASC
    `)
    .all({ job_id: id }) as JobRow[]
}

/**
 * Ids of a job's ancestors, nearest first.
 */
export function listAncestorIds(db: BetterSqlite3Database, id: string): string[] {
  const rows = db
    .prepare(`
      WITH RECURSIVE ancestors(id, hops) AS (
        SELECT parent_id, 1 FROM jobs WHERE id = @job_id AND parent_id IS NOT NULL
        UNION ALL
        SELECT j.parent_id, a.hops + 1 FROM jobs j JOIN ancestors a ON j.id = a.id
        WHERE j.parent_id IS NOT NULL
      )
      SELECT id FROM ancestors ORDER BY hops ASC
    `)
    .all({ job_id: id }) as { id: string }[]
  return rows.map((r) => r.id)
}

/**
 * Filtered, paginated job listing plus the unpaginated match count.
 */
export function listJobRows(
  db: BetterSqlite3Database,
  filter: JobRowFilter,
): { rows: JobRow[]; total: number } {
  const clauses: string[] = []
  const params: Record<string, string | number> = {}

  if (filter.parent_id === null) {
    clauses.push('j.parent_id IS NULL')
  } else if (filter.parent_id !== undefined) {
    clauses.push('j.parent_id = @parent_id')
    params.parent_id = filter.parent_id
  }
  if (filter.manager_id !== undefined) {
    clauses.push('j.manager_id = @manager_id')
    params.manager_id = filter.manager_id
  }
  if (filter.statuses !== undefined && filter.statuses.length > 0) {
    const names = filter.statuses.map((status, i) => {
      params[`status_${i}`] = status
      return `@status_${i}`
    })
    clauses.push(`s.status IN (${names.join(', ')})`)
  }
  if (filter.types !== undefined && filter.types.length > 0) {
    const names = filter.types.map((type, i) => {
      params[`type_${i}`] = type
      return `@type_${i}`
    })
    clauses.push(`j.type IN (${names.join(', ')})`)
  }
  if (filter.created_after !== undefined) {
    clauses.push('j.created_at >= @created_after')
    params.created_after = filter.created_after
  }
  if (filter.created_before !== undefined) {
    clauses.push('j.created_at < @created_before')
    params.created_before = filter.created_before
  }

  const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : ''
  const direction = filter.order === 'asc' ? 'ASC' : 'DESC'

  const countRow = db
    .prepare(`SELECT COUNT(*) AS total FROM jobs j JOIN job_state s ON s.job_id = j.id ${where}`)
    .get(params) as { total: number }

  params.limit = filter.limit ?? -1
  params.offset = filter.offset ?? 0
  const rows = db
    .prepare(`
      ${JOB_SELECT} ${where}
      ORDER BY j.created_at ${direction}, j.rowid ${direction}
      LIMIT @limit OFFSET @offset
    `)
    .all(params) as JobRow[]

  return { rows, total: countRow.total }
}

// ---------------------------------------------------------------------------
// Status and counters
// ---------------------------------------------------------------------------

/**
 * Compare-and-swap a job's status. Returns true when the row moved from
 * `from` to `to`.
 */
export function casStatus(db: BetterSqlite3Database, input: CasStatusInput): boolean {
  const result = db
    .prepare(`
      UPDATE job_state SET
        status = @to,
        started_at = CASE WHEN @to = 'running' THEN COALESCE(started_at, @now) ELSE started_at END,
        completed_at = CASE WHEN @to IN ('completed', 'failed', 'cancelled') THEN @now ELSE completed_at END,
        error = COALESCE(@error, error),
        error_code = COALESCE(@error_code, error_code),
        result = COALESCE(@result, result),
        result_count = COALESCE(@result_count, result_count),
        possibly_incomplete = MAX(possibly_incomplete, @possibly_incomplete),
        awaiting_children = CASE WHEN @to IN ('completed', 'failed', 'cancelled') THEN 0 ELSE awaiting_children END,
        last_heartbeat = @now,
        updated_at = @now
      WHERE job_id = @job_id
        AND status = @from
        AND (@require_idle = 0 OR (progress_pending = 0 AND progress_running = 0))
    `)
    .run(input)
  return result.changes === 1
}

/**
 * Apply a counter delta to every ancestor of `jobId` (not the job itself)
 * and mark them as having seen child activity.
 */
export function applyAncestorDelta(
  db: BetterSqlite3Database,
  jobId: string,
  delta: ProgressDelta,
  now: number,
): void {
  db.prepare(`
    ${ANCESTORS_CTE}
    UPDATE job_state SET
      progress_total = progress_total + @total,
      progress_pending = progress_pending + @pending,
      progress_running = progress_running + @running,
      progress_completed = progress_completed + @completed,
      progress_failed = progress_failed + @failed,
      progress_cancelled = progress_cancelled + @cancelled,
      last_heartbeat = @now,
      updated_at = @now
    WHERE job_id IN (SELECT id FROM ancestors)
  `).run({ job_id: jobId, now, ...delta })
}

/**
 * Apply a counter delta to a job and all of its ancestors in one statement.
 */
export function applyProgressDelta(
  db: BetterSqlite3Database,
  jobId: string,
  delta: ProgressDelta,
  now: number,
): number {
  const result = db
    .prepare(`
      WITH RECURSIVE chain(id) AS (
        SELECT @job_id
        UNION ALL
        SELECT j.parent_id FROM jobs j JOIN chain c ON j.id = c.id WHERE j.parent_id IS NOT NULL
      )
      UPDATE job_state SET
        progress_total = progress_total + @total,
        progress_pending = progress_pending + @pending,
        progress_running = progress_running + @running,
        progress_completed = progress_completed + @completed,
        progress_failed = progress_failed + @failed,
        progress_cancelled = progress_cancelled + @cancelled,
        last_heartbeat = @now,
        updated_at = @now
      WHERE job_id IN (SELECT id FROM chain)
    `)
    .run({ job_id: jobId, now, ...delta })
  return result.changes
}

/**
 * Touch last_heartbeat on a job and all of its ancestors.
 */
export function touchHeartbeat(db: BetterSqlite3Database, jobId: string, now: number): void {
  db.prepare(`
    WITH RECURSIVE chain(id) AS (
      SELECT @job_id
      UNION ALL
      SELECT j.parent_id FROM jobs j JOIN chain c ON j.id = c.id WHERE j.parent_id IS NOT NULL
    )
    UPDATE job_state SET last_heartbeat = @now, updated_at = @now
    WHERE job_id IN (SELECT id FROM chain)
  `).run({ job_id: jobId, now })
}

/**
 * Ancestors of `jobId` that are running, awaiting children, and now have no
 * pending or running descendants. Nearest first.
 */
export function findIdleAwaitingAncestors(db: BetterSqlite3Database, jobId: string): string[] {
  const rows = db
    .prepare(`
      WITH RECURSIVE ancestors(id, hops) AS (
        SELECT parent_id, 1 FROM jobs WHERE id = @job_id AND parent_id IS NOT NULL
        UNION ALL
        SELECT j.parent_id, a.hops + 1 FROM jobs j JOIN ancestors a ON j.id = a.id
        WHERE j.parent_id IS NOT NULL
      )
      SELECT a.id FROM ancestors a
      JOIN job_state s ON s.job_id = a.id
      WHERE s.status = 'running'
        AND s.awaiting_children = 1
        AND s.progress_pending = 0
        AND s.progress_running = 0
      ORDER BY a.hops ASC
    `)
    .all({ job_id: jobId }) as { id: string }[]
  return rows.map((r) => r.id)
}

export function setAwaitingChildren(
  db: BetterSqlite3Database,
  jobId: string,
  awaiting: boolean,
  now: number,
): void {
  db.prepare(`
    UPDATE job_state SET awaiting_children = ?, last_heartbeat = ?, updated_at = ? WHERE job_id = ?
  `).run(awaiting ? 1 : 0, now, now, jobId)
}

export function saveCheckpoint(
  db: BetterSqlite3Database,
  jobId: string,
  checkpoint: string | null,
  now: number,
): void {
  db.prepare('UPDATE job_state SET checkpoint = ?, updated_at = ? WHERE job_id = ?').run(
    checkpoint,
    now,
    jobId,
  )
}

export function addResultCount(
  db: BetterSqlite3Database,
  jobId: string,
  count: number,
  now: number,
): void {
  db.prepare(
    'UPDATE job_state SET result_count = result_count + ?, updated_at = ? WHERE job_id = ?',
  ).run(count, now, jobId)
}

// ---------------------------------------------------------------------------
// Subtree queries and deletion
// ---------------------------------------------------------------------------

/**
 * Id of a running job in the subtree rooted at `id` (the root included), if any.
 */
export function findRunningInSubtree(db: BetterSqlite3Database, id: string): string | undefined {
  const row = db
    .prepare(`
      WITH RECURSIVE subtree(id) AS (
        SELECT @job_id
        UNION ALL
        SELECT j.id FROM jobs j JOIN subtree t ON j.parent_id = t.id
      )
      SELECT s.job_id AS id FROM job_state s
      WHERE s.job_id IN (SELECT id FROM subtree) AND s.status = 'running'
      LIMIT 1
    `)
    .get({ job_id: id }) as { id: string } | undefined
  return row?.id
}

/**
 * Count of jobs in the subtree rooted at `id`, the root included.
 */
export function countSubtree(db: BetterSqlite3Database, id: string): number {
  const row = db
    .prepare(`
      WITH RECURSIVE subtree(id) AS (
        SELECT @job_id
        UNION ALL
        SELECT j.id FROM jobs j JOIN subtree t ON j.parent_id = t.id
      )
      SELECT COUNT(*) AS n FROM subtree s JOIN jobs j ON j.id = s.id
    `)
    .get({ job_id: id }) as { n: number }
  return row.n
}

/**
 * Delete a job; foreign keys cascade to descendants, logs and dedup rows.
 */
export function deleteJobRow(db: BetterSqlite3Database, id: string): boolean {
  return db.prepare('DELETE FROM jobs WHERE id = ?').run(id).changes === 1
}

/**
 * Root jobs in one of `statuses` whose completion is older than `cutoff`.
 */
export function listExpiredRootRows(
  db: BetterSqlite3Database,
  cutoff: number,
  statuses: string[],
): JobRow[] {
  const params: Record<string, string | number> = { cutoff }
  const names = statuses.map((status, i) => {
    params[`status_${i}`] = status
    return `@status_${i}`
  })
  if (names.length === 0) return []
  return db
    .prepare(`
      ${JOB_SELECT}
      WHERE j.parent_id IS NULL
        AND s.status IN (${names.join(', ')})
        AND COALESCE(s.completed_at, j.created_at) < @cutoff
      ORDER BY j.created_at ASC
    `)
    .all(params) as JobRow[]
}

/**
 * Count of direct children grouped by status.
 */
export function countChildrenByStatus(
  db: BetterSqlite3Database,
  parentId: string,
): { status: string; n: number }[] {
  return db
    .prepare(`
      SELECT s.status AS status, COUNT(*) AS n
      FROM jobs j JOIN job_state s ON s.job_id = j.id
      WHERE j.parent_id = ?
      GROUP BY s.status
    `)
    .all(parentId) as { status: string; n: number }[]
}

// ---------------------------------------------------------------------------
// Dedup records
// ---------------------------------------------------------------------------

/**
 * Claim a key within a scope. Returns false if the key was already claimed.
 */
export function insertDedup(
  db: BetterSqlite3Database,
  scopeId: string,
  key: string,
  jobId: string,
  now: number,
): boolean {
  const result = db
    .prepare(
      'INSERT OR IGNORE INTO job_dedup (scope_id, key, job_id, created_at) VALUES (?, ?, ?, ?)',
    )
    .run(scopeId, key, jobId, now)
  return result.changes === 1
}

export function getDedupJobId(
  db: BetterSqlite3Database,
  scopeId: string,
  key: string,
): string | undefined {
  const row = db
    .prepare('SELECT job_id FROM job_dedup WHERE scope_id = ? AND key = ?')
    .get(scopeId, key) as { job_id: string } | undefined
  return row?.job_id
}

export function countDedup(db: BetterSqlite3Database, scopeId: string): number {
  const row = db
    .prepare('SELECT COUNT(*) AS n FROM job_dedup WHERE scope_id = ?')
    .get(scopeId) as { n: number }
  return row.n
}
