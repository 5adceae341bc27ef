/**
 * Durable queue query functions for the SQLite persistence layer.
 *
 * Lease-scoped updates match on (id, lease_token) so that a worker whose
 * lease was taken over by a redelivery can no longer ack or extend it.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

// ---------------------------------------------------------------------------
// Row types
// ---------------------------------------------------------------------------

export interface QueueMessageRow {
  id: string
  type: string
  job_id: string | null
  payload: string
  priority: number
  visible_at: number
  enqueued_at: number
  receive_count: number
  lease_token: string | null
  dedup_key: string | null
  last_error: string | null
}

export interface DeadLetterRow {
  id: string
  type: string
  job_id: string | null
  payload: string
  receive_count: number
  dedup_key: string | null
  last_error: string | null
  enqueued_at: number
  dead_lettered_at: number
}

export type InsertMessageInput = Omit<QueueMessageRow, 'receive_count' | 'lease_token' | 'last_error'>

export interface QueueCounts {
  visible: number
  leased: number
  delayed: number
  dead: number
}

// ---------------------------------------------------------------------------
// Enqueue and receive
// ---------------------------------------------------------------------------

/**
 * Insert a message. Returns false when a live message with the same
 * dedup key already exists.
 */
export function insertMessage(db: BetterSqlite3Database, input: InsertMessageInput): boolean {
  const result = db
    .prepare(`
      INSERT OR IGNORE INTO queue_messages (
        id, type, job_id, payload, priority, visible_at, enqueued_at, dedup_key
      ) VALUES (
        @id, @type, @job_id, @payload, @priority, @visible_at, @enqueued_at, @dedup_key
      )
    `)
    .run(input)
  return result.changes === 1
}

export function getMessage(db: BetterSqlite3Database, id: string): QueueMessageRow | undefined {
  return db.prepare('SELECT * FROM queue_messages WHERE id = ?').get(id) as
    | QueueMessageRow
    | undefined
}

export function getMessageByDedupKey(
  db: BetterSqlite3Database,
  dedupKey: string,
): QueueMessageRow | undefined {
  return db.prepare('SELECT * FROM queue_messages WHERE dedup_key = ?').get(dedupKey) as
    | QueueMessageRow
    | undefined
}

/**
 * Oldest visible message, highest priority first.
 */
export function peekVisibleMessage(
  db: BetterSqlite3Database,
  now: number,
): QueueMessageRow | undefined {
  return db
    .prepare(`
      SELECT * FROM queue_messages
      WHERE visible_at <= ?
      ORDER BY priority DESC, visible_at ASC, rowid ASC
      LIMIT 1
    `)
    .get(now) as QueueMessageRow | undefined
}

/**
 * Lease a message: new token, hidden until `visibleAt`, one more receive.
 */
export function leaseMessage(
  db: BetterSqlite3Database,
  id: string,
  token: string,
  visibleAt: number,
): QueueMessageRow | undefined {
  return db
    .prepare(`
      UPDATE queue_messages
      SET lease_token = ?, visible_at = ?, receive_count = receive_count + 1
      WHERE id = ?
      RETURNING *
    `)
    .get(token, visibleAt, id) as QueueMessageRow | undefined
}

/**
 * Pull an unleased message's visibility forward to `visibleAt`. Leased
 * messages and messages already due sooner are left alone.
 */
export function advanceMessage(
  db: BetterSqlite3Database,
  id: string,
  visibleAt: number,
  now: number,
): boolean {
  return (
    db
      .prepare(`
        UPDATE queue_messages SET visible_at = @visible_at
        WHERE id = @id
          AND visible_at > @visible_at
          AND (lease_token IS NULL OR visible_at <= @now)
      `)
      .run({ id, visible_at: visibleAt, now }).changes === 1
  )
}

// ---------------------------------------------------------------------------
// Lease-scoped operations
// ---------------------------------------------------------------------------

export function deleteLeasedMessage(
  db: BetterSqlite3Database,
  id: string,
  token: string,
): boolean {
  return (
    db.prepare('DELETE FROM queue_messages WHERE id = ? AND lease_token = ?').run(id, token)
      .changes === 1
  )
}

export function extendLeasedMessage(
  db: BetterSqlite3Database,
  id: string,
  token: string,
  visibleAt: number,
): boolean {
  return (
    db
      .prepare('UPDATE queue_messages SET visible_at = ? WHERE id = ? AND lease_token = ?')
      .run(visibleAt, id, token).changes === 1
  )
}

/**
 * Give up a lease, making the message visible again at `visibleAt`.
 * `resetReceives` clears the redelivery count (deliberate reschedule).
 */
export function releaseLeasedMessage(
  db: BetterSqlite3Database,
  params: {
    id: string
    token: string
    visible_at: number
    reset_receives: number
    last_error: string | null
    payload: string | null
  },
): boolean {
  return (
    db
      .prepare(`
        UPDATE queue_messages SET
          visible_at = @visible_at,
          lease_token = NULL,
          receive_count = CASE WHEN @reset_receives = 1 THEN 0 ELSE receive_count END,
          last_error = COALESCE(@last_error, last_error),
          payload = COALESCE(@payload, payload)
        WHERE id = @id AND lease_token = @token
      `)
      .run(params).changes === 1
  )
}

// ---------------------------------------------------------------------------
// Dead letters
// ---------------------------------------------------------------------------

/**
 * Move a live message into dead_letters.
 */
export function moveToDeadLetters(db: BetterSqlite3Database, id: string, now: number): boolean {
  const moved = db
    .prepare(`
      INSERT OR REPLACE INTO dead_letters (
        id, type, job_id, payload, receive_count, dedup_key, last_error, enqueued_at, dead_lettered_at
      )
      SELECT id, type, job_id, payload, receive_count, dedup_key, last_error, enqueued_at, ?
      FROM queue_messages WHERE id = ?
    `)
    .run(now, id)
  if (moved.changes === 0) return false
  db.prepare('DELETE FROM queue_messages WHERE id = ?').run(id)
  return true
}

export function listDeadLetterRows(db: BetterSqlite3Database, limit = 100): DeadLetterRow[] {
  return db
    .prepare('SELECT * FROM dead_letters ORDER BY dead_lettered_at DESC, rowid DESC LIMIT ?')
    .all(limit) as DeadLetterRow[]
}

export function getDeadLetterRow(db: BetterSqlite3Database, id: string): DeadLetterRow | undefined {
  return db.prepare('SELECT * FROM dead_letters WHERE id = ?').get(id) as DeadLetterRow | undefined
}

export function deleteDeadLetterRow(db: BetterSqlite3Database, id: string): boolean {
  return db.prepare('DELETE FROM dead_letters WHERE id = ?').run(id).changes === 1
}

export function listDeadLettersBefore(db: BetterSqlite3Database, cutoff: number): DeadLetterRow[] {
  return db
    .prepare('SELECT * FROM dead_letters WHERE dead_lettered_at < ? ORDER BY dead_lettered_at ASC')
    .all(cutoff) as DeadLetterRow[]
}

// ---------------------------------------------------------------------------
// Inspection
// ---------------------------------------------------------------------------

export function countMessages(db: BetterSqlite3Database, now: number): QueueCounts {
  const row = db
    .prepare(`
      SELECT
        COALESCE(SUM(CASE WHEN visible_at <= @now THEN 1 ELSE 0 END), 0) AS visible,
        COALESCE(SUM(CASE WHEN visible_at > @now AND lease_token IS NOT NULL THEN 1 ELSE 0 END), 0) AS leased,
        COALESCE(SUM(CASE WHEN visible_at > @now AND lease_token IS NULL THEN 1 ELSE 0 END), 0) AS delayed,
        (SELECT COUNT(*) FROM dead_letters) AS dead
      FROM queue_messages
    `)
    .get({ now }) as QueueCounts
  return row
}

export function listMessageRows(db: BetterSqlite3Database, type?: string): QueueMessageRow[] {
  if (type !== undefined) {
    return db
      .prepare('SELECT * FROM queue_messages WHERE type = ? ORDER BY rowid ASC')
      .all(type) as QueueMessageRow[]
  }
  return db.prepare('SELECT * FROM queue_messages ORDER BY rowid ASC').all() as QueueMessageRow[]
}

/**
 * Earliest visible_at among live messages, or null when the queue is empty.
 */
export function getNextVisibleAt(db: BetterSqlite3Database): number | null {
  const row = db.prepare('SELECT MIN(visible_at) AS next FROM queue_messages').get() as { next: number | null }
  return row.next
}
