/**
 * Document and full-text index query functions.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

export interface DocumentRow {
  id: string
  url: string
  title: string | null
  content: string
  source_job_id: string | null
  fetched_at: number
}

export interface SearchHitRow {
  doc_id: string
  title: string | null
  snippet: string
  rank: number
}

/**
 * Insert or refresh a document by URL.
 */
export function upsertDocumentRow(db: BetterSqlite3Database, row: DocumentRow): void {
  db.prepare(`
    INSERT INTO documents (id, url, title, content, source_job_id, fetched_at)
    VALUES (@id, @url, @title, @content, @source_job_id, @fetched_at)
    ON CONFLICT(url) DO UPDATE SET
      title = excluded.title,
      content = excluded.content,
      source_job_id = excluded.source_job_id,
      fetched_at = excluded.fetched_at
  `).run(row)
}

export function getDocumentRow(db: BetterSqlite3Database, id: string): DocumentRow | undefined {
  return db.prepare('SELECT * FROM documents WHERE id = ?').get(id) as DocumentRow | undefined
}

export function listDocumentRows(
  db: BetterSqlite3Database,
  limit: number,
  offset: number,
): DocumentRow[] {
  return db
    .prepare('SELECT * FROM documents ORDER BY fetched_at DESC, rowid DESC LIMIT ? OFFSET ?')
    .all(limit, offset) as DocumentRow[]
}

export function deleteDocumentRow(db: BetterSqlite3Database, id: string): boolean {
  return db.prepare('DELETE FROM documents WHERE id = ?').run(id).changes === 1
}

export function countDocumentRows(db: BetterSqlite3Database): number {
  const row = db.prepare('SELECT COUNT(*) AS n FROM documents').get() as { n: number }
  return row.n
}

/**
 * Replace the full-text index contents with the current documents.
 */
export function rebuildFtsIndex(db: BetterSqlite3Database): number {
  db.prepare('DELETE FROM documents_fts').run()
  const result = db
    .prepare(`
      INSERT INTO documents_fts (doc_id, title, content)
      SELECT id, COALESCE(title, ''), content FROM documents
    `)
    .run()
  return result.changes
}

export function searchFtsIndex(
  db: BetterSqlite3Database,
  query: string,
  limit: number,
): SearchHitRow[] {
  return db
    .prepare(`
      SELECT doc_id, title, snippet(documents_fts, 2, '[', ']', '...', 12) AS snippet, rank
      FROM documents_fts
      WHERE documents_fts MATCH ?
      ORDER BY rank
      LIMIT ?
    `)
    .all(query, limit) as SearchHitRow[]
}
