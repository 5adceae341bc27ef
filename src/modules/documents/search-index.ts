/**
 * SearchIndex: full-text index over the document store (SQLite FTS5).
 *
 * The index is rebuilt wholesale by the `index` step rather than kept in
 * sync on every save, so a search only sees documents as of the last rebuild.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { rebuildFtsIndex, searchFtsIndex } from '../../persistence/queries/documents.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('documents:search')

export interface SearchHit {
  documentId: string
  title: string | null
  /** Matched terms wrapped in [ ] */
  snippet: string
  rank: number
}

export interface SearchIndex {
  /** Replace the index contents with every stored document. Returns the number indexed */
  rebuild(): number

  search(query: string, limit?: number): SearchHit[]
}

export class FtsSearchIndex implements SearchIndex {
  private readonly _db: BetterSqlite3Database

  constructor(db: BetterSqlite3Database) {
    this._db = db
  }

  rebuild(): number {
    const indexed = this._db.transaction(() => rebuildFtsIndex(this._db))()
    logger.info({ indexed }, 'Search index rebuilt')
    return indexed
  }

  search(query: string, limit = 10): SearchHit[] {
    const terms = toMatchExpression(query)
    if (terms === '') return []
    return searchFtsIndex(this._db, terms, limit).map((row) => ({
      documentId: row.doc_id,
      title: row.title === '' ? null : row.title,
      snippet: row.snippet,
      rank: row.rank,
    }))
  }
}

/**
 * Quote each word so user input never reaches the FTS5 query syntax.
 */
export function toMatchExpression(query: string): string {
  return query
    .split(/\s+/)
    .map((word) => word.replace(/"/g, ''))
    .filter((word) => word !== '')
    .map((word) => `"${word}"`)
    .join(' ')
}

export function createSearchIndex(db: BetterSqlite3Database): SearchIndex {
  return new FtsSearchIndex(db)
}
