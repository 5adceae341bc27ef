/**
 * DocumentStore: crawled pages, keyed by URL.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Clock } from '../../core/types.js'
import { systemClock } from '../../core/types.js'
import { deriveId } from '../../utils/helpers.js'
import {
  countDocumentRows,
  deleteDocumentRow,
  getDocumentRow,
  listDocumentRows,
  upsertDocumentRow,
} from '../../persistence/queries/documents.js'
import type { DocumentRow } from '../../persistence/queries/documents.js'

export interface StoredDocument {
  id: string
  url: string
  title: string | null
  content: string
  /** Job that last fetched the page */
  sourceJobId: string | null
  fetchedAt: number
}

export interface SaveDocumentInput {
  url: string
  title: string | null
  content: string
  sourceJobId?: string | null
}

export interface DocumentStore {
  /** Insert or refresh the document for a URL; the id is stable per URL */
  save(input: SaveDocumentInput): StoredDocument

  get(id: string): StoredDocument | undefined

  /** Newest first */
  list(options?: { limit?: number; offset?: number }): StoredDocument[]

  delete(id: string): boolean

  count(): number
}

export function documentIdFor(url: string): string {
  return deriveId('document', url)
}

export class SqliteDocumentStore implements DocumentStore {
  private readonly _db: BetterSqlite3Database
  private readonly _clock: Clock

  constructor(db: BetterSqlite3Database, clock: Clock = systemClock) {
    this._db = db
    this._clock = clock
  }

  save(input: SaveDocumentInput): StoredDocument {
    const row: DocumentRow = {
      id: documentIdFor(input.url),
      url: input.url,
      title: input.title,
      content: input.content,
      source_job_id: input.sourceJobId ?? null,
      fetched_at: this._clock.now(),
    }
    upsertDocumentRow(this._db, row)
    return toDocument(row)
  }

  get(id: string): StoredDocument | undefined {
    const row = getDocumentRow(this._db, id)
    return row === undefined ? undefined : toDocument(row)
  }

  list(options: { limit?: number; offset?: number } = {}): StoredDocument[] {
    return listDocumentRows(this._db, options.limit ?? 100, options.offset ?? 0).map(toDocument)
  }

  delete(id: string): boolean {
    return deleteDocumentRow(this._db, id)
  }

  count(): number {
    return countDocumentRows(this._db)
  }
}

function toDocument(row: DocumentRow): StoredDocument {
  return {
    id: row.id,
    url: row.url,
    title: row.title,
    content: row.content,
    sourceJobId: row.source_job_id,
    fetchedAt: row.fetched_at,
  }
}

export function createDocumentStore(db: BetterSqlite3Database, clock?: Clock): DocumentStore {
  return new SqliteDocumentStore(db, clock)
}
