/**
 * Tests for SqliteDocumentStore and FtsSearchIndex.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { createDocumentStore, documentIdFor } from '../document-store.js'
import type { DocumentStore } from '../document-store.js'
import { createSearchIndex, toMatchExpression } from '../search-index.js'
import type { SearchIndex } from '../search-index.js'
import { openMemoryDb } from '../../../../test/helpers/db.js'
import { ManualClock } from '../../../../test/helpers/clock.js'

describe('documents', () => {
  let db: BetterSqlite3Database
  let clock: ManualClock
  let documents: DocumentStore
  let search: SearchIndex

  beforeEach(() => {
    db = openMemoryDb()
    clock = new ManualClock()
    documents = createDocumentStore(db, clock)
    search = createSearchIndex(db)
  })

  afterEach(() => {
    db.close()
  })

  describe('DocumentStore', () => {
    it('keeps one document per URL with a stable id', () => {
      const first = documents.save({ url: 'https://example.test/a', title: 'A', content: 'first body' })
      clock.advance(1_000)
      const second = documents.save({ url: 'https://example.test/a', title: 'A2', content: 'second body', sourceJobId: 'job-1' })

      expect(second.id).toBe(first.id)
      expect(first.id).toBe(documentIdFor('https://example.test/a'))
      expect(documents.count()).toBe(1)
      expect(documents.get(first.id)).toEqual({
        id: first.id,
        url: 'https://example.test/a',
        title: 'A2',
        content: 'second body',
        sourceJobId: 'job-1',
        fetchedAt: clock.now(),
      })
    })

    it('lists newest first and deletes by id', () => {
      documents.save({ url: 'https://example.test/old', title: null, content: 'old' })
      clock.advance(10)
      const latest = documents.save({ url: 'https://example.test/new', title: null, content: 'new' })

      expect(documents.list().map((d) => d.url)).toEqual(['https://example.test/new', 'https://example.test/old'])
      expect(documents.list({ limit: 1, offset: 1 }).map((d) => d.url)).toEqual(['https://example.test/old'])
      expect(documents.delete(latest.id)).toBe(true)
      expect(documents.delete(latest.id)).toBe(false)
      expect(documents.count()).toBe(1)
    })
  })

  describe('SearchIndex', () => {
    it('finds documents only after a rebuild', () => {
      const doc = documents.save({ url: 'https://example.test/queue', title: 'Queues', content: 'leases and redelivery' })

      expect(search.search('redelivery')).toEqual([])
      expect(search.rebuild()).toBe(1)

      const hits = search.search('redelivery')
      expect(hits).toHaveLength(1)
      expect(hits[0]?.documentId).toBe(doc.id)
      expect(hits[0]?.title).toBe('Queues')
      expect(hits[0]?.snippet).toBe('leases and [redelivery]')
    })

    it('drops documents deleted before the rebuild', () => {
      const doc = documents.save({ url: 'https://example.test/x', title: 'X', content: 'ephemeral words' })
      search.rebuild()
      documents.delete(doc.id)

      expect(search.rebuild()).toBe(0)
      expect(search.search('ephemeral')).toEqual([])
    })

    it('treats query syntax as plain words', () => {
      expect(toMatchExpression('  lease "OR" NEAR(x) ')).toBe('"lease" "OR" "NEAR(x)"')
      expect(toMatchExpression('   ')).toBe('')
      expect(search.search('')).toEqual([])
    })
  })
})
