/**
 * Tests for ToolRegistry, defineTool and the document tools.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { z } from 'zod'
import { createDocumentStore } from '../../documents/document-store.js'
import type { DocumentStore } from '../../documents/document-store.js'
import { createSearchIndex } from '../../documents/search-index.js'
import { registerBuiltinTools } from '../builtin-tools.js'
import { ToolRegistry, defineTool } from '../tool-registry.js'
import type { ToolContext } from '../tool-registry.js'
import { openMemoryDb } from '../../../../test/helpers/db.js'
import { ManualClock } from '../../../../test/helpers/clock.js'

function toolContext(logs: string[] = []): ToolContext {
  return {
    jobId: 'tool-job',
    signal: new AbortController().signal,
    dependencies: {},
    log: (_level, message) => logs.push(message),
  }
}

describe('ToolRegistry', () => {
  const echo = defineTool({
    name: 'echo',
    description: 'Echo a word',
    parameters: { type: 'object', properties: { word: { type: 'string' } } },
    schema: z.object({ word: z.string() }).strict(),
    async run({ word }) {
      return word
    },
  })

  it('describes tools in the requested order', () => {
    const registry = new ToolRegistry()
    registry.register(echo)

    expect(registry.describe(['echo'])).toEqual([
      { name: 'echo', description: 'Echo a word', parameters: { type: 'object', properties: { word: { type: 'string' } } } },
    ])
    expect(() => registry.describe(['echo', 'nope'])).toThrow('Unknown tool "nope"')
  })

  it('refuses duplicate registrations', () => {
    const registry = new ToolRegistry()
    registry.register(echo)
    expect(() => registry.register(echo)).toThrow('Tool "echo" is already registered')
  })

  it('validates params before running', async () => {
    await expect(echo.run({ word: 'hi' }, toolContext())).resolves.toBe('hi')
    await expect(echo.run({ word: 3 }, toolContext())).rejects.toMatchObject({
      code: 'INVALID_TOOL_PARAMS',
      message: 'Invalid params for tool echo: word: Expected string, received number',
    })
  })
})

describe('document tools', () => {
  let db: BetterSqlite3Database
  let documents: DocumentStore
  let registry: ToolRegistry

  beforeEach(() => {
    db = openMemoryDb()
    const clock = new ManualClock()
    documents = createDocumentStore(db, clock)
    documents.save({ url: 'https://site.test/queues', title: 'Queues', content: 'Messages are leased to workers.' })
    const searchIndex = createSearchIndex(db)
    searchIndex.rebuild()
    registry = new ToolRegistry()
    registerBuiltinTools(registry, { documents, searchIndex })
  })

  afterEach(() => {
    db.close()
  })

  function tool(name: string): NonNullable<ReturnType<ToolRegistry['get']>> {
    const found = registry.get(name)
    if (found === undefined) throw new Error(`missing tool ${name}`)
    return found
  }

  it('registers search_documents and get_document', () => {
    expect(registry.names).toEqual(['search_documents', 'get_document'])
  })

  it('searches the index', async () => {
    const logs: string[] = []
    const result = await tool('search_documents').run({ query: 'leased' }, toolContext(logs))

    expect(result).toMatchObject({ query: 'leased', hits: [{ title: 'Queues' }] })
    expect(logs).toEqual(['Search "leased" matched 1 document(s)'])
  })

  it('fetches a document by URL', async () => {
    const result = await tool('get_document').run({ url: 'https://site.test/queues' }, toolContext())

    expect(result).toEqual({
      id: documents.list({ limit: 1 })[0]?.id,
      url: 'https://site.test/queues',
      title: 'Queues',
      content: 'Messages are leased to workers.',
      truncated: false,
    })
  })

  it('fails for a missing document or no identifier', async () => {
    await expect(tool('get_document').run({ id: 'nope' }, toolContext())).rejects.toMatchObject({
      code: 'DOCUMENT_NOT_FOUND',
    })
    await expect(tool('get_document').run({}, toolContext())).rejects.toMatchObject({
      code: 'INVALID_TOOL_PARAMS',
    })
  })
})
