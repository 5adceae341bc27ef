/**
 * Tools over the local document store and search index.
 */

import { z } from 'zod'
import { TerminalError } from '../../core/errors.js'
import type { DocumentStore } from '../documents/document-store.js'
import { documentIdFor } from '../documents/document-store.js'
import type { SearchIndex } from '../documents/search-index.js'
import { defineTool } from './tool-registry.js'
import type { Tool, ToolRegistry } from './tool-registry.js'

const MAX_CONTENT_CHARS = 4000

export function searchDocumentsTool(searchIndex: SearchIndex): Tool {
  return defineTool({
    name: 'search_documents',
    description: 'Full-text search over crawled documents. Returns titles, snippets and document ids.',
    parameters: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Words to search for' },
        limit: { type: 'integer', minimum: 1, maximum: 50 },
      },
      required: ['query'],
    },
    schema: z.object({ query: z.string().min(1), limit: z.number().int().min(1).max(50).default(10) }).strict(),
    async run({ query, limit }, ctx) {
      const hits = searchIndex.search(query, limit)
      ctx.log('info', `Search "${query}" matched ${String(hits.length)} document(s)`)
      return { query, hits }
    },
  })
}

export function getDocumentTool(documents: DocumentStore): Tool {
  return defineTool({
    name: 'get_document',
    description: 'Fetch one crawled document by id or URL. Content is truncated.',
    parameters: {
      type: 'object',
      properties: {
        id: { type: 'string' },
        url: { type: 'string' },
      },
    },
    schema: z
      .object({ id: z.string().min(1).optional(), url: z.string().url().optional() })
      .strict()
      .refine((p) => p.id !== undefined || p.url !== undefined, 'Either id or url is required'),
    async run({ id, url }) {
      const documentId = id ?? (url === undefined ? undefined : documentIdFor(url))
      const document = documentId === undefined ? undefined : documents.get(documentId)
      if (document === undefined) {
        throw new TerminalError(`Document ${id ?? url ?? ''} not found`, 'DOCUMENT_NOT_FOUND')
      }
      return {
        id: document.id,
        url: document.url,
        title: document.title,
        content: document.content.slice(0, MAX_CONTENT_CHARS),
        truncated: document.content.length > MAX_CONTENT_CHARS,
      }
    },
  })
}

export interface BuiltinToolDeps {
  documents: DocumentStore
  searchIndex: SearchIndex
}

export function registerBuiltinTools(registry: ToolRegistry, deps: BuiltinToolDeps): void {
  registry.register(searchDocumentsTool(deps.searchIndex))
  registry.register(getDocumentTool(deps.documents))
}
