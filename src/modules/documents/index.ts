/**
 * Documents module: public API exports.
 */

export type { DocumentStore, SaveDocumentInput, StoredDocument } from './document-store.js'
export { SqliteDocumentStore, createDocumentStore, documentIdFor } from './document-store.js'
export type { SearchHit, SearchIndex } from './search-index.js'
export { FtsSearchIndex, createSearchIndex, toMatchExpression } from './search-index.js'
