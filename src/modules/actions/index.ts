/**
 * Actions module: public API exports.
 */

export { CrawlAction, CRAWL_PAGE_MESSAGE_TYPE, compilePatterns, createCrawlAction } from './crawl-action.js'
export type { CrawlDeps } from './crawl-action.js'
export { IndexRebuildAction } from './index-action.js'
export { NotifyAction } from './notify-action.js'
export { PurgeDeadLettersAction, PurgeJobsAction } from './maintenance-actions.js'
export { HttpPageFetcher, extractHtml, resolveLink } from './page-fetcher.js'
export type { FetchedPage, HttpPageFetcherOptions, PageFetcher } from './page-fetcher.js'
export { registerBuiltinActions } from './builtin-actions.js'
export type { BuiltinActionDeps } from './builtin-actions.js'
