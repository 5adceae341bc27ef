/**
 * Registration of the built-in step actions.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { DurableQueue } from '../queue/durable-queue.js'
import type { JobStore } from '../job-store/job-store.js'
import type { HandlerRegistry } from '../worker-pool/handler-registry.js'
import type { ActionRegistry } from '../executor/action-registry.js'
import type { JobLifecycle } from '../hierarchy/job-lifecycle.js'
import type { DocumentStore } from '../documents/document-store.js'
import type { SearchIndex } from '../documents/search-index.js'
import { CrawlAction } from './crawl-action.js'
import { IndexRebuildAction } from './index-action.js'
import { NotifyAction } from './notify-action.js'
import { PurgeDeadLettersAction, PurgeJobsAction } from './maintenance-actions.js'
import type { PageFetcher } from './page-fetcher.js'

export interface BuiltinActionDeps {
  store: JobStore
  queue: DurableQueue
  documents: DocumentStore
  searchIndex: SearchIndex
  fetcher: PageFetcher
  lifecycle: JobLifecycle
  eventBus?: TypedEventBus
}

/**
 * Register crawl, index, notify and maintenance actions, and the work
 * handlers they enqueue.
 */
export function registerBuiltinActions(actions: ActionRegistry, handlers: HandlerRegistry, deps: BuiltinActionDeps): void {
  const crawl = new CrawlAction(deps)
  actions.register('crawl', 'crawl', crawl)
  crawl.register(handlers)

  actions.register('index', 'rebuild', new IndexRebuildAction(deps.searchIndex))
  actions.register('notify', 'publish', new NotifyAction(deps.eventBus))
  actions.register('maintenance', 'purge_jobs', new PurgeJobsAction(deps.lifecycle))
  actions.register('maintenance', 'purge_dead_letters', new PurgeDeadLettersAction(deps.queue))
}
