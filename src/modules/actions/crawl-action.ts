/**
 * Crawl step action and the `crawl_page` work handler.
 *
 * The step enqueues one page job per seed and hands completion to the
 * probe. Each page job fetches and stores its page and, while under
 * max_depth, enqueues the links it found as further page jobs under the same
 * step, so the tree stays flat and grows while it runs. URLs are claimed per
 * step, so a page is crawled at most once and redelivery never duplicates it.
 */

import type { JobId } from '../../core/types.js'
import { TerminalError } from '../../core/errors.js'
import { deriveId } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { DurableQueue } from '../queue/durable-queue.js'
import type { JobStore } from '../job-store/job-store.js'
import { parseJobConfig } from '../job-store/job-types.js'
import type { JobConfigMap } from '../job-store/job-types.js'
import type { JobRecord } from '../job-store/types.js'
import { Outcome } from '../worker-pool/handler-registry.js'
import type { HandlerContext, HandlerOutcome, HandlerRegistry } from '../worker-pool/handler-registry.js'
import type { ActionContext, ActionResult, StepAction } from '../executor/action-registry.js'
import type { DocumentStore } from '../documents/document-store.js'
import type { PageFetcher } from './page-fetcher.js'

const logger = createLogger('actions:crawl')

export const CRAWL_PAGE_MESSAGE_TYPE = 'crawl_page'

type PageConfig = JobConfigMap['crawl_page']

export interface CrawlDeps {
  store: JobStore
  queue: DurableQueue
  documents: DocumentStore
  fetcher: PageFetcher
}

export class CrawlAction implements StepAction {
  readonly mode = 'fanout' as const

  private readonly _store: JobStore
  private readonly _queue: DurableQueue
  private readonly _documents: DocumentStore
  private readonly _fetcher: PageFetcher

  constructor(deps: CrawlDeps) {
    this._store = deps.store
    this._queue = deps.queue
    this._documents = deps.documents
    this._fetcher = deps.fetcher
  }

  async run(ctx: ActionContext): Promise<ActionResult> {
    if (ctx.definition.type !== 'crawl') {
      throw new TerminalError(`Crawl action cannot run a ${ctx.definition.type} step`, 'INVALID_STEP')
    }
    const crawl = ctx.definition.config
    compilePatterns(crawl.include_patterns)
    compilePatterns(crawl.exclude_patterns)

    let enqueued = 0
    for (const url of crawl.seeds) {
      const spawned = this._spawnPage(ctx.step, {
        url,
        depth: 0,
        max_depth: crawl.max_depth,
        max_pages: crawl.max_pages,
        follow_links: crawl.follow_links,
        include_patterns: crawl.include_patterns,
        exclude_patterns: crawl.exclude_patterns,
      })
      if (spawned) enqueued++
    }
    ctx.log('info', `Enqueued ${String(enqueued)} seed page(s)`)
    return { resultCount: enqueued }
  }

  /** Register the `crawl_page` work handler */
  register(registry: HandlerRegistry): void {
    registry.register(CRAWL_PAGE_MESSAGE_TYPE, (ctx) => this._handlePage(ctx))
  }

  // -------------------------------------------------------------------------
  // crawl_page
  // -------------------------------------------------------------------------

  private async _handlePage(ctx: HandlerContext): Promise<HandlerOutcome> {
    const page = ctx.job
    if (page === null) {
      throw new TerminalError(`Message ${ctx.message.id} has no job`, 'NO_JOB')
    }
    const config = parseJobConfig('crawl_page', page.config)

    const fetched = await this._fetcher.fetch(config.url, ctx.signal)
    const document = this._documents.save({
      url: config.url,
      title: fetched.title,
      content: fetched.content,
      sourceJobId: page.id,
    })

    const discovered = this._followLinks(page, config, fetched.links, ctx)
    logger.debug({ jobId: page.id, url: config.url, links: fetched.links.length, discovered }, 'Page crawled')

    return Outcome.completed(
      { url: config.url, document_id: document.id, title: fetched.title, links: fetched.links.length, discovered },
      1,
    )
  }

  private _followLinks(page: JobRecord, config: PageConfig, links: string[], ctx: HandlerContext): number {
    if (!config.follow_links || config.depth >= config.max_depth || page.parentId === null) {
      return 0
    }
    const step = this._store.getJob(page.parentId)
    if (step === undefined || step.state.status !== 'running') {
      return 0
    }

    const include = compilePatterns(config.include_patterns)
    const exclude = compilePatterns(config.exclude_patterns)
    const candidates = links.filter(
      (link) => (include.length === 0 || include.some((re) => re.test(link))) && !exclude.some((re) => re.test(link)),
    )

    let discovered = 0
    for (const [index, link] of candidates.entries()) {
      if (this._store.countDedup(step.id) >= config.max_pages) {
        ctx.log(
          'info',
          `Reached max pages limit (${String(config.max_pages)}), skipping ${String(candidates.length - index)} remaining link(s)`,
        )
        break
      }
      if (this._spawnPage(step, { ...config, url: link, depth: config.depth + 1 })) {
        discovered++
      }
    }
    return discovered
  }

  /**
   * Claim the URL for the step and enqueue a page job for it, in one
   * transaction. False when the URL was already claimed or the step reached
   * max_pages.
   */
  private _spawnPage(step: JobRecord, config: PageConfig): boolean {
    const childId: JobId = deriveId(step.id, `page:${config.url}`)
    return this._store.transaction(() => {
      if (this._store.countDedup(step.id) >= config.max_pages) return false
      if (!this._store.claimDedup(step.id, config.url, childId)) return false
      this._store.createJob({
        id: childId,
        parentId: step.id,
        type: 'crawl_page',
        name: config.url,
        config,
        definitionId: step.definitionId,
      })
      this._queue.enqueue({ type: CRAWL_PAGE_MESSAGE_TYPE, jobId: childId }, { dedupKey: `job:${childId}` })
      return true
    })
  }
}

/**
 * @throws {TerminalError} (INVALID_PATTERN) for a pattern that is not a valid regular expression
 */
export function compilePatterns(patterns: string[]): RegExp[] {
  return patterns.map((pattern) => {
    try {
      return new RegExp(pattern)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new TerminalError(`Invalid URL pattern "${pattern}": ${message}`, 'INVALID_PATTERN', { pattern })
    }
  })
}

export function createCrawlAction(deps: CrawlDeps): CrawlAction {
  return new CrawlAction(deps)
}
