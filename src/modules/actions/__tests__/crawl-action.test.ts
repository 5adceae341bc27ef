/**
 * Tests for CrawlAction and the crawl_page handler.
 *
 * Pages come from an in-memory fetcher; page jobs run through a real worker
 * pool one message at a time.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { TerminalError } from '../../../core/errors.js'
import { deriveId } from '../../../utils/helpers.js'
import { createJobStore } from '../../job-store/job-store-impl.js'
import type { JobStore } from '../../job-store/job-store.js'
import type { JobRecord } from '../../job-store/types.js'
import { createDurableQueue } from '../../queue/durable-queue-impl.js'
import type { DurableQueue } from '../../queue/durable-queue.js'
import { HandlerRegistry } from '../../worker-pool/handler-registry.js'
import { WorkerPoolImpl } from '../../worker-pool/worker-pool-impl.js'
import { StepDefinitionSchema } from '../../executor/definition-schema.js'
import type { ActionContext } from '../../executor/action-registry.js'
import { createDocumentStore } from '../../documents/document-store.js'
import type { DocumentStore } from '../../documents/document-store.js'
import { CRAWL_PAGE_MESSAGE_TYPE, CrawlAction } from '../crawl-action.js'
import type { FetchedPage, PageFetcher } from '../page-fetcher.js'
import { openMemoryDb } from '../../../../test/helpers/db.js'
import { ManualClock } from '../../../../test/helpers/clock.js'
import { managerConfig } from '../../../../test/helpers/jobs.js'
import { drain } from '../../../../test/helpers/drain.js'
import { failDeleteOnce, failEnqueueOnce } from '../../../../test/helpers/faults.js'

class FakeFetcher implements PageFetcher {
  readonly fetched: string[] = []

  constructor(private readonly _links: Record<string, string[]>) {}

  async fetch(url: string): Promise<FetchedPage> {
    this.fetched.push(url)
    const links = this._links[url]
    if (links === undefined) {
      throw new TerminalError(`Fetching ${url} returned 404`, 'FETCH_FAILED')
    }
    return { url, status: 200, title: `Title of ${url}`, content: `Body of ${url}`, links }
  }
}

describe('CrawlAction', () => {
  let db: BetterSqlite3Database
  let store: JobStore
  let queue: DurableQueue
  let documents: DocumentStore
  let pool: WorkerPoolImpl
  let clock: ManualClock

  beforeEach(() => {
    db = openMemoryDb()
    clock = new ManualClock()
    store = createJobStore(db, { clock })
    queue = createDurableQueue(db, { leaseMs: 30_000, maxReceives: 3 }, clock)
    documents = createDocumentStore(db, clock)
  })

  afterEach(() => {
    db.close()
  })

  function setup(links: Record<string, string[]>): { crawl: CrawlAction; fetcher: FakeFetcher } {
    const fetcher = new FakeFetcher(links)
    const crawl = new CrawlAction({ store, queue, documents, fetcher })
    const registry = new HandlerRegistry()
    crawl.register(registry)
    pool = new WorkerPoolImpl({ queue, store, registry, clock })
    return { crawl, fetcher }
  }

  /** A running crawl step and the context its action runs with */
  function crawlContext(config: Record<string, unknown>): ActionContext {
    const definition = StepDefinitionSchema.parse({ name: 'crawl', type: 'crawl', config })
    const manager = store.createJob({ id: 'mgr', type: 'manager', name: 'mgr', config: managerConfig() }).job
    store.updateStatus(manager.id, 'running')
    store.createJob({ id: 'step', parentId: manager.id, type: 'step', name: 'crawl', config: { step: definition, index: 0 } })
    const step: JobRecord = store.updateStatus('step', 'running').job
    return { step, definition, manager, signal: new AbortController().signal, log: () => undefined }
  }

  async function processAll(): Promise<void> {
    while (await pool.processNext()) {
      // keep going until the queue has nothing visible
    }
  }

  it('enqueues one page job per seed', async () => {
    const { crawl } = setup({})
    const ctx = crawlContext({ seeds: ['https://site.test/', 'https://site.test/docs'] })

    const result = await crawl.run(ctx)

    expect(result).toEqual({ resultCount: 2 })
    const pages = store.listChildren('step')
    expect(pages.map((p) => p.id)).toEqual([
      deriveId('step', 'page:https://site.test/'),
      deriveId('step', 'page:https://site.test/docs'),
    ])
    expect(pages[0]?.config).toMatchObject({ url: 'https://site.test/', depth: 0, max_depth: 1 })
    expect(queue.listMessages('crawl_page')).toHaveLength(2)
  })

  it('follows links down to max_depth and crawls each URL once', async () => {
    const { crawl, fetcher } = setup({
      'https://site.test/': ['https://site.test/docs', 'https://site.test/about'],
      'https://site.test/docs': ['https://site.test/deep', 'https://site.test/'],
      'https://site.test/about': ['https://site.test/deeper'],
      'https://site.test/deep': [],
    })
    await crawl.run(crawlContext({ seeds: ['https://site.test/', 'https://site.test/docs'], max_depth: 1 }))

    await processAll()

    expect([...fetcher.fetched].sort()).toEqual([
      'https://site.test/',
      'https://site.test/about',
      'https://site.test/deep',
      'https://site.test/docs',
    ])
    expect(documents.count()).toBe(4)
    const step = store.requireJob('step')
    expect(step.state.progress).toMatchObject({ total: 4, completed: 4 })
    expect(store.listChildren('step').every((page) => page.parentId === 'step')).toBe(true)
  })

  it('records the crawl result on each page job', async () => {
    const { crawl } = setup({ 'https://site.test/': ['https://site.test/a'], 'https://site.test/a': [] })
    await crawl.run(crawlContext({ seeds: ['https://site.test/'] }))

    await processAll()

    const seed = store.requireJob(deriveId('step', 'page:https://site.test/'))
    expect(seed.state.resultCount).toBe(1)
    expect(seed.state.result).toMatchObject({ url: 'https://site.test/', links: 1, discovered: 1 })
    const child = store.requireJob(deriveId('step', 'page:https://site.test/a'))
    expect(child.config).toMatchObject({ depth: 1 })
  })

  it('filters discovered links by include and exclude patterns', async () => {
    const { crawl, fetcher } = setup({
      'https://site.test/': ['https://site.test/docs/a', 'https://site.test/docs/private', 'https://site.test/blog'],
      'https://site.test/docs/a': [],
    })
    await crawl.run(
      crawlContext({ seeds: ['https://site.test/'], include_patterns: ['/docs/'], exclude_patterns: ['private'] }),
    )

    await processAll()

    expect(fetcher.fetched).toEqual(['https://site.test/', 'https://site.test/docs/a'])
  })

  it('stops enqueueing at max_pages', async () => {
    const { crawl, fetcher } = setup({
      'https://site.test/': ['https://site.test/1', 'https://site.test/2', 'https://site.test/3'],
      'https://site.test/1': [],
    })
    await crawl.run(crawlContext({ seeds: ['https://site.test/'], max_pages: 2 }))

    await processAll()

    expect(fetcher.fetched).toEqual(['https://site.test/', 'https://site.test/1'])
    const seedId = deriveId('step', 'page:https://site.test/')
    expect(store.getLogs(seedId).map((entry) => entry.message)).toContain(
      'Reached max pages limit (2), skipping 2 remaining link(s)',
    )
  })

  it('does not follow links when follow_links is off', async () => {
    const { crawl, fetcher } = setup({ 'https://site.test/': ['https://site.test/a'] })
    await crawl.run(crawlContext({ seeds: ['https://site.test/'], follow_links: false }))

    await processAll()

    expect(fetcher.fetched).toEqual(['https://site.test/'])
  })

  it('fails a page job whose fetch fails terminally', async () => {
    const { crawl } = setup({})
    await crawl.run(crawlContext({ seeds: ['https://site.test/missing'] }))

    await processAll()

    const page = store.requireJob(deriveId('step', 'page:https://site.test/missing'))
    expect(page.state.status).toBe('failed')
    expect(page.state.errorCode).toBe('FETCH_FAILED')
    expect(store.requireJob('step').state.progress.failed).toBe(1)
  })

  it('rolls back a discovered link whose enqueue fails and spawns it on redelivery', async () => {
    const { crawl, fetcher } = setup({ 'https://site.test/': ['https://site.test/a'], 'https://site.test/a': [] })
    await crawl.run(crawlContext({ seeds: ['https://site.test/'] }))
    failEnqueueOnce(queue, (message) => message.type === CRAWL_PAGE_MESSAGE_TYPE)

    await drain(pool, queue, clock)

    expect(fetcher.fetched).toEqual(['https://site.test/', 'https://site.test/', 'https://site.test/a'])
    const child = store.requireJob(deriveId('step', 'page:https://site.test/a'))
    expect(child.state.status).toBe('completed')
    expect(documents.count()).toBe(2)
    expect(store.requireJob('step').state.progress).toMatchObject({ total: 2, completed: 2 })
  })

  it('creates each child once when a page message is handled twice', async () => {
    const { crawl, fetcher } = setup({
      'https://site.test/': ['https://site.test/a', 'https://site.test/b'],
      'https://site.test/a': [],
      'https://site.test/b': [],
    })
    await crawl.run(crawlContext({ seeds: ['https://site.test/'] }))
    const seedId = deriveId('step', 'page:https://site.test/')
    failDeleteOnce(queue, CRAWL_PAGE_MESSAGE_TYPE, seedId)

    await drain(pool, queue, clock)

    expect(fetcher.fetched.filter((url) => url === 'https://site.test/')).toHaveLength(2)
    expect(
      store
        .listChildren('step')
        .map((page) => page.id)
        .sort(),
    ).toEqual(
      [seedId, deriveId('step', 'page:https://site.test/a'), deriveId('step', 'page:https://site.test/b')].sort(),
    )
    expect(store.requireJob('step').state.progress).toMatchObject({ total: 3, completed: 3, running: 0, pending: 0 })
    expect(store.requireJob(seedId).state.result).toMatchObject({ links: 2, discovered: 0 })
    expect(documents.count()).toBe(3)
  })

  it('rejects an invalid URL pattern before enqueueing anything', async () => {
    const { crawl } = setup({})
    const ctx = crawlContext({ seeds: ['https://site.test/'], include_patterns: ['(unclosed'] })

    await expect(crawl.run(ctx)).rejects.toMatchObject({ code: 'INVALID_PATTERN' })
    expect(store.listChildren('step')).toEqual([])
  })
})
