/**
 * End-to-end: a crawl then index workflow with a notify post-job, driven
 * through the fully wired runtime on an in-memory database.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { TerminalError } from '../../src/core/errors.js'
import { createRuntime } from '../../src/core/runtime-impl.js'
import type { Runtime } from '../../src/core/runtime.js'
import { DEFAULT_CONFIG } from '../../src/modules/config/defaults.js'
import type { ConveyorConfig } from '../../src/modules/config/config-schema.js'
import type { FetchedPage, PageFetcher } from '../../src/modules/actions/page-fetcher.js'
import { deriveId } from '../../src/utils/helpers.js'
import { ManualClock } from '../helpers/clock.js'
import { drain } from '../helpers/drain.js'

const SITE: Record<string, string[]> = {
  'https://alpha.test/': ['https://alpha.test/guide', 'https://beta.test/'],
  'https://beta.test/': ['https://beta.test/faq'],
  'https://gamma.test/': [],
  'https://alpha.test/guide': ['https://alpha.test/deeper'],
  'https://beta.test/faq': [],
}

class SiteFetcher implements PageFetcher {
  readonly fetched: string[] = []

  async fetch(url: string): Promise<FetchedPage> {
    this.fetched.push(url)
    const links = SITE[url]
    if (links === undefined) {
      throw new TerminalError(`Fetching ${url} returned 404`, 'FETCH_FAILED')
    }
    return { url, status: 200, title: `Page ${url}`, content: `Conveyor handbook section for ${url}`, links }
  }
}

const config: ConveyorConfig = {
  ...DEFAULT_CONFIG,
  database: { path: ':memory:' },
  llm: { ...DEFAULT_CONFIG.llm, provider: 'none' },
}

describe('crawl, index and notify', () => {
  let runtime: Runtime
  let clock: ManualClock
  let fetcher: SiteFetcher

  beforeEach(async () => {
    clock = new ManualClock()
    fetcher = new SiteFetcher()
    runtime = await createRuntime({ config, fetcher, clock, random: () => 0.5 })
  })

  afterEach(async () => {
    await runtime.shutdown()
  })

  it('runs the workflow to completion and fires the post-job once', async () => {
    const published: string[] = []
    runtime.eventBus.on('notification:published', ({ message }) => {
      published.push(message)
    })

    runtime.definitions.save({
      id: 'notify',
      name: 'Announce',
      steps: [{ name: 'announce', type: 'notify', config: { channel: 'ops', message: 'handbook indexed' } }],
    })
    const { managerId, stepIds } = runtime.executor.execute({
      id: 'handbook',
      name: 'Crawl and index the handbook',
      post_jobs: ['notify'],
      steps: [
        {
          name: 'crawl',
          type: 'crawl',
          config: {
            seeds: ['https://alpha.test/', 'https://beta.test/', 'https://gamma.test/'],
            max_depth: 1,
          },
        },
        { name: 'index', type: 'index' },
      ],
    })

    await drain(runtime.pool, runtime.queue, clock)

    const manager = runtime.store.requireJob(managerId)
    expect(manager.state.status).toBe('completed')
    expect(manager.state.progress.total).toBeGreaterThanOrEqual(3)
    expect(manager.state.progress).toMatchObject({ total: 7, completed: 7, pending: 0, running: 0 })

    const steps = runtime.store.listChildren(managerId)
    expect(steps.map((step) => [step.type, step.name, step.state.status])).toEqual([
      ['step', 'crawl', 'completed'],
      ['step', 'index', 'completed'],
    ])
    expect(steps.map((step) => step.id)).toEqual(stepIds)

    const [crawlStepId, indexStepId] = stepIds
    if (crawlStepId === undefined || indexStepId === undefined) throw new Error('expected two steps')
    const pages = runtime.store.listChildren(crawlStepId)
    expect(pages.length).toBeGreaterThanOrEqual(3)
    expect(pages.every((page) => page.type === 'crawl_page' && page.state.status === 'completed')).toBe(true)
    expect(pages.map((page) => page.config)).toEqual(
      expect.arrayContaining([
        expect.objectContaining({ url: 'https://alpha.test/guide', depth: 1 }),
        expect.objectContaining({ url: 'https://beta.test/faq', depth: 1 }),
      ]),
    )
    expect(fetcher.fetched).not.toContain('https://alpha.test/deeper')

    const crawlStep = runtime.store.requireJob(crawlStepId)
    expect(crawlStep.state.progress.total).toBeGreaterThanOrEqual(3)
    expect(crawlStep.state.progress).toMatchObject({ total: 5, completed: 5, failed: 0 })

    expect(runtime.documents.count()).toBe(5)
    expect(runtime.store.requireJob(indexStepId).state.result).toEqual({ indexed: 5 })
    expect(runtime.searchIndex.search('handbook').length).toBe(5)

    const roots = runtime.store.listJobs({ parentId: 'root' }).jobs
    expect(roots.filter((job) => job.definitionId === 'handbook')).toHaveLength(1)
    const postJobs = roots.filter((job) => job.definitionId === 'notify')
    expect(postJobs).toHaveLength(1)
    expect(postJobs[0]?.id).toBe(deriveId(managerId, 'post:notify'))
    expect(postJobs[0]?.state.status).toBe('completed')
    expect(published).toEqual(['handbook indexed'])
  })

  it('does not fire the post-job twice when the manager is advanced again', async () => {
    runtime.definitions.save({
      id: 'notify',
      name: 'Announce',
      steps: [{ name: 'announce', type: 'notify', config: { message: 'done' } }],
    })
    const { managerId } = runtime.executor.execute({
      id: 'small',
      name: 'Single page',
      post_jobs: ['notify'],
      steps: [{ name: 'crawl', type: 'crawl', config: { seeds: ['https://gamma.test/'] } }],
    })

    await drain(runtime.pool, runtime.queue, clock)
    runtime.executor.advance(managerId)
    await drain(runtime.pool, runtime.queue, clock)

    const postJobs = runtime.store.listJobs({ parentId: 'root' }).jobs.filter((job) => job.definitionId === 'notify')
    expect(postJobs).toHaveLength(1)
  })
})
