/**
 * Tests for the inline step actions: notify, index rebuild and the
 * maintenance purges.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { createEventBus } from '../../../core/event-bus.js'
import { createJobStore } from '../../job-store/job-store-impl.js'
import type { JobStore } from '../../job-store/job-store.js'
import { createDurableQueue } from '../../queue/durable-queue-impl.js'
import type { DurableQueue } from '../../queue/durable-queue.js'
import { CompletionProbeImpl } from '../../completion-probe/completion-probe-impl.js'
import { ActionRegistry } from '../../executor/action-registry.js'
import { createDefinitionStore } from '../../executor/definition-store.js'
import { JobExecutorImpl } from '../../executor/job-executor-impl.js'
import { StepDefinitionSchema } from '../../executor/definition-schema.js'
import type { ActionContext } from '../../executor/action-registry.js'
import { JobLifecycle } from '../../hierarchy/job-lifecycle.js'
import { createDocumentStore } from '../../documents/document-store.js'
import { createSearchIndex } from '../../documents/search-index.js'
import { NotifyAction } from '../notify-action.js'
import { IndexRebuildAction } from '../index-action.js'
import { PurgeDeadLettersAction, PurgeJobsAction } from '../maintenance-actions.js'
import { openMemoryDb } from '../../../../test/helpers/db.js'
import { ManualClock } from '../../../../test/helpers/clock.js'
import { createTree, managerConfig } from '../../../../test/helpers/jobs.js'

const HOUR = 3_600_000

describe('inline actions', () => {
  let db: BetterSqlite3Database
  let clock: ManualClock
  let store: JobStore
  let queue: DurableQueue
  let logs: string[]

  beforeEach(() => {
    db = openMemoryDb()
    clock = new ManualClock()
    store = createJobStore(db, { clock })
    queue = createDurableQueue(db, { leaseMs: 1000, maxReceives: 1 }, clock)
    logs = []
  })

  afterEach(() => {
    db.close()
  })

  function context(step: unknown): ActionContext {
    const { manager, step: job } = createTree(store, `mgr-${String(logs.length)}-${String(clock.now())}`)
    return {
      step: job,
      definition: StepDefinitionSchema.parse(step),
      manager,
      signal: new AbortController().signal,
      log: (_level, message) => logs.push(message),
    }
  }

  describe('NotifyAction', () => {
    it('logs the message and publishes it on the bus', async () => {
      const bus = createEventBus()
      const onPublished = vi.fn()
      bus.on('notification:published', onPublished)
      const ctx = context({ name: 'notify', type: 'notify', config: { channel: 'ops', message: 'crawl finished' } })

      const result = await new NotifyAction(bus).run(ctx)

      expect(result).toEqual({ result: { channel: 'ops', message: 'crawl finished' }, resultCount: 1 })
      expect(logs).toEqual(['[ops] crawl finished'])
      expect(onPublished).toHaveBeenCalledWith({ jobId: ctx.step.id, channel: 'ops', message: 'crawl finished' })
    })

    it('uses the default channel', async () => {
      await new NotifyAction().run(context({ name: 'notify', type: 'notify', config: { message: 'hi' } }))
      expect(logs).toEqual(['[default] hi'])
    })

    it('rejects a step of another type', async () => {
      const ctx = context({ name: 'reindex', type: 'index' })
      await expect(new NotifyAction().run(ctx)).rejects.toMatchObject({ code: 'INVALID_STEP' })
    })
  })

  describe('IndexRebuildAction', () => {
    it('rebuilds the index from every stored document', async () => {
      const documents = createDocumentStore(db, clock)
      documents.save({ url: 'https://site.test/a', title: 'A', content: 'queues and leases' })
      documents.save({ url: 'https://site.test/b', title: 'B', content: 'workers' })
      const searchIndex = createSearchIndex(db)

      const result = await new IndexRebuildAction(searchIndex).run(context({ name: 'reindex', type: 'index' }))

      expect(result).toEqual({ result: { indexed: 2 }, resultCount: 2 })
      expect(logs).toEqual(['Indexed 2 document(s)'])
      expect(searchIndex.search('leases').map((hit) => hit.title)).toEqual(['A'])
    })
  })

  describe('maintenance', () => {
    function lifecycle(): JobLifecycle {
      const probe = new CompletionProbeImpl({ store, queue, clock })
      const executor = new JobExecutorImpl({
        store,
        queue,
        definitions: createDefinitionStore(db, clock),
        actions: new ActionRegistry(),
        probe,
        clock,
      })
      return new JobLifecycle({ store, queue, executor, clock })
    }

    function finishedRoot(id: string): void {
      store.createJob({ id, type: 'manager', name: id, config: managerConfig() })
      store.updateStatus(id, 'running')
      store.updateStatus(id, 'completed')
    }

    it('purges finished job trees older than the cutoff', async () => {
      finishedRoot('old')
      clock.advance(3 * HOUR)
      const action = new PurgeJobsAction(lifecycle())
      const step = { name: 'purge', type: 'maintenance', action: 'purge_jobs', config: { older_than_hours: 2 } }

      const dry = await action.run(context({ ...step, config: { older_than_hours: 2, dry_run: true } }))
      expect(dry).toEqual({ result: { dry_run: true, job_ids: ['old'], deleted_jobs: 0 }, resultCount: 1 })
      expect(store.getJob('old')).toBeDefined()

      const real = await action.run(context(step))
      expect(real).toEqual({ result: { dry_run: false, job_ids: ['old'], deleted_jobs: 1 }, resultCount: 1 })
      expect(store.getJob('old')).toBeUndefined()
      expect(logs).toEqual(['Dry run: 1 job tree(s) would be purged', 'Purged 1 job tree(s) (1 job(s))'])
    })

    it('purges dead letters older than the cutoff', async () => {
      queue.enqueue({ type: 'crawl_page', jobId: null })
      queue.receive()
      clock.advance(1000)
      const dead = queue.receive()
      clock.advance(2 * HOUR)
      const action = new PurgeDeadLettersAction(queue)
      const step = { name: 'purge', type: 'maintenance', action: 'purge_dead_letters', config: { older_than_hours: 1 } }

      const result = await action.run(context(step))

      expect(result).toEqual({ result: { dry_run: false, ids: [dead?.id] }, resultCount: 1 })
      expect(queue.listDeadLetters()).toEqual([])
      expect(logs).toEqual(['Purged 1 dead letter(s)'])
    })
  })
})
