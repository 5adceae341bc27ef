/**
 * Tests for WorkerPoolImpl
 *
 * Uses an in-memory database with the real queue and store. Most cases drive
 * the pool one message at a time through processNext().
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { RetryableError, TerminalError } from '../../../core/errors.js'
import { createJobStore } from '../../job-store/job-store-impl.js'
import type { JobStore } from '../../job-store/job-store.js'
import { createDurableQueue } from '../../queue/durable-queue-impl.js'
import type { DurableQueue } from '../../queue/durable-queue.js'
import { HandlerRegistry, Outcome } from '../handler-registry.js'
import type { HandlerContext } from '../handler-registry.js'
import { WorkerPoolImpl } from '../worker-pool-impl.js'
import { openMemoryDb } from '../../../../test/helpers/db.js'
import { ManualClock } from '../../../../test/helpers/clock.js'
import { addPage, createTree } from '../../../../test/helpers/jobs.js'
import { waitUntil } from '../../../../test/helpers/poll.js'

describe('WorkerPoolImpl', () => {
  let db: BetterSqlite3Database
  let clock: ManualClock
  let store: JobStore
  let queue: DurableQueue
  let pool: WorkerPoolImpl
  let onIdleAncestor: ReturnType<typeof vi.fn>

  beforeEach(() => {
    db = openMemoryDb()
    clock = new ManualClock()
    store = createJobStore(db, { clock })
    queue = createDurableQueue(db, { leaseMs: 30_000, maxReceives: 2 }, clock)
    onIdleAncestor = vi.fn()
    pool = new WorkerPoolImpl({
      queue,
      store,
      clock,
      onIdleAncestor,
      random: () => 0.5,
      options: { pollIntervalMs: 5, retryBaseMs: 100, retryMaxMs: 1_000 },
    })
  })

  afterEach(async () => {
    await pool.stop(50)
    db.close()
  })

  function pageJob(id = 'p1'): string {
    const { step } = createTree(store)
    addPage(store, step.id, id)
    return id
  }

  function enqueuePage(jobId: string): void {
    queue.enqueue({ type: 'crawl_page', jobId, payload: {} })
  }

  // -------------------------------------------------------------------------
  // Registration
  // -------------------------------------------------------------------------

  it('rejects a second handler for the same message type', () => {
    pool.registerHandler('crawl_page', async () => Outcome.completed())
    expect(() => pool.registerHandler('crawl_page', async () => Outcome.completed())).toThrow(
      'Handler for message type "crawl_page" is already registered',
    )
  })

  it('returns false when nothing is visible', async () => {
    expect(await pool.processNext()).toBe(false)
  })

  // -------------------------------------------------------------------------
  // Claiming and outcomes
  // -------------------------------------------------------------------------

  it('claims the job, runs the handler and records the result', async () => {
    const seen: string[] = []
    pool.registerHandler('crawl_page', async (ctx) => {
      seen.push(ctx.job?.state.status ?? 'none')
      return Outcome.completed({ links: 2 }, 2)
    })
    enqueuePage(pageJob())

    expect(await pool.processNext()).toBe(true)

    expect(seen).toEqual(['running'])
    const job = store.requireJob('p1')
    expect(job.state.status).toBe('completed')
    expect(job.state.result).toEqual({ links: 2 })
    expect(job.state.resultCount).toBe(2)
    expect(queue.listMessages()).toEqual([])
  })

  it('drops messages whose job no longer exists', async () => {
    const handler = vi.fn(async () => Outcome.completed())
    pool.registerHandler('crawl_page', handler)
    enqueuePage('ghost')

    await pool.processNext()

    expect(handler).not.toHaveBeenCalled()
    expect(queue.listMessages()).toEqual([])
  })

  it('drops redelivered messages whose job is already terminal', async () => {
    const handler = vi.fn(async () => Outcome.completed())
    pool.registerHandler('crawl_page', handler)
    const id = pageJob()
    store.updateStatus(id, 'running')
    store.updateStatus(id, 'completed')
    enqueuePage(id)

    await pool.processNext()

    expect(handler).not.toHaveBeenCalled()
    expect(queue.listMessages()).toEqual([])
  })

  it('leaves the job running on a waiting outcome', async () => {
    pool.registerHandler('crawl_page', async () => Outcome.waiting())
    enqueuePage(pageJob())

    await pool.processNext()

    expect(store.requireJob('p1').state.status).toBe('running')
    expect(queue.listMessages()).toEqual([])
  })

  it('reschedules the message with a new payload on a requeue outcome', async () => {
    pool.registerHandler('crawl_page', async () => Outcome.requeue(250, { checks: 1 }))
    enqueuePage(pageJob())

    await pool.processNext()

    const [message] = queue.listMessages()
    expect(message?.payload).toEqual({ checks: 1 })
    expect(message?.visibleAt).toBe(clock.now() + 250)
    expect(message?.receiveCount).toBe(0)
    expect(store.requireJob('p1').state.status).toBe('running')
  })

  it('fails the job on a failed outcome without retrying', async () => {
    pool.registerHandler('crawl_page', async () => Outcome.failed(new Error('404 from origin'), 'FETCH_FAILED'))
    enqueuePage(pageJob())

    await pool.processNext()

    const job = store.requireJob('p1')
    expect(job.state.status).toBe('failed')
    expect(job.state.error).toBe('404 from origin')
    expect(job.state.errorCode).toBe('FETCH_FAILED')
    expect(queue.listMessages()).toEqual([])
  })

  it('does not claim the job for control handlers', async () => {
    let received: HandlerContext | undefined
    pool.registerHandler(
      'completion_probe',
      async (ctx) => {
        received = ctx
        return Outcome.completed()
      },
      { lifecycle: 'control' },
    )
    const { step } = createTree(store)
    queue.enqueue({ type: 'completion_probe', jobId: step.id })

    await pool.processNext()

    expect(received?.job?.id).toBe(step.id)
    expect(store.requireJob(step.id).state.status).toBe('pending')
  })

  // -------------------------------------------------------------------------
  // Errors
  // -------------------------------------------------------------------------

  it('releases retryable failures with backoff and keeps the job running', async () => {
    pool.registerHandler('crawl_page', async () => {
      throw new RetryableError('connection reset')
    })
    enqueuePage(pageJob())

    await pool.processNext()

    const [message] = queue.listMessages()
    expect(message?.receiveCount).toBe(1)
    expect(message?.visibleAt).toBe(clock.now() + 100)
    expect(store.requireJob('p1').state.status).toBe('running')
    expect(store.getLogs('p1').map((l) => l.message)).toEqual([
      'Attempt 1 failed: connection reset; retrying in 100ms',
    ])
  })

  it('fails the job immediately on a terminal error and reports it settled', async () => {
    const onSettled = vi.fn()
    pool.registerHandler(
      'crawl_page',
      async () => {
        throw new TerminalError('robots.txt disallows this page', 'DISALLOWED')
      },
      { onSettled },
    )
    enqueuePage(pageJob())

    await pool.processNext()

    const job = store.requireJob('p1')
    expect(job.state.status).toBe('failed')
    expect(job.state.errorCode).toBe('DISALLOWED')
    expect(onSettled).toHaveBeenCalledTimes(1)
    expect(queue.listMessages()).toEqual([])
  })

  it('rolls back a completion whose onSettled throws and redelivers the message', async () => {
    let settles = 0
    pool.registerHandler('crawl_page', async () => Outcome.completed({ ok: true }), {
      onSettled: () => {
        settles++
        if (settles === 1) throw new Error('next phase could not be enqueued')
      },
    })
    enqueuePage(pageJob())

    await pool.processNext()

    expect(store.requireJob('p1').state.status).toBe('running')
    const [message] = queue.listMessages()
    expect(message?.receiveCount).toBe(1)
    expect(message?.visibleAt).toBe(clock.now() + 100)

    clock.advance(100)
    await pool.processNext()

    expect(settles).toBe(2)
    expect(store.requireJob('p1').state).toMatchObject({ status: 'completed', result: { ok: true } })
    expect(queue.listMessages()).toEqual([])
  })

  it('keeps the message when recording a terminal failure throws', async () => {
    pool.registerHandler(
      'crawl_page',
      async () => {
        throw new TerminalError('robots.txt disallows this page', 'DISALLOWED')
      },
      {
        onSettled: () => {
          throw new Error('next phase could not be enqueued')
        },
      },
    )
    enqueuePage(pageJob())

    await pool.processNext()

    expect(store.requireJob('p1').state.status).toBe('running')
    const [message] = queue.listMessages()
    expect(message?.receiveCount).toBe(1)
    expect(message?.visibleAt).toBe(clock.now() + 100)
  })

  it('fails the job with DEAD_LETTERED once redeliveries are exhausted', async () => {
    pool.registerHandler('crawl_page', async () => {
      throw new Error('flaky upstream')
    })
    enqueuePage(pageJob())

    await pool.processNext()
    clock.advance(1_000)
    await pool.processNext()
    clock.advance(1_000)
    await pool.processNext()

    const job = store.requireJob('p1')
    expect(job.state.status).toBe('failed')
    expect(job.state.errorCode).toBe('DEAD_LETTERED')
    expect(job.state.error).toBe('Message dead-lettered after 2 deliveries: flaky upstream')
    expect(queue.listDeadLetters()).toHaveLength(1)
  })

  it('hands dead letters to onDeadLetter when one is registered', async () => {
    const onDeadLetter = vi.fn()
    pool.registerHandler(
      'completion_probe',
      async () => {
        throw new Error('database busy')
      },
      { lifecycle: 'control', onDeadLetter },
    )
    const { step } = createTree(store)
    queue.enqueue({ type: 'completion_probe', jobId: step.id })

    for (let i = 0; i < 3; i++) {
      await pool.processNext()
      clock.advance(1_000)
    }

    expect(onDeadLetter).toHaveBeenCalledTimes(1)
    expect(onDeadLetter.mock.calls[0]?.[0]).toMatchObject({ jobId: step.id, exhausted: true })
    expect(store.requireJob(step.id).state.status).toBe('pending')
  })

  it('fails a job with TIMEOUT when its handler overruns', async () => {
    pool.registerHandler('crawl_page', () => new Promise(() => undefined), { resolveTimeoutMs: () => 20 })
    enqueuePage(pageJob())

    await pool.processNext()

    const job = store.requireJob('p1')
    expect(job.state.status).toBe('failed')
    expect(job.state.errorCode).toBe('TIMEOUT')
    expect(job.state.error).toBe('Job p1 exceeded timeout of 20ms')
  })

  it('fails jobs whose message type has no handler', async () => {
    enqueuePage(pageJob())

    await pool.processNext()

    expect(store.requireJob('p1').state.errorCode).toBe('NO_HANDLER')
  })

  it('reports awaiting ancestors left idle by a finished job', async () => {
    pool.registerHandler('crawl_page', async () => Outcome.completed())
    const { step } = createTree(store)
    store.updateStatus(step.id, 'running')
    store.setAwaitingChildren(step.id, true)
    addPage(store, step.id, 'p1')
    enqueuePage('p1')

    await pool.processNext()

    expect(onIdleAncestor).toHaveBeenCalledWith(step.id)
  })

  // -------------------------------------------------------------------------
  // Worker loops
  // -------------------------------------------------------------------------

  it('drains the queue with concurrent workers', async () => {
    const registry = new HandlerRegistry()
    registry.register('crawl_page', async () => Outcome.completed())
    pool = new WorkerPoolImpl({ queue, store, clock, registry, options: { pollIntervalMs: 5 } })
    const { step } = createTree(store)
    for (const id of ['a', 'b', 'c']) {
      addPage(store, step.id, id)
      enqueuePage(id)
    }

    pool.start(2)
    expect(pool.isRunning).toBe(true)
    expect(pool.getWorkers().map((w) => w.workerId)).toEqual(['worker-1', 'worker-2'])
    await waitUntil(() => store.requireJob(step.id).state.progress.completed === 3)
    await pool.stop()

    expect(pool.isRunning).toBe(false)
    expect(queue.listMessages()).toEqual([])
  })

  it('reports busy workers with elapsed time from the pool clock', async () => {
    let release: () => void = () => undefined
    const gate = new Promise<void>((resolve) => {
      release = resolve
    })
    pool.registerHandler('crawl_page', async () => {
      await gate
      return Outcome.completed()
    })
    enqueuePage(pageJob())

    pool.start(1)
    await waitUntil(() => pool.activeCount === 1)
    clock.advance(5_000)

    expect(pool.getWorkers()).toEqual([
      {
        workerId: 'worker-1',
        status: 'busy',
        messageId: queue.listMessages()[0]?.id,
        messageType: 'crawl_page',
        jobId: 'p1',
        elapsedMs: 5_000,
      },
    ])

    release()
    await waitUntil(() => store.requireJob('p1').state.status === 'completed')
  })

  it('aborts stuck handlers on stop and leaves their message for redelivery', async () => {
    pool.registerHandler('crawl_page', () => new Promise(() => undefined))
    enqueuePage(pageJob())

    pool.start(1)
    await waitUntil(() => pool.activeCount === 1)
    await pool.stop(20)

    expect(pool.activeCount).toBe(0)
    expect(store.requireJob('p1').state.status).toBe('running')
    expect(queue.listMessages()).toHaveLength(1)
  })
})
