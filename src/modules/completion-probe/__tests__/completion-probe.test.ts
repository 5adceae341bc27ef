/**
 * Tests for CompletionProbeImpl
 *
 * Probe messages are driven through a real worker pool one visit at a time,
 * with a manual clock controlling visibility and the staleness gap.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { createEventBus } from '../../../core/event-bus.js'
import type { TypedEventBus } from '../../../core/event-bus.js'
import { createJobStore } from '../../job-store/job-store-impl.js'
import type { JobStore } from '../../job-store/job-store.js'
import type { JobRecord } from '../../job-store/types.js'
import { createDurableQueue } from '../../queue/durable-queue-impl.js'
import type { DurableQueue, LeasedMessage } from '../../queue/durable-queue.js'
import { HandlerRegistry } from '../../worker-pool/handler-registry.js'
import { WorkerPoolImpl } from '../../worker-pool/worker-pool-impl.js'
import { CompletionProbeImpl } from '../completion-probe-impl.js'
import type { CompletionProbeOptions, ProbeDelegate } from '../completion-probe.js'
import { openMemoryDb } from '../../../../test/helpers/db.js'
import { ManualClock } from '../../../../test/helpers/clock.js'
import { addPage, createTree } from '../../../../test/helpers/jobs.js'

describe('CompletionProbe', () => {
  let db: BetterSqlite3Database
  let clock: ManualClock
  let bus: TypedEventBus
  let store: JobStore
  let queue: DurableQueue
  let probe: CompletionProbeImpl
  let pool: WorkerPoolImpl
  let step: JobRecord
  let t0: number

  function setup(options: Partial<CompletionProbeOptions> = {}, delegate?: ProbeDelegate): void {
    const registry = new HandlerRegistry()
    probe = new CompletionProbeImpl({
      store,
      queue,
      clock,
      eventBus: bus,
      options: { initialDelayMs: 500, stalenessMs: 2_000, rescheduleDelayMs: 1_000, safetyRecheckMs: 30_000, ...options },
      ...(delegate === undefined ? {} : { delegate }),
    })
    probe.register(registry)
    pool = new WorkerPoolImpl({ queue, store, clock, registry, onIdleAncestor: (id) => probe.schedule(id) })
  }

  /** A running fan-out step awaiting its children */
  function startFanOut(): void {
    step = createTree(store).step
    store.updateStatus(step.id, 'running')
    store.setAwaitingChildren(step.id, true)
  }

  /** Run a work job to `status`, scheduling probes for ancestors it leaves idle */
  function finishPage(id: string, status: 'completed' | 'failed' = 'completed'): void {
    store.updateStatus(id, 'running')
    const { idleAncestors } = store.updateStatus(id, status)
    for (const ancestorId of idleAncestors) probe.schedule(ancestorId)
  }

  function stepStatus(): string {
    return store.requireJob(step.id).state.status
  }

  beforeEach(() => {
    db = openMemoryDb()
    clock = new ManualClock()
    t0 = clock.now()
    bus = createEventBus()
    store = createJobStore(db, { clock, eventBus: bus })
    queue = createDurableQueue(db, { leaseMs: 30_000, maxReceives: 3 }, clock)
    setup()
  })

  afterEach(() => {
    db.close()
  })

  // -------------------------------------------------------------------------
  // Two-observation confirmation
  // -------------------------------------------------------------------------

  it('completes a subtree after two zero observations a staleness gap apart', async () => {
    const completed = vi.fn()
    bus.on('job:completed', completed)
    startFanOut()
    addPage(store, step.id, 'p1')
    finishPage('p1')

    clock.advance(500)
    await pool.processNext()
    expect(stepStatus()).toBe('running')
    const [message] = queue.listMessages('completion_probe')
    expect(message?.payload).toEqual({ first_scheduled_at: t0, zero_observed_at: t0 + 500 })
    expect(message?.visibleAt).toBe(t0 + 2_500)

    clock.advance(2_000)
    await pool.processNext()
    expect(stepStatus()).toBe('completed')
    expect(completed).toHaveBeenCalledWith({ jobId: step.id, possiblyIncomplete: false })
    expect(queue.listMessages()).toEqual([])
  })

  it('resets the observation when the subtree saw activity in the gap', async () => {
    const rescheduled = vi.fn()
    bus.on('probe:rescheduled', rescheduled)
    startFanOut()
    addPage(store, step.id, 'p1')
    finishPage('p1')
    clock.advance(500)
    await pool.processNext()

    clock.advance(1_000)
    store.heartbeat(step.id)
    clock.advance(1_000)
    await pool.processNext()

    expect(stepStatus()).toBe('running')
    const [message] = queue.listMessages('completion_probe')
    expect(message?.payload['zero_observed_at']).toBe(t0 + 2_500)
    expect(message?.visibleAt).toBe(t0 + 4_500)
    expect(rescheduled).toHaveBeenLastCalledWith({ jobId: step.id, reason: 'heartbeat', delayMs: 2_000 })

    clock.advance(2_000)
    await pool.processNext()
    expect(stepStatus()).toBe('completed')
  })

  it('waits out the rest of the gap when a new child pulls the probe forward', async () => {
    startFanOut()
    addPage(store, step.id, 'p1')
    finishPage('p1')
    clock.advance(500)
    await pool.processNext()

    // a sibling discovered and finished during the gap
    clock.advance(100)
    addPage(store, step.id, 'p2')
    finishPage('p2')
    expect(queue.listMessages('completion_probe')).toHaveLength(1)
    expect(queue.nextVisibleAt()).toBe(t0 + 1_100)

    clock.advance(500)
    await pool.processNext()
    expect(queue.nextVisibleAt()).toBe(t0 + 2_500)

    clock.advance(1_400)
    await pool.processNext()
    expect(stepStatus()).toBe('running')

    clock.advance(2_000)
    await pool.processNext()
    expect(stepStatus()).toBe('completed')
    expect(store.requireJob(step.id).state.progress).toMatchObject({ total: 2, completed: 2, pending: 0, running: 0 })
  })

  it('never completes while a child is still active', async () => {
    startFanOut()
    addPage(store, step.id, 'p1')
    probe.schedule(step.id)

    clock.advance(500)
    await pool.processNext()

    expect(stepStatus()).toBe('running')
    const [message] = queue.listMessages('completion_probe')
    expect(message?.payload['zero_observed_at']).toBeNull()
    expect(message?.visibleAt).toBe(t0 + 30_500)
  })

  it('keeps one probe per job', () => {
    startFanOut()
    probe.schedule(step.id)
    probe.schedule(step.id)
    expect(queue.listMessages('completion_probe')).toHaveLength(1)
  })

  it('drops probes for jobs that are not awaiting children', async () => {
    step = createTree(store).step
    store.updateStatus(step.id, 'running')
    probe.schedule(step.id, 0)

    await pool.processNext()

    expect(stepStatus()).toBe('running')
    expect(queue.listMessages()).toEqual([])
  })

  // -------------------------------------------------------------------------
  // Delegate hooks
  // -------------------------------------------------------------------------

  it('records the verdict of the delegate and reports the settled job', async () => {
    const onSettled = vi.fn()
    setup({}, {
      decide: (job) =>
        job.state.progress.failed > 0
          ? { status: 'failed', error: '1 child job(s) failed', code: 'CHILD_FAILURES' }
          : { status: 'completed' },
      onSettled,
    })
    startFanOut()
    addPage(store, step.id, 'p1')
    finishPage('p1', 'failed')

    clock.advance(500)
    await pool.processNext()
    clock.advance(2_000)
    await pool.processNext()

    const settled = store.requireJob(step.id)
    expect(settled.state.status).toBe('failed')
    expect(settled.state.errorCode).toBe('CHILD_FAILURES')
    expect(onSettled).toHaveBeenCalledTimes(1)
    expect(onSettled.mock.calls[0]?.[0]).toMatchObject({ id: step.id })
  })

  it('fails a fan-out that outlives its timeout and cancels its children', async () => {
    const onSettled = vi.fn()
    setup({}, { timeoutMs: () => 1_000, onSettled })
    startFanOut()
    addPage(store, step.id, 'p1')
    probe.schedule(step.id, 0)

    clock.advance(1_000)
    await pool.processNext()

    const settled = store.requireJob(step.id)
    expect(settled.state.status).toBe('failed')
    expect(settled.state.errorCode).toBe('TIMEOUT')
    expect(settled.state.error).toBe(`Job ${step.id} exceeded timeout of 1000ms`)
    expect(store.requireJob('p1').state.status).toBe('cancelled')
    expect(onSettled).toHaveBeenCalledTimes(1)
  })

  // -------------------------------------------------------------------------
  // Forced completion
  // -------------------------------------------------------------------------

  it('force-completes a fan-out older than the max age', async () => {
    const completed = vi.fn()
    bus.on('job:completed', completed)
    setup({ maxAgeMs: 10_000 })
    startFanOut()
    addPage(store, step.id, 'p1')
    probe.schedule(step.id, 0)

    clock.advance(10_000)
    await pool.processNext()

    const settled = store.requireJob(step.id)
    expect(settled.state.status).toBe('completed')
    expect(settled.state.possiblyIncomplete).toBe(true)
    expect(store.requireJob('p1').state.status).toBe('cancelled')
    expect(completed).toHaveBeenCalledWith({ jobId: step.id, possiblyIncomplete: true })
    expect(store.getLogs(step.id).map((l) => l.message)).toContain(
      'Completed without confirmation (exceeded max age of 10000ms); results may be incomplete',
    )
  })

  it('force-completes the job of a dead-lettered probe', () => {
    startFanOut()
    addPage(store, step.id, 'p1')
    const message: LeasedMessage = {
      id: 'm-1',
      type: 'completion_probe',
      jobId: step.id,
      payload: {},
      receiveCount: 4,
      enqueuedAt: t0,
      lastError: 'database is locked',
      lease: { messageId: 'm-1', token: 'expired' },
      exhausted: true,
    }

    probe.onDeadLetter(message)

    const settled = store.requireJob(step.id)
    expect(settled.state.status).toBe('completed')
    expect(settled.state.possiblyIncomplete).toBe(true)
  })
})
