/**
 * Tests for JobLifecycle: cancel, rerun, copy, start, delete and cleanup.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { InvalidStateTransitionError, JobRunningError, JobValidationError } from '../../../core/errors.js'
import { createJobStore } from '../../job-store/job-store-impl.js'
import type { JobStore } from '../../job-store/job-store.js'
import { parseJobConfig } from '../../job-store/job-types.js'
import { createDurableQueue } from '../../queue/durable-queue-impl.js'
import type { DurableQueue } from '../../queue/durable-queue.js'
import { CompletionProbeImpl } from '../../completion-probe/completion-probe-impl.js'
import { ActionRegistry } from '../../executor/action-registry.js'
import { createDefinitionStore } from '../../executor/definition-store.js'
import { JobExecutorImpl } from '../../executor/job-executor-impl.js'
import { MANAGER_MESSAGE_TYPE } from '../../executor/job-executor.js'
import { JobLifecycle } from '../job-lifecycle.js'
import { openMemoryDb } from '../../../../test/helpers/db.js'
import { ManualClock } from '../../../../test/helpers/clock.js'
import { addPage, createTree, managerConfig } from '../../../../test/helpers/jobs.js'

const HOUR = 3_600_000

describe('JobLifecycle', () => {
  let db: BetterSqlite3Database
  let clock: ManualClock
  let store: JobStore
  let queue: DurableQueue
  let lifecycle: JobLifecycle
  let idle: string[]

  beforeEach(() => {
    db = openMemoryDb()
    clock = new ManualClock()
    store = createJobStore(db, { clock })
    queue = createDurableQueue(db, { leaseMs: 30_000, maxReceives: 3 }, clock)
    const probe = new CompletionProbeImpl({ store, queue, clock })
    const executor = new JobExecutorImpl({
      store,
      queue,
      definitions: createDefinitionStore(db, clock),
      actions: new ActionRegistry(),
      probe,
      clock,
    })
    idle = []
    lifecycle = new JobLifecycle({ store, queue, executor, clock, onIdleAncestor: (id) => idle.push(id) })
  })

  afterEach(() => {
    db.close()
  })

  /** A finished root manager with no children */
  function finishedRoot(id: string, status: 'completed' | 'failed' = 'completed'): void {
    store.createJob({ id, type: 'manager', name: id, config: managerConfig() })
    store.updateStatus(id, 'running')
    store.updateStatus(id, status)
  }

  // -------------------------------------------------------------------------
  // cancel
  // -------------------------------------------------------------------------

  describe('cancel', () => {
    it('cascades to every active descendant', () => {
      const { step } = createTree(store)
      addPage(store, step.id, 'p1')

      const job = lifecycle.cancel('mgr-1')

      expect(job.state.status).toBe('cancelled')
      expect(store.requireJob(step.id).state.status).toBe('cancelled')
      expect(store.requireJob('p1').state.status).toBe('cancelled')
      expect(() => lifecycle.cancel('mgr-1')).toThrow(InvalidStateTransitionError)
    })

    it('reports a fan-out parent left without active children', () => {
      const { step } = createTree(store)
      store.updateStatus(step.id, 'running')
      store.setAwaitingChildren(step.id, true)
      addPage(store, step.id, 'p1')

      lifecycle.cancel('p1')

      expect(idle).toEqual([step.id])
      expect(store.requireJob(step.id).state.status).toBe('running')
    })
  })

  // -------------------------------------------------------------------------
  // rerun / copy / start
  // -------------------------------------------------------------------------

  describe('rerun', () => {
    it('re-executes a manager as a new root with fresh steps', () => {
      finishedRoot('old', 'failed')
      const source = store.requireJob('old')

      const rerun = lifecycle.rerun('old')

      expect(rerun.id).not.toBe('old')
      expect(rerun.parentId).toBeNull()
      expect(rerun.state.status).toBe('pending')
      const config = parseJobConfig('manager', rerun.config)
      expect(config.definition).toEqual(parseJobConfig('manager', source.config).definition)
      expect(config.trigger).toBe('rerun')
      expect(config.triggered_by).toBe('old')
      expect(store.listChildren(rerun.id).map((child) => child.type)).toEqual(['step'])
      expect(queue.listMessages(MANAGER_MESSAGE_TYPE).map((m) => m.jobId)).toEqual([rerun.id])
      expect(store.requireJob('old').state.status).toBe('failed')
    })

    it('runs a finished work job again as a standalone root', () => {
      const { step } = createTree(store)
      store.updateStatus(step.id, 'running')
      addPage(store, step.id, 'p1')
      store.updateStatus('p1', 'running')
      store.updateStatus('p1', 'completed')

      const rerun = lifecycle.rerun('p1')

      expect(rerun.parentId).toBeNull()
      expect(rerun.depth).toBe(0)
      expect(rerun.type).toBe('crawl_page')
      expect(rerun.config).toEqual(store.requireJob('p1').config)
      expect(queue.listMessages('crawl_page').map((m) => m.jobId)).toEqual([rerun.id])
    })

    it('rejects a source that has not finished', () => {
      createTree(store)
      expect(() => lifecycle.rerun('mgr-1')).toThrow(InvalidStateTransitionError)
    })

    it('rejects job types that only run inside their workflow', () => {
      const { step } = createTree(store)
      lifecycle.cancel(step.id)
      expect(() => lifecycle.rerun(step.id)).toThrow(JobValidationError)
    })
  })

  describe('copy and start', () => {
    it('leaves the copy pending until it is started', () => {
      finishedRoot('old')

      const copy = lifecycle.copy('old')
      expect(copy.state.status).toBe('pending')
      expect(queue.listMessages()).toHaveLength(0)

      lifecycle.start(copy.id)
      expect(queue.listMessages(MANAGER_MESSAGE_TYPE).map((m) => m.jobId)).toEqual([copy.id])
    })

    it('refuses to start a job that is not a pending root', () => {
      finishedRoot('done')
      const { step } = createTree(store)

      expect(() => lifecycle.start('done')).toThrow(InvalidStateTransitionError)
      expect(() => lifecycle.start(step.id)).toThrow('is not a root job')
    })
  })

  // -------------------------------------------------------------------------
  // delete / cleanup
  // -------------------------------------------------------------------------

  describe('delete', () => {
    it('rejects deleting a tree with a running job', () => {
      const { step } = createTree(store)
      addPage(store, step.id, 'p1')
      store.updateStatus(step.id, 'running')
      store.updateStatus('p1', 'running')

      expect(() => lifecycle.delete('mgr-1')).toThrow(JobRunningError)
      expect(store.getJob('mgr-1')).toBeDefined()
    })

    it('deletes a finished tree with its logs', () => {
      const { step } = createTree(store)
      addPage(store, step.id, 'p1')
      store.appendLog('p1', 'info', 'fetched')
      lifecycle.cancel('mgr-1')

      expect(lifecycle.delete('mgr-1')).toBe(3)
      expect(store.getJob('mgr-1')).toBeUndefined()
      expect(store.getJob('p1')).toBeUndefined()
      expect(store.getLogs('p1')).toEqual([])
    })
  })

  describe('cleanup', () => {
    beforeEach(() => {
      finishedRoot('old')
      clock.advance(2 * HOUR)
      finishedRoot('recent', 'failed')
      clock.advance(HOUR / 2)
    })

    it('reports expired roots without deleting on a dry run', () => {
      const report = lifecycle.cleanup({ olderThanHours: 1, dryRun: true })

      expect(report).toEqual({ dryRun: true, cutoff: clock.now() - HOUR, jobIds: ['old'], deletedJobs: 0 })
      expect(store.getJob('old')).toBeDefined()
    })

    it('deletes expired roots', () => {
      const report = lifecycle.cleanup({ olderThanHours: 1 })

      expect(report.jobIds).toEqual(['old'])
      expect(report.deletedJobs).toBe(1)
      expect(store.getJob('old')).toBeUndefined()
      expect(store.getJob('recent')).toBeDefined()
    })

    it('only selects the given statuses', () => {
      expect(lifecycle.cleanup({ olderThanHours: 1, statuses: ['failed'] }).jobIds).toEqual([])
      expect(lifecycle.cleanup({ olderThanHours: 0.25, statuses: ['failed'] }).jobIds).toEqual(['recent'])
    })
  })

  it('advances the manager when one of its steps is cancelled', () => {
    const { manager, step } = createTree(store)
    store.updateStatus(manager.id, 'running')
    const advance = vi.spyOn(queue, 'enqueue')

    lifecycle.cancel(step.id)

    expect(advance).toHaveBeenCalledWith({ type: 'job_advance', jobId: manager.id }, { delayMs: 0 })
  })
})
