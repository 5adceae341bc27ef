/**
 * JobHierarchy: read views over Manager → Step → Work trees.
 */

import type { JobId } from '../../core/types.js'
import { JobNotFoundError } from '../../core/errors.js'
import type { JobStore } from '../job-store/job-store.js'
import type { ChildStatusCounts, JobProgress, JobRecord, ListJobsFilter } from '../job-store/types.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface JobTreeNode {
  job: JobRecord
  children: JobTreeNode[]
  /** Children exist below maxDepth but were not expanded */
  truncated: boolean
}

export interface ChildStats {
  jobId: JobId
  /** Direct children by status */
  children: ChildStatusCounts & { total: number }
  /** All descendants, from the job's progress counters */
  descendants: JobProgress
  /** Settled share of all descendants, 0..1; 1 when there are none */
  settledRatio: number
}

export interface GroupedJob {
  root: JobRecord
  childrenSummary: ChildStatusCounts & { total: number }
}

export interface ListGroupedResult {
  groups: GroupedJob[]
  totalCount: number
}

// ---------------------------------------------------------------------------
// JobHierarchy
// ---------------------------------------------------------------------------

export class JobHierarchy {
  constructor(private readonly _store: JobStore) {}

  /**
   * The subtree rooted at `jobId`. `maxDepth` counts levels below the root;
   * 0 returns the root alone.
   * @throws {JobNotFoundError}
   */
  getTree(jobId: JobId, maxDepth?: number): JobTreeNode {
    const root = this._store.getJob(jobId)
    if (root === undefined) {
      throw new JobNotFoundError(jobId)
    }

    const byParent = new Map<JobId, JobRecord[]>()
    for (const descendant of this._store.listDescendants(jobId)) {
      if (descendant.parentId === null) continue
      const siblings = byParent.get(descendant.parentId) ?? []
      siblings.push(descendant)
      byParent.set(descendant.parentId, siblings)
    }

    const build = (job: JobRecord, level: number): JobTreeNode => {
      const children = byParent.get(job.id) ?? []
      if (maxDepth !== undefined && level >= maxDepth) {
        return { job, children: [], truncated: children.length > 0 }
      }
      return { job, children: children.map((child) => build(child, level + 1)), truncated: false }
    }
    return build(root, 0)
  }

  /**
   * Root jobs matching `filter`, each paired with a summary of its direct children.
   */
  listGrouped(filter: Omit<ListJobsFilter, 'parentId'> = {}): ListGroupedResult {
    const { jobs, totalCount } = this._store.listJobs({ ...filter, parentId: 'root' })
    return {
      groups: jobs.map((root) => ({ root, childrenSummary: this._childSummary(root.id) })),
      totalCount,
    }
  }

  /** @throws {JobNotFoundError} */
  getChildStats(jobId: JobId): ChildStats {
    const job = this._store.requireJob(jobId)
    const { progress } = job.state
    const settled = progress.completed + progress.failed + progress.cancelled
    return {
      jobId,
      children: this._childSummary(jobId),
      descendants: { ...progress },
      settledRatio: progress.total === 0 ? 1 : settled / progress.total,
    }
  }

  private _childSummary(jobId: JobId): ChildStatusCounts & { total: number } {
    const counts = this._store.getChildStatusCounts(jobId)
    const total = counts.pending + counts.running + counts.completed + counts.failed + counts.cancelled
    return { ...counts, total }
  }
}
