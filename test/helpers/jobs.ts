/**
 * Builders for valid job configs used across tests.
 */

import type { JobStore } from '../../src/modules/job-store/job-store.js'
import type { JobRecord } from '../../src/modules/job-store/types.js'

export function managerConfig(definitionId = 'def-1'): Record<string, unknown> {
  return {
    definition: {
      id: definitionId,
      name: 'Test definition',
      steps: [{ name: 'reindex', type: 'index' }],
    },
  }
}

export function stepConfig(index = 0): Record<string, unknown> {
  return {
    step: { name: `crawl-${index}`, type: 'crawl', config: { seeds: ['https://example.test/'] } },
    index,
  }
}

export function pageConfig(url: string, depth = 1): Record<string, unknown> {
  return { url, depth, max_depth: 1, max_pages: 50, follow_links: false }
}

export interface TestTree {
  manager: JobRecord
  step: JobRecord
}

/**
 * A manager with one step beneath it, both pending.
 */
export function createTree(store: JobStore, managerId = 'mgr-1'): TestTree {
  const manager = store.createJob({ id: managerId, type: 'manager', name: 'manager', config: managerConfig() }).job
  const step = store.createJob({
    id: `${managerId}-step`,
    parentId: manager.id,
    type: 'step',
    name: 'crawl',
    config: stepConfig(),
  }).job
  return { manager, step }
}

/**
 * Add a work job beneath `parentId`.
 */
export function addPage(store: JobStore, parentId: string, id: string): JobRecord {
  return store.createJob({
    id,
    parentId,
    type: 'crawl_page',
    name: id,
    config: pageConfig(`https://example.test/${id}`),
  }).job
}
