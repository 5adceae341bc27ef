/**
 * Hierarchy module: public API exports.
 */

export { JobHierarchy } from './job-hierarchy.js'
export type { ChildStats, GroupedJob, JobTreeNode, ListGroupedResult } from './job-hierarchy.js'
export { JobLifecycle, createJobLifecycle } from './job-lifecycle.js'
export type { CleanupOptions, CleanupReport, JobLifecycleDeps } from './job-lifecycle.js'
