/**
 * CLI output formatting utilities
 *
 * Human-readable tables and trees for jobs, definitions and queue state, and
 * the JSON envelope used by `--output-format json`.
 */

import type { JobRecord, JobLogEntry } from '../../modules/job-store/types.js'
import type { JobTreeNode } from '../../modules/hierarchy/job-hierarchy.js'
import { formatDuration } from '../../utils/helpers.js'

/**
 * Format a table from an array of row objects.
 *
 * Computes column widths from headers + data, then renders aligned columns
 * separated by ` | ` with a header separator row.
 */
export function formatTable(
  headers: string[],
  rows: Record<string, string>[],
  keys: string[]
): string {
  const widths = headers.map((header, i) => {
    const key = keys[i] ?? header
    const dataMax = rows.reduce((max, row) => {
      const val = row[key] ?? ''
      return Math.max(max, val.length)
    }, 0)
    return Math.max(header.length, dataMax)
  })

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-')
  const headerRow = headers.map((h, i) => h.padEnd(widths[i] ?? h.length)).join(' | ')

  const dataRows = rows.map((row) =>
    keys.map((key, i) => {
      const val = row[key] ?? ''
      return val.padEnd(widths[i] ?? val.length)
    }).join(' | ')
  )

  return [headerRow, separator, ...dataRows].join('\n')
}

export function formatTimestamp(ms: number | null): string {
  return ms === null ? '-' : new Date(ms).toISOString()
}

/**
 * One row per job: id, type, name, status, progress and result count.
 */
export function formatJobTable(jobs: JobRecord[]): string {
  const headers = ['ID', 'Type', 'Name', 'Status', 'Progress', 'Results', 'Created']
  const keys = ['id', 'type', 'name', 'status', 'progress', 'results', 'created']
  const rows = jobs.map((job) => ({
    id: job.id,
    type: job.type,
    name: job.name,
    status: job.state.status,
    progress: formatProgress(job),
    results: String(job.state.resultCount),
    created: formatTimestamp(job.createdAt),
  }))
  return formatTable(headers, rows, keys)
}

export function formatProgress(job: JobRecord): string {
  const { total, completed, failed, cancelled } = job.state.progress
  if (total === 0) return '-'
  const done = completed + failed + cancelled
  return failed > 0 ? `${String(done)}/${String(total)} (${String(failed)} failed)` : `${String(done)}/${String(total)}`
}

/**
 * Multi-line description of a single job.
 */
export function formatJobDetail(job: JobRecord): string {
  const lines = [
    `ID:        ${job.id}`,
    `Type:      ${job.type}`,
    `Name:      ${job.name}`,
    `Status:    ${job.state.status}${job.state.possiblyIncomplete ? ' (possibly incomplete)' : ''}`,
    `Parent:    ${job.parentId ?? '-'}`,
    `Manager:   ${job.managerId ?? '-'}`,
    `Progress:  ${formatProgress(job)}`,
    `Results:   ${String(job.state.resultCount)}`,
    `Created:   ${formatTimestamp(job.createdAt)}`,
    `Started:   ${formatTimestamp(job.state.startedAt)}`,
    `Completed: ${formatTimestamp(job.state.completedAt)}`,
  ]
  if (job.state.startedAt !== null && job.state.completedAt !== null) {
    lines.push(`Duration:  ${formatDuration(job.state.completedAt - job.state.startedAt)}`)
  }
  if (job.state.error !== null) {
    lines.push(`Error:     ${job.state.errorCode === null ? '' : `[${job.state.errorCode}] `}${job.state.error}`)
  }
  if (job.state.result !== null && job.state.result !== undefined) {
    lines.push(`Result:    ${JSON.stringify(job.state.result)}`)
  }
  return lines.join('\n')
}

/**
 * Indented tree, one job per line.
 */
export function formatJobTree(node: JobTreeNode, depth = 0): string {
  const indent = '  '.repeat(depth)
  const { job } = node
  const lines = [`${indent}${job.name} [${job.type}] ${job.state.status} (${job.id})`]
  for (const child of node.children) {
    lines.push(formatJobTree(child, depth + 1))
  }
  if (node.truncated) {
    lines.push(`${indent}  ...`)
  }
  return lines.join('\n')
}

export function formatLogLine(entry: JobLogEntry): string {
  return `${formatTimestamp(entry.createdAt)} ${entry.level.toUpperCase().padEnd(5)} ${entry.jobId} ${entry.message}`
}

/**
 * CLIJsonOutput wrapper type for machine-consumable JSON responses.
 */
export interface CLIJsonOutput<T> {
  /** ISO timestamp of when the command was executed */
  timestamp: string
  version: string
  /** The CLI command that was executed */
  command: string
  data: T
}

export function buildJsonOutput<T>(command: string, data: T, version: string): CLIJsonOutput<T> {
  return {
    timestamp: new Date().toISOString(),
    version,
    command,
    data,
  }
}
