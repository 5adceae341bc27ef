/**
 * `conveyor jobs` command group
 *
 * Subcommands:
 *   - `conveyor jobs list`            list jobs (roots by default)
 *   - `conveyor jobs show <id>`       one job with its child statistics
 *   - `conveyor jobs tree <id>`       the subtree below a job
 *   - `conveyor jobs cancel <id>`     cancel a job and its active descendants
 *   - `conveyor jobs rerun <id>`      new root from a terminal job, enqueued
 *   - `conveyor jobs copy <id>`       new pending root from a job, not enqueued
 *   - `conveyor jobs start <id>`      enqueue a pending root
 *   - `conveyor jobs delete <id>`     delete a job and its subtree
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error
 *   2 - Usage error (unknown job, invalid state transition, running subtree)
 */

import type { Command } from 'commander'
import { JobValidationError } from '../../core/errors.js'
import { isJobType } from '../../modules/job-store/job-types.js'
import type { JobType } from '../../modules/job-store/job-types.js'
import type { ListJobsFilter } from '../../modules/job-store/types.js'
import {
  buildJsonOutput,
  formatJobDetail,
  formatJobTable,
  formatJobTree,
} from '../utils/formatting.js'
import { EXIT_SUCCESS, parseOutputFormat, withRuntime, writeLine } from '../utils/runtime.js'
import type { CommandContext, OutputFormat } from '../utils/runtime.js'

// ---------------------------------------------------------------------------
// list
// ---------------------------------------------------------------------------

export interface JobsListOptions {
  status?: string
  type?: string
  /** A parent id, 'root' (default) or 'all' */
  parent: string
  limit: number
  offset: number
  outputFormat: OutputFormat
}

function parseTypeFilter(raw: string): JobType[] {
  return raw.split(',').map((value) => {
    const type = value.trim()
    if (!isJobType(type)) {
      throw new JobValidationError(`Unknown job type "${type}"`, { type })
    }
    return type
  })
}

export async function runJobsList(ctx: CommandContext, options: JobsListOptions): Promise<number> {
  return withRuntime(ctx, (runtime) => {
    const filter: ListJobsFilter = {
      limit: options.limit,
      offset: options.offset,
      order: 'desc',
      ...(options.parent !== 'all' && { parentId: options.parent }),
      ...(options.status !== undefined && { status: options.status }),
      ...(options.type !== undefined && { type: parseTypeFilter(options.type) }),
    }
    const { jobs, totalCount } = runtime.store.listJobs(filter)

    if (options.outputFormat === 'json') {
      writeLine(JSON.stringify(buildJsonOutput('jobs list', { jobs, totalCount }, ctx.version)))
      return EXIT_SUCCESS
    }
    if (jobs.length === 0) {
      writeLine('No jobs found.')
      return EXIT_SUCCESS
    }
    writeLine(formatJobTable(jobs))
    writeLine(`Showing ${String(jobs.length)} of ${String(totalCount)} job(s)`)
    return EXIT_SUCCESS
  })
}

// ---------------------------------------------------------------------------
// show / tree
// ---------------------------------------------------------------------------

export async function runJobsShow(ctx: CommandContext, jobId: string, format: OutputFormat): Promise<number> {
  return withRuntime(ctx, (runtime) => {
    const job = runtime.store.requireJob(jobId)
    const stats = runtime.hierarchy.getChildStats(jobId)
    if (format === 'json') {
      writeLine(JSON.stringify(buildJsonOutput('jobs show', { job, stats }, ctx.version)))
      return EXIT_SUCCESS
    }
    writeLine(formatJobDetail(job))
    if (stats.children.total > 0) {
      const c = stats.children
      writeLine(
        `Children:  ${String(c.total)} (pending ${String(c.pending)}, running ${String(c.running)}, ` +
          `completed ${String(c.completed)}, failed ${String(c.failed)}, cancelled ${String(c.cancelled)})`,
      )
    }
    return EXIT_SUCCESS
  })
}

export async function runJobsTree(
  ctx: CommandContext,
  jobId: string,
  maxDepth: number | undefined,
  format: OutputFormat,
): Promise<number> {
  return withRuntime(ctx, (runtime) => {
    const tree = runtime.hierarchy.getTree(jobId, maxDepth)
    writeLine(format === 'json' ? JSON.stringify(buildJsonOutput('jobs tree', tree, ctx.version)) : formatJobTree(tree))
    return EXIT_SUCCESS
  })
}

// ---------------------------------------------------------------------------
// cancel / rerun / copy / start / delete
// ---------------------------------------------------------------------------

export type JobMutation = 'cancel' | 'rerun' | 'copy' | 'start' | 'delete'

export interface JobMutationOptions {
  reason?: string
  outputFormat: OutputFormat
}

export async function runJobMutation(
  ctx: CommandContext,
  mutation: JobMutation,
  jobId: string,
  options: JobMutationOptions,
): Promise<number> {
  return withRuntime(ctx, (runtime) => {
    let message: string
    let data: Record<string, unknown>
    switch (mutation) {
      case 'cancel': {
        const job = runtime.lifecycle.cancel(jobId, options.reason)
        message = `Cancelled ${job.id}`
        data = { jobId: job.id, status: job.state.status }
        break
      }
      case 'rerun': {
        const job = runtime.lifecycle.rerun(jobId)
        message = `Rerun of ${jobId} enqueued as ${job.id}`
        data = { sourceId: jobId, jobId: job.id }
        break
      }
      case 'copy': {
        const job = runtime.lifecycle.copy(jobId)
        message = `Copied ${jobId} to ${job.id}; run \`conveyor jobs start ${job.id}\` to enqueue it`
        data = { sourceId: jobId, jobId: job.id }
        break
      }
      case 'start': {
        runtime.lifecycle.start(jobId)
        message = `Enqueued ${jobId}`
        data = { jobId }
        break
      }
      case 'delete': {
        const deleted = runtime.lifecycle.delete(jobId)
        message = `Deleted ${jobId} (${String(deleted)} job(s))`
        data = { jobId, deletedJobs: deleted }
        break
      }
    }
    writeLine(options.outputFormat === 'json' ? JSON.stringify(buildJsonOutput(`jobs ${mutation}`, data, ctx.version)) : message)
    return EXIT_SUCCESS
  })
}

// ---------------------------------------------------------------------------
// registerJobsCommand
// ---------------------------------------------------------------------------

const FORMAT_OPTION = ['--output-format <format>', 'Output format: human (default) or json', 'human'] as const

export function registerJobsCommand(program: Command, ctx: CommandContext): void {
  const jobs = program.command('jobs').description('Inspect and manage jobs')

  jobs
    .command('list')
    .description('List jobs, newest first')
    .option('--status <statuses>', 'Comma-separated statuses to include')
    .option('--type <types>', 'Comma-separated job types to include')
    .option('--parent <id>', "Parent id, 'root' or 'all'", 'root')
    .option('--limit <n>', 'Maximum jobs to show', '50')
    .option('--offset <n>', 'Jobs to skip', '0')
    .option(...FORMAT_OPTION)
    .action(
      async (opts: { status?: string; type?: string; parent: string; limit: string; offset: string; outputFormat: string }) => {
        process.exitCode = await runJobsList(ctx, {
          ...(opts.status !== undefined && { status: opts.status }),
          ...(opts.type !== undefined && { type: opts.type }),
          parent: opts.parent,
          limit: Number.parseInt(opts.limit, 10),
          offset: Number.parseInt(opts.offset, 10),
          outputFormat: parseOutputFormat(opts.outputFormat),
        })
      },
    )

  jobs
    .command('show <id>')
    .description('Show one job')
    .option(...FORMAT_OPTION)
    .action(async (id: string, opts: { outputFormat: string }) => {
      process.exitCode = await runJobsShow(ctx, id, parseOutputFormat(opts.outputFormat))
    })

  jobs
    .command('tree <id>')
    .description('Show the subtree below a job')
    .option('--depth <n>', 'Levels to expand below the job')
    .option(...FORMAT_OPTION)
    .action(async (id: string, opts: { depth?: string; outputFormat: string }) => {
      const depth = opts.depth === undefined ? undefined : Number.parseInt(opts.depth, 10)
      process.exitCode = await runJobsTree(ctx, id, depth, parseOutputFormat(opts.outputFormat))
    })

  jobs
    .command('cancel <id>')
    .description('Cancel a job and its active descendants')
    .option('--reason <text>', 'Reason recorded on the job')
    .option(...FORMAT_OPTION)
    .action(async (id: string, opts: { reason?: string; outputFormat: string }) => {
      process.exitCode = await runJobMutation(ctx, 'cancel', id, {
        ...(opts.reason !== undefined && { reason: opts.reason }),
        outputFormat: parseOutputFormat(opts.outputFormat),
      })
    })

  const simple: { name: Exclude<JobMutation, 'cancel'>; description: string }[] = [
    { name: 'rerun', description: 'Run a terminal job again as a new root' },
    { name: 'copy', description: 'Copy a job to a new pending root without enqueueing it' },
    { name: 'start', description: 'Enqueue a pending root job' },
    { name: 'delete', description: 'Delete a job and its subtree' },
  ]
  for (const { name, description } of simple) {
    jobs
      .command(`${name} <id>`)
      .description(description)
      .option(...FORMAT_OPTION)
      .action(async (id: string, opts: { outputFormat: string }) => {
        process.exitCode = await runJobMutation(ctx, name, id, { outputFormat: parseOutputFormat(opts.outputFormat) })
      })
  }
}
