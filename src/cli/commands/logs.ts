/**
 * `conveyor logs <id>` command
 *
 * Prints a job's log lines, or with `--aggregate` the lines of the job and
 * all of its descendants in time order.
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error
 *   2 - Usage error (unknown job, unknown level)
 */

import type { Command } from 'commander'
import { JobValidationError } from '../../core/errors.js'
import { LOG_LEVELS } from '../../core/types.js'
import type { LogLevel } from '../../core/types.js'
import type { LogQueryOptions } from '../../modules/job-store/types.js'
import { buildJsonOutput, formatLogLine } from '../utils/formatting.js'
import { EXIT_SUCCESS, parseOutputFormat, withRuntime, writeLine } from '../utils/runtime.js'
import type { CommandContext, OutputFormat } from '../utils/runtime.js'

export interface LogsOptions {
  aggregate: boolean
  level?: string
  limit?: number
  outputFormat: OutputFormat
}

function parseLevel(raw: string): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === raw)
  if (level === undefined) {
    throw new JobValidationError(`Unknown log level "${raw}"; expected one of ${LOG_LEVELS.join(', ')}`)
  }
  return level
}

export async function runLogsAction(ctx: CommandContext, jobId: string, options: LogsOptions): Promise<number> {
  return withRuntime(ctx, (runtime) => {
    runtime.store.requireJob(jobId)
    const query: LogQueryOptions = {
      ...(options.level !== undefined && { minLevel: parseLevel(options.level) }),
      ...(options.limit !== undefined && { limit: options.limit }),
    }
    const entries = options.aggregate
      ? runtime.store.getAggregatedLogs(jobId, query)
      : runtime.store.getLogs(jobId, query)

    if (options.outputFormat === 'json') {
      writeLine(JSON.stringify(buildJsonOutput('logs', entries, ctx.version)))
      return EXIT_SUCCESS
    }
    for (const entry of entries) {
      writeLine(formatLogLine(entry))
    }
    return EXIT_SUCCESS
  })
}

export function registerLogsCommand(program: Command, ctx: CommandContext): void {
  program
    .command('logs <id>')
    .description("Print a job's log")
    .option('--aggregate', 'Include every descendant, interleaved by time', false)
    .option('--level <level>', 'Minimum level: debug, info, warn or error')
    .option('--limit <n>', 'Maximum lines to print')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (id: string, opts: { aggregate: boolean; level?: string; limit?: string; outputFormat: string }) => {
      process.exitCode = await runLogsAction(ctx, id, {
        aggregate: opts.aggregate,
        ...(opts.level !== undefined && { level: opts.level }),
        ...(opts.limit !== undefined && { limit: Number.parseInt(opts.limit, 10) }),
        outputFormat: parseOutputFormat(opts.outputFormat),
      })
    })
}
