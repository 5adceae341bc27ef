/**
 * `conveyor cleanup` command
 *
 * Deletes terminal root jobs (and their subtrees) older than the retention
 * window. Defaults come from the `retention` config section.
 *
 * Usage:
 *   conveyor cleanup --dry-run                   List what would be deleted
 *   conveyor cleanup --older-than-hours 24       Override the retention window
 *   conveyor cleanup --status failed,cancelled   Only these terminal statuses
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error
 *   2 - Usage error (bad status list)
 */

import type { Command } from 'commander'
import { JobValidationError } from '../../core/errors.js'
import type { JobStatus } from '../../core/types.js'
import { buildJsonOutput, formatTimestamp } from '../utils/formatting.js'
import { EXIT_SUCCESS, parseOutputFormat, withRuntime, writeLine } from '../utils/runtime.js'
import type { CommandContext, OutputFormat } from '../utils/runtime.js'

const TERMINAL_STATUSES: readonly JobStatus[] = ['completed', 'failed', 'cancelled']

export interface CleanupActionOptions {
  dryRun: boolean
  olderThanHours?: number
  statuses?: string
  outputFormat: OutputFormat
}

function parseStatuses(raw: string): JobStatus[] {
  return raw.split(',').map((value) => {
    const status = TERMINAL_STATUSES.find((candidate) => candidate === value.trim())
    if (status === undefined) {
      throw new JobValidationError(`Cleanup only removes terminal jobs; "${value.trim()}" is not one of ${TERMINAL_STATUSES.join(', ')}`)
    }
    return status
  })
}

export async function runCleanupAction(ctx: CommandContext, options: CleanupActionOptions): Promise<number> {
  return withRuntime(ctx, (runtime) => {
    const report = runtime.lifecycle.cleanup({
      dryRun: options.dryRun,
      olderThanHours: options.olderThanHours ?? runtime.config.retention.older_than_hours,
      statuses: options.statuses === undefined ? runtime.config.retention.statuses : parseStatuses(options.statuses),
    })

    if (options.outputFormat === 'json') {
      writeLine(JSON.stringify(buildJsonOutput('cleanup', report, ctx.version)))
      return EXIT_SUCCESS
    }
    const cutoff = formatTimestamp(report.cutoff)
    if (report.dryRun) {
      writeLine(`Dry run: ${String(report.jobIds.length)} job tree(s) finished before ${cutoff} would be deleted`)
      for (const id of report.jobIds) {
        writeLine(`  ${id}`)
      }
    } else {
      writeLine(
        `Deleted ${String(report.deletedJobs)} job(s) from ${String(report.jobIds.length)} tree(s) finished before ${cutoff}`,
      )
    }
    return EXIT_SUCCESS
  })
}

export function registerCleanupCommand(program: Command, ctx: CommandContext): void {
  program
    .command('cleanup')
    .description('Delete old finished job trees')
    .option('--dry-run', 'Only report what would be deleted', false)
    .option('--older-than-hours <hours>', 'Retention window (default: retention.older_than_hours)')
    .option('--status <statuses>', 'Comma-separated terminal statuses (default: retention.statuses)')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (opts: { dryRun: boolean; olderThanHours?: string; status?: string; outputFormat: string }) => {
      process.exitCode = await runCleanupAction(ctx, {
        dryRun: opts.dryRun,
        ...(opts.olderThanHours !== undefined && { olderThanHours: Number.parseFloat(opts.olderThanHours) }),
        ...(opts.status !== undefined && { statuses: opts.status }),
        outputFormat: parseOutputFormat(opts.outputFormat),
      })
    })
}
