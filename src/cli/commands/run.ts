/**
 * `conveyor run <definitionId>` command
 *
 * Creates a manager and its steps for a stored definition and enqueues it.
 * With `--wait`, also runs a worker pool in this process until the manager
 * reaches a terminal status.
 *
 * Usage:
 *   conveyor run crawl-docs                  Enqueue for a separate `conveyor worker`
 *   conveyor run crawl-docs --wait           Process in-process until done
 *   conveyor run crawl-docs --no-start       Create the tree only; see `jobs start`
 *
 * Exit codes:
 *   0 - Success (enqueued, or finished as completed with --wait)
 *   1 - System error, or the run ended failed/cancelled/timed out with --wait
 *   2 - Usage error (unknown, disabled or invalid definition)
 */

import type { Command } from 'commander'
import { sleep } from '../../utils/helpers.js'
import { isTerminalStatus } from '../../core/types.js'
import type { Runtime } from '../../core/runtime.js'
import type { JobRecord } from '../../modules/job-store/types.js'
import { buildJsonOutput, formatJobDetail } from '../utils/formatting.js'
import { EXIT_ERROR, EXIT_SUCCESS, parseOutputFormat, withRuntime, writeLine } from '../utils/runtime.js'
import type { CommandContext, OutputFormat } from '../utils/runtime.js'

export interface RunOptions {
  definitionId: string
  start: boolean
  wait: boolean
  /** Give up waiting after this long */
  timeoutMs: number
  pollMs: number
  outputFormat: OutputFormat
}

async function waitForManager(runtime: Runtime, managerId: string, options: RunOptions): Promise<JobRecord | null> {
  const deadline = Date.now() + options.timeoutMs
  for (;;) {
    const manager = runtime.store.requireJob(managerId)
    if (isTerminalStatus(manager.state.status)) {
      return manager
    }
    if (Date.now() >= deadline) {
      return null
    }
    await sleep(options.pollMs)
  }
}

export async function runRunAction(ctx: CommandContext, options: RunOptions): Promise<number> {
  return withRuntime(ctx, async (runtime) => {
    const { managerId, stepIds } = runtime.executor.execute(options.definitionId, { enqueue: options.start })

    if (!options.wait || !options.start) {
      if (options.outputFormat === 'json') {
        writeLine(JSON.stringify(buildJsonOutput('run', { managerId, stepIds, started: options.start }, ctx.version)))
      } else {
        writeLine(
          options.start
            ? `Enqueued ${managerId} (${String(stepIds.length)} step(s))`
            : `Created ${managerId} (${String(stepIds.length)} step(s)); run \`conveyor jobs start ${managerId}\` to enqueue it`,
        )
      }
      return EXIT_SUCCESS
    }

    runtime.pool.start()
    const manager = await waitForManager(runtime, managerId, options)
    if (manager === null) {
      process.stderr.write(`Error: ${managerId} did not finish within ${String(options.timeoutMs)}ms\n`)
      return EXIT_ERROR
    }

    if (options.outputFormat === 'json') {
      writeLine(JSON.stringify(buildJsonOutput('run', manager, ctx.version)))
    } else {
      writeLine(formatJobDetail(manager))
    }
    return manager.state.status === 'completed' ? EXIT_SUCCESS : EXIT_ERROR
  })
}

// ---------------------------------------------------------------------------
// registerRunCommand
// ---------------------------------------------------------------------------

export function registerRunCommand(program: Command, ctx: CommandContext): void {
  program
    .command('run <definitionId>')
    .description('Execute a stored job definition')
    .option('--no-start', 'Create the job tree without enqueueing it')
    .option('--wait', 'Process the run in this process until it finishes', false)
    .option('--timeout <ms>', 'Maximum time to wait with --wait', '3600000')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(
      async (
        definitionId: string,
        opts: { start: boolean; wait: boolean; timeout: string; outputFormat: string },
      ) => {
        process.exitCode = await runRunAction(ctx, {
          definitionId,
          start: opts.start,
          wait: opts.wait,
          timeoutMs: Number.parseInt(opts.timeout, 10),
          pollMs: 250,
          outputFormat: parseOutputFormat(opts.outputFormat),
        })
      },
    )
}
