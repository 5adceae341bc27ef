/**
 * `conveyor worker` command
 *
 * Runs a worker pool against the configured database until SIGINT or
 * SIGTERM, then drains in-flight handlers and exits.
 *
 * Exit codes:
 *   0 - Clean shutdown
 *   1 - System error
 */

import type { Command } from 'commander'
import { once } from 'node:events'
import { createLogger } from '../../utils/logger.js'
import { EXIT_SUCCESS, withRuntime, writeLine } from '../utils/runtime.js'
import type { CommandContext } from '../utils/runtime.js'

const logger = createLogger('worker-cmd')

export interface WorkerOptions {
  /** Overrides workers.concurrency */
  concurrency?: number
  /** Resolves when the worker should stop (default: SIGINT or SIGTERM) */
  stopSignal?: Promise<unknown>
}

function shutdownSignal(): Promise<unknown> {
  return Promise.race([once(process, 'SIGINT'), once(process, 'SIGTERM')])
}

export async function runWorkerAction(ctx: CommandContext, options: WorkerOptions = {}): Promise<number> {
  return withRuntime(ctx, async (runtime) => {
    const concurrency = options.concurrency ?? runtime.config.workers.concurrency
    runtime.pool.start(concurrency)
    writeLine(`Worker started with ${String(concurrency)} worker(s); press Ctrl+C to stop`)

    await (options.stopSignal ?? shutdownSignal())
    logger.info('Stopping worker pool')
    await runtime.pool.stop()
    writeLine('Worker stopped')
    return EXIT_SUCCESS
  })
}

export function registerWorkerCommand(program: Command, ctx: CommandContext): void {
  program
    .command('worker')
    .description('Process queued jobs until interrupted')
    .option('--concurrency <n>', 'Number of concurrent handlers')
    .action(async (opts: { concurrency?: string }) => {
      process.exitCode = await runWorkerAction(ctx, {
        ...(opts.concurrency !== undefined && { concurrency: Number.parseInt(opts.concurrency, 10) }),
      })
    })
}
