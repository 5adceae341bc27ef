/**
 * `conveyor queue` command group
 *
 * Subcommands:
 *   - `conveyor queue stats`            live message counts by state
 *   - `conveyor queue dead-letters`     list dead-lettered messages
 *   - `conveyor queue redrive <id>`     move a dead letter back onto the queue
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error
 *   2 - Usage error (unknown dead letter)
 */

import type { Command } from 'commander'
import { buildJsonOutput, formatTable, formatTimestamp } from '../utils/formatting.js'
import { EXIT_SUCCESS, parseOutputFormat, withRuntime, writeLine } from '../utils/runtime.js'
import type { CommandContext, OutputFormat } from '../utils/runtime.js'

export async function runQueueStats(ctx: CommandContext, format: OutputFormat): Promise<number> {
  return withRuntime(ctx, (runtime) => {
    const counts = runtime.queue.stats()
    if (format === 'json') {
      writeLine(JSON.stringify(buildJsonOutput('queue stats', counts, ctx.version)))
      return EXIT_SUCCESS
    }
    writeLine(
      formatTable(
        ['Visible', 'Leased', 'Delayed', 'Dead'],
        [
          {
            visible: String(counts.visible),
            leased: String(counts.leased),
            delayed: String(counts.delayed),
            dead: String(counts.dead),
          },
        ],
        ['visible', 'leased', 'delayed', 'dead'],
      ),
    )
    return EXIT_SUCCESS
  })
}

export async function runQueueDeadLetters(ctx: CommandContext, limit: number, format: OutputFormat): Promise<number> {
  return withRuntime(ctx, (runtime) => {
    const letters = runtime.queue.listDeadLetters(limit)
    if (format === 'json') {
      writeLine(JSON.stringify(buildJsonOutput('queue dead-letters', letters, ctx.version)))
      return EXIT_SUCCESS
    }
    if (letters.length === 0) {
      writeLine('No dead letters.')
      return EXIT_SUCCESS
    }
    const rows = letters.map((letter) => ({
      id: letter.id,
      type: letter.type,
      job: letter.jobId ?? '-',
      receives: String(letter.receiveCount),
      at: formatTimestamp(letter.deadLetteredAt),
      error: letter.lastError ?? '-',
    }))
    writeLine(
      formatTable(
        ['ID', 'Type', 'Job', 'Receives', 'Dead-lettered', 'Last error'],
        rows,
        ['id', 'type', 'job', 'receives', 'at', 'error'],
      ),
    )
    return EXIT_SUCCESS
  })
}

export async function runQueueRedrive(ctx: CommandContext, id: string, format: OutputFormat): Promise<number> {
  return withRuntime(ctx, (runtime) => {
    const { messageId } = runtime.queue.redriveDeadLetter(id)
    writeLine(
      format === 'json'
        ? JSON.stringify(buildJsonOutput('queue redrive', { deadLetterId: id, messageId }, ctx.version))
        : `Redrove dead letter ${id} as message ${messageId}`,
    )
    return EXIT_SUCCESS
  })
}

export function registerQueueCommand(program: Command, ctx: CommandContext): void {
  const queue = program.command('queue').description('Inspect the durable queue')

  queue
    .command('stats')
    .description('Show message counts')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (opts: { outputFormat: string }) => {
      process.exitCode = await runQueueStats(ctx, parseOutputFormat(opts.outputFormat))
    })

  queue
    .command('dead-letters')
    .description('List dead-lettered messages, newest first')
    .option('--limit <n>', 'Maximum entries', '50')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (opts: { limit: string; outputFormat: string }) => {
      process.exitCode = await runQueueDeadLetters(ctx, Number.parseInt(opts.limit, 10), parseOutputFormat(opts.outputFormat))
    })

  queue
    .command('redrive <id>')
    .description('Move a dead letter back onto the queue')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (id: string, opts: { outputFormat: string }) => {
      process.exitCode = await runQueueRedrive(ctx, id, parseOutputFormat(opts.outputFormat))
    })
}
