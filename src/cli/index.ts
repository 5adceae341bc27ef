#!/usr/bin/env node
/**
 * Conveyor CLI - Main entry point
 * Provides the `conveyor` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'node:url'
import { dirname, resolve } from 'node:path'
import { readFile } from 'node:fs/promises'
import { createLogger } from '../utils/logger.js'
import { registerDefinitionsCommand } from './commands/definitions.js'
import { registerRunCommand } from './commands/run.js'
import { registerWorkerCommand } from './commands/worker.js'
import { registerJobsCommand } from './commands/jobs.js'
import { registerLogsCommand } from './commands/logs.js'
import { registerCleanupCommand } from './commands/cleanup.js'
import { registerQueueCommand } from './commands/queue.js'
import { registerConfigCommand } from './commands/config.js'
import { EXIT_SUCCESS, EXIT_USAGE_ERROR } from './utils/runtime.js'
import type { CommandContext } from './utils/runtime.js'

const logger = createLogger('cli')

/** Resolve the package version from package.json from src/cli or dist/src/cli */
async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  for (const pkgPath of [resolve(here, '../../package.json'), resolve(here, '../../../package.json')]) {
    try {
      const pkg = JSON.parse(await readFile(pkgPath, 'utf-8')) as { version?: string }
      if (pkg.version !== undefined) return pkg.version
    } catch (err) {
      logger.debug({ err, pkgPath }, 'package.json not readable here')
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()
  const ctx: CommandContext = { projectRoot: process.cwd(), version }

  const program = new Command()

  program
    .name('conveyor')
    .description('Conveyor - durable job hierarchies for crawling, indexing and LLM orchestration')
    .version(version, '-v, --version', 'Output the current version')
    .option('--project-root <dir>', 'Directory holding .conveyor/ (default: cwd)')
    .option('--db <path>', 'SQLite database path (overrides database.path)')
    .exitOverride((err) => {
      process.exit(err.exitCode === 0 ? EXIT_SUCCESS : EXIT_USAGE_ERROR)
    })
    .hook('preAction', () => {
      const opts = program.opts<{ projectRoot?: string; db?: string }>()
      if (opts.projectRoot !== undefined) ctx.projectRoot = resolve(opts.projectRoot)
      if (opts.db !== undefined) ctx.databasePath = opts.db
    })

  registerDefinitionsCommand(program, ctx)
  registerRunCommand(program, ctx)
  registerWorkerCommand(program, ctx)
  registerJobsCommand(program, ctx)
  registerLogsCommand(program, ctx)
  registerCleanupCommand(program, ctx)
  registerQueueCommand(program, ctx)
  registerConfigCommand(program, ctx)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

// Errors are handled internally by main() which calls process.exit(1)
void main()
