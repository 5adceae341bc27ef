/**
 * Shared plumbing for CLI commands: load configuration, open a runtime, map
 * errors to exit codes and close everything afterwards.
 */

import { join, resolve } from 'node:path'
import {
  ConfigError,
  DeadLetterNotFoundError,
  DefinitionNotFoundError,
  InvalidStateTransitionError,
  JobNotFoundError,
  JobRunningError,
  JobValidationError,
} from '../../core/errors.js'
import { createRuntime } from '../../core/runtime-impl.js'
import type { Runtime } from '../../core/runtime.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { ConveyorConfig } from '../../modules/config/config-schema.js'
import { DefinitionParseError } from '../../modules/executor/definition-parser.js'
import { createLogger } from '../../utils/logger.js'
import { maskSecrets } from './masking.js'

const logger = createLogger('cli')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const EXIT_SUCCESS = 0
export const EXIT_ERROR = 1
export const EXIT_USAGE_ERROR = 2

// ---------------------------------------------------------------------------
// Options shared by every command
// ---------------------------------------------------------------------------

export type OutputFormat = 'human' | 'json'

export interface CommandContext {
  projectRoot: string
  /** Overrides database.path */
  databasePath?: string
  /** Default: ~/.conveyor */
  globalConfigDir?: string
  version: string
}

export function parseOutputFormat(raw: string | undefined): OutputFormat {
  return raw === 'json' ? 'json' : 'human'
}

/**
 * Errors a user can fix by changing the command line or the data it names.
 */
export function isUsageError(err: unknown): boolean {
  return (
    err instanceof JobNotFoundError ||
    err instanceof DefinitionNotFoundError ||
    err instanceof DeadLetterNotFoundError ||
    err instanceof InvalidStateTransitionError ||
    err instanceof JobValidationError ||
    err instanceof JobRunningError ||
    err instanceof DefinitionParseError ||
    err instanceof ConfigError
  )
}

export async function loadCliConfig(ctx: CommandContext): Promise<ConveyorConfig> {
  const system = createConfigSystem({
    projectConfigDir: join(ctx.projectRoot, '.conveyor'),
    ...(ctx.globalConfigDir !== undefined && { globalConfigDir: ctx.globalConfigDir }),
    ...(ctx.databasePath !== undefined && { cliOverrides: { database: { path: ctx.databasePath } } }),
  })
  await system.load()
  const config = system.getConfig()
  if (ctx.databasePath === undefined && config.database.path !== ':memory:') {
    return { ...config, database: { path: resolve(ctx.projectRoot, config.database.path) } }
  }
  return config
}

/**
 * Run `fn` against a freshly opened runtime and return its exit code.
 * Thrown errors are reported on stderr and mapped to exit codes 1 or 2.
 */
export async function withRuntime(
  ctx: CommandContext,
  fn: (runtime: Runtime) => Promise<number> | number,
): Promise<number> {
  let runtime: Runtime | null = null
  try {
    runtime = await createRuntime({ config: await loadCliConfig(ctx) })
    return await fn(runtime)
  } catch (err) {
    return reportError(err)
  } finally {
    if (runtime !== null) {
      await runtime.shutdown().catch((err: unknown) => {
        logger.error({ err }, 'Failed to close runtime')
      })
    }
  }
}

export function reportError(err: unknown): number {
  const message = err instanceof Error ? err.message : String(err)
  process.stderr.write(`Error: ${maskSecrets(message)}\n`)
  if (isUsageError(err)) {
    return EXIT_USAGE_ERROR
  }
  logger.error({ err }, 'Command failed')
  return EXIT_ERROR
}

export function writeLine(line: string): void {
  process.stdout.write(line + '\n')
}
