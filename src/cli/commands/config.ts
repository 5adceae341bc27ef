/**
 * `conveyor config` command group
 *
 * Subcommands:
 *   - `conveyor config show`               display merged config (credentials masked)
 *   - `conveyor config set <key> <value>`  update a project config value
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error
 *   2 - Invalid key, value or configuration
 */

import type { Command } from 'commander'
import { join } from 'node:path'
import yaml from 'js-yaml'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { ConfigSystem } from '../../modules/config/config-system.js'
import { EXIT_SUCCESS, reportError, writeLine } from '../utils/runtime.js'
import type { CommandContext } from '../utils/runtime.js'

/**
 * Turn a command-line string into the scalar it spells.
 */
export function coerceValue(raw: string): unknown {
  const trimmed = raw.trim()
  if (trimmed === 'true') return true
  if (trimmed === 'false') return false
  if (trimmed === 'null') return null
  if (/^-?\d+$/.test(trimmed)) return parseInt(trimmed, 10)
  if (/^-?\d*\.\d+$/.test(trimmed)) return parseFloat(trimmed)
  return trimmed
}

function configSystem(ctx: CommandContext): ConfigSystem {
  return createConfigSystem({
    projectConfigDir: join(ctx.projectRoot, '.conveyor'),
    ...(ctx.globalConfigDir !== undefined && { globalConfigDir: ctx.globalConfigDir }),
  })
}

export async function runConfigShow(ctx: CommandContext, format: 'yaml' | 'json'): Promise<number> {
  try {
    const system = configSystem(ctx)
    await system.load()
    const masked = system.getMasked()
    if (format === 'json') {
      writeLine(JSON.stringify(masked, null, 2))
    } else {
      writeLine('# Conveyor configuration (credentials masked)\n')
      process.stdout.write(yaml.dump(masked))
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err)
  }
}

export async function runConfigSet(ctx: CommandContext, key: string, rawValue: string): Promise<number> {
  try {
    const system = configSystem(ctx)
    await system.load()
    const value = coerceValue(rawValue)
    await system.set(key, value)
    writeLine(`Set ${key} = ${JSON.stringify(value)}`)
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err)
  }
}

export function registerConfigCommand(program: Command, ctx: CommandContext): void {
  const config = program.command('config').description('View and modify configuration')

  config
    .command('show')
    .description('Display the merged configuration with credentials masked')
    .option('--format <format>', 'Output format: yaml (default) or json', 'yaml')
    .action(async (opts: { format: string }) => {
      process.exitCode = await runConfigShow(ctx, opts.format === 'json' ? 'json' : 'yaml')
    })

  config
    .command('set <key> <value>')
    .description('Set a value in the project config file (.conveyor/config.yaml)')
    .action(async (key: string, value: string) => {
      process.exitCode = await runConfigSet(ctx, key, value)
    })
}
