/**
 * `conveyor definitions` command group
 *
 * Subcommands:
 *   - `conveyor definitions load <path>`   load a YAML/JSON file or a directory of them
 *   - `conveyor definitions list`          list stored definitions
 *   - `conveyor definitions show <id>`     print one definition
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error
 *   2 - Usage error (unknown id, unreadable file, invalid definitions loaded)
 */

import type { Command } from 'commander'
import { statSync } from 'node:fs'
import { resolve } from 'node:path'
import yaml from 'js-yaml'
import { DefinitionNotFoundError } from '../../core/errors.js'
import type { StoredDefinition } from '../../modules/executor/definition-store.js'
import { buildJsonOutput, formatTable } from '../utils/formatting.js'
import {
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
  parseOutputFormat,
  withRuntime,
  writeLine,
} from '../utils/runtime.js'
import type { CommandContext, OutputFormat } from '../utils/runtime.js'

function definitionSummary(stored: StoredDefinition): Record<string, unknown> {
  return {
    id: stored.id,
    name: stored.name,
    enabled: stored.enabled,
    valid: stored.valid,
    validationError: stored.validationError,
    sourcePath: stored.sourcePath,
    steps: stored.definition?.steps.length ?? 0,
  }
}

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

export async function runDefinitionsLoad(ctx: CommandContext, path: string, format: OutputFormat): Promise<number> {
  return withRuntime(ctx, (runtime) => {
    const target = resolve(ctx.projectRoot, path)
    const loaded = statSync(target).isDirectory()
      ? runtime.definitions.loadDirectory(target)
      : runtime.definitions.loadFile(target)
    const invalid = loaded.filter((stored) => !stored.valid)

    if (format === 'json') {
      writeLine(JSON.stringify(buildJsonOutput('definitions load', loaded.map(definitionSummary), ctx.version)))
    } else {
      for (const stored of loaded) {
        writeLine(stored.valid ? `Loaded ${stored.id}` : `Invalid ${stored.id}: ${stored.validationError ?? ''}`)
      }
      writeLine(`${String(loaded.length)} definition(s) loaded, ${String(invalid.length)} invalid`)
    }
    return invalid.length > 0 ? EXIT_USAGE_ERROR : EXIT_SUCCESS
  })
}

export async function runDefinitionsList(ctx: CommandContext, format: OutputFormat): Promise<number> {
  return withRuntime(ctx, (runtime) => {
    const stored = runtime.definitions.list()
    if (format === 'json') {
      writeLine(JSON.stringify(buildJsonOutput('definitions list', stored.map(definitionSummary), ctx.version)))
      return EXIT_SUCCESS
    }
    if (stored.length === 0) {
      writeLine('No definitions stored.')
      return EXIT_SUCCESS
    }
    const rows = stored.map((s) => ({
      id: s.id,
      name: s.name,
      enabled: s.enabled ? 'yes' : 'no',
      valid: s.valid ? 'yes' : `no (${s.validationError ?? ''})`,
      steps: String(s.definition?.steps.length ?? 0),
    }))
    writeLine(formatTable(['ID', 'Name', 'Enabled', 'Valid', 'Steps'], rows, ['id', 'name', 'enabled', 'valid', 'steps']))
    return EXIT_SUCCESS
  })
}

export async function runDefinitionsShow(ctx: CommandContext, id: string, format: OutputFormat): Promise<number> {
  return withRuntime(ctx, (runtime) => {
    const stored = runtime.definitions.get(id)
    if (stored === undefined) {
      throw new DefinitionNotFoundError(id)
    }
    const document = stored.definition ?? stored.raw
    if (format === 'json') {
      writeLine(JSON.stringify(buildJsonOutput('definitions show', { ...definitionSummary(stored), definition: document }, ctx.version)))
    } else {
      process.stdout.write(yaml.dump(document))
    }
    return EXIT_SUCCESS
  })
}

// ---------------------------------------------------------------------------
// registerDefinitionsCommand
// ---------------------------------------------------------------------------

export function registerDefinitionsCommand(program: Command, ctx: CommandContext): void {
  const definitions = program.command('definitions').description('Manage job definitions')

  definitions
    .command('load <path>')
    .description('Load definitions from a YAML/JSON file or a directory')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (path: string, opts: { outputFormat: string }) => {
      process.exitCode = await runDefinitionsLoad(ctx, path, parseOutputFormat(opts.outputFormat))
    })

  definitions
    .command('list')
    .description('List stored definitions')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (opts: { outputFormat: string }) => {
      process.exitCode = await runDefinitionsList(ctx, parseOutputFormat(opts.outputFormat))
    })

  definitions
    .command('show <id>')
    .description('Print a stored definition')
    .option('--output-format <format>', 'Output format: yaml (default) or json', 'human')
    .action(async (id: string, opts: { outputFormat: string }) => {
      process.exitCode = await runDefinitionsShow(ctx, id, parseOutputFormat(opts.outputFormat))
    })
}
