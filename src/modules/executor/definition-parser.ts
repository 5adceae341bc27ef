/**
 * Job definition file and string parser.
 *
 * Reads YAML or JSON definition files/strings and returns raw parsed documents
 * (before Zod validation). Format is determined by file extension for file-based
 * loading, or explicitly specified for string-based loading. A document may hold
 * one definition or a list of them.
 */

import { readFileSync } from 'node:fs'
import { extname } from 'node:path'
import { load as parse } from 'js-yaml'
import { ConveyorError } from '../../core/errors.js'
import type { RawJobDefinition } from './definition-schema.js'

// ---------------------------------------------------------------------------
// DefinitionParseError
// ---------------------------------------------------------------------------

export class DefinitionParseError extends ConveyorError {
  constructor(message: string, context: { filePath?: string; format?: DefinitionFormat } = {}) {
    super(message, 'DEFINITION_PARSE_ERROR', context)
    this.name = 'DefinitionParseError'
  }
}

// ---------------------------------------------------------------------------
// Format detection
// ---------------------------------------------------------------------------

export type DefinitionFormat = 'yaml' | 'json'

export const DEFINITION_FILE_EXTENSIONS = ['.yaml', '.yml', '.json'] as const

export function detectFormat(filePath: string): DefinitionFormat {
  return extname(filePath).toLowerCase() === '.json' ? 'json' : 'yaml'
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parse definition documents from a string.
 * @throws {DefinitionParseError} on syntax errors or an empty document
 */
export function parseDefinitionString(content: string, format: DefinitionFormat): RawJobDefinition[] {
  let parsed: unknown
  try {
    parsed = format === 'json' ? (JSON.parse(content) as unknown) : parse(content)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new DefinitionParseError(`${format === 'json' ? 'JSON' : 'YAML'} parse error: ${message}`, { format })
  }

  if (parsed === null || parsed === undefined) {
    throw new DefinitionParseError('Definition document is empty', { format })
  }
  return Array.isArray(parsed) ? parsed : [parsed]
}

/**
 * Read a definition file and parse its contents.
 * @throws {DefinitionParseError} on read or syntax errors
 */
export function parseDefinitionFile(filePath: string): RawJobDefinition[] {
  let content: string
  try {
    content = readFileSync(filePath, 'utf-8')
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new DefinitionParseError(`Failed to read file: ${message}`, { filePath })
  }

  const format = detectFormat(filePath)
  try {
    return parseDefinitionString(content, format)
  } catch (err) {
    if (err instanceof DefinitionParseError) {
      throw new DefinitionParseError(`${filePath}: ${err.message}`, { filePath, format })
    }
    throw err
  }
}
