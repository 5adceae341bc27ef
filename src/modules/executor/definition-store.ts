/**
 * DefinitionStore: persisted job definitions.
 *
 * Definitions are validated when saved. One that fails validation is still
 * stored, flagged invalid with its error, so `definitions list` can show
 * what is wrong with it; executing it fails fast and resolving it as a
 * post-job skips it.
 */

import { readdirSync } from 'node:fs'
import { join } from 'node:path'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Clock } from '../../core/types.js'
import { systemClock } from '../../core/types.js'
import { DefinitionNotFoundError, JobValidationError } from '../../core/errors.js'
import { isPlainObject } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import {
  deleteDefinitionRow,
  getDefinitionRow,
  listDefinitionRows,
  setDefinitionEnabled,
  upsertDefinitionRow,
} from '../../persistence/queries/definitions.js'
import type { DefinitionRow } from '../../persistence/queries/definitions.js'
import { DEFINITION_ID_PATTERN, validateDefinition } from './definition-schema.js'
import type { JobDefinition, RawJobDefinition } from './definition-schema.js'
import { DEFINITION_FILE_EXTENSIONS, parseDefinitionFile } from './definition-parser.js'

const logger = createLogger('executor:definitions')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface StoredDefinition {
  id: string
  name: string
  enabled: boolean
  valid: boolean
  validationError: string | null
  /** Parsed definition; null when invalid */
  definition: JobDefinition | null
  /** Document as it was loaded */
  raw: unknown
  sourcePath: string | null
  createdAt: number
  updatedAt: number
}

/** Why a definition referenced by id cannot run */
export type DefinitionResolution =
  | { ok: true; definition: JobDefinition }
  | { ok: false; reason: 'missing' | 'disabled' | 'invalid'; message: string }

export interface DefinitionStore {
  /**
   * Validate and store a raw definition document.
   * @throws {JobValidationError} when the document has no usable id
   */
  save(raw: RawJobDefinition, sourcePath?: string): StoredDefinition

  /** Parse a YAML/JSON file and store every definition in it */
  loadFile(filePath: string): StoredDefinition[]

  /** Load every definition file in a directory, in name order */
  loadDirectory(dirPath: string): StoredDefinition[]

  get(id: string): StoredDefinition | undefined

  list(): StoredDefinition[]

  /** Look up a definition that is present, enabled and valid */
  resolve(id: string): DefinitionResolution

  /**
   * @throws {DefinitionNotFoundError} when missing
   * @throws {JobValidationError} when disabled or invalid
   */
  require(id: string): JobDefinition

  setEnabled(id: string, enabled: boolean): void

  delete(id: string): boolean
}

// ---------------------------------------------------------------------------
// SqliteDefinitionStore
// ---------------------------------------------------------------------------

export class SqliteDefinitionStore implements DefinitionStore {
  private readonly _db: BetterSqlite3Database
  private readonly _clock: Clock

  constructor(db: BetterSqlite3Database, clock: Clock = systemClock) {
    this._db = db
    this._clock = clock
  }

  save(raw: RawJobDefinition, sourcePath?: string): StoredDefinition {
    const id = isPlainObject(raw) ? raw['id'] : undefined
    if (typeof id !== 'string' || !DEFINITION_ID_PATTERN.test(id)) {
      throw new JobValidationError(
        `Definition${sourcePath === undefined ? '' : ` in ${sourcePath}`} has no valid "id"`,
        sourcePath === undefined ? {} : { sourcePath },
      )
    }

    const validation = validateDefinition(raw)
    const rawName = isPlainObject(raw) ? raw['name'] : undefined
    const rawEnabled = isPlainObject(raw) ? raw['enabled'] : undefined
    upsertDefinitionRow(this._db, {
      id,
      name: validation.ok ? validation.definition.name : typeof rawName === 'string' ? rawName : id,
      body: JSON.stringify(raw),
      enabled: (validation.ok ? validation.definition.enabled : rawEnabled !== false) ? 1 : 0,
      validation_status: validation.ok ? 'valid' : 'invalid',
      validation_error: validation.ok ? null : validation.error,
      source_path: sourcePath ?? null,
      now: this._clock.now(),
    })

    if (validation.ok) {
      logger.info({ definitionId: id, steps: validation.definition.steps.length }, 'Definition saved')
    } else {
      logger.warn({ definitionId: id, error: validation.error }, 'Definition saved as invalid')
    }
    return this._requireStored(id)
  }

  loadFile(filePath: string): StoredDefinition[] {
    return parseDefinitionFile(filePath).map((raw) => this.save(raw, filePath))
  }

  loadDirectory(dirPath: string): StoredDefinition[] {
    const files = readdirSync(dirPath)
      .filter((name) => DEFINITION_FILE_EXTENSIONS.some((ext) => name.toLowerCase().endsWith(ext)))
      .sort()
    return files.flatMap((name) => this.loadFile(join(dirPath, name)))
  }

  get(id: string): StoredDefinition | undefined {
    const row = getDefinitionRow(this._db, id)
    return row === undefined ? undefined : toStoredDefinition(row)
  }

  list(): StoredDefinition[] {
    return listDefinitionRows(this._db).map(toStoredDefinition)
  }

  resolve(id: string): DefinitionResolution {
    const stored = this.get(id)
    if (stored === undefined) {
      return { ok: false, reason: 'missing', message: `Job definition not found: ${id}` }
    }
    if (!stored.enabled) {
      return { ok: false, reason: 'disabled', message: `Job definition ${id} is disabled` }
    }
    if (stored.definition === null) {
      return {
        ok: false,
        reason: 'invalid',
        message: `Job definition ${id} is invalid: ${stored.validationError ?? 'unknown error'}`,
      }
    }
    return { ok: true, definition: stored.definition }
  }

  require(id: string): JobDefinition {
    const resolution = this.resolve(id)
    if (resolution.ok) {
      return resolution.definition
    }
    if (resolution.reason === 'missing') {
      throw new DefinitionNotFoundError(id)
    }
    throw new JobValidationError(resolution.message, { definitionId: id, reason: resolution.reason })
  }

  setEnabled(id: string, enabled: boolean): void {
    if (!setDefinitionEnabled(this._db, id, enabled, this._clock.now())) {
      throw new DefinitionNotFoundError(id)
    }
  }

  delete(id: string): boolean {
    return deleteDefinitionRow(this._db, id)
  }

  private _requireStored(id: string): StoredDefinition {
    const stored = this.get(id)
    if (stored === undefined) {
      throw new DefinitionNotFoundError(id)
    }
    return stored
  }
}

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

function toStoredDefinition(row: DefinitionRow): StoredDefinition {
  const raw = JSON.parse(row.body) as unknown
  let definition: JobDefinition | null = null
  if (row.validation_status === 'valid') {
    const validation = validateDefinition(raw)
    definition = validation.ok ? { ...validation.definition, enabled: row.enabled === 1 } : null
  }
  return {
    id: row.id,
    name: row.name,
    enabled: row.enabled === 1,
    valid: definition !== null,
    validationError: row.validation_error,
    definition,
    raw,
    sourcePath: row.source_path,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

export function createDefinitionStore(db: BetterSqlite3Database, clock?: Clock): DefinitionStore {
  return new SqliteDefinitionStore(db, clock)
}
