/**
 * Command-level tests: each action runs against a file-backed database in a
 * temp project directory, with stdout and stderr captured.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import type { MockInstance } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { runDefinitionsLoad, runDefinitionsShow } from '../definitions.js'
import { runRunAction } from '../run.js'
import { runJobMutation, runJobsShow } from '../jobs.js'
import { runLogsAction } from '../logs.js'
import { runQueueStats } from '../queue.js'
import { runCleanupAction } from '../cleanup.js'
import { coerceValue } from '../config.js'
import type { CommandContext } from '../../utils/runtime.js'

const DOCS_YAML = `
id: docs
name: Crawl the docs
steps:
  - name: crawl
    type: crawl
    config:
      seeds: ["https://docs.test/"]
`

let tmp: string
let ctx: CommandContext
let stdout: MockInstance<typeof process.stdout.write>
let stderr: MockInstance<typeof process.stderr.write>

function written(spy: MockInstance<typeof process.stdout.write>): string {
  return spy.mock.calls.map((call) => String(call[0])).join('')
}

function lastJson<T>(): { command: string; data: T } {
  const lines = written(stdout).trim().split('\n')
  return JSON.parse(lines[lines.length - 1] ?? '') as { command: string; data: T }
}

beforeEach(() => {
  tmp = mkdtempSync(join(tmpdir(), 'conveyor-cli-'))
  ctx = {
    projectRoot: tmp,
    databasePath: join(tmp, 'test.db'),
    globalConfigDir: join(tmp, 'global'),
    version: '0.0.0',
  }
  writeFileSync(join(tmp, 'docs.yaml'), DOCS_YAML)
  stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
  stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
})

afterEach(() => {
  vi.restoreAllMocks()
  rmSync(tmp, { recursive: true, force: true })
})

describe('definitions', () => {
  it('loads a file relative to the project root', async () => {
    const code = await runDefinitionsLoad(ctx, 'docs.yaml', 'human')
    expect(code).toBe(0)
    expect(written(stdout)).toBe('Loaded docs\n1 definition(s) loaded, 0 invalid\n')
  })

  it('exits 2 when a definition is invalid', async () => {
    writeFileSync(join(tmp, 'bad.yaml'), 'id: bad\nsteps: []\n')
    const code = await runDefinitionsLoad(ctx, 'bad.yaml', 'json')
    expect(code).toBe(2)
    const out = lastJson<{ id: string; valid: boolean }[]>()
    expect(out.command).toBe('definitions load')
    expect(out.data[0]?.id).toBe('bad')
    expect(out.data[0]?.valid).toBe(false)
  })

  it('exits 2 for an unknown definition', async () => {
    const code = await runDefinitionsShow(ctx, 'missing', 'human')
    expect(code).toBe(2)
    expect(written(stderr)).toBe('Error: Job definition not found: missing\n')
  })
})

describe('run and jobs', () => {
  it('creates an unstarted run that jobs start enqueues', async () => {
    await runDefinitionsLoad(ctx, 'docs.yaml', 'human')
    stdout.mockClear()

    expect(
      await runRunAction(ctx, {
        definitionId: 'docs',
        start: false,
        wait: false,
        timeoutMs: 1000,
        pollMs: 10,
        outputFormat: 'json',
      }),
    ).toBe(0)
    const run = lastJson<{ managerId: string; stepIds: string[]; started: boolean }>()
    expect(run.data.stepIds).toHaveLength(1)
    expect(run.data.started).toBe(false)
    const managerId = run.data.managerId

    await runQueueStats(ctx, 'json')
    expect(lastJson<{ visible: number }>().data.visible).toBe(0)

    expect(await runJobMutation(ctx, 'start', managerId, { outputFormat: 'human' })).toBe(0)
    expect(written(stdout).endsWith(`Enqueued ${managerId}\n`)).toBe(true)

    await runQueueStats(ctx, 'json')
    expect(lastJson<{ visible: number }>().data.visible).toBe(1)

    expect(await runJobMutation(ctx, 'cancel', managerId, { outputFormat: 'human' })).toBe(0)
    expect(written(stdout).endsWith(`Cancelled ${managerId}\n`)).toBe(true)

    expect(await runJobMutation(ctx, 'start', managerId, { outputFormat: 'human' })).toBe(2)
    expect(written(stderr)).toBe(`Error: Invalid status transition for job ${managerId}: cancelled -> running\n`)
  })

  it('exits 2 for an unknown job', async () => {
    expect(await runJobsShow(ctx, 'nope', 'human')).toBe(2)
    expect(written(stderr)).toBe('Error: Job not found: nope\n')
  })
})

describe('logs', () => {
  it('rejects an unknown level', async () => {
    await runDefinitionsLoad(ctx, 'docs.yaml', 'human')
    await runRunAction(ctx, {
      definitionId: 'docs',
      start: false,
      wait: false,
      timeoutMs: 1000,
      pollMs: 10,
      outputFormat: 'json',
    })
    const managerId = lastJson<{ managerId: string }>().data.managerId

    const code = await runLogsAction(ctx, managerId, { aggregate: false, level: 'loud', outputFormat: 'human' })
    expect(code).toBe(2)
    expect(written(stderr)).toBe('Error: Unknown log level "loud"; expected one of debug, info, warn, error\n')
  })
})

describe('cleanup', () => {
  it('reports nothing to delete on a fresh database', async () => {
    const code = await runCleanupAction(ctx, { dryRun: true, outputFormat: 'json' })
    expect(code).toBe(0)
    const out = lastJson<{ dryRun: boolean; jobIds: string[]; deletedJobs: number }>()
    expect(out.command).toBe('cleanup')
    expect(out.data.dryRun).toBe(true)
    expect(out.data.jobIds).toEqual([])
  })

  it('rejects a non-terminal status', async () => {
    const code = await runCleanupAction(ctx, { dryRun: true, statuses: 'running', outputFormat: 'human' })
    expect(code).toBe(2)
    expect(written(stderr)).toBe(
      'Error: Cleanup only removes terminal jobs; "running" is not one of completed, failed, cancelled\n',
    )
  })
})

describe('coerceValue', () => {
  it('parses scalars', () => {
    expect(coerceValue('true')).toBe(true)
    expect(coerceValue('12')).toBe(12)
    expect(coerceValue('0.5')).toBe(0.5)
    expect(coerceValue('null')).toBeNull()
    expect(coerceValue(' text ')).toBe('text')
  })
})
