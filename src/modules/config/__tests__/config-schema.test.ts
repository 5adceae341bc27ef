/**
 * Unit tests for config-schema.ts
 */

import { describe, it, expect } from 'vitest'
import { ConveyorConfigSchema, PartialConveyorConfigSchema, LlmConfigSchema } from '../config-schema.js'
import { DEFAULT_CONFIG } from '../defaults.js'

describe('ConveyorConfigSchema', () => {
  it('accepts the defaults', () => {
    expect(ConveyorConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true)
  })

  it('rejects a missing section', () => {
    const result = ConveyorConfigSchema.safeParse({ ...DEFAULT_CONFIG, probe: undefined })
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['probe'])
    }
  })

  it('rejects an unsupported format version', () => {
    expect(ConveyorConfigSchema.safeParse({ ...DEFAULT_CONFIG, config_format_version: '2' }).success).toBe(false)
  })

  it('rejects zero workers', () => {
    const result = ConveyorConfigSchema.safeParse({ ...DEFAULT_CONFIG, workers: { ...DEFAULT_CONFIG.workers, concurrency: 0 } })
    expect(result.success).toBe(false)
  })
})

describe('LlmConfigSchema', () => {
  it('accepts an optional base url', () => {
    const parsed = LlmConfigSchema.parse({ ...DEFAULT_CONFIG.llm, base_url: 'http://localhost:8080/v1' })
    expect(parsed.base_url).toBe('http://localhost:8080/v1')
  })

  it('rejects an unknown provider', () => {
    expect(LlmConfigSchema.safeParse({ ...DEFAULT_CONFIG.llm, provider: 'carrier-pigeon' }).success).toBe(false)
  })
})

describe('PartialConveyorConfigSchema', () => {
  it('accepts a single nested field', () => {
    expect(PartialConveyorConfigSchema.parse({ probe: { staleness_ms: 10 } })).toEqual({ probe: { staleness_ms: 10 } })
  })

  it('rejects unknown top-level keys', () => {
    expect(PartialConveyorConfigSchema.safeParse({ providers: {} }).success).toBe(false)
  })
})
