import { describe, it, expect } from 'vitest'
import { computeBackoff } from '../backoff.js'

describe('computeBackoff', () => {
  const noJitter = { baseMs: 1000, maxMs: 60_000, random: () => 0.5 }

  it('waits the base delay on the first attempt', () => {
    expect(computeBackoff(1, noJitter)).toBe(1000)
  })

  it('doubles per attempt by default', () => {
    expect(computeBackoff(2, noJitter)).toBe(2000)
    expect(computeBackoff(3, noJitter)).toBe(4000)
  })

  it('caps at maxMs', () => {
    expect(computeBackoff(20, noJitter)).toBe(60_000)
  })

  it('applies symmetric jitter', () => {
    expect(computeBackoff(1, { baseMs: 1000, maxMs: 60_000, random: () => 0 })).toBe(900)
    expect(computeBackoff(1, { baseMs: 1000, maxMs: 60_000, random: () => 1 })).toBe(1100)
  })

  it('honours a custom multiplier', () => {
    expect(computeBackoff(3, { ...noJitter, multiplier: 4 })).toBe(16_000)
  })
})
