/**
 * Retry delay calculation for redelivered messages.
 */

export interface BackoffOptions {
  baseMs: number
  maxMs: number
  multiplier?: number
  /** Fraction of the delay used as symmetric jitter, e.g. 0.1 for ±10% */
  jitter?: number
  random?: () => number
}

/**
 * Exponential backoff with jitter. `attempt` is 1-indexed: attempt 1 waits
 * about `baseMs`, attempt 2 about `baseMs * multiplier`, capped at `maxMs`.
 */
export function computeBackoff(attempt: number, options: BackoffOptions): number {
  const multiplier = options.multiplier ?? 2
  const jitterRatio = options.jitter ?? 0.1
  const random = options.random ?? Math.random

  const exponent = Math.max(0, attempt - 1)
  const delay = Math.min(options.baseMs * Math.pow(multiplier, exponent), options.maxMs)
  const jitter = delay * jitterRatio
  return Math.max(0, Math.floor(delay + (random() * 2 - 1) * jitter))
}
