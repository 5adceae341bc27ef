/**
 * CompletionProbe: decides when a fanned-out subtree has finished.
 *
 * A fan-out parent stays running with `awaiting_children` set. The probe is a
 * self-requeuing control message that re-reads the parent's live counters and
 * completes it only after two zero observations separated by the staleness
 * gap, with no child activity (heartbeat) in between.
 */

import type { JobId } from '../../core/types.js'
import type { JobRecord } from '../job-store/types.js'
import type { LeasedMessage } from '../queue/durable-queue.js'
import type { HandlerContext, HandlerOutcome } from '../worker-pool/handler-registry.js'
import type { HandlerRegistry } from '../worker-pool/handler-registry.js'

export const PROBE_MESSAGE_TYPE = 'completion_probe'

export interface CompletionProbeOptions {
  initialDelayMs: number
  stalenessMs: number
  rescheduleDelayMs: number
  maxAgeMs: number
  safetyRecheckMs: number
}

export const DEFAULT_PROBE_OPTIONS: CompletionProbeOptions = {
  initialDelayMs: 500,
  stalenessMs: 2_000,
  rescheduleDelayMs: 1_000,
  maxAgeMs: 21_600_000,
  safetyRecheckMs: 30_000,
}

/** Terminal status the probe records once a subtree settles */
export type ProbeVerdict =
  | { status: 'completed' }
  | { status: 'failed'; error: string; code: string }

/**
 * Hooks through which the owner of fan-out jobs (the executor) shapes what
 * the probe does with a settled subtree.
 */
export interface ProbeDelegate {
  /** Defaults to completed */
  decide?(job: JobRecord): ProbeVerdict
  /** Called in the transaction that records the terminal status on the job */
  onSettled?(job: JobRecord): void
  /** Run-time budget of the job measured from its start, if any */
  timeoutMs?(job: JobRecord): number | undefined
}

export interface CompletionProbe {
  /**
   * Schedule a probe for `jobId`. A probe already waiting for the same job is
   * pulled forward instead of duplicated.
   */
  schedule(jobId: JobId, delayMs?: number): void

  /** Queue handler for probe messages (control lifecycle) */
  handle(ctx: HandlerContext): Promise<HandlerOutcome>

  /** Force-complete the job of a probe that exhausted its redeliveries */
  onDeadLetter(message: LeasedMessage): void

  /** Install the hooks of the component that owns fan-out jobs */
  setDelegate(delegate: ProbeDelegate): void

  /** Register the probe handler on a registry */
  register(registry: HandlerRegistry): void
}
