/**
 * DurableQueue: persistent at-least-once message queue.
 *
 * A received message stays invisible until its lease expires or it is
 * deleted. Messages redelivered more than the configured budget move to the
 * dead-letter table instead of looping.
 */

import type { QueueCounts } from '../../persistence/queries/queue.js'

export type { QueueCounts }

// ---------------------------------------------------------------------------
// Message types
// ---------------------------------------------------------------------------

/** A message as handed to enqueue() */
export interface QueueMessage {
  /** Handler routing key */
  type: string
  /** Job the message is about, if any */
  jobId: string | null
  payload?: Record<string, unknown>
}

/** Proof of ownership for a received message */
export interface Lease {
  messageId: string
  token: string
}

/** A message returned by receive() */
export interface LeasedMessage {
  id: string
  type: string
  jobId: string | null
  payload: Record<string, unknown>
  /** Deliveries so far, this one included */
  receiveCount: number
  enqueuedAt: number
  lastError: string | null
  lease: Lease
  /**
   * True when the message exceeded its redelivery budget. It has already been
   * moved to the dead-letter table; the lease cannot be acked.
   */
  exhausted: boolean
}

export interface EnqueueOptions {
  delayMs?: number
  /** Unique among live messages; a duplicate enqueue returns the existing message */
  dedupKey?: string
  /** Higher values are received first */
  priority?: number
  /**
   * When the dedup key is held by a message that is not leased, pull its
   * visibility forward to this enqueue's if that is sooner
   */
  advanceDuplicate?: boolean
}

export interface EnqueueResult {
  messageId: string
  created: boolean
}

export interface DeadLetter {
  id: string
  type: string
  jobId: string | null
  payload: Record<string, unknown>
  receiveCount: number
  lastError: string | null
  enqueuedAt: number
  deadLetteredAt: number
}

/** Read-only view of a live message */
export interface QueuedMessageInfo {
  id: string
  type: string
  jobId: string | null
  payload: Record<string, unknown>
  receiveCount: number
  visibleAt: number
  dedupKey: string | null
}

export interface PurgeDeadLettersResult {
  dryRun: boolean
  ids: string[]
}

export interface QueueOptions {
  /** Visibility timeout applied on receive */
  leaseMs: number
  /** Deliveries allowed before a message is dead-lettered */
  maxReceives: number
}

// ---------------------------------------------------------------------------
// DurableQueue interface
// ---------------------------------------------------------------------------

export interface DurableQueue {
  enqueue(message: QueueMessage, options?: EnqueueOptions): EnqueueResult

  /** Shorthand for enqueue() with a visibility delay */
  enqueueWithDelay(message: QueueMessage, delayMs: number, options?: Omit<EnqueueOptions, 'delayMs'>): EnqueueResult

  /** Lease the next visible message, or null when none is visible */
  receive(): LeasedMessage | null

  /** Ack a message. False when the lease was lost */
  delete(lease: Lease): boolean

  /** Push the lease expiry to now + durationMs. False when the lease was lost */
  extend(lease: Lease, durationMs: number): boolean

  /**
   * Reschedule a message on purpose (self-requeue). Resets its redelivery
   * count; an optional payload replaces the stored one.
   */
  requeue(lease: Lease, delayMs: number, payload?: Record<string, unknown>): boolean

  /** Give a failed message back for retry after delayMs, keeping its redelivery count */
  release(lease: Lease, delayMs: number, error?: string): boolean

  stats(): QueueCounts

  /** Live messages in enqueue order, optionally of one type */
  listMessages(type?: string): QueuedMessageInfo[]

  /** When the next message becomes visible (leased ones included), or null when empty */
  nextVisibleAt(): number | null

  listDeadLetters(limit?: number): DeadLetter[]

  /** Move a dead letter back onto the queue with a fresh redelivery budget */
  redriveDeadLetter(id: string): EnqueueResult

  purgeDeadLetters(olderThanMs: number, dryRun: boolean): PurgeDeadLettersResult
}
