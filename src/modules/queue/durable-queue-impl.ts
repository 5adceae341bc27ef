/**
 * SQLite-backed implementation of DurableQueue.
 */

import { randomUUID } from 'node:crypto'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Clock } from '../../core/types.js'
import { systemClock } from '../../core/types.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import { DeadLetterNotFoundError } from '../../core/errors.js'
import {
  advanceMessage,
  countMessages,
  deleteDeadLetterRow,
  deleteLeasedMessage,
  extendLeasedMessage,
  getDeadLetterRow,
  getMessageByDedupKey,
  insertMessage,
  leaseMessage,
  getNextVisibleAt,
  listDeadLetterRows,
  listDeadLettersBefore,
  listMessageRows,
  moveToDeadLetters,
  peekVisibleMessage,
  releaseLeasedMessage,
} from '../../persistence/queries/queue.js'
import type { DeadLetterRow, QueueCounts } from '../../persistence/queries/queue.js'
import { isPlainObject } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type {
  DeadLetter,
  DurableQueue,
  EnqueueOptions,
  EnqueueResult,
  Lease,
  LeasedMessage,
  PurgeDeadLettersResult,
  QueueMessage,
  QueueOptions,
  QueuedMessageInfo,
} from './durable-queue.js'

const logger = createLogger('queue')

export const DEFAULT_QUEUE_OPTIONS: QueueOptions = {
  leaseMs: 30_000,
  maxReceives: 5,
}

function decodePayload(raw: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(raw)
  return isPlainObject(parsed) ? parsed : {}
}

function toDeadLetter(row: DeadLetterRow): DeadLetter {
  return {
    id: row.id,
    type: row.type,
    jobId: row.job_id,
    payload: decodePayload(row.payload),
    receiveCount: row.receive_count,
    lastError: row.last_error,
    enqueuedAt: row.enqueued_at,
    deadLetteredAt: row.dead_lettered_at,
  }
}

// ---------------------------------------------------------------------------
// SqliteDurableQueue
// ---------------------------------------------------------------------------

export class SqliteDurableQueue implements DurableQueue {
  private readonly _db: BetterSqlite3Database
  private readonly _options: QueueOptions
  private readonly _clock: Clock
  private readonly _eventBus: TypedEventBus | undefined

  constructor(
    db: BetterSqlite3Database,
    options: Partial<QueueOptions> = {},
    clock: Clock = systemClock,
    eventBus?: TypedEventBus,
  ) {
    this._db = db
    this._options = { ...DEFAULT_QUEUE_OPTIONS, ...options }
    this._clock = clock
    this._eventBus = eventBus
  }

  enqueue(message: QueueMessage, options: EnqueueOptions = {}): EnqueueResult {
    const now = this._clock.now()
    const id = randomUUID()
    const dedupKey = options.dedupKey ?? null

    const visibleAt = now + Math.max(0, options.delayMs ?? 0)

    const created = insertMessage(this._db, {
      id,
      type: message.type,
      job_id: message.jobId,
      payload: JSON.stringify(message.payload ?? {}),
      priority: options.priority ?? 0,
      visible_at: visibleAt,
      enqueued_at: now,
      dedup_key: dedupKey,
    })

    if (!created && dedupKey !== null) {
      const existing = getMessageByDedupKey(this._db, dedupKey)
      if (existing !== undefined) {
        if (options.advanceDuplicate === true) {
          advanceMessage(this._db, existing.id, visibleAt, now)
        }
        logger.debug({ type: message.type, dedupKey, messageId: existing.id }, 'Enqueue deduplicated')
        return { messageId: existing.id, created: false }
      }
    }

    logger.debug({ type: message.type, jobId: message.jobId, messageId: id, delayMs: options.delayMs ?? 0 }, 'Message enqueued')
    return { messageId: id, created: true }
  }

  enqueueWithDelay(
    message: QueueMessage,
    delayMs: number,
    options: Omit<EnqueueOptions, 'delayMs'> = {},
  ): EnqueueResult {
    return this.enqueue(message, { ...options, delayMs })
  }

  receive(): LeasedMessage | null {
    const claim = this._db.transaction((): LeasedMessage | null => {
      const now = this._clock.now()
      const candidate = peekVisibleMessage(this._db, now)
      if (candidate === undefined) {
        return null
      }

      const token = randomUUID()
      const row = leaseMessage(this._db, candidate.id, token, now + this._options.leaseMs)
      if (row === undefined) {
        return null
      }

      const exhausted = row.receive_count > this._options.maxReceives
      if (exhausted) {
        moveToDeadLetters(this._db, row.id, now)
      }

      return {
        id: row.id,
        type: row.type,
        jobId: row.job_id,
        payload: decodePayload(row.payload),
        receiveCount: row.receive_count,
        enqueuedAt: row.enqueued_at,
        lastError: row.last_error,
        lease: { messageId: row.id, token },
        exhausted,
      }
    })

    const message = claim.immediate()
    if (message?.exhausted === true) {
      logger.warn(
        { messageId: message.id, type: message.type, jobId: message.jobId, receiveCount: message.receiveCount },
        'Message exceeded redelivery budget; moved to dead letters',
      )
      this._eventBus?.emit('queue:dead-lettered', {
        messageId: message.id,
        type: message.type,
        jobId: message.jobId,
        receiveCount: message.receiveCount,
      })
    }
    return message
  }

  delete(lease: Lease): boolean {
    const deleted = deleteLeasedMessage(this._db, lease.messageId, lease.token)
    if (!deleted) {
      logger.debug({ messageId: lease.messageId }, 'Delete ignored: lease lost')
    }
    return deleted
  }

  extend(lease: Lease, durationMs: number): boolean {
    return extendLeasedMessage(this._db, lease.messageId, lease.token, this._clock.now() + durationMs)
  }

  requeue(lease: Lease, delayMs: number, payload?: Record<string, unknown>): boolean {
    return releaseLeasedMessage(this._db, {
      id: lease.messageId,
      token: lease.token,
      visible_at: this._clock.now() + Math.max(0, delayMs),
      reset_receives: 1,
      last_error: null,
      payload: payload === undefined ? null : JSON.stringify(payload),
    })
  }

  release(lease: Lease, delayMs: number, error?: string): boolean {
    return releaseLeasedMessage(this._db, {
      id: lease.messageId,
      token: lease.token,
      visible_at: this._clock.now() + Math.max(0, delayMs),
      reset_receives: 0,
      last_error: error ?? null,
      payload: null,
    })
  }

  stats(): QueueCounts {
    return countMessages(this._db, this._clock.now())
  }

  listMessages(type?: string): QueuedMessageInfo[] {
    return listMessageRows(this._db, type).map((row) => ({
      id: row.id,
      type: row.type,
      jobId: row.job_id,
      payload: decodePayload(row.payload),
      receiveCount: row.receive_count,
      visibleAt: row.visible_at,
      dedupKey: row.dedup_key,
    }))
  }

  nextVisibleAt(): number | null {
    return getNextVisibleAt(this._db)
  }

  listDeadLetters(limit = 100): DeadLetter[] {
    return listDeadLetterRows(this._db, limit).map(toDeadLetter)
  }

  redriveDeadLetter(id: string): EnqueueResult {
    const redrive = this._db.transaction((): EnqueueResult => {
      const row = getDeadLetterRow(this._db, id)
      if (row === undefined) {
        throw new DeadLetterNotFoundError(id)
      }
      const result = this.enqueue(
        { type: row.type, jobId: row.job_id, payload: decodePayload(row.payload) },
        row.dedup_key === null ? {} : { dedupKey: row.dedup_key },
      )
      deleteDeadLetterRow(this._db, id)
      return result
    })
    const result = redrive()
    logger.info({ deadLetterId: id, messageId: result.messageId }, 'Dead letter redriven')
    return result
  }

  purgeDeadLetters(olderThanMs: number, dryRun: boolean): PurgeDeadLettersResult {
    const cutoff = this._clock.now() - olderThanMs
    const rows = listDeadLettersBefore(this._db, cutoff)
    const ids = rows.map((r) => r.id)
    if (!dryRun) {
      const purge = this._db.transaction(() => {
        for (const id of ids) deleteDeadLetterRow(this._db, id)
      })
      purge()
    }
    logger.info({ count: ids.length, dryRun }, 'Dead letters purged')
    return { dryRun, ids }
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createDurableQueue(
  db: BetterSqlite3Database,
  options: Partial<QueueOptions> = {},
  clock: Clock = systemClock,
  eventBus?: TypedEventBus,
): DurableQueue {
  return new SqliteDurableQueue(db, options, clock, eventBus)
}
