/**
 * Queue module: public API exports.
 */

export type {
  DeadLetter,
  DurableQueue,
  EnqueueOptions,
  EnqueueResult,
  Lease,
  LeasedMessage,
  PurgeDeadLettersResult,
  QueueCounts,
  QueueMessage,
  QueueOptions,
  QueuedMessageInfo,
} from './durable-queue.js'
export { SqliteDurableQueue, createDurableQueue, DEFAULT_QUEUE_OPTIONS } from './durable-queue-impl.js'
export { computeBackoff } from './backoff.js'
export type { BackoffOptions } from './backoff.js'
