/**
 * Drive a worker pool one message at a time, jumping a manual clock to the
 * next visible message whenever the queue has nothing ready.
 */

import type { DurableQueue } from '../../src/modules/queue/durable-queue.js'
import type { WorkerPool } from '../../src/modules/worker-pool/worker-pool.js'
import type { ManualClock } from './clock.js'

export async function drain(pool: WorkerPool, queue: DurableQueue, clock: ManualClock, maxTurns = 500): Promise<number> {
  let processed = 0
  for (let turn = 0; turn < maxTurns; turn++) {
    if (await pool.processNext()) {
      processed++
      continue
    }
    const next = queue.nextVisibleAt()
    if (next === null) {
      return processed
    }
    clock.set(Math.max(clock.now(), next))
  }
  throw new Error(`Queue did not drain within ${maxTurns} turns`)
}
