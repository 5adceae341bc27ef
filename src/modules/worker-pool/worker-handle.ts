/**
 * WorkerHandle: one receive loop of the worker pool.
 *
 * Responsibilities:
 *  - Repeatedly asking the pool to process the next visible message
 *  - Sleeping for the poll interval while the queue is empty
 *  - Exposing what it is working on for status snapshots
 *  - Stopping after the in-flight message when asked
 */

import { sleepWithSignal } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('worker-pool:worker')

/** Processes at most one message; resolves false when nothing was visible */
export type ProcessNextFn = (handle: WorkerHandle) => Promise<boolean>

export interface CurrentMessage {
  messageId: string
  type: string
  jobId: string | null
  startedAt: Date
}

export class WorkerHandle {
  readonly workerId: string
  readonly startedAt: Date

  private readonly _processNext: ProcessNextFn
  private readonly _pollIntervalMs: number
  private readonly _stopController = new AbortController()
  private _loop: Promise<void> | null = null
  private _current: CurrentMessage | null = null

  constructor(workerId: string, processNext: ProcessNextFn, pollIntervalMs: number) {
    this.workerId = workerId
    this._processNext = processNext
    this._pollIntervalMs = pollIntervalMs
    this.startedAt = new Date()
  }

  /**
   * Start the loop. Must be called exactly once.
   */
  start(): void {
    if (this._loop !== null) {
      throw new Error(`Worker ${this.workerId} already started`)
    }
    this._loop = this._run()
  }

  /** Stop receiving; the in-flight message (if any) finishes first */
  requestStop(): void {
    this._stopController.abort()
  }

  /** Resolves once the loop has exited */
  async done(): Promise<void> {
    if (this._loop !== null) {
      await this._loop
    }
  }

  get current(): CurrentMessage | null {
    return this._current
  }

  get stopping(): boolean {
    return this._stopController.signal.aborted
  }

  setCurrent(current: CurrentMessage | null): void {
    this._current = current
  }

  private async _run(): Promise<void> {
    const signal = this._stopController.signal
    logger.debug({ workerId: this.workerId }, 'Worker loop started')
    while (!signal.aborted) {
      let processed = false
      try {
        processed = await this._processNext(this)
      } catch (err) {
        // Queue or store failures outside a handler; back off and keep looping
        logger.error({ workerId: this.workerId, err }, 'Worker iteration failed')
      }
      if (!processed && !signal.aborted) {
        await sleepWithSignal(this._pollIntervalMs, signal)
      }
    }
    logger.debug({ workerId: this.workerId }, 'Worker loop stopped')
  }
}
