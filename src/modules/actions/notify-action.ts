/**
 * Notify step action: publish a message on a named channel.
 *
 * Delivery is an event on the bus plus a job log line; subscribers decide
 * where a channel goes.
 */

import { TerminalError } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { ActionContext, ActionResult, StepAction } from '../executor/action-registry.js'

export class NotifyAction implements StepAction {
  readonly mode = 'inline' as const

  constructor(private readonly _eventBus?: TypedEventBus) {}

  async run(ctx: ActionContext): Promise<ActionResult> {
    if (ctx.definition.type !== 'notify') {
      throw new TerminalError(`Notify action cannot run a ${ctx.definition.type} step`, 'INVALID_STEP')
    }
    const { channel, message } = ctx.definition.config
    ctx.log('info', `[${channel}] ${message}`)
    this._eventBus?.emit('notification:published', { jobId: ctx.step.id, channel, message })
    return { result: { channel, message }, resultCount: 1 }
  }
}
