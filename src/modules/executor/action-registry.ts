/**
 * ActionRegistry: (step type, action) → step action.
 *
 * Each action declares how its step completes:
 *  - inline:   run() does the work; the step completes when it returns
 *  - fanout:   run() creates and enqueues work jobs; the completion probe
 *              completes the step once they settle
 *  - deferred: run() starts a workflow that completes the step itself
 */

import type { LogLevel } from '../../core/types.js'
import type { JobRecord } from '../job-store/types.js'
import type { StepDefinition, StepType } from './definition-schema.js'

export type ActionMode = 'inline' | 'fanout' | 'deferred'

export interface ActionContext {
  /** The step job, running */
  step: JobRecord
  definition: StepDefinition
  manager: JobRecord
  signal: AbortSignal
  log(level: LogLevel, message: string): void
}

export interface ActionResult {
  result?: unknown
  resultCount?: number
}

export interface StepAction {
  readonly mode: ActionMode
  run(ctx: ActionContext): Promise<ActionResult>
}

export class ActionRegistry {
  private readonly _actions = new Map<string, StepAction>()

  /**
   * @throws {Error} when the pair is already registered
   */
  register(stepType: StepType, action: string, impl: StepAction): void {
    const key = actionKey(stepType, action)
    if (this._actions.has(key)) {
      throw new Error(`Action "${key}" is already registered`)
    }
    this._actions.set(key, impl)
  }

  resolve(stepType: StepType, action: string): StepAction | undefined {
    return this._actions.get(actionKey(stepType, action))
  }

  get keys(): string[] {
    return [...this._actions.keys()]
  }
}

function actionKey(stepType: string, action: string): string {
  return `${stepType}:${action}`
}
