/**
 * Maintenance step actions: retention cleanup of finished job trees and of
 * dead-lettered messages. Both honour `dry_run`.
 */

import { TerminalError } from '../../core/errors.js'
import type { DurableQueue } from '../queue/durable-queue.js'
import type { JobLifecycle } from '../hierarchy/job-lifecycle.js'
import type { ActionContext, ActionResult, StepAction } from '../executor/action-registry.js'
import type { MaintenanceStepConfig } from '../executor/definition-schema.js'

const HOUR_MS = 3_600_000

function maintenanceConfig(ctx: ActionContext): MaintenanceStepConfig {
  if (ctx.definition.type !== 'maintenance') {
    throw new TerminalError(`Maintenance action cannot run a ${ctx.definition.type} step`, 'INVALID_STEP')
  }
  return ctx.definition.config
}

export class PurgeJobsAction implements StepAction {
  readonly mode = 'inline' as const

  constructor(private readonly _lifecycle: JobLifecycle) {}

  async run(ctx: ActionContext): Promise<ActionResult> {
    const config = maintenanceConfig(ctx)
    const report = this._lifecycle.cleanup({
      olderThanHours: config.older_than_hours,
      statuses: config.statuses,
      dryRun: config.dry_run,
    })
    ctx.log(
      'info',
      report.dryRun
        ? `Dry run: ${String(report.jobIds.length)} job tree(s) would be purged`
        : `Purged ${String(report.jobIds.length)} job tree(s) (${String(report.deletedJobs)} job(s))`,
    )
    return {
      result: { dry_run: report.dryRun, job_ids: report.jobIds, deleted_jobs: report.deletedJobs },
      resultCount: report.jobIds.length,
    }
  }
}

export class PurgeDeadLettersAction implements StepAction {
  readonly mode = 'inline' as const

  constructor(private readonly _queue: DurableQueue) {}

  async run(ctx: ActionContext): Promise<ActionResult> {
    const config = maintenanceConfig(ctx)
    const { dryRun, ids } = this._queue.purgeDeadLetters(config.older_than_hours * HOUR_MS, config.dry_run)
    ctx.log(
      'info',
      dryRun
        ? `Dry run: ${String(ids.length)} dead letter(s) would be purged`
        : `Purged ${String(ids.length)} dead letter(s)`,
    )
    return { result: { dry_run: dryRun, ids }, resultCount: ids.length }
  }
}
