/**
 * ConveyorEvents interface: defines all typed events for the event bus.
 *
 * Event naming convention: {module}:{action} (e.g., "job:status", "probe:rescheduled").
 * Events are notification only; no control flow depends on a subscriber.
 */

import type { JobId, JobStatus, LogLevel } from './types.js'

/**
 * Complete typed map of all events emitted on the event bus.
 * Use `keyof ConveyorEvents` to constrain event keys.
 */
export interface ConveyorEvents {
  // -------------------------------------------------------------------------
  // Job lifecycle events
  // -------------------------------------------------------------------------

  /** A job row was inserted */
  'job:created': { jobId: JobId; parentId: JobId | null; type: string; name: string }

  /** A job changed status */
  'job:status': { jobId: JobId; from: JobStatus; to: JobStatus; error?: string }

  /** A parent was confirmed complete by the completion probe */
  'job:completed': { jobId: JobId; possiblyIncomplete: boolean }

  /** A line was appended to a job's log */
  'job:log': { jobId: JobId; level: LogLevel; message: string }

  // -------------------------------------------------------------------------
  // Queue / probe events
  // -------------------------------------------------------------------------

  /** A message exceeded its redelivery budget */
  'queue:dead-lettered': { messageId: string; type: string; jobId: JobId | null; receiveCount: number }

  /** A completion probe found the subtree not yet settled */
  'probe:rescheduled': { jobId: JobId; reason: 'heartbeat' | 'first-observation'; delayMs: number }

  // -------------------------------------------------------------------------
  // Executor / orchestrator events
  // -------------------------------------------------------------------------

  /** A manager moved to its next step */
  'step:advanced': { managerId: JobId; stepId: JobId; stepName: string; index: number }

  /** The planner produced a plan */
  'orchestrator:planned': { stepId: JobId; iteration: number; toolCalls: number }

  /** The reviewer judged the collected results */
  'orchestrator:reviewed': { stepId: JobId; iteration: number; goalAchieved: boolean; confidence: number }

  /** A notify step published a message */
  'notification:published': { jobId: JobId; channel: string; message: string }
}
