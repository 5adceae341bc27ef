/**
 * Core types for Conveyor
 * Shared type definitions used across all modules
 */

/** Unique identifier for a job */
export type JobId = string

/** Status of a job */
export type JobStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled'

/** All job statuses in lifecycle order */
export const JOB_STATUSES: readonly JobStatus[] = [
  'pending',
  'running',
  'completed',
  'failed',
  'cancelled',
] as const

/** Statuses a job never leaves */
export const TERMINAL_STATUSES: readonly JobStatus[] = ['completed', 'failed', 'cancelled'] as const

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status)
}

export function isJobStatus(value: string): value is JobStatus {
  return (JOB_STATUSES as readonly string[]).includes(value)
}

/** Severity level for persisted job log lines */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'] as const

/** Source of wall-clock milliseconds; injected so timing can be driven in tests */
export interface Clock {
  now(): number
}

export const systemClock: Clock = {
  now: () => Date.now(),
}
