/**
 * Zod validation schemas for the Conveyor configuration system.
 *
 * Defines schemas for all config sections:
 *  - database, queue, workers
 *  - completion probe and orchestrator timing
 *  - retention, LLM provider and crawler settings
 *  - full config document
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const DatabaseConfigSchema = z
  .object({
    /** SQLite file path; ":memory:" for a private in-memory database */
    path: z.string().min(1),
  })
  .strict()

export const QueueConfigSchema = z
  .object({
    lease_ms: z.number().int().positive(),
    /** Deliveries allowed before a message is dead-lettered */
    max_receives: z.number().int().min(1).max(100),
    poll_interval_ms: z.number().int().positive(),
    retry_base_ms: z.number().int().positive(),
    retry_max_ms: z.number().int().positive(),
  })
  .strict()

export type QueueConfig = z.infer<typeof QueueConfigSchema>

export const WorkersConfigSchema = z
  .object({
    concurrency: z.number().int().min(1).max(64),
    shutdown_timeout_ms: z.number().int().min(0),
    heartbeat_interval_ms: z.number().int().positive(),
  })
  .strict()

export type WorkersConfig = z.infer<typeof WorkersConfigSchema>

export const ProbeConfigSchema = z
  .object({
    /** Delay before the first probe after a fan-out */
    initial_delay_ms: z.number().int().min(0),
    /** Minimum gap between the two zero observations */
    staleness_ms: z.number().int().positive(),
    /** Delay used when child activity resets the observation */
    reschedule_delay_ms: z.number().int().positive(),
    /** Fan-outs older than this are force-completed as possibly incomplete */
    max_age_ms: z.number().int().positive(),
    /** Recheck interval for a probe that found active children */
    safety_recheck_ms: z.number().int().positive(),
  })
  .strict()

export type ProbeConfig = z.infer<typeof ProbeConfigSchema>

export const OrchestratorConfigSchema = z
  .object({
    wait_interval_ms: z.number().int().positive(),
    wait_timeout_ms: z.number().int().positive(),
    max_replans: z.number().int().min(0).max(5),
  })
  .strict()

export type OrchestratorConfig = z.infer<typeof OrchestratorConfigSchema>

export const RetentionConfigSchema = z
  .object({
    older_than_hours: z.number().positive(),
    statuses: z.array(z.enum(['completed', 'failed', 'cancelled'])).min(1),
  })
  .strict()

export type RetentionConfig = z.infer<typeof RetentionConfigSchema>

export const LlmConfigSchema = z
  .object({
    provider: z.enum(['openai', 'none']),
    model: z.string().min(1),
    /** Name of the environment variable that holds the API key */
    api_key_env: z.string().min(1),
    base_url: z.string().url().optional(),
    timeout_ms: z.number().int().positive(),
  })
  .strict()

export type LlmConfig = z.infer<typeof LlmConfigSchema>

export const CrawlerConfigSchema = z
  .object({
    user_agent: z.string().min(1),
    request_timeout_ms: z.number().int().positive(),
    /** Response bodies beyond this size are truncated */
    max_body_bytes: z.number().int().positive(),
  })
  .strict()

export type CrawlerConfig = z.infer<typeof CrawlerConfigSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

export const CURRENT_CONFIG_FORMAT_VERSION = '1'

export const ConveyorConfigSchema = z
  .object({
    config_format_version: z.literal(CURRENT_CONFIG_FORMAT_VERSION),
    log_level: LogLevelSchema,
    database: DatabaseConfigSchema,
    queue: QueueConfigSchema,
    workers: WorkersConfigSchema,
    probe: ProbeConfigSchema,
    orchestrator: OrchestratorConfigSchema,
    retention: RetentionConfigSchema,
    llm: LlmConfigSchema,
    crawler: CrawlerConfigSchema,
  })
  .strict()
  .superRefine((config, ctx) => {
    if (config.queue.retry_max_ms < config.queue.retry_base_ms) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['queue', 'retry_max_ms'],
        message: 'retry_max_ms must be at least retry_base_ms',
      })
    }
    if (config.workers.heartbeat_interval_ms >= config.queue.lease_ms) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['workers', 'heartbeat_interval_ms'],
        message: 'heartbeat_interval_ms must be shorter than queue.lease_ms',
      })
    }
  })

export type ConveyorConfig = z.infer<typeof ConveyorConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (one layer of the hierarchy, before merging)
// ---------------------------------------------------------------------------

export const PartialConveyorConfigSchema = z
  .object({
    config_format_version: z.literal(CURRENT_CONFIG_FORMAT_VERSION).optional(),
    log_level: LogLevelSchema.optional(),
    database: DatabaseConfigSchema.partial().optional(),
    queue: QueueConfigSchema.partial().optional(),
    workers: WorkersConfigSchema.partial().optional(),
    probe: ProbeConfigSchema.partial().optional(),
    orchestrator: OrchestratorConfigSchema.partial().optional(),
    retention: RetentionConfigSchema.partial().optional(),
    llm: LlmConfigSchema.partial().optional(),
    crawler: CrawlerConfigSchema.partial().optional(),
  })
  .strict()

export type PartialConveyorConfig = z.infer<typeof PartialConveyorConfigSchema>
