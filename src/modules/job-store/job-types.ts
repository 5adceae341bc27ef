/**
 * Job types and their typed configs.
 *
 * Every job row carries a `type` discriminant. Its config is validated
 * against the matching schema when the job is created, so unknown types and
 * malformed configs are rejected before anything is enqueued.
 */

import { z } from 'zod'
import {
  formatZodIssues,
  JobDefinitionSchema,
  StepDefinitionSchema,
} from '../executor/definition-schema.js'
import { JobValidationError } from '../../core/errors.js'

// ---------------------------------------------------------------------------
// Job type names
// ---------------------------------------------------------------------------

export const JOB_TYPES = [
  'manager',
  'step',
  'crawl_page',
  'orchestrator_planning',
  'tool_call',
  'orchestrator_wait',
  'orchestrator_review',
] as const

export type JobType = (typeof JOB_TYPES)[number]

export function isJobType(value: string): value is JobType {
  return (JOB_TYPES as readonly string[]).includes(value)
}

/**
 * Work job types that can run as a root of their own (rerun, copy). Their
 * queue message type is the job type.
 */
export const STANDALONE_JOB_TYPES: readonly JobType[] = ['crawl_page', 'tool_call']

// ---------------------------------------------------------------------------
// Config schemas per job type
// ---------------------------------------------------------------------------

export const JobTriggerSchema = z.enum(['manual', 'pre_job', 'post_job', 'rerun', 'maintenance'])
export type JobTrigger = z.infer<typeof JobTriggerSchema>

export const ManagerConfigSchema = z
  .object({
    definition: JobDefinitionSchema,
    trigger: JobTriggerSchema.default('manual'),
    triggered_by: z.string().optional(),
  })
  .strict()

export const StepJobConfigSchema = z
  .object({
    step: StepDefinitionSchema,
    index: z.number().int().min(0),
  })
  .strict()

export const CrawlPageConfigSchema = z
  .object({
    url: z.string().url(),
    depth: z.number().int().min(0),
    max_depth: z.number().int().min(0),
    max_pages: z.number().int().positive(),
    follow_links: z.boolean(),
    include_patterns: z.array(z.string()).default([]),
    exclude_patterns: z.array(z.string()).default([]),
  })
  .strict()

export const ReplanContextSchema = z
  .object({
    previous_summary: z.string(),
    missing_data: z.array(z.string()),
    recovery_actions: z.array(z.string()),
  })
  .strict()

export type ReplanContext = z.infer<typeof ReplanContextSchema>

export const PlanningConfigSchema = z
  .object({
    goal: z.string().min(1),
    tools: z.array(z.string()).min(1),
    iteration: z.number().int().min(0),
    context: ReplanContextSchema.optional(),
  })
  .strict()

export const ToolCallConfigSchema = z
  .object({
    tool: z.string().min(1),
    params: z.record(z.unknown()).default({}),
    depends_on: z.array(z.string()).default([]),
    plan_call_id: z.string().min(1),
    iteration: z.number().int().min(0),
  })
  .strict()

export const WaitConfigSchema = z
  .object({
    iteration: z.number().int().min(0),
    tool_job_ids: z.array(z.string()),
    interval_ms: z.number().int().positive(),
    timeout_ms: z.number().int().positive(),
  })
  .strict()

export const ReviewConfigSchema = z
  .object({
    goal: z.string().min(1),
    iteration: z.number().int().min(0),
  })
  .strict()

export interface JobConfigMap {
  manager: z.infer<typeof ManagerConfigSchema>
  step: z.infer<typeof StepJobConfigSchema>
  crawl_page: z.infer<typeof CrawlPageConfigSchema>
  orchestrator_planning: z.infer<typeof PlanningConfigSchema>
  tool_call: z.infer<typeof ToolCallConfigSchema>
  orchestrator_wait: z.infer<typeof WaitConfigSchema>
  orchestrator_review: z.infer<typeof ReviewConfigSchema>
}

const JOB_CONFIG_SCHEMAS: { [K in JobType]: z.ZodType<JobConfigMap[K], z.ZodTypeDef, unknown> } = {
  manager: ManagerConfigSchema,
  step: StepJobConfigSchema,
  crawl_page: CrawlPageConfigSchema,
  orchestrator_planning: PlanningConfigSchema,
  tool_call: ToolCallConfigSchema,
  orchestrator_wait: WaitConfigSchema,
  orchestrator_review: ReviewConfigSchema,
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Validate a job type name and its config.
 * @throws {JobValidationError} for unknown types or configs failing their schema
 */
export function parseJobSpec(type: string, config: unknown): { type: JobType; config: Record<string, unknown> } {
  if (!isJobType(type)) {
    throw new JobValidationError(`Unknown job type "${type}"`, { type, known: [...JOB_TYPES] })
  }
  const parsed = parseJobConfig(type, config)
  return { type, config: { ...parsed } }
}

/**
 * Parse the stored config of a job as the typed config of `type`.
 * @throws {JobValidationError} when the config does not match
 */
export function parseJobConfig<T extends JobType>(type: T, config: unknown): JobConfigMap[T] {
  const schema = JOB_CONFIG_SCHEMAS[type]
  const result = schema.safeParse(config)
  if (!result.success) {
    throw new JobValidationError(`Invalid config for job type "${type}": ${formatZodIssues(result.error)}`, {
      type,
    })
  }
  return result.data
}
