/**
 * Zod schemas for job definition files (YAML or JSON).
 *
 * A definition is an ordered list of steps. Each step is a tagged union on
 * `type`; the `action` picks the handler within that type.
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Step fields shared by every step type
// ---------------------------------------------------------------------------

export const OnErrorPolicySchema = z.enum(['fail', 'continue', 'retry'])
export type OnErrorPolicy = z.infer<typeof OnErrorPolicySchema>

const stepCommon = {
  name: z.string().min(1, 'Step name is required'),
  description: z.string().optional(),
  on_error: OnErrorPolicySchema.default('fail'),
  max_attempts: z.number().int().min(1).max(20).default(3),
  retry_delay_ms: z.number().int().min(0).default(1000),
  timeout_ms: z.number().int().positive().optional(),
}

// ---------------------------------------------------------------------------
// Step configs
// ---------------------------------------------------------------------------

export const CrawlStepConfigSchema = z
  .object({
    seeds: z.array(z.string().url()).min(1, 'A crawl step needs at least one seed URL'),
    max_depth: z.number().int().min(0).default(1),
    max_pages: z.number().int().positive().default(100),
    follow_links: z.boolean().default(true),
    include_patterns: z.array(z.string()).default([]),
    exclude_patterns: z.array(z.string()).default([]),
  })
  .strict()

export type CrawlStepConfig = z.infer<typeof CrawlStepConfigSchema>

export const OrchestrateStepConfigSchema = z
  .object({
    goal: z.string().min(1, 'An orchestrate step needs a goal'),
    tools: z.array(z.string().min(1)).min(1, 'An orchestrate step needs at least one tool'),
    max_replans: z.number().int().min(0).max(5).optional(),
    wait_interval_ms: z.number().int().positive().optional(),
    wait_timeout_ms: z.number().int().positive().optional(),
  })
  .strict()

export type OrchestrateStepConfig = z.infer<typeof OrchestrateStepConfigSchema>

export const NotifyStepConfigSchema = z
  .object({
    channel: z.string().min(1).default('default'),
    message: z.string().min(1),
  })
  .strict()

export const MaintenanceStepConfigSchema = z
  .object({
    older_than_hours: z.number().positive(),
    statuses: z.array(z.enum(['completed', 'failed', 'cancelled'])).default(['completed', 'failed', 'cancelled']),
    dry_run: z.boolean().default(false),
  })
  .strict()

export type MaintenanceStepConfig = z.infer<typeof MaintenanceStepConfigSchema>

// ---------------------------------------------------------------------------
// StepDefinitionSchema
// ---------------------------------------------------------------------------

export const CrawlStepSchema = z
  .object({
    ...stepCommon,
    type: z.literal('crawl'),
    action: z.literal('crawl').default('crawl'),
    config: CrawlStepConfigSchema,
  })
  .strict()

export const IndexStepSchema = z
  .object({
    ...stepCommon,
    type: z.literal('index'),
    action: z.literal('rebuild').default('rebuild'),
    config: z.object({}).strict().default({}),
  })
  .strict()

export const OrchestrateStepSchema = z
  .object({
    ...stepCommon,
    type: z.literal('orchestrate'),
    action: z.literal('plan_execute_review').default('plan_execute_review'),
    config: OrchestrateStepConfigSchema,
  })
  .strict()

export const NotifyStepSchema = z
  .object({
    ...stepCommon,
    type: z.literal('notify'),
    action: z.literal('publish').default('publish'),
    config: NotifyStepConfigSchema,
  })
  .strict()

export const MaintenanceStepSchema = z
  .object({
    ...stepCommon,
    type: z.literal('maintenance'),
    action: z.enum(['purge_jobs', 'purge_dead_letters']),
    config: MaintenanceStepConfigSchema,
  })
  .strict()

export const StepDefinitionSchema = z.discriminatedUnion('type', [
  CrawlStepSchema,
  IndexStepSchema,
  OrchestrateStepSchema,
  NotifyStepSchema,
  MaintenanceStepSchema,
])

export type StepDefinition = z.infer<typeof StepDefinitionSchema>
export type StepType = StepDefinition['type']

// ---------------------------------------------------------------------------
// JobDefinitionSchema
// ---------------------------------------------------------------------------

export const DEFINITION_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/

export const ErrorToleranceSchema = z
  .object({
    max_child_failures: z.number().int().min(0),
    failure_action: z.enum(['continue', 'fail']).default('fail'),
  })
  .strict()

export type ErrorTolerance = z.infer<typeof ErrorToleranceSchema>

export const JobDefinitionSchema = z
  .object({
    id: z.string().regex(DEFINITION_ID_PATTERN, 'Definition id may contain letters, digits, "_", "-" and "."'),
    name: z.string().min(1, 'Definition name is required'),
    description: z.string().optional(),
    enabled: z.boolean().default(true),
    tags: z.array(z.string()).default([]),
    timeout_ms: z.number().int().positive().optional(),
    pre_jobs: z.array(z.string()).default([]),
    post_jobs: z.array(z.string()).default([]),
    error_tolerance: ErrorToleranceSchema.optional(),
    steps: z.array(StepDefinitionSchema).min(1, 'A definition needs at least one step'),
  })
  .strict()
  .superRefine((def, ctx) => {
    const seen = new Set<string>()
    def.steps.forEach((step, index) => {
      if (seen.has(step.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['steps', index, 'name'],
          message: `Duplicate step name "${step.name}"`,
        })
      }
      seen.add(step.name)
    })
    for (const key of ['pre_jobs', 'post_jobs'] as const) {
      if (def[key].includes(def.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `Definition "${def.id}" cannot list itself in ${key}`,
        })
      }
    }
  })

export type JobDefinition = z.infer<typeof JobDefinitionSchema>

/** Raw parsed document before Zod validation */
export type RawJobDefinition = unknown

// ---------------------------------------------------------------------------
// Validation helpers
// ---------------------------------------------------------------------------

export type DefinitionValidation =
  | { ok: true; definition: JobDefinition }
  | { ok: false; error: string }

/**
 * Validate a raw definition, flattening zod issues into one readable line per issue.
 */
export function validateDefinition(raw: RawJobDefinition): DefinitionValidation {
  const result = JobDefinitionSchema.safeParse(raw)
  if (result.success) {
    return { ok: true, definition: result.data }
  }
  return { ok: false, error: formatZodIssues(result.error) }
}

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)'
      return `${path}: ${issue.message}`
    })
    .join('; ')
}
