/**
 * Parsing of planner and reviewer replies.
 *
 * A plan is an ordered list of tool calls whose `depends_on` name earlier or
 * later calls of the same plan by id. The planner may instead answer with a
 * single error object. Anything that is not at least one well-formed call is
 * "no actionable plan"; nothing is ever filled in on the model's behalf.
 */

import { z } from 'zod'
import { PlanError, TerminalError } from '../../core/errors.js'
import { formatZodIssues } from '../executor/definition-schema.js'

// ---------------------------------------------------------------------------
// Plan
// ---------------------------------------------------------------------------

export const PlannedCallSchema = z.object({
  id: z.string().min(1),
  tool: z.string().min(1),
  params: z.record(z.unknown()).default({}),
  depends_on: z.array(z.string()).default([]),
})

export type PlannedCall = z.infer<typeof PlannedCallSchema>

export const PlanOutputSchema = z.union([
  z.object({ error: z.string().min(1) }).strict(),
  z.object({ tool_calls: z.array(PlannedCallSchema) }),
])

export const NO_ACTIONABLE_PLAN = 'no actionable plan'

/**
 * Parse and check a planner reply against the tools the step may use.
 * @throws {PlanError} for unparsable output, an error object or zero calls
 * @throws {TerminalError} (INVALID_PLAN) for unknown tools, duplicate ids,
 *   dangling dependencies or dependency cycles
 */
export function parsePlan(content: string, allowedTools: readonly string[]): PlannedCall[] {
  const raw = parseJson(content)
  if (raw === undefined) {
    throw new PlanError(`${NO_ACTIONABLE_PLAN}: planner output is not valid JSON`)
  }
  const parsed = PlanOutputSchema.safeParse(raw)
  if (!parsed.success) {
    throw new PlanError(`${NO_ACTIONABLE_PLAN}: ${formatZodIssues(parsed.error)}`)
  }
  if ('error' in parsed.data) {
    throw new PlanError(`${NO_ACTIONABLE_PLAN}: ${parsed.data.error}`, { plannerError: parsed.data.error })
  }
  const calls = parsed.data.tool_calls
  if (calls.length === 0) {
    throw new PlanError(NO_ACTIONABLE_PLAN)
  }

  const ids = new Set<string>()
  for (const call of calls) {
    if (ids.has(call.id)) {
      throw invalidPlan(`Duplicate tool call id "${call.id}"`)
    }
    ids.add(call.id)
    if (!allowedTools.includes(call.tool)) {
      throw invalidPlan(`Tool call "${call.id}" uses unknown tool "${call.tool}"`)
    }
  }
  for (const call of calls) {
    for (const dep of call.depends_on) {
      if (!ids.has(dep)) {
        throw invalidPlan(`Tool call "${call.id}" depends on unknown call "${dep}"`)
      }
    }
  }
  const cycle = findCycle(calls)
  if (cycle !== null) {
    throw invalidPlan(`Tool calls form a dependency cycle: ${cycle.join(' -> ')}`)
  }
  return calls
}

function invalidPlan(message: string): TerminalError {
  return new TerminalError(message, 'INVALID_PLAN')
}

/** A dependency cycle as a closed path of call ids, or null */
export function findCycle(calls: readonly PlannedCall[]): string[] | null {
  const deps = new Map(calls.map((call) => [call.id, call.depends_on]))
  const state = new Map<string, 'visiting' | 'done'>()
  const path: string[] = []

  const visit = (id: string): string[] | null => {
    const seen = state.get(id)
    if (seen === 'done') return null
    if (seen === 'visiting') {
      return [...path.slice(path.indexOf(id)), id]
    }
    state.set(id, 'visiting')
    path.push(id)
    for (const dep of deps.get(id) ?? []) {
      const cycle = visit(dep)
      if (cycle !== null) return cycle
    }
    path.pop()
    state.set(id, 'done')
    return null
  }

  for (const call of calls) {
    const cycle = visit(call.id)
    if (cycle !== null) return cycle
  }
  return null
}

// ---------------------------------------------------------------------------
// Review
// ---------------------------------------------------------------------------

export const ReviewOutputSchema = z.object({
  goal_achieved: z.boolean(),
  confidence: z.number().min(0).max(1),
  summary: z.string(),
  missing_data: z.array(z.string()).default([]),
  recovery_actions: z.array(z.string()).default([]),
})

export type ReviewOutput = z.infer<typeof ReviewOutputSchema>

/**
 * @throws {TerminalError} (INVALID_REVIEW) when the reply is not a review
 */
export function parseReview(content: string): ReviewOutput {
  const raw = parseJson(content)
  if (raw === undefined) {
    throw new TerminalError('Reviewer output is not valid JSON', 'INVALID_REVIEW')
  }
  const parsed = ReviewOutputSchema.safeParse(raw)
  if (!parsed.success) {
    throw new TerminalError(`Reviewer output is invalid: ${formatZodIssues(parsed.error)}`, 'INVALID_REVIEW')
  }
  return parsed.data
}

function parseJson(content: string): unknown {
  try {
    return JSON.parse(content) as unknown
  } catch {
    return undefined
  }
}
