/**
 * Prompt and output-schema builders for the planner and the reviewer.
 */

import type { ReplanContext } from '../job-store/job-types.js'
import type { JsonOutputSchema, LlmMessage } from './llm-provider.js'
import type { ToolDescriptor } from './tool-registry.js'

const PLANNER_SYSTEM_PROMPT = [
  'You are the planner of an automated job runner.',
  'You have no external knowledge: every fact must come from a tool call.',
  'Answer with JSON only, in one of two shapes:',
  '{"tool_calls": [{"id", "tool", "params", "depends_on"}]} with at least one call to the listed tools, or',
  '{"error": "<reason>"} when none of the tools can make progress on the goal.',
  'Never answer in prose. Never invent data or tool results.',
  'Use depends_on to list the ids of calls whose results a call needs.',
].join('\n')

const REVIEWER_SYSTEM_PROMPT = [
  'You review the results of tool calls made toward a goal.',
  'Judge only from the results given; do not add outside knowledge.',
  'Answer with JSON only: goal_achieved, confidence (0 to 1), summary,',
  'missing_data (what is still unknown) and recovery_actions (further tool work that could close the gap).',
].join('\n')

export function buildPlanningMessages(
  goal: string,
  tools: ToolDescriptor[],
  context?: ReplanContext,
): LlmMessage[] {
  const lines = [`Goal: ${goal}`, '', 'Tools:']
  for (const tool of tools) {
    lines.push(`- ${tool.name}: ${tool.description}`, `  params schema: ${JSON.stringify(tool.parameters)}`)
  }
  if (context !== undefined) {
    lines.push(
      '',
      'A previous attempt did not reach the goal.',
      `Summary: ${context.previous_summary}`,
      `Missing data: ${context.missing_data.join('; ') || 'none listed'}`,
      `Suggested recovery actions: ${context.recovery_actions.join('; ') || 'none listed'}`,
    )
  }
  return [
    { role: 'system', content: PLANNER_SYSTEM_PROMPT },
    { role: 'user', content: lines.join('\n') },
  ]
}

export interface ToolCallOutcome {
  id: string
  iteration: number
  tool: string
  params: Record<string, unknown>
  status: string
  result?: unknown
  error?: string
}

export function buildReviewMessages(goal: string, outcomes: ToolCallOutcome[]): LlmMessage[] {
  return [
    { role: 'system', content: REVIEWER_SYSTEM_PROMPT },
    {
      role: 'user',
      content: [`Goal: ${goal}`, '', 'Tool call results:', JSON.stringify(outcomes, null, 2)].join('\n'),
    },
  ]
}

export function planOutputSchema(toolNames: string[]): JsonOutputSchema {
  return {
    name: 'plan',
    schema: {
      type: 'object',
      properties: {
        tool_calls: {
          type: 'array',
          items: {
            type: 'object',
            properties: {
              id: { type: 'string' },
              tool: { type: 'string', enum: toolNames },
              params: { type: 'object' },
              depends_on: { type: 'array', items: { type: 'string' } },
            },
            required: ['id', 'tool', 'params', 'depends_on'],
          },
        },
        error: { type: 'string' },
      },
    },
  }
}

export const REVIEW_OUTPUT_SCHEMA: JsonOutputSchema = {
  name: 'review',
  schema: {
    type: 'object',
    properties: {
      goal_achieved: { type: 'boolean' },
      confidence: { type: 'number', minimum: 0, maximum: 1 },
      summary: { type: 'string' },
      missing_data: { type: 'array', items: { type: 'string' } },
      recovery_actions: { type: 'array', items: { type: 'string' } },
    },
    required: ['goal_achieved', 'confidence', 'summary', 'missing_data', 'recovery_actions'],
  },
}
