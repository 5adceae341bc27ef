/**
 * ToolRegistry: the tools a plan may call.
 *
 * A tool validates its own params with zod; the planner only sees its name,
 * description and JSON-schema parameters.
 */

import type { z } from 'zod'
import type { JobId, LogLevel } from '../../core/types.js'
import { TerminalError } from '../../core/errors.js'
import { formatZodIssues } from '../executor/definition-schema.js'

export interface ToolContext {
  jobId: JobId
  signal: AbortSignal
  /** Results of completed dependencies, keyed by their plan call id */
  dependencies: Record<string, unknown>
  log(level: LogLevel, message: string): void
}

export interface Tool {
  readonly name: string
  readonly description: string
  /** JSON schema of the params object, shown to the planner */
  readonly parameters: Record<string, unknown>
  /**
   * @throws {TerminalError} (INVALID_TOOL_PARAMS) when params fail validation
   */
  run(params: Record<string, unknown>, ctx: ToolContext): Promise<unknown>
}

export interface ToolSpec<P> {
  name: string
  description: string
  parameters: Record<string, unknown>
  schema: z.ZodType<P, z.ZodTypeDef, unknown>
  run(params: P, ctx: ToolContext): Promise<unknown>
}

/** Build a Tool whose params are parsed with `spec.schema` before `run` */
export function defineTool<P>(spec: ToolSpec<P>): Tool {
  return {
    name: spec.name,
    description: spec.description,
    parameters: spec.parameters,
    async run(params, ctx) {
      const parsed = spec.schema.safeParse(params)
      if (!parsed.success) {
        throw new TerminalError(
          `Invalid params for tool ${spec.name}: ${formatZodIssues(parsed.error)}`,
          'INVALID_TOOL_PARAMS',
          { tool: spec.name },
        )
      }
      return spec.run(parsed.data, ctx)
    },
  }
}

export interface ToolDescriptor {
  name: string
  description: string
  parameters: Record<string, unknown>
}

export class ToolRegistry {
  private readonly _tools = new Map<string, Tool>()

  /**
   * @throws {Error} when a tool with the same name is registered
   */
  register(tool: Tool): void {
    if (this._tools.has(tool.name)) {
      throw new Error(`Tool "${tool.name}" is already registered`)
    }
    this._tools.set(tool.name, tool)
  }

  get(name: string): Tool | undefined {
    return this._tools.get(name)
  }

  has(name: string): boolean {
    return this._tools.has(name)
  }

  get names(): string[] {
    return [...this._tools.keys()]
  }

  /**
   * Descriptors of the named tools, in the given order.
   * @throws {TerminalError} (UNKNOWN_TOOL) when a name is not registered
   */
  describe(names: string[]): ToolDescriptor[] {
    return names.map((name) => {
      const tool = this._tools.get(name)
      if (tool === undefined) {
        throw new TerminalError(`Unknown tool "${name}"`, 'UNKNOWN_TOOL', { tool: name, known: this.names })
      }
      return { name: tool.name, description: tool.description, parameters: tool.parameters }
    })
  }
}
