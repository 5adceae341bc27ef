/**
 * LlmProvider: the one call the orchestrator makes to a language model:
 * a chat exchange whose reply must be JSON matching a given schema.
 *
 * Parsing and validating the reply is the caller's job; a provider only
 * guarantees it returns the raw text or throws.
 */

import { TerminalError } from '../../core/errors.js'

export interface LlmMessage {
  role: 'system' | 'user'
  content: string
}

export interface JsonOutputSchema {
  name: string
  schema: Record<string, unknown>
}

export interface LlmRequest {
  messages: LlmMessage[]
  /** JSON schema the reply must follow */
  output: JsonOutputSchema
  signal?: AbortSignal
}

export interface LlmResponse {
  content: string
  model: string
}

export interface LlmProvider {
  readonly name: string

  /**
   * @throws {LlmError} for transient failures (network, rate limits, 5xx)
   * @throws {TerminalError} when the request is rejected or no provider is configured
   */
  complete(request: LlmRequest): Promise<LlmResponse>
}

/**
 * Stand-in used when `llm.provider` is `none` or the API key is missing.
 * Orchestrate steps fail with LLM_UNAVAILABLE instead of retrying.
 */
export class UnconfiguredLlmProvider implements LlmProvider {
  readonly name = 'none'

  constructor(private readonly _reason: string) {}

  async complete(): Promise<LlmResponse> {
    throw new TerminalError(`No LLM provider available: ${this._reason}`, 'LLM_UNAVAILABLE')
  }
}
