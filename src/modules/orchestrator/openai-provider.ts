/**
 * OpenAI chat completions provider with JSON-schema structured output.
 */

import OpenAI from 'openai'
import { LlmError, TerminalError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { LlmConfig } from '../config/config-schema.js'
import { UnconfiguredLlmProvider } from './llm-provider.js'
import type { LlmProvider, LlmRequest, LlmResponse } from './llm-provider.js'

const logger = createLogger('orchestrator:llm')

export interface OpenAiProviderOptions {
  apiKey: string
  model: string
  baseUrl?: string
  timeoutMs: number
}

export class OpenAiProvider implements LlmProvider {
  readonly name = 'openai'

  private readonly _client: OpenAI
  private readonly _model: string

  constructor(options: OpenAiProviderOptions) {
    this._model = options.model
    // Retries go through queue redelivery, not the client
    this._client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      maxRetries: 0,
    })
  }

  async complete(request: LlmRequest): Promise<LlmResponse> {
    let completion: OpenAI.Chat.Completions.ChatCompletion
    try {
      completion = await this._client.chat.completions.create(
        {
          model: this._model,
          messages: request.messages.map((m) =>
            m.role === 'system' ? { role: 'system' as const, content: m.content } : { role: 'user' as const, content: m.content },
          ),
          temperature: 0,
          response_format: {
            type: 'json_schema',
            json_schema: { name: request.output.name, schema: request.output.schema, strict: false },
          },
        },
        { signal: request.signal },
      )
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      if (err instanceof OpenAI.APIError && err.status !== undefined && err.status < 500 && err.status !== 429) {
        throw new TerminalError(`LLM request rejected: ${message}`, 'LLM_REJECTED', {
          model: this._model,
          status: err.status,
        })
      }
      throw new LlmError(`LLM request failed: ${message}`, { model: this._model })
    }

    const choice = completion.choices[0]
    const content = choice?.message.content
    if (content === undefined || content === null) {
      throw new LlmError('LLM returned no content', { model: this._model, finishReason: choice?.finish_reason })
    }
    logger.debug({ model: completion.model, usage: completion.usage }, 'LLM completion received')
    return { content, model: completion.model }
  }
}

/**
 * Provider for the `llm` config section. The API key is read from the
 * environment variable named by `api_key_env`.
 */
export function createLlmProvider(config: LlmConfig, env: NodeJS.ProcessEnv = process.env): LlmProvider {
  if (config.provider === 'none') {
    return new UnconfiguredLlmProvider('llm.provider is "none"')
  }
  const apiKey = env[config.api_key_env]
  if (apiKey === undefined || apiKey === '') {
    logger.warn({ envVar: config.api_key_env }, 'LLM API key not set; orchestrate steps will fail')
    return new UnconfiguredLlmProvider(`environment variable ${config.api_key_env} is not set`)
  }
  return new OpenAiProvider({
    apiKey,
    model: config.model,
    timeoutMs: config.timeout_ms,
    ...(config.base_url === undefined ? {} : { baseUrl: config.base_url }),
  })
}
