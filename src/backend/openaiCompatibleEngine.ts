/**
 * OpenAI Compatible Engine
 *
 * Uses the openai SDK to call any OpenAI-compatible API (Ollama, LM Studio, vLLM, OpenAI).
 * Failures are rethrown as EngineError so the executor can classify and learn from them.
 */

import OpenAI from 'openai'
import { createLogger } from '../shared/logger.js'
import { EngineError } from '../shared/error.js'
import type { EngineConfig } from '../config/schema.js'
import type { QueryOptions, ReasoningEngine } from './types.js'

const logger = createLogger('engine')

const SYSTEM_PROMPT =
  'You are a software engineering assistant working inside a code repository. ' +
  'Answer concisely. When a task cannot be completed, start the relevant line with "Error:".'

export function createOpenAICompatibleEngine(config: EngineConfig): ReasoningEngine {
  const client = new OpenAI({
    baseURL: config.baseURL,
    apiKey: config.apiKey || 'no-key',
    timeout: config.timeoutSeconds * 1000,
    maxRetries: 1,
  })

  return {
    name: `openai-compatible:${config.model}`,

    async query(prompt: string, options: QueryOptions = {}): Promise<string> {
      const startTime = Date.now()

      try {
        const completion = await client.chat.completions.create(
          {
            model: config.model,
            messages: [
              { role: 'system', content: SYSTEM_PROMPT },
              { role: 'user', content: prompt },
            ],
            max_tokens: config.maxTokens,
          },
          options.signal ? { signal: options.signal } : undefined
        )

        const durationMs = Date.now() - startTime
        logger.debug(`Completed (${(durationMs / 1000).toFixed(1)}s, model: ${config.model})`)
        return completion.choices[0]?.message?.content ?? ''
      } catch (error: unknown) {
        throw toEngineError(error, config.baseURL)
      }
    },
  }
}

function toEngineError(error: unknown, baseURL: string): EngineError {
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new EngineError('ERR_TIMEOUT', `Engine request timed out: ${error.message}`, error)
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new EngineError(
      'ERR_NETWORK',
      `Connection failed: ${baseURL} - ${error.message}`,
      error,
      'Check that the engine endpoint (engine.baseURL) is reachable'
    )
  }
  if (error instanceof OpenAI.APIError) {
    return EngineError.from(new Error(`API error (${error.status ?? 'unknown'}): ${error.message}`))
  }
  return EngineError.from(error)
}
