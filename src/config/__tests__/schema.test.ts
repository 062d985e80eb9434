/**
 * Config schema validation tests
 */

import { describe, it, expect } from 'vitest'
import { configSchema, engineConfigSchema, executionConfigSchema } from '../schema.js'

describe('configSchema', () => {
  it('should parse empty object with defaults', () => {
    const result = configSchema.parse({})
    expect(result.engine.baseURL).toBe('http://localhost:11434/v1')
    expect(result.engine.model).toBe('qwen2.5-coder:7b')
    expect(result.engine.apiKey).toBeUndefined()
    expect(result.engine.timeoutSeconds).toBe(120)
    expect(result.engine.maxTokens).toBe(4096)
    expect(result.execution.taskDelayMs).toBe(500)
    expect(result.knowledge.maxPatterns).toBe(200)
    expect(result.knowledge.file).toBeUndefined()
  })

  it('should fill defaults inside partially specified sections', () => {
    const result = configSchema.parse({ engine: { model: 'llama3' } })
    expect(result.engine.model).toBe('llama3')
    expect(result.engine.baseURL).toBe('http://localhost:11434/v1')
  })

  it('should reject a malformed engine URL', () => {
    expect(engineConfigSchema.safeParse({ baseURL: 'not a url' }).success).toBe(false)
  })

  it('should reject a negative task delay', () => {
    expect(executionConfigSchema.safeParse({ taskDelayMs: -1 }).success).toBe(false)
  })

  it('should accept a zero task delay', () => {
    expect(executionConfigSchema.parse({ taskDelayMs: 0 }).taskDelayMs).toBe(0)
  })
})
