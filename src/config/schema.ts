import { z } from 'zod'

export const engineConfigSchema = z.object({
  /** OpenAI 兼容接口地址（Ollama / LM Studio / OpenAI） */
  baseURL: z.string().url().default('http://localhost:11434/v1'),
  /** 本地服务通常不需要 key */
  apiKey: z.string().optional(),
  model: z.string().min(1).default('qwen2.5-coder:7b'),
  timeoutSeconds: z.number().positive().default(120),
  maxTokens: z.number().int().positive().default(4096),
})

export const executionConfigSchema = z.object({
  /** 任务之间的停顿，毫秒 */
  taskDelayMs: z.number().int().min(0).default(500),
})

export const knowledgeConfigSchema = z.object({
  /** 知识库文件，默认 <dataDir>/error-knowledge.json */
  file: z.string().optional(),
  /** 写盘时保留的模式上限 */
  maxPatterns: z.number().int().positive().default(200),
})

export const configSchema = z.object({
  engine: engineConfigSchema.default({}),
  execution: executionConfigSchema.default({}),
  knowledge: knowledgeConfigSchema.default({}),
})

export type EngineConfig = z.infer<typeof engineConfigSchema>
export type ExecutionConfig = z.infer<typeof executionConfigSchema>
export type KnowledgeConfig = z.infer<typeof knowledgeConfigSchema>
export type Config = z.infer<typeof configSchema>
