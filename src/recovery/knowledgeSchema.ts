/**
 * 知识库文件格式：{ patterns: LearnedPattern[] }
 * 读取时也接受裸数组
 */

import { z } from 'zod'

const resolutionSchema = z.object({
  solution: z.string(),
  outcome: z.string(),
  timestamp: z.string(),
})

const failedAttemptSchema = z.object({
  attemptedSolution: z.string(),
  reason: z.string(),
})

export const learnedPatternSchema = z.object({
  signature: z.string().min(1),
  errorType: z.string(),
  sampleMessage: z.string().optional(),
  successCount: z.number().int().min(0),
  failureCount: z.number().int().min(0),
  successfulResolutions: z.array(resolutionSchema).default([]),
  failedAttempts: z.array(failedAttemptSchema).default([]),
})

export const knowledgeFileSchema = z.union([
  z.object({ patterns: z.array(learnedPatternSchema) }),
  z.array(learnedPatternSchema).transform(patterns => ({ patterns })),
])

export type KnowledgeFile = z.output<typeof knowledgeFileSchema>
