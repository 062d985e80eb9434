/**
 * LearnedPattern 的纯函数操作
 */

import type {
  ErrorSignatureSource,
  FailedAttempt,
  LearnedPattern,
  LearnedSolution,
  Resolution,
} from '../types/knowledge.js'

export const MAX_RESOLUTIONS = 10
export const MAX_FAILED_ATTEMPTS = 5

export function createPattern(signature: string, error: ErrorSignatureSource): LearnedPattern {
  const pattern: LearnedPattern = {
    signature,
    errorType: error.type,
    successCount: 0,
    failureCount: 0,
    successfulResolutions: [],
    failedAttempts: [],
  }
  if (error.message !== undefined) pattern.sampleMessage = error.message
  return pattern
}

/** 追加并截断，超出上限时淘汰最旧的 */
function appendCapped<T>(items: T[], item: T, cap: number): T[] {
  const next = [...items, item]
  return next.length > cap ? next.slice(next.length - cap) : next
}

export function addResolution(pattern: LearnedPattern, resolution: Resolution): void {
  pattern.successfulResolutions = appendCapped(
    pattern.successfulResolutions,
    resolution,
    MAX_RESOLUTIONS
  )
  pattern.successCount++
}

export function addFailedAttempt(pattern: LearnedPattern, attempt: FailedAttempt): void {
  pattern.failedAttempts = appendCapped(pattern.failedAttempts, attempt, MAX_FAILED_ATTEMPTS)
  pattern.failureCount++
}

/** 写盘排序依据 */
export function patternWeight(pattern: LearnedPattern): number {
  return pattern.successCount + pattern.failureCount
}

/**
 * 模式中使用次数最多的方案
 * confidence = 出现次数 / 该模式保留的方案总数；outcome 取第一次出现的那条
 */
export function topSolutions(pattern: LearnedPattern, limit: number): LearnedSolution[] {
  const total = pattern.successfulResolutions.length
  if (total === 0) return []

  const grouped = new Map<string, LearnedSolution>()
  for (const resolution of pattern.successfulResolutions) {
    const existing = grouped.get(resolution.solution)
    if (existing) {
      existing.usageCount++
    } else {
      grouped.set(resolution.solution, {
        solution: resolution.solution,
        confidence: 0,
        usageCount: 1,
        outcome: resolution.outcome,
      })
    }
  }

  return [...grouped.values()]
    .map(s => ({ ...s, confidence: s.usageCount / total }))
    .sort((a, b) => b.usageCount - a.usageCount)
    .slice(0, limit)
}
