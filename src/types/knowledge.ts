/**
 * 错误知识库类型
 */

/** 一次失败的记录，由恢复管理器生成 */
export interface ErrorRecord {
  operation: string
  /** 错误名，如 TaskFailure / EngineError / TypeError */
  type: string
  message?: string
  timestamp: string
  context: Record<string, unknown>
}

/** 计算签名与相似度只需要类型和消息 */
export type ErrorSignatureSource = Pick<ErrorRecord, 'type' | 'message'>

export interface Resolution {
  solution: string
  outcome: string
  timestamp: string
}

export interface FailedAttempt {
  attemptedSolution: string
  reason: string
}

export interface LearnedPattern {
  signature: string
  errorType: string
  /** 第一次遇到时的消息 */
  sampleMessage?: string
  successCount: number
  failureCount: number
  /** 最多 10 条，旧的先淘汰 */
  successfulResolutions: Resolution[]
  /** 最多 5 条，旧的先淘汰 */
  failedAttempts: FailedAttempt[]
}

export interface LearnedSolution {
  solution: string
  /** 该方案在所属模式的成功记录中的占比 */
  confidence: number
  usageCount: number
  outcome: string
}

export interface LearningInsights {
  totalPatterns: number
  totalSuccesses: number
  totalFailures: number
  /** successes / (successes + failures)，无记录时为 0 */
  successRate: number
  patternsByType: Record<string, number>
  topPatterns: LearnedPattern[]
}
