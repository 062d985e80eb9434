/**
 * 执行器对外的类型：失败决策、恢复协作者、执行结果、操作员
 */

import type { PlanTaskSnapshot } from '../types/plan.js'
import type { ErrorRecord } from '../types/knowledge.js'
import type { RecoveryContext } from '../recovery/ErrorRecoveryManager.js'

export type FailureDecision = 'retry' | 'skip' | 'stop'

/** 任务失败后交给决策方的信息 */
export interface FailureDecisionRequest {
  task: PlanTaskSnapshot
  error: string
  recovery: RecoveryContext
}

export type FailureResolver = (request: FailureDecisionRequest) => Promise<FailureDecision>

/** 恢复协作者，ErrorRecoveryManager 实现了它 */
export interface FailureRecorder {
  recordError(operation: string, fault: unknown, context?: Record<string, unknown>): RecoveryContext
  recordSuccessfulResolution(error: ErrorRecord, solution: string, outcome: string): Promise<void>
  recordFailedResolution(error: ErrorRecord, attemptedSolution: string, reason: string): Promise<void>
}

/** 单个任务的失败：给人看的原因 + 交给恢复协作者的原始错误 */
export interface TaskFailure {
  message: string
  fault: Error
}

export interface ExecutionSummary {
  total: number
  completed: number
  failed: number
  /** 因停止而未执行的 pending 任务 */
  skipped: number
}

export interface ExecutionResult {
  success: boolean
  message: string
  summary: ExecutionSummary
}

export interface OperatorChoice<T extends string> {
  name: string
  value: T
}

/** 交互式选择，CLI 用 inquirer 实现 */
export interface Operator {
  askChoice<T extends string>(message: string, choices: ReadonlyArray<OperatorChoice<T>>): Promise<T>
}
