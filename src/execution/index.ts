/**
 * @entry Execution 计划执行
 *
 * - PlanExecutor: 逐个执行任务，失败时询问 retry / skip / stop
 * - createOperatorResolver: 操作员交互 → 失败决策
 * - keywordClassifier: 默认的回复分类
 */

export { PlanExecutor, RETRY_SOLUTION, type PlanExecutorOptions } from './PlanExecutor.js'
export { ExecutionEventBus, type ExecutionEventMap, type TaskAttemptPayload } from './executionEvents.js'
export { createOperatorResolver, FAILURE_CHOICES, type OperatorResolverOptions } from './operatorResolver.js'
export {
  createKeywordClassifier,
  keywordClassifier,
  extractFailureReason,
  FAILURE_MARKERS,
  DEFAULT_FAILURE_REASON,
  type ResponseClassifier,
  type ResponseClassification,
} from './classifyResponse.js'
export { buildTaskPrompt } from './buildTaskPrompt.js'
export { TaskFailureError } from './TaskFailureError.js'
export type {
  FailureDecision,
  FailureDecisionRequest,
  FailureResolver,
  FailureRecorder,
  TaskFailure,
  ExecutionSummary,
  ExecutionResult,
  Operator,
  OperatorChoice,
} from './types.js'
