/**
 * @entry Types 类型定义模块
 *
 * - plan: PlanTask/PlanTaskStatus/PlanTaskSnapshot
 * - taskStatus: STATUS_GLYPHS/statusLabel
 * - knowledge: ErrorRecord/LearnedPattern/Resolution/FailedAttempt/LearnedSolution/LearningInsights
 */

export type { PlanTask, PlanTaskStatus, PlanTaskSnapshot } from './plan.js'
export { STATUS_GLYPHS, statusLabel } from './taskStatus.js'
export type {
  ErrorRecord,
  ErrorSignatureSource,
  Resolution,
  FailedAttempt,
  LearnedPattern,
  LearnedSolution,
  LearningInsights,
} from './knowledge.js'
