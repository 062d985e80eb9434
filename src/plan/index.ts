/**
 * @entry Plan 任务计划
 *
 * - TaskPlan: 目标 + 有序任务
 * - PlanManager: 当前计划及其渲染
 * - PlanSession: 执行中 / 停止标志
 * - generatePlan: 由推理引擎生成计划
 */

export { TaskPlan } from './TaskPlan.js'
export { PlanManager, type PlanManagerOptions } from './PlanManager.js'
export { PlanSession } from './PlanSession.js'
export { formatPlan, formatCompactPlan, formatPlanSummary, formatProgressBar } from './formatPlan.js'
export {
  generatePlan,
  buildPlanPrompt,
  parsePlanResponse,
  CREATE_PLAN_PROMPT,
  type ParsedPlan,
} from './generatePlan.js'
