/**
 * 计划与任务类型
 */

export type PlanTaskStatus = 'pending' | 'in_progress' | 'completed' | 'failed'

export interface PlanTask {
  /** 从 1 开始，追加时分配，之后不变 */
  number: number
  description: string
  status: PlanTaskStatus
  /** 仅失败任务携带 */
  error?: string
  startedAt?: string
  completedAt?: string
}

/** 只读快照，供渲染与事件使用 */
export type PlanTaskSnapshot = Readonly<PlanTask>
