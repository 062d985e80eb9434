/**
 * 计划管理器：持有至多一个当前计划
 *
 * 除 createPlan 外，没有当前计划时所有操作都是空操作
 * （返回 null / false / 空字符串）。任务编号不存在时同样忽略。
 */

import { createLogger } from '../shared/logger.js'
import type { PlanTaskSnapshot } from '../types/plan.js'
import { TaskPlan } from './TaskPlan.js'
import { formatCompactPlan, formatPlan, formatPlanSummary } from './formatPlan.js'

const logger = createLogger('plan')

export interface PlanManagerOptions {
  /** 时间源，测试中固定时间 */
  now?: () => Date
}

export class PlanManager {
  private current: TaskPlan | null = null

  constructor(private readonly options: PlanManagerOptions = {}) {}

  /** 创建新计划，替换旧计划 */
  createPlan(description: string): TaskPlan {
    if (this.current) {
      logger.debug(`Discarding plan: ${this.current.description}`)
    }
    this.current = new TaskPlan(description, this.options.now)
    return this.current
  }

  addTask(description: string): PlanTaskSnapshot | null {
    return this.current?.addTask(description) ?? null
  }

  startTask(taskNumber: number): boolean {
    return this.transition(taskNumber, plan => plan.markInProgress(taskNumber))
  }

  completeTask(taskNumber: number): boolean {
    return this.transition(taskNumber, plan => plan.markCompleted(taskNumber))
  }

  failTask(taskNumber: number, error: string): boolean {
    return this.transition(taskNumber, plan => plan.markFailed(taskNumber, error))
  }

  hasPlan(): boolean {
    return this.current !== null
  }

  getCurrentPlan(): TaskPlan | null {
    return this.current
  }

  clearPlan(): void {
    this.current = null
  }

  displayPlan(): string {
    return this.current ? formatPlan(this.current) : 'No active plan.'
  }

  displayCompactPlan(): string {
    return this.current ? formatCompactPlan(this.current) : ''
  }

  getPlanSummaryForText(): string {
    return this.current ? formatPlanSummary(this.current) : ''
  }

  private transition(taskNumber: number, apply: (plan: TaskPlan) => boolean): boolean {
    if (!this.current) return false
    const applied = apply(this.current)
    if (!applied) {
      logger.debug(`Ignoring unknown task #${taskNumber}`)
    }
    return applied
  }
}
