/**
 * 计划模型：目标 + 有序任务列表
 *
 * 任务只能追加，编号从 1 开始且不变。overallStatus 每次读取时重新推导，
 * 不单独存储。无 I/O。
 */

import type { PlanTask, PlanTaskSnapshot, PlanTaskStatus } from '../types/plan.js'

export class TaskPlan {
  readonly createdAt: string
  private readonly items: PlanTask[] = []

  constructor(
    readonly description: string,
    private readonly now: () => Date = () => new Date()
  ) {
    this.createdAt = this.now().toISOString()
  }

  get tasks(): readonly PlanTaskSnapshot[] {
    return this.items
  }

  /**
   * failed 优先；全部完成为 completed（空计划同样成立）；
   * 有任务在执行为 in_progress；否则 pending
   */
  get overallStatus(): PlanTaskStatus {
    if (this.items.some(t => t.status === 'failed')) return 'failed'
    if (this.items.every(t => t.status === 'completed')) return 'completed'
    if (this.items.some(t => t.status === 'in_progress')) return 'in_progress'
    return 'pending'
  }

  addTask(description: string): PlanTaskSnapshot {
    const task: PlanTask = {
      number: this.items.length + 1,
      description,
      status: 'pending',
    }
    this.items.push(task)
    return task
  }

  getTask(taskNumber: number): PlanTaskSnapshot | undefined {
    return this.find(taskNumber)
  }

  /** 重新开始的任务会清掉上一次的错误 */
  markInProgress(taskNumber: number): boolean {
    const task = this.find(taskNumber)
    if (!task) return false
    task.status = 'in_progress'
    task.startedAt = this.now().toISOString()
    delete task.error
    return true
  }

  markCompleted(taskNumber: number): boolean {
    const task = this.find(taskNumber)
    if (!task) return false
    task.status = 'completed'
    task.completedAt = this.now().toISOString()
    delete task.error
    return true
  }

  markFailed(taskNumber: number, error: string): boolean {
    const task = this.find(taskNumber)
    if (!task) return false
    task.status = 'failed'
    task.error = error
    task.completedAt = this.now().toISOString()
    return true
  }

  /** 正在执行的任务 */
  getCurrentTask(): PlanTaskSnapshot | undefined {
    return this.items.find(t => t.status === 'in_progress')
  }

  getNextPendingTask(): PlanTaskSnapshot | undefined {
    return this.items.find(t => t.status === 'pending')
  }

  get totalCount(): number {
    return this.items.length
  }

  get completedCount(): number {
    return this.items.filter(t => t.status === 'completed').length
  }

  /** 0-100，空计划为 0 */
  get progressPercentage(): number {
    if (this.items.length === 0) return 0
    return Math.floor((this.completedCount * 100) / this.items.length)
  }

  isComplete(): boolean {
    return this.overallStatus === 'completed'
  }

  hasFailed(): boolean {
    return this.overallStatus === 'failed'
  }

  private find(taskNumber: number): PlanTask | undefined {
    return this.items.find(t => t.number === taskNumber)
  }
}
