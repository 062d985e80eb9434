/**
 * 计划会话
 *
 * 由调用方持有并注入执行器：计划管理器、「执行中」标志和协作式停止标志
 * 都挂在这里，不使用全局状态。
 */

import { PlanManager } from './PlanManager.js'

export class PlanSession {
  private executing = false
  private stopFlag = false
  private stopController: AbortController | null = null

  constructor(readonly plans: PlanManager = new PlanManager()) {}

  /**
   * 检查并占用执行权。已有执行在进行时返回 false。
   * 成功时重置停止标志。
   */
  beginExecution(): boolean {
    if (this.executing) return false
    this.executing = true
    this.stopFlag = false
    this.stopController = new AbortController()
    return true
  }

  endExecution(): void {
    this.executing = false
    this.stopController = null
  }

  /** 请求停止：当前任务结束后生效，任务间等待会被立即打断 */
  requestStop(): void {
    this.stopFlag = true
    this.stopController?.abort()
  }

  get isExecuting(): boolean {
    return this.executing
  }

  get stopRequested(): boolean {
    return this.stopFlag
  }

  get stopSignal(): AbortSignal | undefined {
    return this.stopController?.signal
  }
}
