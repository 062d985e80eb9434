/**
 * 任务状态辅助函数
 */

import type { PlanTaskStatus } from './plan.js'

/** 状态徽标，渲染计划时使用 */
export const STATUS_GLYPHS: Record<PlanTaskStatus, string> = {
  pending: '[ ]',
  in_progress: '[→]',
  completed: '[✓]',
  failed: '[✗]',
}

/** 给推理引擎看的状态标签，如 IN_PROGRESS */
export function statusLabel(status: PlanTaskStatus): string {
  return status.toUpperCase()
}
