/**
 * 计划渲染
 *
 * - formatPlan: 终端完整视图（chalk 着色）
 * - formatCompactPlan: 单行状态，如 `[Plan: 2/5] → Write tests`
 * - formatPlanSummary: 纯文本，拼进给推理引擎的 prompt
 */

import chalk from 'chalk'
import { drawSeparator } from '../shared/drawSeparator.js'
import { STATUS_GLYPHS, statusLabel } from '../types/taskStatus.js'
import type { PlanTaskStatus } from '../types/plan.js'
import type { TaskPlan } from './TaskPlan.js'

const PLAN_WIDTH = 70
const PROGRESS_BAR_WIDTH = 40

const STATUS_COLORS: Record<PlanTaskStatus, (s: string) => string> = {
  pending: chalk.gray,
  in_progress: chalk.yellow,
  completed: chalk.green,
  failed: chalk.red,
}

export function formatProgressBar(percentage: number, width: number = PROGRESS_BAR_WIDTH): string {
  const filled = Math.floor((percentage * width) / 100)
  return '[' + chalk.green('█'.repeat(filled)) + chalk.gray('░'.repeat(width - filled)) + ']'
}

export function formatPlan(plan: TaskPlan): string {
  const lines: string[] = []
  const percentage = plan.progressPercentage

  lines.push(chalk.cyan(drawSeparator('TASK PLAN', PLAN_WIDTH)))
  lines.push('')
  lines.push(`${chalk.bold('Goal:')} ${plan.description}`)
  lines.push('')
  lines.push(
    `${chalk.bold('Progress:')} ${formatProgressBar(percentage)} ${percentage}% (${plan.completedCount}/${plan.totalCount} tasks)`
  )
  lines.push('')
  lines.push(chalk.bold('Tasks:'))

  for (const task of plan.tasks) {
    const color = STATUS_COLORS[task.status]
    lines.push(`${color(STATUS_GLYPHS[task.status])} ${task.number}. ${task.description}`)
    if (task.status === 'failed' && task.error) {
      lines.push(`    ${chalk.red(`Error: ${task.error}`)}`)
    }
  }

  lines.push('')
  lines.push(chalk.cyan(drawSeparator('', PLAN_WIDTH)))
  return lines.join('\n')
}

export function formatCompactPlan(plan: TaskPlan): string {
  const prefix = chalk.cyan(`[Plan: ${plan.completedCount}/${plan.totalCount}]`)

  const current = plan.getCurrentTask()
  if (current) return `${prefix} ${chalk.yellow('→')} ${current.description}`
  if (plan.isComplete()) return `${prefix} ${chalk.green('✓ Complete')}`

  const next = plan.getNextPendingTask()
  if (next) return `${prefix} ${chalk.gray('Next:')} ${next.description}`
  return prefix
}

export function formatPlanSummary(plan: TaskPlan): string {
  const lines = [
    'CURRENT PLAN:',
    `Goal: ${plan.description}`,
    `Progress: ${plan.completedCount}/${plan.totalCount} tasks completed`,
    'Tasks:',
    ...plan.tasks.map(t => `  ${t.number}. [${statusLabel(t.status)}] ${t.description}`),
  ]
  return lines.join('\n')
}
