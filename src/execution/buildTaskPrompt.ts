/**
 * 单个任务的 prompt
 *
 * 上下文只包含编号更小且已完成的任务
 */

import { describeProject, type ProjectContext } from '../project/detectProject.js'
import type { PlanTaskSnapshot } from '../types/plan.js'
import type { TaskPlan } from '../plan/TaskPlan.js'

export function buildTaskPrompt(
  plan: TaskPlan,
  task: PlanTaskSnapshot,
  project?: ProjectContext
): string {
  const lines: string[] = [
    'Execute the following task:',
    '',
    `Task: ${task.description}`,
    '',
    'Context:',
    `- This is task #${task.number} of ${plan.totalCount} in a multi-step plan`,
    `- Overall goal: ${plan.description}`,
  ]

  if (project) {
    lines.push(`- Project: ${describeProject(project)} at ${project.rootDir}`)
  }

  const done = plan.tasks.filter(t => t.number < task.number && t.status === 'completed')
  if (done.length > 0) {
    lines.push('- Previously completed tasks:')
    for (const t of done) {
      lines.push(`  ✓ Task #${t.number}: ${t.description}`)
    }
  }

  lines.push(
    '',
    'Instructions:',
    '- Perform the task as described',
    '- If something goes wrong, start the line with "Error:" and explain it',
    '- Confirm completion when done'
  )
  return lines.join('\n')
}
