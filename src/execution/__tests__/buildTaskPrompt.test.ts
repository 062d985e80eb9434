import { describe, it, expect } from 'vitest'
import { buildTaskPrompt } from '../buildTaskPrompt.js'
import { TaskPlan } from '../../plan/TaskPlan.js'
import type { ProjectContext } from '../../project/detectProject.js'

function samplePlan(): TaskPlan {
  const plan = new TaskPlan('Add login', () => new Date('2026-03-01T10:00:00.000Z'))
  plan.addTask('Create user table')
  plan.addTask('Write auth service')
  plan.addTask('Add login route')
  return plan
}

describe('buildTaskPrompt', () => {
  it('describes the first task without history', () => {
    const plan = samplePlan()
    const task = plan.tasks[0]
    expect(task).toBeDefined()
    if (!task) return

    expect(buildTaskPrompt(plan, task)).toBe(
      [
        'Execute the following task:',
        '',
        'Task: Create user table',
        '',
        'Context:',
        '- This is task #1 of 3 in a multi-step plan',
        '- Overall goal: Add login',
        '',
        'Instructions:',
        '- Perform the task as described',
        '- If something goes wrong, start the line with "Error:" and explain it',
        '- Confirm completion when done',
      ].join('\n')
    )
  })

  it('lists only earlier completed tasks', () => {
    const plan = samplePlan()
    plan.markCompleted(1)
    plan.markFailed(2, 'boom')
    plan.markCompleted(3)
    const task = plan.getTask(3)
    if (!task) throw new Error('missing task')

    const prompt = buildTaskPrompt(plan, task)

    expect(prompt).toContain('- Previously completed tasks:\n  ✓ Task #1: Create user table\n')
    expect(prompt).not.toContain('Task #2:')
    expect(prompt).not.toContain('Task #3:')
  })

  it('includes the project when known', () => {
    const plan = samplePlan()
    const project: ProjectContext = {
      rootDir: '/work/shop',
      projectType: 'nodejs',
      mainLanguage: 'typescript',
      packageManager: 'npm',
      frameworks: ['express'],
    }
    const task = plan.getTask(1)
    if (!task) throw new Error('missing task')

    expect(buildTaskPrompt(plan, task, project)).toContain(
      '- Project: nodejs (typescript, npm) with express at /work/shop'
    )
  })
})
