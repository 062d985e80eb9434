import { describe, it, expect, beforeEach } from 'vitest'
import { PlanManager } from '../PlanManager.js'
import { stripAnsi } from '../../shared/logger.js'

let manager: PlanManager

beforeEach(() => {
  manager = new PlanManager({ now: () => new Date('2026-03-01T10:00:00.000Z') })
})

describe('PlanManager', () => {
  describe('without a plan', () => {
    it('treats every operation as a no-op', () => {
      expect(manager.hasPlan()).toBe(false)
      expect(manager.addTask('Step 1')).toBeNull()
      expect(manager.startTask(1)).toBe(false)
      expect(manager.completeTask(1)).toBe(false)
      expect(manager.failTask(1, 'boom')).toBe(false)
      expect(manager.getCurrentPlan()).toBeNull()
    })

    it('renders placeholders', () => {
      expect(manager.displayPlan()).toBe('No active plan.')
      expect(manager.displayCompactPlan()).toBe('')
      expect(manager.getPlanSummaryForText()).toBe('')
    })
  })

  it('replaces the current plan', () => {
    manager.createPlan('First goal')
    manager.addTask('Old step')
    const plan = manager.createPlan('Second goal')

    expect(manager.getCurrentPlan()).toBe(plan)
    expect(plan.totalCount).toBe(0)
  })

  it('drives task transitions', () => {
    manager.createPlan('Add login')
    manager.addTask('Create table')
    manager.addTask('Write route')

    expect(manager.startTask(1)).toBe(true)
    expect(manager.completeTask(1)).toBe(true)
    expect(manager.failTask(2, 'timeout')).toBe(true)
    expect(manager.failTask(9, 'nope')).toBe(false)

    expect(manager.getCurrentPlan()?.tasks.map(t => t.status)).toEqual(['completed', 'failed'])
  })

  it('summarizes the plan as plain text', () => {
    manager.createPlan('Add login')
    manager.addTask('Create table')
    manager.addTask('Write route')
    manager.startTask(2)

    expect(manager.getPlanSummaryForText()).toBe(
      [
        'CURRENT PLAN:',
        'Goal: Add login',
        'Progress: 0/2 tasks completed',
        'Tasks:',
        '  1. [PENDING] Create table',
        '  2. [IN_PROGRESS] Write route',
      ].join('\n')
    )
    expect(stripAnsi(manager.displayCompactPlan())).toBe('[Plan: 0/2] → Write route')
  })

  it('clears the plan', () => {
    manager.createPlan('Add login')
    manager.clearPlan()
    expect(manager.hasPlan()).toBe(false)
  })
})
