import { describe, it, expect } from 'vitest'
import { buildPlanPrompt, generatePlan, parsePlanResponse } from '../generatePlan.js'
import { PlanManager } from '../PlanManager.js'
import type { ReasoningEngine } from '../../backend/types.js'

function replyingEngine(reply: string | Error): ReasoningEngine {
  return {
    name: 'fixed',
    async query(): Promise<string> {
      if (reply instanceof Error) throw reply
      return reply
    },
  }
}

describe('parsePlanResponse', () => {
  it('extracts the summary and numbered tasks', () => {
    const text = [
      'Sure, here it is.',
      'PLAN: Add login support',
      '1. Create user table',
      '   2.   Write auth service  ',
      'Some note',
      '3. Add login route',
    ].join('\n')

    expect(parsePlanResponse(text, 'fallback')).toEqual({
      goal: 'Add login support',
      tasks: ['Create user table', 'Write auth service', 'Add login route'],
    })
  })

  it('falls back to the given goal', () => {
    expect(parsePlanResponse('1. Only step', 'Do it')).toEqual({ goal: 'Do it', tasks: ['Only step'] })
    expect(parsePlanResponse('PLAN:   \n1. Only step', 'Do it').goal).toBe('Do it')
  })

  it('ignores lines that only look numbered', () => {
    expect(parsePlanResponse('1.5 is a version\n2.\n3)nope', 'g').tasks).toEqual([])
  })
})

describe('buildPlanPrompt', () => {
  it('includes the goal and project', () => {
    const prompt = buildPlanPrompt('Add $1 pricing', {
      rootDir: '/work/shop',
      projectType: 'python',
      mainLanguage: 'python',
      frameworks: [],
    })
    expect(prompt).toContain('Goal: Add $1 pricing\n')
    expect(prompt).toContain('- Type: python (python)\n- Root: /work/shop\n')
    expect(prompt).toContain('3-8 specific, actionable tasks')
  })
})

describe('generatePlan', () => {
  it('replaces the current plan with the parsed one', async () => {
    const manager = new PlanManager()
    const result = await generatePlan(
      manager,
      replyingEngine('PLAN: Login\n1. Create table\n2. Write route'),
      'Add login'
    )

    expect(result.ok).toBe(true)
    expect(manager.getCurrentPlan()?.description).toBe('Login')
    expect(manager.getCurrentPlan()?.tasks.map(t => t.description)).toEqual(['Create table', 'Write route'])
  })

  it('fails and clears the plan when no task is found', async () => {
    const manager = new PlanManager()
    manager.createPlan('Previous')

    const result = await generatePlan(manager, replyingEngine('I would rather not.'), 'Add login')

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('PLAN_GENERATION_FAILED')
      expect(result.error.message).toBe('Failed to create plan: No tasks extracted from the response')
    }
    expect(manager.hasPlan()).toBe(false)
  })

  it('turns an engine failure into an AppError', async () => {
    const manager = new PlanManager()
    const result = await generatePlan(manager, replyingEngine(new Error('connection refused')), 'Add login')

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toBe('Failed to create plan: connection refused')
      expect(result.error.category).toBe('PLAN')
    }
  })
})
