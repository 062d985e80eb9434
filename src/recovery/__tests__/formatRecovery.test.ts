import { describe, it, expect } from 'vitest'
import { formatInsights, formatRecoveryContext } from '../formatRecovery.js'
import { stripAnsi } from '../../shared/logger.js'
import type { LearningInsights } from '../../types/knowledge.js'

describe('formatRecoveryContext', () => {
  it('lists each suggestion with its actions', () => {
    const text = formatRecoveryContext({
      error: {
        operation: 'Plan execution - Task #1',
        type: 'TaskFailure',
        message: 'Error: disk full',
        timestamp: '2026-03-01T10:00:00.000Z',
        context: {},
      },
      learnedSolutions: [],
      suggestions: [
        {
          title: 'Task Reported Failure',
          description: 'The engine reported that the task failed',
          actions: ['Read the reason above', 'Retry the task'],
          recommendedAction: 'retry',
        },
      ],
    })

    expect(stripAnsi(text).split('\n')).toEqual([
      '── RECOVERY SUGGESTIONS ' + '─'.repeat(36),
      '',
      'Task Reported Failure',
      '  The engine reported that the task failed',
      '  • Read the reason above',
      '  • Retry the task',
      '─'.repeat(60),
    ])
  })
})

describe('formatInsights', () => {
  it('says when nothing was learned', () => {
    const empty: LearningInsights = {
      totalPatterns: 0,
      totalSuccesses: 0,
      totalFailures: 0,
      successRate: 0,
      patternsByType: {},
      topPatterns: [],
    }
    expect(stripAnsi(formatInsights(empty))).toBe('No error patterns learned yet.')
  })

  it('summarizes totals, types and resolved patterns', () => {
    const insights: LearningInsights = {
      totalPatterns: 2,
      totalSuccesses: 3,
      totalFailures: 1,
      successRate: 0.75,
      patternsByType: { EngineError: 1, TaskFailure: 1 },
      topPatterns: [
        {
          signature: 'TaskFailure:abc',
          errorType: 'TaskFailure',
          sampleMessage: 'Error: disk full',
          successCount: 3,
          failureCount: 0,
          successfulResolutions: [],
          failedAttempts: [],
        },
        {
          signature: 'EngineError:def',
          errorType: 'EngineError',
          successCount: 0,
          failureCount: 1,
          successfulResolutions: [],
          failedAttempts: [],
        },
      ],
    }

    const lines = stripAnsi(formatInsights(insights)).split('\n')

    expect(lines).toContain('Total patterns learned: 2')
    expect(lines).toContain('Success rate: 75%')
    expect(lines).toContain('  TaskFailure: 1')
    expect(lines).toContain('  1. TaskFailure (3 resolved) - Error: disk full')
    expect(lines.some(l => l.includes('EngineError (0 resolved)'))).toBe(false)
  })
})
