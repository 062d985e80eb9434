import { describe, it, expect, vi, beforeEach } from 'vitest'

const promptMock = vi.hoisted(() => vi.fn())

vi.mock('inquirer', () => ({
  default: { prompt: promptMock },
}))

import { confirm, createInquirerOperator } from '../prompt.js'
import { FAILURE_CHOICES } from '../../execution/operatorResolver.js'

beforeEach(() => {
  promptMock.mockReset()
})

describe('createInquirerOperator', () => {
  it('asks a list question and returns the picked value', async () => {
    promptMock.mockResolvedValue({ result: 'stop' })

    const answer = await createInquirerOperator().askChoice('Task #1 failed: boom. What would you like to do?', FAILURE_CHOICES)

    expect(answer).toBe('stop')
    expect(promptMock).toHaveBeenCalledWith([
      {
        type: 'list',
        name: 'result',
        message: 'Task #1 failed: boom. What would you like to do?',
        choices: [
          { name: 'Retry this task', value: 'retry' },
          { name: 'Skip and continue', value: 'skip' },
          { name: 'Stop execution', value: 'stop' },
        ],
      },
    ])
  })
})

describe('confirm', () => {
  it('passes the default through', async () => {
    promptMock.mockResolvedValue({ result: true })

    expect(await confirm('Execute this plan now?', true)).toBe(true)
    expect(promptMock).toHaveBeenCalledWith([
      { type: 'confirm', name: 'result', message: 'Execute this plan now?', default: true },
    ])
  })
})
