/**
 * Shared 工具函数测试
 *
 * 覆盖: drawSeparator, sleep, createMutex, assertError, AppError / EngineError, stripAnsi
 */

import { describe, it, expect } from 'vitest'
import { drawSeparator } from '../src/shared/drawSeparator.js'
import { sleep } from '../src/shared/sleep.js'
import { createMutex } from '../src/shared/mutex.js'
import { ensureError, getErrorMessage, getErrorName } from '../src/shared/assertError.js'
import { AppError, EngineError } from '../src/shared/error.js'
import { stripAnsi } from '../src/shared/logger.js'

describe('drawSeparator', () => {
  it('draws a plain line', () => {
    expect(drawSeparator('', 5)).toBe('─────')
  })

  it('embeds the title', () => {
    expect(drawSeparator('PLAN', 12)).toBe('── PLAN ────')
  })

  it('never pads negatively', () => {
    expect(drawSeparator('A VERY LONG TITLE', 4)).toBe('── A VERY LONG TITLE ')
  })
})

describe('sleep', () => {
  it('resolves true when not interrupted', async () => {
    expect(await sleep(1)).toBe(true)
  })

  it('resolves false for an aborted signal', async () => {
    const controller = new AbortController()
    controller.abort()
    expect(await sleep(60_000, controller.signal)).toBe(false)
  })

  it('resolves false when aborted while waiting', async () => {
    const controller = new AbortController()
    const waiting = sleep(60_000, controller.signal)
    controller.abort()
    expect(await waiting).toBe(false)
  })
})

describe('createMutex', () => {
  it('runs critical sections one after another', async () => {
    const mutex = createMutex()
    const order: string[] = []

    const slow = mutex.runExclusive(async () => {
      order.push('a:start')
      await sleep(5)
      order.push('a:end')
    })
    const fast = mutex.runExclusive(() => {
      order.push('b')
    })

    await Promise.all([slow, fast])

    expect(order).toEqual(['a:start', 'a:end', 'b'])
  })

  it('releases the lock when a section throws', async () => {
    const mutex = createMutex()
    await expect(
      mutex.runExclusive(() => {
        throw new Error('boom')
      })
    ).rejects.toThrow('boom')
    expect(await mutex.runExclusive(() => 'next')).toBe('next')
  })
})

describe('assertError', () => {
  it('extracts messages and names from thrown values', () => {
    const typeError = new TypeError('x is undefined')
    expect(getErrorMessage(typeError)).toBe('x is undefined')
    expect(getErrorName(typeError)).toBe('TypeError')
    expect(getErrorMessage('plain')).toBe('plain')
    expect(getErrorName('plain')).toBe('Error')
    expect(getErrorMessage(42)).toBe('42')
    expect(getErrorName(42)).toBe('UnknownError')
  })

  it('wraps non-errors', () => {
    const error = ensureError({ toString: () => 'odd' })
    expect(error).toBeInstanceOf(Error)
    expect(error.message).toBe('odd')
  })
})

describe('AppError', () => {
  it('classifies known failures', () => {
    expect(AppError.fromError('connect ECONNREFUSED 127.0.0.1:11434')).toMatchObject({
      code: 'ERR_NETWORK',
      category: 'NETWORK',
    })
    expect(AppError.fromError(new Error('Request timed out'))).toMatchObject({
      code: 'ERR_TIMEOUT',
      category: 'TIMEOUT',
    })
    expect(AppError.fromError('something odd').code).toBe('ERR_UNKNOWN')
  })

  it('formats code, message and suggestion', () => {
    const text = stripAnsi(AppError.planGeneration('No tasks extracted from the response').format())
    expect(text).toContain('Error [PLAN]')
    expect(text).toContain('  Code: PLAN_GENERATION_FAILED')
    expect(text).toContain('  Failed to create plan: No tasks extracted from the response')
    expect(text).toContain('Suggested fix:')
  })
})

describe('EngineError', () => {
  it('keeps its own name for error signatures', () => {
    const error = EngineError.from(new Error('429 Too Many Requests'))
    expect(error.name).toBe('EngineError')
    expect(error.code).toBe('ERR_RATE_LIMIT')
    expect(error.category).toBe('ENGINE')
  })

  it('falls back to ENGINE_FAILED', () => {
    expect(EngineError.from('model not found').code).toBe('ENGINE_FAILED')
  })

  it('returns an existing EngineError unchanged', () => {
    const original = new EngineError('ERR_AUTH', 'bad key')
    expect(EngineError.from(original)).toBe(original)
  })
})
