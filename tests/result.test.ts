/**
 * Result 类型单元测试
 */

import { describe, it, expect } from 'vitest'
import { ok, err, tryAsync, type Result } from '../src/shared/result.js'

function parseCount(input: string): Result<number, string> {
  const n = Number(input)
  return Number.isInteger(n) ? ok(n) : err(`not a count: ${input}`)
}

describe('ok / err', () => {
  it('narrows on the ok flag', () => {
    const good = parseCount('3')
    const bad = parseCount('three')

    expect(good).toEqual({ ok: true, value: 3 })
    expect(bad).toEqual({ ok: false, error: 'not a count: three' })
  })
})

describe('tryAsync', () => {
  it('wraps a resolved value', async () => {
    expect(await tryAsync(async () => 'done')).toEqual({ ok: true, value: 'done' })
  })

  it('wraps a synchronous return value', async () => {
    expect(await tryAsync(() => 7)).toEqual({ ok: true, value: 7 })
  })

  it('turns a rejection into err', async () => {
    const failure = new Error('engine unavailable')
    expect(await tryAsync(() => Promise.reject(failure))).toEqual({ ok: false, error: failure })
  })

  it('turns a synchronous throw into err', async () => {
    const result = await tryAsync(() => JSON.parse('{'))
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error).toBeInstanceOf(SyntaxError)
  })

  it('wraps non-Error rejections', async () => {
    const result = await tryAsync(() => Promise.reject('plain'))
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(Error)
      expect(result.error.message).toBe('plain')
    }
  })
})
