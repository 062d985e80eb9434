import { describe, it, expect, vi } from 'vitest'
import { createInterruptHandler } from '../interrupt.js'

describe('createInterruptHandler', () => {
  it('requests a stop on the first interrupt', () => {
    const stop = vi.fn()
    const forceExit = vi.fn()
    const onInterrupt = createInterruptHandler({ stop, forceExit })

    onInterrupt()

    expect(stop).toHaveBeenCalledTimes(1)
    expect(forceExit).not.toHaveBeenCalled()
  })

  it('forces an exit on every later interrupt', () => {
    const stop = vi.fn()
    const forceExit = vi.fn()
    const onInterrupt = createInterruptHandler({ stop, forceExit })

    onInterrupt()
    onInterrupt()
    onInterrupt()

    expect(stop).toHaveBeenCalledTimes(1)
    expect(forceExit).toHaveBeenCalledTimes(2)
  })
})
