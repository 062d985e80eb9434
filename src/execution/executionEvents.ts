/**
 * Plan execution events. The CLI renders progress from these; the executor
 * never touches the terminal.
 *
 * Listener errors are caught and logged, never propagated to the executor.
 */

import { EventEmitter } from 'events'
import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'
import type { PlanTaskSnapshot } from '../types/plan.js'
import type { ExecutionResult } from './types.js'

const logger = createLogger('execution-events')

export interface TaskAttemptPayload {
  task: PlanTaskSnapshot
  /** 1 for the first run, 2 for the retry */
  attempt: number
}

export interface ExecutionEventMap {
  'execution:started': [payload: { goal: string; total: number }]
  'task:started': [payload: TaskAttemptPayload]
  'task:completed': [payload: TaskAttemptPayload]
  'task:failed': [payload: TaskAttemptPayload & { error: string }]
  'execution:finished': [payload: ExecutionResult]
}

type Listener<K extends keyof ExecutionEventMap> = (...args: ExecutionEventMap[K]) => void

export class ExecutionEventBus {
  private readonly emitter = new EventEmitter()

  on<K extends keyof ExecutionEventMap>(event: K, listener: Listener<K>): this {
    this.emitter.on(event, listener)
    return this
  }

  off<K extends keyof ExecutionEventMap>(event: K, listener: Listener<K>): this {
    this.emitter.off(event, listener)
    return this
  }

  /** A failing listener neither stops the executor nor the other listeners */
  emit<K extends keyof ExecutionEventMap>(event: K, ...args: ExecutionEventMap[K]): boolean {
    const listeners = this.emitter.listeners(event)
    for (const listener of listeners) {
      try {
        listener(...args)
      } catch (e) {
        logger.error(`Listener error for ${event}: ${getErrorMessage(e)}`)
      }
    }
    return listeners.length > 0
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners()
  }
}
