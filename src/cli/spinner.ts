/**
 * ora 封装：任务进度行与单次等待
 */

import ora from 'ora'
import { ensureError } from '../shared/assertError.js'

export interface Spinner {
  start(text?: string): void
  succeed(text?: string): void
  fail(text?: string): void
}

/** 同一个 spinner 可以反复 start，用于逐个任务显示进度 */
export function createSpinner(text?: string): Spinner {
  const spinner = ora({ text, spinner: 'dots' })

  return {
    start(next) {
      if (spinner.isSpinning) spinner.stop()
      if (next) spinner.text = next
      spinner.start()
    },
    succeed: next => {
      spinner.succeed(next)
    },
    fail: next => {
      spinner.fail(next)
    },
  }
}

/** 等待期间显示 spinner；失败时以错误信息收尾并继续抛出 */
export async function withSpinner<T>(text: string, task: () => Promise<T>, doneText?: string): Promise<T> {
  const spinner = createSpinner(text)
  spinner.start()
  try {
    const result = await task()
    spinner.succeed(doneText)
    return result
  } catch (e) {
    spinner.fail(ensureError(e).message)
    throw e
  }
}
