/**
 * CLI 交互式提示
 * 基于 inquirer 的简化封装
 */

import inquirer from 'inquirer'
import type { Operator, OperatorChoice } from '../execution/types.js'

export async function confirm(message: string, defaultValue: boolean = false): Promise<boolean> {
  const { result } = await inquirer.prompt<{ result: boolean }>([
    {
      type: 'confirm',
      name: 'result',
      message,
      default: defaultValue,
    },
  ])
  return result
}

// 单选
export async function select<T extends string>(
  message: string,
  choices: ReadonlyArray<OperatorChoice<T>>
): Promise<T> {
  const { result } = await inquirer.prompt<{ result: T }>([
    {
      type: 'list',
      name: 'result',
      message,
      choices: choices.map(c => ({ name: c.name, value: c.value })),
    },
  ])
  return result
}

/** 终端操作员：失败时由用户在列表中选择 */
export function createInquirerOperator(): Operator {
  return {
    askChoice: (message, choices) => select(message, choices),
  }
}
