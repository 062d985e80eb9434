/**
 * 把操作员的交互式选择适配成执行器的失败决策
 */

import type {
  FailureDecision,
  FailureDecisionRequest,
  FailureResolver,
  Operator,
  OperatorChoice,
} from './types.js'

export const FAILURE_CHOICES: ReadonlyArray<OperatorChoice<FailureDecision>> = [
  { name: 'Retry this task', value: 'retry' },
  { name: 'Skip and continue', value: 'skip' },
  { name: 'Stop execution', value: 'stop' },
]

export interface OperatorResolverOptions {
  /** 提问前调用，用于展示恢复建议 */
  beforeAsk?: (request: FailureDecisionRequest) => void
}

export function createOperatorResolver(
  operator: Operator,
  options: OperatorResolverOptions = {}
): FailureResolver {
  return async request => {
    options.beforeAsk?.(request)
    return operator.askChoice(
      `Task #${request.task.number} failed: ${request.error}. What would you like to do?`,
      FAILURE_CHOICES
    )
  }
}
