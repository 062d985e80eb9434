/**
 * 统一错误处理
 * 面向用户的错误带错误码、分类和修复建议
 */

import chalk from 'chalk'
import { getErrorMessage } from './assertError.js'

export type ErrorCategory =
  | 'PLAN' // 计划生成/执行错误
  | 'ENGINE' // 推理引擎调用错误
  | 'NETWORK'
  | 'TIMEOUT'
  | 'UNKNOWN'

export type ErrorCode =
  | 'PLAN_GENERATION_FAILED'
  | 'ENGINE_FAILED'
  | 'ERR_TIMEOUT'
  | 'ERR_NETWORK'
  | 'ERR_RATE_LIMIT'
  | 'ERR_AUTH'
  | 'ERR_UNKNOWN'

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly category: ErrorCategory = 'UNKNOWN',
    cause?: unknown,
    public readonly suggestion?: string
  ) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'AppError'
  }

  /** 终端输出格式 */
  format(): string {
    const lines: string[] = ['']
    const colorFn = categoryColors[this.category]

    lines.push(chalk.red('✗') + ' ' + chalk.bold('Error') + ` [${colorFn(this.category)}]`)
    lines.push('')
    lines.push(chalk.dim(`  Code: ${this.code}`))
    lines.push(`  ${this.message}`)

    if (this.suggestion) {
      lines.push('')
      lines.push(chalk.cyan('  Suggested fix:'))
      lines.push(chalk.dim('    →') + ` ${this.suggestion}`)
    }

    lines.push('')
    return lines.join('\n')
  }

  // ============ 工厂方法 ============

  static planGeneration(reason: string, cause?: unknown): AppError {
    return new AppError(
      'PLAN_GENERATION_FAILED',
      `Failed to create plan: ${reason}`,
      'PLAN',
      cause,
      'Rephrase the goal with clearer, more concrete instructions'
    )
  }

  /**
   * 按已知错误模式把普通错误转为 AppError
   */
  static fromError(error: Error | string): AppError {
    const message = typeof error === 'string' ? error : error.message
    const cause = typeof error === 'string' ? undefined : error

    const pattern = errorPatterns.find(p => p.pattern.test(message))
    if (pattern) {
      return new AppError(pattern.code, message, pattern.category, cause, pattern.suggestion)
    }
    return new AppError('ERR_UNKNOWN', message, 'UNKNOWN', cause)
  }
}

/**
 * 推理引擎调用失败
 * 作为独立的错误名参与错误签名，便于知识库按类型聚合
 */
export class EngineError extends AppError {
  constructor(code: ErrorCode, message: string, cause?: unknown, suggestion?: string) {
    super(code, message, 'ENGINE', cause, suggestion)
    this.name = 'EngineError'
  }

  static from(error: unknown): EngineError {
    if (error instanceof EngineError) return error
    const classified = AppError.fromError(error instanceof Error ? error : getErrorMessage(error))
    const code = classified.code === 'ERR_UNKNOWN' ? 'ENGINE_FAILED' : classified.code
    return new EngineError(code, classified.message, error, classified.suggestion)
  }
}

// ============ 错误模式匹配 ============

interface ErrorPattern {
  pattern: RegExp
  category: ErrorCategory
  code: ErrorCode
  suggestion: string
}

const errorPatterns: ErrorPattern[] = [
  {
    pattern: /timeout|timed out|ETIMEDOUT/i,
    category: 'TIMEOUT',
    code: 'ERR_TIMEOUT',
    suggestion: 'Increase engine.timeoutSeconds or split the task into smaller steps',
  },
  {
    pattern: /ECONNREFUSED|ENOTFOUND|network|connection (?:refused|error)/i,
    category: 'NETWORK',
    code: 'ERR_NETWORK',
    suggestion: 'Check that the engine endpoint (engine.baseURL) is reachable',
  },
  {
    pattern: /rate.?limit|429|too many requests/i,
    category: 'ENGINE',
    code: 'ERR_RATE_LIMIT',
    suggestion: 'Wait a few minutes and retry',
  },
  {
    pattern: /unauthorized|401|api.?key|authentication/i,
    category: 'ENGINE',
    code: 'ERR_AUTH',
    suggestion: 'Check the STEPWISE_API_KEY environment variable',
  },
]

const categoryColors: Record<ErrorCategory, (text: string) => string> = {
  PLAN: chalk.magenta,
  ENGINE: chalk.red,
  NETWORK: chalk.red,
  TIMEOUT: chalk.magenta,
  UNKNOWN: chalk.gray,
}

export function printError(error: Error | string): void {
  const appError = error instanceof AppError ? error : AppError.fromError(error)
  console.error(appError.format())
}

export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${String(x)}`)
}
