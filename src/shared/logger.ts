/**
 * 统一日志系统
 *
 * 交互终端下输出 `时间 级别 消息`；stdout 不是 TTY 时在消息前加 [scope]，
 * 便于在重定向的日志里区分模块。NODE_ENV=test 时默认静默。
 *
 * 级别来源：LOG_LEVEL / DEBUG=1 / SILENT=1，或 setLogLevel()（CLI 的 --debug）
 */

import chalk from 'chalk'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'
type EmittingLevel = Exclude<LogLevel, 'silent'>

interface LevelStyle {
  rank: number
  label: string
  paint: (s: string) => string
  sink: (...data: unknown[]) => void
}

const LEVELS: Record<EmittingLevel, LevelStyle> = {
  debug: { rank: 0, label: 'DBG', paint: chalk.gray, sink: (...d) => console.log(...d) },
  info: { rank: 1, label: 'INF', paint: chalk.blue, sink: (...d) => console.log(...d) },
  warn: { rank: 2, label: 'WRN', paint: chalk.yellow, sink: (...d) => console.warn(...d) },
  error: { rank: 3, label: 'ERR', paint: chalk.red, sink: (...d) => console.error(...d) },
}
const SILENT_RANK = 4

function rankOf(level: LogLevel): number {
  return level === 'silent' ? SILENT_RANK : LEVELS[level].rank
}

function isLogLevel(value: string): value is LogLevel {
  return value === 'silent' || Object.hasOwn(LEVELS, value)
}

function levelFromEnv(env: NodeJS.ProcessEnv): LogLevel {
  if (env.NODE_ENV === 'test' || env.SILENT === '1') return 'silent'
  if (env.DEBUG === '1') return 'debug'
  const requested = env.LOG_LEVEL
  return requested && isLogLevel(requested) ? requested : 'info'
}

let threshold: LogLevel = levelFromEnv(process.env)

export function setLogLevel(level: LogLevel): void {
  threshold = level
}

function clock(date: Date): string {
  const hms = [date.getHours(), date.getMinutes(), date.getSeconds()]
  return chalk.dim(hms.map(n => String(n).padStart(2, '0')).join(':'))
}

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1b\[[0-9;]*m/g

/** 移除 ANSI 颜色序列 */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '')
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

export function createLogger(scope: string = ''): Logger {
  const tag = scope ? `${chalk.cyan(`[${scope}]`)} ` : ''

  const emit =
    (level: EmittingLevel) =>
    (message: string, ...args: unknown[]): void => {
      const style = LEVELS[level]
      if (style.rank < rankOf(threshold)) return
      const prefix = `${clock(new Date())} ${style.paint(style.label)} ${process.stdout.isTTY ? '' : tag}`
      style.sink(prefix + message, ...args)
    }

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  }
}

export interface ErrorContext {
  /** 计划中的任务编号 */
  taskNumber?: number
  operation?: string
  attempt?: number
  [key: string]: unknown
}

const STACK_LINES = 6

/**
 * 记录带上下文的错误，附带截断后的堆栈
 *
 * @example
 * logError(logger, 'Engine query failed', err, { taskNumber: 2, attempt: 1 })
 */
export function logError(logger: Logger, message: string, error: Error | string, context: ErrorContext = {}): void {
  const details: Record<string, unknown> = Object.fromEntries(
    Object.entries(context).filter(([, value]) => value !== undefined)
  )
  if (error instanceof Error && error.stack) {
    details.stack = error.stack.split('\n').slice(0, STACK_LINES).join('\n')
  }

  const text = `${message}: ${error instanceof Error ? error.message : error}`
  if (Object.keys(details).length > 0) {
    logger.error(text, details)
  } else {
    logger.error(text)
  }
}
