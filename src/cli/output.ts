/**
 * 面向终端用户的输出：状态行、标题、对齐的键值列表
 * 诊断信息走 shared/logger.ts
 */

import chalk from 'chalk'

type Marker = 'success' | 'error' | 'warn' | 'info'

const MARKERS: Record<Marker, string> = {
  success: chalk.green('✓'),
  error: chalk.red('✗'),
  warn: chalk.yellow('!'),
  info: chalk.blue('ℹ'),
}

function status(marker: Marker, message: string): void {
  const line = `${MARKERS[marker]} ${message}`
  if (marker === 'error') console.error(line)
  else if (marker === 'warn') console.warn(line)
  else console.log(line)
}

export const success = (message: string): void => status('success', message)
export const error = (message: string): void => status('error', message)
export const warn = (message: string): void => status('warn', message)
export const info = (message: string): void => status('info', message)

const HEADER_RULE_MAX = 40

export function header(title: string): void {
  console.log(`\n${chalk.bold(title)}`)
  console.log(chalk.dim('─'.repeat(Math.min(title.length + 4, HEADER_RULE_MAX))))
}

/** 标签对齐的键值对，缺失的值显示为 - */
export function list(entries: ReadonlyArray<readonly [string, string | number | undefined]>): void {
  const width = Math.max(0, ...entries.map(([label]) => label.length))
  for (const [label, value] of entries) {
    console.log(`  ${chalk.gray(`${label.padEnd(width)}:`)} ${value ?? '-'}`)
  }
}

export function bulletList(items: readonly string[]): void {
  for (const item of items) console.log(`  ${chalk.dim('•')} ${item}`)
}
