/**
 * 恢复建议与学习统计的终端渲染
 */

import chalk from 'chalk'
import { drawSeparator } from '../shared/drawSeparator.js'
import { truncateText } from '../shared/truncateText.js'
import type { LearningInsights } from '../types/knowledge.js'
import type { RecoveryContext } from './ErrorRecoveryManager.js'

const WIDTH = 60

export function formatRecoveryContext(context: RecoveryContext): string {
  const lines: string[] = [chalk.cyan(drawSeparator('RECOVERY SUGGESTIONS', WIDTH))]

  for (const suggestion of context.suggestions) {
    lines.push('')
    lines.push(chalk.yellow.bold(suggestion.title))
    lines.push(`  ${chalk.dim(suggestion.description)}`)
    for (const action of suggestion.actions) {
      lines.push(`  • ${action}`)
    }
  }

  lines.push(chalk.cyan(drawSeparator('', WIDTH)))
  return lines.join('\n')
}

export function formatInsights(insights: LearningInsights): string {
  if (insights.totalPatterns === 0) {
    return chalk.dim('No error patterns learned yet.')
  }

  const lines: string[] = [
    chalk.cyan(drawSeparator('ERROR LEARNING INSIGHTS', WIDTH)),
    '',
    `Total patterns learned: ${insights.totalPatterns}`,
    `Successful resolutions: ${chalk.green(String(insights.totalSuccesses))}`,
    `Failed attempts: ${chalk.red(String(insights.totalFailures))}`,
    `Success rate: ${Math.round(insights.successRate * 100)}%`,
    '',
    chalk.bold('Patterns by type:'),
    ...Object.entries(insights.patternsByType)
      .sort(([, a], [, b]) => b - a)
      .map(([type, count]) => `  ${type}: ${count}`),
  ]

  const top = insights.topPatterns.filter(p => p.successCount > 0)
  if (top.length > 0) {
    lines.push('')
    lines.push(chalk.bold('Most resolved:'))
    top.forEach((p, i) => {
      const sample = p.sampleMessage ? ` - ${truncateText(p.sampleMessage, 60)}` : ''
      lines.push(`  ${i + 1}. ${p.errorType} (${p.successCount} resolved)${chalk.dim(sample)}`)
    })
  }

  lines.push('')
  lines.push(chalk.cyan(drawSeparator('', WIDTH)))
  return lines.join('\n')
}
