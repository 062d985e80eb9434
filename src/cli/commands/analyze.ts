import type { Command } from 'commander'
import chalk from 'chalk'
import { analyzeComplexity, shouldSuggestPlan, type ComplexityLevel } from '../../analysis/analyzeComplexity.js'
import { header, list } from '../output.js'

const LEVEL_COLORS: Record<ComplexityLevel, (s: string) => string> = {
  simple: chalk.green,
  moderate: chalk.cyan,
  complex: chalk.yellow,
  very_complex: chalk.red,
}

export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze')
    .description('Score how complex a request is')
    .argument('<request>', 'Request to analyze')
    .action((request: string) => {
      const verdict = analyzeComplexity(request)

      header('Complexity analysis')
      list([
        ['Level', LEVEL_COLORS[verdict.level](verdict.level)],
        ['Score', verdict.score],
        ['Reasoning', verdict.reasoning],
        ['Plan suggested', shouldSuggestPlan(verdict) ? 'yes' : 'no'],
      ])
    })
}
