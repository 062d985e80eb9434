/**
 * 错误知识库命令
 *   stepwise knowledge insights        - 学习统计
 *   stepwise knowledge lookup <msg>    - 查询某个错误的已学解决方案
 *   stepwise knowledge clear           - 清空知识库
 */

import type { Command } from 'commander'
import { formatInsights } from '../../recovery/formatRecovery.js'
import { ErrorRecoveryManager } from '../../recovery/ErrorRecoveryManager.js'
import { openKnowledge } from '../runtime.js'
import { confirm } from '../prompt.js'
import { bulletList, header, info, success } from '../output.js'

interface LookupOptions {
  type: string
}

export function registerKnowledgeCommands(program: Command): void {
  const knowledge = program.command('knowledge').description('Inspect what was learned from past errors')

  knowledge
    .command('insights')
    .description('Show learning statistics')
    .action(async () => {
      const recovery = new ErrorRecoveryManager(await openKnowledge())
      console.log(formatInsights(recovery.getLearningInsights()))
    })

  knowledge
    .command('lookup')
    .description('Show learned solutions for an error message')
    .argument('<message>', 'Error message')
    .option('-t, --type <type>', 'Error type', 'TaskFailure')
    .action(async (message: string, options: LookupOptions) => {
      const knowledge = await openKnowledge()
      const learnedSolutions = knowledge.getLearnedSolutions({ type: options.type, message })

      if (learnedSolutions.length === 0) {
        info('No learned solutions for this error')
        return
      }

      header('Learned solutions')
      bulletList(
        learnedSolutions.map(
          s => `${s.solution} (confidence: ${Math.round(s.confidence * 100)}%, used ${s.usageCount} times)`
        )
      )
    })

  knowledge
    .command('clear')
    .description('Forget every learned pattern')
    .option('-y, --yes', 'Do not ask for confirmation')
    .action(async (options: { yes?: boolean }) => {
      if (!options.yes && !(await confirm('Delete all learned error patterns?'))) return

      const recovery = new ErrorRecoveryManager(await openKnowledge())
      await recovery.clearLearning()
      success('Error knowledge cleared')
    })
}
