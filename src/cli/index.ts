#!/usr/bin/env node
/**
 * @entry stepwise CLI 主入口
 *
 * 命令：
 *   stepwise run "请求"              - 分析复杂度，必要时先生成计划再执行
 *   stepwise plan "目标" [--dry-run] - 生成计划并执行
 *   stepwise analyze "请求"          - 只做复杂度分析
 *   stepwise knowledge ...           - 错误知识库
 */

import { Command } from 'commander'
import { setLogLevel } from '../shared/logger.js'
import { ensureError } from '../shared/assertError.js'
import { printError } from '../shared/error.js'
import { registerRunCommands } from './commands/run.js'
import { registerAnalyzeCommand } from './commands/analyze.js'
import { registerKnowledgeCommands } from './commands/knowledge.js'

const program = new Command()

program
  .name('stepwise')
  .description('Plan multi-step development requests and execute them task by task')
  .version('0.1.0')
  .option('--debug', 'Show debug logs')
  .hook('preAction', thisCommand => {
    if (thisCommand.opts<{ debug?: boolean }>().debug) {
      setLogLevel('debug')
    }
  })

registerRunCommands(program)
registerAnalyzeCommand(program)
registerKnowledgeCommands(program)

program.parseAsync().catch((e: unknown) => {
  printError(ensureError(e))
  process.exit(1)
})
