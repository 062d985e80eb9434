/**
 * 主命令：
 *   stepwise run "请求"    - 复杂请求先生成计划再逐步执行，简单请求直接回答
 *   stepwise plan "目标"   - 生成计划，确认后执行
 */

import type { Command } from 'commander'
import chalk from 'chalk'
import { analyzeComplexity, shouldSuggestPlan } from '../../analysis/analyzeComplexity.js'
import { generatePlan } from '../../plan/generatePlan.js'
import { printError } from '../../shared/error.js'
import { createRuntime, executeInTerminal, type Runtime } from '../runtime.js'
import { confirm } from '../prompt.js'
import { createSpinner, withSpinner } from '../spinner.js'
import { info } from '../output.js'

interface RunOptions {
  yes?: boolean
}

interface PlanOptions {
  dryRun?: boolean
  yes?: boolean
}

/** 生成并展示计划，失败时返回 false */
async function createPlan(runtime: Runtime, goal: string): Promise<boolean> {
  const spinner = createSpinner('Creating plan...')
  spinner.start()
  const result = await generatePlan(runtime.session.plans, runtime.engine, goal, runtime.project)

  if (!result.ok) {
    spinner.fail('Plan creation failed')
    printError(result.error)
    process.exitCode = 1
    return false
  }

  spinner.succeed(`Plan created with ${result.value.totalCount} tasks`)
  console.log('\n' + runtime.session.plans.displayPlan() + '\n')
  return true
}

async function runPlanned(runtime: Runtime, goal: string, askFirst: boolean): Promise<void> {
  if (!(await createPlan(runtime, goal))) return

  if (askFirst && !(await confirm('Execute this plan now?', true))) {
    info('Plan not executed')
    return
  }

  const result = await executeInTerminal(runtime)
  if (!result.success) process.exitCode = 1
}

export function registerRunCommands(program: Command): void {
  program
    .command('run')
    .description('Handle a request, planning it first when it looks multi-step')
    .argument('<request>', 'What you want done')
    .option('-y, --yes', 'Plan and execute without asking')
    .action(async (request: string, options: RunOptions) => {
      const verdict = analyzeComplexity(request)
      console.log(chalk.dim(`Complexity: ${verdict.level} (score ${verdict.score}) - ${verdict.reasoning}`))

      const runtime = await createRuntime()

      if (shouldSuggestPlan(verdict)) {
        const usePlan =
          options.yes || (await confirm('This looks like a multi-step task. Create a plan first?', true))
        if (usePlan) {
          await runPlanned(runtime, request, !options.yes)
          return
        }
      }

      const answer = await withSpinner('Thinking...', () => runtime.engine.query(request))
      console.log('\n' + answer)
    })

  program
    .command('plan')
    .description('Break a goal into a task plan and execute it')
    .argument('<goal>', 'Goal to plan')
    .option('--dry-run', 'Only show the plan')
    .option('-y, --yes', 'Execute without asking')
    .action(async (goal: string, options: PlanOptions) => {
      const runtime = await createRuntime()

      if (options.dryRun) {
        await createPlan(runtime, goal)
        return
      }
      await runPlanned(runtime, goal, !options.yes)
    })
}
