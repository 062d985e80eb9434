/**
 * CLI 运行时：按配置组装会话、引擎、知识库与执行器
 */

import chalk from 'chalk'
import { loadConfig, resolveKnowledgeFile, type Config } from '../config/index.js'
import { detectProject, type ProjectContext } from '../project/detectProject.js'
import { createOpenAICompatibleEngine } from '../backend/openaiCompatibleEngine.js'
import type { ReasoningEngine } from '../backend/types.js'
import { ErrorKnowledgeStore } from '../recovery/ErrorKnowledgeStore.js'
import { ErrorRecoveryManager } from '../recovery/ErrorRecoveryManager.js'
import { formatRecoveryContext } from '../recovery/formatRecovery.js'
import { PlanSession } from '../plan/PlanSession.js'
import { PlanExecutor } from '../execution/PlanExecutor.js'
import { createOperatorResolver } from '../execution/operatorResolver.js'
import type { ExecutionResult } from '../execution/types.js'
import { createInquirerOperator } from './prompt.js'
import { createSpinner } from './spinner.js'
import { createInterruptHandler, INTERRUPT_EXIT_CODE } from './interrupt.js'
import { error, info, success, warn } from './output.js'

export interface Runtime {
  config: Config
  project: ProjectContext
  session: PlanSession
  engine: ReasoningEngine
  recovery: ErrorRecoveryManager
}

export async function createRuntime(cwd: string = process.cwd()): Promise<Runtime> {
  const config = await loadConfig({ cwd })
  const knowledge = await openKnowledge(config)

  return {
    config,
    project: detectProject(cwd),
    session: new PlanSession(),
    engine: createOpenAICompatibleEngine(config.engine),
    recovery: new ErrorRecoveryManager(knowledge),
  }
}

/** 只打开知识库，不需要引擎 */
export async function openKnowledge(config?: Config): Promise<ErrorKnowledgeStore> {
  const resolved = config ?? (await loadConfig())
  return ErrorKnowledgeStore.open(resolveKnowledgeFile(resolved), {
    maxPatterns: resolved.knowledge.maxPatterns,
  })
}

function createTerminalExecutor(runtime: Runtime): PlanExecutor {
  const resolveFailure = createOperatorResolver(createInquirerOperator(), {
    beforeAsk: request => console.log('\n' + formatRecoveryContext(request.recovery) + '\n'),
  })

  const executor = new PlanExecutor({
    session: runtime.session,
    engine: runtime.engine,
    recovery: runtime.recovery,
    resolveFailure,
    taskDelayMs: runtime.config.execution.taskDelayMs,
  })

  const spinner = createSpinner()
  executor.events
    .on('execution:started', ({ goal, total }) => {
      info(`Executing plan: ${goal} (${total} tasks)`)
    })
    .on('task:started', ({ task, attempt }) => {
      const retry = attempt > 1 ? chalk.dim(' (retry)') : ''
      spinner.start(`Task #${task.number}: ${task.description}${retry}`)
    })
    .on('task:completed', ({ task }) => {
      spinner.succeed(`Task #${task.number}: ${task.description}`)
      console.log(runtime.session.plans.displayCompactPlan())
    })
    .on('task:failed', ({ task, error: reason }) => {
      spinner.fail(`Task #${task.number}: ${reason}`)
    })

  return executor
}

function printResult(result: ExecutionResult): void {
  console.log()
  if (result.success) {
    success(result.message)
  } else {
    error(result.message)
  }
}

/**
 * 执行当前计划；Ctrl+C 请求在当前任务结束后停止（失败提示中按下则立即停止），再按一次强制退出
 */
export async function executeInTerminal(runtime: Runtime): Promise<ExecutionResult> {
  const executor = createTerminalExecutor(runtime)
  const onInterrupt = createInterruptHandler({
    stop: () => {
      warn('Stopping after the current task... (Ctrl+C again to quit now)')
      executor.stopExecution()
    },
    forceExit: () => {
      console.log()
      error('Interrupted')
      process.exit(INTERRUPT_EXIT_CODE)
    },
  })

  process.on('SIGINT', onInterrupt)
  try {
    const result = await executor.executePlan(runtime.project)
    printResult(result)
    console.log('\n' + runtime.session.plans.displayPlan())
    return result
  } finally {
    process.off('SIGINT', onInterrupt)
    executor.events.removeAllListeners()
  }
}
