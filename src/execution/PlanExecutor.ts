/**
 * Plan Executor
 *
 * Drives the session's current plan task by task through the reasoning engine:
 * classify each response, record failures with the recovery collaborator, suspend
 * on the failure resolver for retry / skip / stop, and summarize the run.
 *
 * Reentrancy is rejected through the session guard. Stopping is cooperative:
 * it takes effect between tasks and interrupts the inter-task pause.
 */

import { createLogger, logError } from '../shared/logger.js'
import { assertNever } from '../shared/error.js'
import { err, ok, tryAsync, type Result } from '../shared/result.js'
import { getErrorMessage } from '../shared/assertError.js'
import { sleep } from '../shared/sleep.js'
import type { ReasoningEngine } from '../backend/types.js'
import type { PlanSession } from '../plan/PlanSession.js'
import type { TaskPlan } from '../plan/TaskPlan.js'
import type { ProjectContext } from '../project/detectProject.js'
import type { PlanTaskSnapshot } from '../types/plan.js'
import { buildTaskPrompt } from './buildTaskPrompt.js'
import { DEFAULT_FAILURE_REASON, keywordClassifier, type ResponseClassifier } from './classifyResponse.js'
import { ExecutionEventBus } from './executionEvents.js'
import { TaskFailureError } from './TaskFailureError.js'
import type {
  ExecutionResult,
  ExecutionSummary,
  FailureDecision,
  FailureDecisionRequest,
  FailureRecorder,
  FailureResolver,
  TaskFailure,
} from './types.js'

const logger = createLogger('executor')

const DEFAULT_TASK_DELAY_MS = 500
export const RETRY_SOLUTION = 'Retry the task'

type FailureOutcome = 'recovered' | 'skipped' | 'stopped'

export interface PlanExecutorOptions {
  session: PlanSession
  engine: ReasoningEngine
  recovery: FailureRecorder
  resolveFailure: FailureResolver
  classifier?: ResponseClassifier
  /** Pause between tasks; 0 disables it */
  taskDelayMs?: number
}

function emptySummary(): ExecutionSummary {
  return { total: 0, completed: 0, failed: 0, skipped: 0 }
}

export class PlanExecutor {
  readonly events = new ExecutionEventBus()

  private readonly session: PlanSession
  private readonly engine: ReasoningEngine
  private readonly recovery: FailureRecorder
  private readonly resolveFailure: FailureResolver
  private readonly classifier: ResponseClassifier
  private readonly taskDelayMs: number

  constructor(options: PlanExecutorOptions) {
    this.session = options.session
    this.engine = options.engine
    this.recovery = options.recovery
    this.resolveFailure = options.resolveFailure
    this.classifier = options.classifier ?? keywordClassifier
    this.taskDelayMs = options.taskDelayMs ?? DEFAULT_TASK_DELAY_MS
  }

  async executePlan(project?: ProjectContext): Promise<ExecutionResult> {
    const plan = this.session.plans.getCurrentPlan()
    if (!plan) {
      return { success: false, message: 'No active plan to execute', summary: emptySummary() }
    }
    if (!this.session.beginExecution()) {
      return { success: false, message: 'Execution already in progress', summary: emptySummary() }
    }

    try {
      const result = await this.runPlan(plan, project)
      this.events.emit('execution:finished', result)
      return result
    } finally {
      this.session.endExecution()
    }
  }

  /** Takes effect after the current task */
  stopExecution(): void {
    logger.info('Stop requested')
    this.session.requestStop()
  }

  private async runPlan(plan: TaskPlan, project?: ProjectContext): Promise<ExecutionResult> {
    const taskNumbers = plan.tasks.map(t => t.number)
    let completed = 0
    let failed = 0
    let stopped = false

    this.events.emit('execution:started', { goal: plan.description, total: taskNumbers.length })

    for (const [index, taskNumber] of taskNumbers.entries()) {
      if (this.session.stopRequested) {
        stopped = true
        break
      }

      const status = plan.getTask(taskNumber)?.status
      if (status === 'completed') {
        completed++
        continue
      }
      if (status === 'failed') {
        failed++
        continue
      }

      const outcome = await this.attemptTask(plan, taskNumber, 1, project)
      if (outcome.ok) {
        completed++
      } else {
        failed++
        const handled = await this.handleFailure(plan, taskNumber, outcome.error, project)
        if (handled === 'recovered') {
          failed--
          completed++
        } else if (handled === 'stopped') {
          stopped = true
          break
        }
      }

      const hasMore = index < taskNumbers.length - 1
      if (hasMore && !(await sleep(this.taskDelayMs, this.session.stopSignal))) {
        stopped = true
        break
      }
    }

    const skipped = stopped
      ? taskNumbers.filter(n => plan.getTask(n)?.status === 'pending').length
      : 0
    const summary: ExecutionSummary = { total: taskNumbers.length, completed, failed, skipped }
    const success = completed === summary.total

    return {
      success,
      message: success
        ? 'All tasks completed successfully!'
        : `Execution incomplete: ${completed} completed, ${failed} failed, ${skipped} skipped`,
      summary,
    }
  }

  /**
   * Run one task: mark it in progress, query the engine, classify, and record the result
   * on the plan.
   */
  private async attemptTask(
    plan: TaskPlan,
    taskNumber: number,
    attempt: number,
    project?: ProjectContext
  ): Promise<Result<void, TaskFailure>> {
    const plans = this.session.plans
    plans.startTask(taskNumber)

    const task = plan.getTask(taskNumber)
    if (!task) {
      return err({ message: `Unknown task #${taskNumber}`, fault: new Error(`Unknown task #${taskNumber}`) })
    }
    this.events.emit('task:started', { task: { ...task }, attempt })

    const prompt = buildTaskPrompt(plan, task, project)
    const response = await tryAsync(() => this.engine.query(prompt))

    let failure: TaskFailure | null = null
    if (!response.ok) {
      logError(logger, `Task #${taskNumber} engine query failed`, response.error, { taskNumber, attempt })
      failure = { message: response.error.message || DEFAULT_FAILURE_REASON, fault: response.error }
    } else {
      const verdict = this.classifier.classify(response.value)
      if (verdict.outcome === 'failure') {
        failure = { message: verdict.reason, fault: new TaskFailureError(verdict.reason) }
      }
    }

    if (failure) {
      plans.failTask(taskNumber, failure.message)
      this.events.emit('task:failed', { task: this.snapshot(plan, taskNumber), attempt, error: failure.message })
      return err(failure)
    }

    plans.completeTask(taskNumber)
    this.events.emit('task:completed', { task: this.snapshot(plan, taskNumber), attempt })
    return ok(undefined)
  }

  private async handleFailure(
    plan: TaskPlan,
    taskNumber: number,
    failure: TaskFailure,
    project?: ProjectContext
  ): Promise<FailureOutcome> {
    const task = this.snapshot(plan, taskNumber)
    const recovery = this.recovery.recordError(`Plan execution - Task #${taskNumber}`, failure.fault, {
      taskNumber,
      task: task.description,
    })

    // 停止请求已到达时不再打扰操作员
    if (this.session.stopRequested) return 'stopped'

    const decision = await this.askForDecision({ task, error: failure.message, recovery })
    switch (decision) {
      case 'skip':
        logger.info(`Skipping task #${taskNumber}`)
        return 'skipped'
      case 'stop':
        this.session.requestStop()
        return 'stopped'
      case 'retry': {
        const retry = await this.attemptTask(plan, taskNumber, 2, project)
        if (retry.ok) {
          await this.recovery.recordSuccessfulResolution(recovery.error, RETRY_SOLUTION, 'Task completed on retry')
          return 'recovered'
        }
        await this.recovery.recordFailedResolution(recovery.error, RETRY_SOLUTION, retry.error.message)
        this.session.requestStop()
        return 'stopped'
      }
      default:
        return assertNever(decision)
    }
  }

  /**
   * A resolver that throws (e.g. the prompt was closed) counts as stop. So does a stop
   * requested while the resolver is still waiting, whether or not it ever settles.
   */
  private async askForDecision(request: FailureDecisionRequest): Promise<FailureDecision> {
    const signal = this.session.stopSignal
    let onAbort = (): void => {}
    const stopped = new Promise<FailureDecision>(resolve => {
      onAbort = () => resolve('stop')
    })
    signal?.addEventListener('abort', onAbort, { once: true })

    const answered = tryAsync(() => this.resolveFailure(request)).then(answer => {
      if (answer.ok) return answer.value
      logger.warn(`No decision for task #${request.task.number}, stopping: ${getErrorMessage(answer.error)}`)
      return 'stop' as const
    })

    try {
      return await Promise.race([answered, stopped])
    } finally {
      signal?.removeEventListener('abort', onAbort)
    }
  }

  private snapshot(plan: TaskPlan, taskNumber: number): PlanTaskSnapshot {
    const task = plan.getTask(taskNumber)
    return task ? { ...task } : { number: taskNumber, description: '', status: 'pending' }
  }
}
