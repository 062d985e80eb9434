/**
 * 由推理引擎把目标拆成计划
 */

import { createLogger } from '../shared/logger.js'
import { AppError } from '../shared/error.js'
import { err, ok, tryAsync, type Result } from '../shared/result.js'
import { describeProject, type ProjectContext } from '../project/detectProject.js'
import type { ReasoningEngine } from '../backend/types.js'
import type { PlanManager } from './PlanManager.js'
import type { TaskPlan } from './TaskPlan.js'

const logger = createLogger('plan')

const PLAN_LINE_PREFIX = 'PLAN:'
const TASK_LINE = /^\d+\.\s+(.+)$/

export const CREATE_PLAN_PROMPT = `You are helping to break a development goal into a task plan.

Goal: {{goal}}
{{projectContext}}
Create a step-by-step plan with 3-8 specific, actionable tasks.
Each task should be clear and focused on one thing.

Format your response EXACTLY as follows (nothing else):
PLAN: <one-line summary>
1. <task description>
2. <task description>
3. <task description>
...

Example:
PLAN: Add token authentication to the API
1. Add the auth dependencies to the project
2. Create a token service for signing and verifying tokens
3. Add an auth middleware to protected routes
4. Create a login endpoint
5. Write unit tests for the token service`

export interface ParsedPlan {
  goal: string
  tasks: string[]
}

export function buildPlanPrompt(goal: string, project?: ProjectContext): string {
  const projectContext = project
    ? `\nProject Context:\n- Type: ${describeProject(project)}\n- Root: ${project.rootDir}\n`
    : ''
  return CREATE_PLAN_PROMPT.replace('{{goal}}', () => goal).replace('{{projectContext}}', () => projectContext)
}

/**
 * 取第一行 `PLAN:` 作为目标（缺失或为空时用 fallbackGoal），
 * 所有 `N. 描述` 行按出现顺序作为任务
 */
export function parsePlanResponse(text: string, fallbackGoal: string): ParsedPlan {
  const lines = text.split('\n').map(l => l.trim())

  const planLine = lines.find(l => l.startsWith(PLAN_LINE_PREFIX))
  const summary = planLine?.slice(PLAN_LINE_PREFIX.length).trim()

  const tasks: string[] = []
  for (const line of lines) {
    const match = TASK_LINE.exec(line)
    const description = match?.[1]?.trim()
    if (description) tasks.push(description)
  }

  return { goal: summary || fallbackGoal, tasks }
}

/**
 * 查询引擎、解析回复并替换当前计划。
 * 引擎失败或解析不到任务时清空当前计划并返回 err。
 */
export async function generatePlan(
  manager: PlanManager,
  engine: ReasoningEngine,
  goal: string,
  project?: ProjectContext
): Promise<Result<TaskPlan, AppError>> {
  const response = await tryAsync(() => engine.query(buildPlanPrompt(goal, project)))
  if (!response.ok) {
    manager.clearPlan()
    return err(AppError.planGeneration(response.error.message, response.error))
  }

  const parsed = parsePlanResponse(response.value, goal)
  if (parsed.tasks.length === 0) {
    manager.clearPlan()
    logger.debug(`Unparseable plan response: ${response.value.slice(0, 200)}`)
    return err(AppError.planGeneration('No tasks extracted from the response'))
  }

  const plan = manager.createPlan(parsed.goal)
  for (const task of parsed.tasks) {
    manager.addTask(task)
  }
  logger.info(`Created plan with ${plan.totalCount} tasks: ${plan.description}`)
  return ok(plan)
}
