/**
 * 项目上下文感知
 * 识别工作目录的项目类型与框架，拼进给推理引擎的 prompt
 */

import { existsSync, readFileSync } from 'fs'
import { join } from 'path'
import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'

const logger = createLogger('project-context')

export interface ProjectContext {
  rootDir: string
  /** nodejs / python / java / rust / go / unknown */
  projectType: string
  mainLanguage: string
  packageManager?: string
  frameworks: string[]
}

/** package.json 依赖名 → 框架名 */
const NODE_FRAMEWORKS: ReadonlyArray<[string, string]> = [
  ['react', 'react'],
  ['vue', 'vue'],
  ['svelte', 'svelte'],
  ['next', 'nextjs'],
  ['express', 'express'],
  ['fastify', 'fastify'],
  ['koa', 'koa'],
  ['@nestjs/core', 'nestjs'],
  ['vitest', 'vitest'],
  ['jest', 'jest'],
  ['mocha', 'mocha'],
  ['vite', 'vite'],
  ['webpack', 'webpack'],
]

export function detectProject(cwd: string = process.cwd()): ProjectContext {
  const context: ProjectContext = {
    rootDir: cwd,
    projectType: 'unknown',
    mainLanguage: 'unknown',
    frameworks: [],
  }
  const has = (file: string): boolean => existsSync(join(cwd, file))

  if (has('package.json')) {
    context.projectType = 'nodejs'
    context.mainLanguage = has('tsconfig.json') ? 'typescript' : 'javascript'
    if (has('pnpm-lock.yaml')) context.packageManager = 'pnpm'
    else if (has('yarn.lock')) context.packageManager = 'yarn'
    else if (has('package-lock.json')) context.packageManager = 'npm'
    context.frameworks = detectNodeFrameworks(join(cwd, 'package.json'))
  } else if (has('pyproject.toml') || has('setup.py') || has('requirements.txt')) {
    context.projectType = 'python'
    context.mainLanguage = 'python'
    if (has('poetry.lock')) context.packageManager = 'poetry'
    else if (has('uv.lock')) context.packageManager = 'uv'
  } else if (has('pom.xml') || has('build.gradle') || has('build.gradle.kts')) {
    context.projectType = 'java'
    context.mainLanguage = has('build.gradle.kts') ? 'kotlin' : 'java'
    context.packageManager = has('pom.xml') ? 'maven' : 'gradle'
  } else if (has('Cargo.toml')) {
    context.projectType = 'rust'
    context.mainLanguage = 'rust'
    context.packageManager = 'cargo'
  } else if (has('go.mod')) {
    context.projectType = 'go'
    context.mainLanguage = 'go'
  }

  logger.debug(`Project detected: ${context.projectType} (${context.mainLanguage})`)
  return context
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function detectNodeFrameworks(packageJsonPath: string): string[] {
  let pkg: unknown
  try {
    pkg = JSON.parse(readFileSync(packageJsonPath, 'utf-8'))
  } catch (e) {
    logger.debug(`Unreadable package.json: ${getErrorMessage(e)}`)
    return []
  }
  if (!isRecord(pkg)) return []

  const deps = {
    ...(isRecord(pkg.dependencies) ? pkg.dependencies : {}),
    ...(isRecord(pkg.devDependencies) ? pkg.devDependencies : {}),
  }
  return NODE_FRAMEWORKS.filter(([dep]) => dep in deps).map(([, name]) => name)
}

/** 单行描述，如 `nodejs (typescript, npm) with vitest, express` */
export function describeProject(context: ProjectContext): string {
  const details = [context.mainLanguage, context.packageManager].filter(Boolean).join(', ')
  const frameworks = context.frameworks.length > 0 ? ` with ${context.frameworks.join(', ')}` : ''
  return `${context.projectType} (${details})${frameworks}`
}
