import { readFile } from 'fs/promises'
import { existsSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'
import YAML from 'yaml'
import { createLogger } from '../shared/logger.js'
import { configSchema, type Config } from './schema.js'

const logger = createLogger('config')

export const CONFIG_FILENAME = '.stepwise.yaml'

let cachedConfig: Config | null = null

/**
 * 查找配置文件路径（全局 + 项目）
 * 全局配置为基底，项目配置覆盖其上
 */
function findConfigPaths(cwd?: string): { globalPath: string | null; projectPath: string | null } {
  const homePath = join(homedir(), CONFIG_FILENAME)
  const projectDir = cwd || process.cwd()
  const projectPath = join(projectDir, CONFIG_FILENAME)

  // 项目目录就是 home 目录时不重复加载
  const isHomeCwd = projectDir === homedir()

  return {
    globalPath: existsSync(homePath) ? homePath : null,
    projectPath: !isHomeCwd && existsSync(projectPath) ? projectPath : null,
  }
}

/**
 * 加载配置
 * 查找顺序：~/.stepwise.yaml 为基底 → 项目目录 .stepwise.yaml 覆盖 → 默认值
 * 格式错误时告警并回退默认配置，环境变量最后覆盖
 */
export async function loadConfig(options: { cwd?: string } = {}): Promise<Config> {
  if (cachedConfig) return cachedConfig

  const { globalPath, projectPath } = findConfigPaths(options.cwd)

  if (!globalPath && !projectPath) {
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  const globalRaw = globalPath ? await parseYamlFile(globalPath) : {}
  const projectRaw = projectPath ? await parseYamlFile(projectPath) : {}
  const merged = deepMergeConfig(globalRaw, projectRaw)

  const result = configSchema.safeParse(merged)
  if (!result.success) {
    logger.warn('Config file format error, using defaults', result.error.issues)
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  cachedConfig = applyEnvOverrides(result.data)
  return cachedConfig
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * 空文件或只有注释的文件解析为空对象
 */
async function parseYamlFile(filePath: string): Promise<Record<string, unknown>> {
  const content = await readFile(filePath, 'utf-8')
  const parsed: unknown = YAML.parse(content)
  if (parsed === null || parsed === undefined) return {}
  if (!isRecord(parsed)) {
    logger.warn(`Ignoring ${filePath}: top level must be a mapping`)
    return {}
  }
  return parsed
}

/**
 * 合并配置：嵌套对象递归合并，数组与标量直接替换
 */
function deepMergeConfig(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...base }
  for (const [key, val] of Object.entries(override)) {
    if (val === undefined || val === null) continue
    const current = result[key]
    result[key] = isRecord(val) && isRecord(current) ? deepMergeConfig(current, val) : val
  }
  return result
}

/**
 * 环境变量覆盖，在 schema 校验之后应用
 */
export function applyEnvOverrides(config: Config): Config {
  const env = process.env

  if (env.STEPWISE_ENGINE_URL || env.STEPWISE_ENGINE_MODEL || env.STEPWISE_API_KEY) {
    const engine = { ...config.engine }
    if (env.STEPWISE_ENGINE_URL) engine.baseURL = env.STEPWISE_ENGINE_URL
    if (env.STEPWISE_ENGINE_MODEL) engine.model = env.STEPWISE_ENGINE_MODEL
    if (env.STEPWISE_API_KEY) engine.apiKey = env.STEPWISE_API_KEY
    config = { ...config, engine }
  }

  return config
}

export function getDefaultConfig(): Config {
  return configSchema.parse({})
}

export function clearConfigCache(): void {
  cachedConfig = null
}
