/**
 * 存储路径常量
 *
 * 数据目录优先级：
 * 1. 环境变量 STEPWISE_DATA_DIR（相对路径基于 cwd）
 * 2. 默认值 <cwd>/.stepwise
 */

import { isAbsolute, join } from 'path'

const DEFAULT_DATA_DIR_NAME = '.stepwise'

function getDataDir(): string {
  const envDir = process.env.STEPWISE_DATA_DIR
  if (envDir) {
    return isAbsolute(envDir) ? envDir : join(process.cwd(), envDir)
  }
  return join(process.cwd(), DEFAULT_DATA_DIR_NAME)
}

/** 主数据目录 */
export const DATA_DIR = getDataDir()

export const FILE_NAMES = {
  ERROR_KNOWLEDGE: 'error-knowledge.json',
} as const

/** 错误知识库文件 */
export const ERROR_KNOWLEDGE_FILE = join(DATA_DIR, FILE_NAMES.ERROR_KNOWLEDGE)
