/**
 * @entry Config 配置模块
 *
 * YAML 配置加载、Schema 校验、环境变量覆盖
 */

export {
  loadConfig,
  getDefaultConfig,
  clearConfigCache,
  applyEnvOverrides,
  CONFIG_FILENAME,
} from './loadConfig.js'
export * from './schema.js'

import { isAbsolute, join } from 'path'
import { DATA_DIR, ERROR_KNOWLEDGE_FILE } from '../store/paths.js'
import type { Config } from './schema.js'

/** 知识库文件：配置中的相对路径基于数据目录 */
export function resolveKnowledgeFile(config: Config): string {
  const file = config.knowledge.file
  if (!file) return ERROR_KNOWLEDGE_FILE
  return isAbsolute(file) ? file : join(DATA_DIR, file)
}
