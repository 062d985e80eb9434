/**
 * stepwise 库入口
 *
 * 复杂度分析、计划模型、计划执行器与错误知识库，可脱离 CLI 单独使用
 */

export * from './shared/index.js'
export * from './types/index.js'
export * from './analysis/index.js'
export * from './plan/index.js'
export * from './execution/index.js'
export * from './recovery/index.js'
export * from './backend/index.js'
export * from './store/index.js'
export {
  loadConfig,
  getDefaultConfig,
  clearConfigCache,
  resolveKnowledgeFile,
  CONFIG_FILENAME,
  type Config,
  type EngineConfig,
} from './config/index.js'
export { detectProject, describeProject, type ProjectContext } from './project/detectProject.js'
