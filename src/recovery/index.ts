/**
 * @entry Recovery 错误恢复与学习
 *
 * - ErrorKnowledgeStore: 持久化的错误→解决方案知识库（签名 + 相似度检索）
 * - ErrorRecoveryManager: 错误记录、历史、恢复建议
 * - formatRecoveryContext / formatInsights: 终端渲染
 */

export { ErrorKnowledgeStore, type ErrorKnowledgeStoreOptions } from './ErrorKnowledgeStore.js'
export {
  ErrorRecoveryManager,
  type RecoveryContext,
  type ErrorStatistics,
  type ErrorRecoveryManagerOptions,
} from './ErrorRecoveryManager.js'
export { generateErrorSignature, messageSimilarity } from './errorSignature.js'
export type { RecoverySuggestion, RecoveryAction } from './recoverySuggestions.js'
export { formatRecoveryContext, formatInsights } from './formatRecovery.js'
