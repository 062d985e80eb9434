/**
 * @entry Backend 推理引擎
 */

export type { ReasoningEngine, QueryOptions } from './types.js'
export { createOpenAICompatibleEngine } from './openaiCompatibleEngine.js'
