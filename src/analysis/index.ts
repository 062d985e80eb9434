/**
 * @entry Analysis 请求复杂度分析
 *
 * - analyzeComplexity(): 关键词打分 → simple / moderate / complex / very_complex
 * - shouldSuggestPlan(): complex 及以上建议先生成计划
 */

export {
  analyzeComplexity,
  shouldSuggestPlan,
  type ComplexityLevel,
  type ComplexityVerdict,
} from './analyzeComplexity.js'
