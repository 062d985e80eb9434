/**
 * 回复分类：推理引擎的文本回复是成功还是失败
 *
 * 默认实现是关键词扫描；执行器接受任何 ResponseClassifier，可替换为结构化判定
 */

export type ResponseClassification =
  | { outcome: 'success' }
  | { outcome: 'failure'; reason: string }

export interface ResponseClassifier {
  classify(response: string): ResponseClassification
}

export const FAILURE_MARKERS = ['error:', 'failed:', 'exception:', 'cannot', 'unable to'] as const

export const DEFAULT_FAILURE_REASON = 'Task execution failed'

/** 第一行含 error / failed 的文本（去掉首尾空白），否则返回默认原因 */
export function extractFailureReason(response: string): string {
  const line = response.split('\n').find(l => /error|failed/i.test(l))
  return line?.trim() || DEFAULT_FAILURE_REASON
}

export function createKeywordClassifier(
  markers: readonly string[] = FAILURE_MARKERS
): ResponseClassifier {
  const lowered = markers.map(m => m.toLowerCase())
  return {
    classify(response: string): ResponseClassification {
      const text = response.toLowerCase()
      if (!lowered.some(marker => text.includes(marker))) {
        return { outcome: 'success' }
      }
      return { outcome: 'failure', reason: extractFailureReason(response) }
    },
  }
}

export const keywordClassifier = createKeywordClassifier()
