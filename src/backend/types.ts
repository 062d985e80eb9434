/**
 * 推理引擎接口
 *
 * 执行器只依赖这个接口；具体实现（OpenAI 兼容接口、测试替身）可替换
 */

export interface QueryOptions {
  /** 中断当前请求 */
  signal?: AbortSignal
}

export interface ReasoningEngine {
  readonly name: string
  /** 返回完整回复文本；失败时 reject */
  query(prompt: string, options?: QueryOptions): Promise<string>
}
