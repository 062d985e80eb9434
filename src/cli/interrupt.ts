/**
 * Ctrl+C 处理：第一次请求停止，第二次强制退出
 */

/** SIGINT 的常规退出码 128 + 2 */
export const INTERRUPT_EXIT_CODE = 130

export interface InterruptActions {
  /** 协作式停止，当前任务结束后生效 */
  stop: () => void
  /** 引擎调用迟迟不返回时由第二次 Ctrl+C 触发 */
  forceExit: () => void
}

export function createInterruptHandler(actions: InterruptActions): () => void {
  let interrupts = 0
  return () => {
    interrupts++
    if (interrupts === 1) actions.stop()
    else actions.forceExit()
  }
}
