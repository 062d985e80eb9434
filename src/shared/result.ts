/**
 * Result 类型 - 显式的成功/失败值
 * 执行器、计划生成等可预期的失败路径都返回 Result，而不是抛异常
 */

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E }

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

/**
 * 调用 fn 并把结果收敛为 Result
 * 同步抛出与 Promise reject 走同一条路径，非 Error 的抛出值会被包装
 */
export async function tryAsync<T>(fn: () => T | Promise<T>): Promise<Result<T, Error>> {
  try {
    return ok(await fn())
  } catch (e) {
    return err(e instanceof Error ? e : new Error(String(e)))
  }
}
