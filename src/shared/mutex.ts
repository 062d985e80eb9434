/**
 * 互斥锁
 *
 * 同一时刻只有一个临界区在执行，其余调用按到达顺序排队。
 * 用于串行化知识库的「修改内存 → 写盘」序列。
 */

export interface Mutex {
  runExclusive<T>(fn: () => Promise<T> | T): Promise<T>
}

export function createMutex(): Mutex {
  let locked = false
  const waitQueue: Array<() => void> = []

  function acquire(): Promise<void> {
    if (!locked) {
      locked = true
      return Promise.resolve()
    }
    // 持有权直接移交给队首，locked 保持 true
    return new Promise(resolve => waitQueue.push(resolve))
  }

  function release(): void {
    const next = waitQueue.shift()
    if (next) next()
    else locked = false
  }

  return {
    async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
      await acquire()
      try {
        return await fn()
      } finally {
        release()
      }
    },
  }
}
