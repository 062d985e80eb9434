/**
 * @entry Shared 公共基础设施模块
 *
 * 底层工具函数，无业务逻辑依赖
 *
 * - Result<T,E>: ok/err/tryAsync
 * - AppError / EngineError: 带错误码、分类和修复建议
 * - Logger: createLogger/setLogLevel/logError
 * - 错误守卫: isError/getErrorMessage/getErrorName/ensureError
 * - 并发: createMutex、可取消的 sleep
 */

export { type Result, ok, err, tryAsync } from './result.js'

export {
  type ErrorCode,
  type ErrorCategory,
  AppError,
  EngineError,
  assertNever,
  printError,
} from './error.js'

export {
  type LogLevel,
  type Logger,
  type ErrorContext,
  setLogLevel,
  createLogger,
  logError,
  stripAnsi,
} from './logger.js'

export { isError, getErrorMessage, getErrorName, ensureError } from './assertError.js'
export { createMutex, type Mutex } from './mutex.js'
export { sleep } from './sleep.js'
export { truncateText } from './truncateText.js'
export { drawSeparator } from './drawSeparator.js'
