/**
 * @entry Shared 公共基础设施模块
 *
 * 底层工具函数，无业务逻辑依赖
 *
 * 能力分组：
 * - Result<T,E>: 函数式错误处理（ok/err/collectFailures）
 * - AppError: 统一错误类型（printError/printWarning/assertNever）
 * - Logger: 日志系统（createLogger/setLogLevel）
 */

// Result 类型
export { type Result, ok, err, collectFailures } from './result.js'

// 错误类型
export {
  type ErrorCode,
  type ErrorCategory,
  type FailedToolRun,
  AppError,
  assertNever,
  getErrorMessage,
  printError,
  printWarning,
} from './error.js'

// 日志
export {
  type LogLevel,
  type LogMode,
  type Logger,
  isLogLevel,
  setLogLevel,
  getLogLevel,
  createLogger,
} from './logger.js'
