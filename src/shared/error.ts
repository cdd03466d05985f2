/**
 * 统一错误处理系统
 * 支持错误分类、上下文信息和修复建议
 */

import chalk from 'chalk'

// ============ 错误分类定义 ============

export type ErrorCategory =
  | 'PERMISSION' // 权限不足（非管理员）
  | 'PLATFORM' // 非 Windows 平台
  | 'PROCESS' // 外部工具执行失败
  | 'CONFIG' // 配置错误
  | 'NOTIFY' // 桌面通知失败
  | 'UNKNOWN' // 未知错误

export type ErrorCode =
  | 'NOT_ELEVATED'
  | 'UNSUPPORTED_PLATFORM'
  | 'DRIVE_ENUM_FAILED'
  | 'PAGEFILE_QUERY_FAILED'
  | 'SCAN_FAILED'
  | 'NOTIFY_FAILED'
  | 'CONFIG_INVALID'
  | 'UNKNOWN'

/** Minimal view of an external tool run, enough to build an error from it */
export interface FailedToolRun {
  command: string
  exitCode: number | null
  stderr: string
}

// ============ 统一错误类 ============

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly category: ErrorCategory = 'UNKNOWN',
    public readonly cause?: unknown,
    public readonly suggestion?: string
  ) {
    super(message)
    this.name = 'AppError'
  }

  /**
   * 格式化错误输出到终端
   */
  format(): string {
    const lines: string[] = []
    const colorFn = categoryColors[this.category]

    lines.push('')
    lines.push(chalk.red('✗') + ' ' + chalk.bold('Error') + ` [${colorFn(categoryLabels[this.category])}]`)
    lines.push('')
    lines.push(chalk.dim(`  Code: ${this.code}`))
    lines.push(`  ${this.message}`)

    if (this.suggestion) {
      lines.push('')
      lines.push(chalk.cyan('  Suggested fix:'))
      lines.push(chalk.dim('    →') + ` ${this.suggestion}`)
    }

    lines.push('')
    return lines.join('\n')
  }

  // ============ 工厂方法 ============

  static notElevated(): AppError {
    return new AppError(
      'NOT_ELEVATED',
      'Administrator rights are required to check and schedule disk repairs',
      'PERMISSION',
      undefined,
      'Re-run from an elevated prompt ("Run as administrator")'
    )
  }

  static unsupportedPlatform(platform: string): AppError {
    return new AppError(
      'UNSUPPORTED_PLATFORM',
      `chkdsk-scheduler only runs on Windows (current platform: ${platform})`,
      'PLATFORM'
    )
  }

  static toolFailed(
    code: ErrorCode,
    what: string,
    run: FailedToolRun,
    category: ErrorCategory = 'PROCESS'
  ): AppError {
    const status = run.exitCode === null ? 'did not start' : `exit ${run.exitCode}`
    const detail = run.stderr.trim()
    return new AppError(
      code,
      `${what} failed (${status})${detail ? `: ${detail}` : ''}`,
      category,
      { command: run.command }
    )
  }

  static configInvalid(reason: string): AppError {
    return new AppError(
      'CONFIG_INVALID',
      `Invalid config: ${reason}`,
      'CONFIG',
      undefined,
      'Check .chkdsk-scheduler.yaml against the documented keys'
    )
  }

  static unknown(cause: unknown): AppError {
    return new AppError('UNKNOWN', getErrorMessage(cause), 'UNKNOWN', cause)
  }
}

// ============ 格式化输出 ============

const categoryLabels: Record<ErrorCategory, string> = {
  PERMISSION: 'permission',
  PLATFORM: 'platform',
  PROCESS: 'process',
  CONFIG: 'config',
  NOTIFY: 'notify',
  UNKNOWN: 'unknown',
}

const categoryColors: Record<ErrorCategory, (text: string) => string> = {
  PERMISSION: chalk.red,
  PLATFORM: chalk.red,
  PROCESS: chalk.red,
  CONFIG: chalk.yellow,
  NOTIFY: chalk.yellow,
  UNKNOWN: chalk.gray,
}

/** Safely extract error message from unknown thrown value */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return String(error)
}

/**
 * 打印错误到终端
 */
export function printError(error: unknown): void {
  const appError = error instanceof AppError ? error : AppError.unknown(error)
  console.error(appError.format())
}

/**
 * 打印警告到终端
 */
export function printWarning(message: string, suggestion?: string): void {
  console.warn('')
  console.warn(chalk.yellow('!') + ' ' + chalk.bold('Warning'))
  console.warn(`  ${message}`)
  if (suggestion) {
    console.warn('')
    console.warn(chalk.cyan('  Suggestion:'))
    console.warn(chalk.dim('    →') + ` ${suggestion}`)
  }
  console.warn('')
}

// ============ 错误断言 ============

export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${String(x)}`)
}
