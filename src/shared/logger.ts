/**
 * 统一日志系统
 *
 * 功能：
 * - 分级日志（debug/info/warn/error）
 * - 前台/后台模式切换
 * - 结构化上下文信息
 *
 * 使用：
 * - createLogger('scope').debug/info/warn/error
 * - setLogLevel('debug'|'info'|'warn'|'error'|'silent')
 * - 非 TTY（计划任务、重定向）时输出带 scope
 */

import chalk from 'chalk'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'
export type LogMode = 'foreground' | 'background'

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

const LEVEL_COLORS: Record<Exclude<LogLevel, 'silent'>, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
}

const LEVEL_LABELS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: 'DBG',
  info: 'INF',
  warn: 'WRN',
  error: 'ERR',
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY
}

// ============ 全局状态 ============

// 从环境变量初始化日志级别
function initLogLevel(): LogLevel {
  if (process.env.NODE_ENV === 'test') return 'silent'
  if (process.env.SILENT === '1') return 'silent'
  if (process.env.DEBUG === '1') return 'debug'
  const level = process.env.CKS_LOG_LEVEL
  if (level && isLogLevel(level)) return level
  return 'info'
}

// 计划任务或重定向输出时为后台模式
function initLogMode(): LogMode {
  return process.stdout.isTTY ? 'foreground' : 'background'
}

let currentLevel: LogLevel = initLogLevel()
const currentMode: LogMode = initLogMode()

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

export function getLogLevel(): LogLevel {
  return currentLevel
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel]
}

function formatTime(): string {
  const now = new Date()
  return chalk.dim(
    [now.getHours(), now.getMinutes(), now.getSeconds()]
      .map(n => n.toString().padStart(2, '0'))
      .join(':')
  )
}

/**
 * 格式化消息
 * - 前台模式：时间+级别+消息
 * - 后台模式：额外带上 scope，便于从日志文件定位
 */
function formatMessage(level: Exclude<LogLevel, 'silent'>, scope: string, message: string): string {
  const color = LEVEL_COLORS[level]
  const label = LEVEL_LABELS[level]

  if (currentMode === 'foreground') {
    return `${formatTime()} ${color(label)} ${message}`
  }

  const scopeStr = scope ? chalk.cyan(`[${scope}]`) : ''
  return `${formatTime()} ${color(label)} ${scopeStr} ${message}`
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

export function createLogger(scope: string = ''): Logger {
  function logWithLevel(
    level: Exclude<LogLevel, 'silent'>,
    message: string,
    args: unknown[]
  ): void {
    if (!shouldLog(level)) return

    const output = formatMessage(level, scope, message)
    const logFn = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log
    logFn(output, ...args)
  }

  return {
    debug(message: string, ...args: unknown[]) {
      logWithLevel('debug', message, args)
    },
    info(message: string, ...args: unknown[]) {
      logWithLevel('info', message, args)
    },
    warn(message: string, ...args: unknown[]) {
      logWithLevel('warn', message, args)
    },
    error(message: string, ...args: unknown[]) {
      logWithLevel('error', message, args)
    },
  }
}
