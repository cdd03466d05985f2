/**
 * CLI 用户输出工具
 * 用于面向用户的终端输出，简洁友好，无时间戳
 *
 * 注意：这些函数仅用于终端用户交互，不用于诊断日志
 * 诊断日志请使用 shared/logger.ts
 */

import chalk from 'chalk'
import type { DriveOutcome } from '../types/drive.js'

// ============ 基础输出 ============

/** 成功消息 */
export function success(message: string): void {
  console.log(chalk.green('✓'), message)
}

/** 警告消息 */
export function warn(message: string): void {
  console.warn(chalk.yellow('!'), message)
}

/** 信息消息 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message)
}

// ============ 结构化输出 ============

/** 输出标题行 */
export function header(title: string): void {
  console.log()
  console.log(chalk.bold(title))
  console.log(chalk.dim('─'.repeat(Math.min(title.length + 4, 40))))
}

/** 步骤进度前缀 [1/5] */
export function stepPrefix(current: number, total: number): string {
  return chalk.cyan(`[${current}/${total}]`)
}

// ============ 驱动器结果 ============

const OUTCOME_ICONS: Record<DriveOutcome, string> = {
  healthy: chalk.green('✓'),
  'scheduled-reboot-repair': chalk.yellow('↻'),
  'scheduled-idle-repair': chalk.yellow('⏱'),
  'already-dirty': chalk.gray('•'),
}

export function outcomeIcon(outcome: DriveOutcome): string {
  return OUTCOME_ICONS[outcome]
}
