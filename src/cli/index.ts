#!/usr/bin/env node
/**
 * @entry chkdsk-scheduler CLI 主入口
 *
 * 命令：
 *   chkdsk-scheduler              - 扫描所有固定磁盘，按需安排修复
 *   chkdsk-scheduler --dry-run    - 只扫描，不修改系统状态
 *   chkdsk-scheduler drives       - 列出磁盘分类与 dirty 状态
 *
 * 需要管理员权限运行
 */

import { Command } from 'commander'
import { registerRunAction } from './commands/run.js'
import { registerDrivesCommand } from './commands/drives.js'
import { printError } from '../shared/index.js'

const VERSION = '0.1.0'

const program = new Command()

program
  .name('chkdsk-scheduler')
  .description('Check fixed drives with chkdsk and schedule repairs at restart or idle time')
  .version(VERSION)
  .enablePositionalOptions()

registerRunAction(program)
registerDrivesCommand(program)

program.parseAsync(process.argv).catch((e: unknown) => {
  printError(e)
  process.exitCode = 1
})
