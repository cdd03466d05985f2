/**
 * External tool invocation
 *
 * Every OS utility (chkdsk, fsutil, chkntfs, schtasks, powershell) is started through
 * runTool with an explicit argument list and no shell. Calls block until the tool
 * exits; there is no timeout.
 */

import { execa } from 'execa'
import { createLogger } from '../shared/logger.js'

const logger = createLogger('tool')

export interface ToolResult {
  /** Printable command line, for logs and error messages */
  command: string
  /** null when the process never produced an exit status (failed to start, killed) */
  exitCode: number | null
  stdout: string
  stderr: string
  /** true when a mutating call was skipped under dry-run */
  skipped: boolean
}

export interface RunToolOptions {
  /** Written to the child's stdin, e.g. a confirmation token */
  input?: string
  /** Extra environment variables for the child */
  env?: Record<string, string>
  /** Changes OS state; skipped under dry-run */
  mutates?: boolean
}

let dryRun = false

export function setDryRun(enabled: boolean): void {
  dryRun = enabled
}

export function isDryRun(): boolean {
  return dryRun
}

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].map(part => (/[\s"]/.test(part) ? JSON.stringify(part) : part)).join(' ')
}

export async function runTool(
  command: string,
  args: readonly string[],
  options: RunToolOptions = {}
): Promise<ToolResult> {
  const commandLine = formatCommand(command, args)

  if (options.mutates && dryRun) {
    logger.info(`[dry-run] ${commandLine}`)
    return { command: commandLine, exitCode: 0, stdout: '', stderr: '', skipped: true }
  }

  logger.debug(`$ ${commandLine}`)

  const result = await execa(command, args, {
    reject: false,
    input: options.input,
    env: options.env,
    windowsHide: true,
  })

  const exitCode = typeof result.exitCode === 'number' ? result.exitCode : null
  const stdout = typeof result.stdout === 'string' ? result.stdout : ''
  // 进程未能启动时 stderr 为空，用 execa 的错误信息代替
  const stderr =
    typeof result.stderr === 'string' && result.stderr.length > 0
      ? result.stderr
      : exitCode === null
        ? typeof result.message === 'string'
          ? result.message
          : ''
        : ''

  logger.debug(`${command} exited with ${exitCode ?? 'no status'}`)

  return { command: commandLine, exitCode, stdout, stderr, skipped: false }
}
