import { AppError } from '../shared/error.js'
import { createLogger } from '../shared/logger.js'
import { runTool } from './runTool.js'

const logger = createLogger('privilege')

/**
 * `net session` only succeeds for members of the local Administrators group
 * running elevated. A tool that fails to start counts as not elevated.
 */
export async function isElevated(): Promise<boolean> {
  const result = await runTool('net', ['session'])
  logger.debug(`net session exited with ${result.exitCode ?? 'no status'}`)
  return result.exitCode === 0
}

export async function assertElevated(): Promise<void> {
  if (!(await isElevated())) {
    throw AppError.notElevated()
  }
}
