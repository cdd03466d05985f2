import { AppError } from '../shared/error.js'
import { createLogger } from '../shared/logger.js'
import { runTool } from '../system/runTool.js'
import type { DriveLetter } from '../types/drive.js'

const logger = createLogger('scan')

/**
 * Read-only `chkdsk <drive>`. 0 means clean; any other status means errors were
 * found and is kept only for display.
 */
export async function scanDrive(drive: DriveLetter): Promise<number> {
  const result = await runTool('chkdsk', [drive])
  if (result.exitCode === null) {
    throw AppError.toolFailed('SCAN_FAILED', `chkdsk ${drive}`, result)
  }
  logger.debug(`chkdsk ${drive} exited with ${result.exitCode}`)
  return result.exitCode
}
