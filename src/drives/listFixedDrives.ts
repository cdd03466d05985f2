import { AppError } from '../shared/error.js'
import { createLogger } from '../shared/logger.js'
import { runPowerShell, splitLines } from '../system/powershell.js'
import type { DriveLetter } from '../types/drive.js'
import { uniqueDrives } from './normalizeDrive.js'

const logger = createLogger('drives')

// DriveType 3 = local fixed disk
const FIXED_DRIVES_SCRIPT =
  "Get-CimInstance -ClassName Win32_LogicalDisk -Filter 'DriveType=3' | Select-Object -ExpandProperty DeviceID"

/**
 * Fixed local drives in enumeration order. Failure here is fatal for the run.
 */
export async function listFixedDrives(): Promise<DriveLetter[]> {
  const result = await runPowerShell(FIXED_DRIVES_SCRIPT)
  if (result.exitCode !== 0) {
    throw AppError.toolFailed('DRIVE_ENUM_FAILED', 'Fixed drive enumeration', result)
  }

  const drives = uniqueDrives(splitLines(result.stdout))
  logger.debug(`Fixed drives: ${drives.join(', ') || '(none)'}`)
  return drives
}
