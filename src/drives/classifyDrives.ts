import type { Config } from '../config/schema.js'
import { AppError, getErrorMessage } from '../shared/error.js'
import { createLogger } from '../shared/logger.js'
import { err, ok, type Result } from '../shared/result.js'
import { runPowerShell, splitLines } from '../system/powershell.js'
import type { DriveClass, DriveLetter } from '../types/drive.js'
import { normalizeDrive, uniqueDrives } from './normalizeDrive.js'

const logger = createLogger('classify')

const PAGEFILE_SCRIPT =
  'Get-CimInstance -ClassName Win32_PageFileUsage | Select-Object -ExpandProperty Name'

const DEFAULT_BOOT_DRIVE = 'C:'

/**
 * Boot drive: config override, then %SystemDrive%, then C:
 */
export function getBootDrive(config?: Pick<Config, 'bootDrive'>): DriveLetter {
  const candidate = config?.bootDrive ?? process.env.SystemDrive ?? DEFAULT_BOOT_DRIVE
  return normalizeDrive(candidate) ?? DEFAULT_BOOT_DRIVE
}

/**
 * Drive letters of every configured pagefile, e.g. "D:\\pagefile.sys" → "D:"
 */
export async function listPagefileDrives(): Promise<Result<DriveLetter[], AppError>> {
  try {
    const result = await runPowerShell(PAGEFILE_SCRIPT)
    if (result.exitCode !== 0) {
      return err(AppError.toolFailed('PAGEFILE_QUERY_FAILED', 'Pagefile enumeration', result))
    }
    return ok(uniqueDrives(splitLines(result.stdout)))
  } catch (e) {
    return err(new AppError('PAGEFILE_QUERY_FAILED', getErrorMessage(e), 'PROCESS', e))
  }
}

/**
 * Drives that can only be repaired at restart: the boot drive plus every
 * pagefile drive, upper-cased and deduplicated. A failed pagefile lookup is
 * logged and the boot drive alone is returned.
 */
export async function getRebootDrives(config?: Pick<Config, 'bootDrive'>): Promise<Set<DriveLetter>> {
  const drives: string[] = [getBootDrive(config)]

  const pagefiles = await listPagefileDrives()
  if (pagefiles.ok) {
    drives.push(...pagefiles.value)
  } else {
    logger.warn(
      `Could not enumerate pagefiles, only the boot drive will be treated as restart-only: ${pagefiles.error.message}`
    )
  }

  const rebootDrives = new Set(uniqueDrives(drives))
  logger.debug(`Restart-only drives: ${[...rebootDrives].join(', ')}`)
  return rebootDrives
}

export function classifyDrive(drive: DriveLetter, rebootDrives: ReadonlySet<DriveLetter>): DriveClass {
  const normalized = normalizeDrive(drive) ?? drive
  return rebootDrives.has(normalized) ? 'reboot-required' : 'idle-eligible'
}
