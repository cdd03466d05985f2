/**
 * Single pass over all fixed drives
 *
 *   privilege check → enumerate → classify (once) → per drive, in order:
 *   dirty bit → (skip if dirty) → read-only scan → schedule repair if needed
 *
 * Drives are processed one at a time; each yields one DriveResult appended to
 * the returned array.
 */

import { getDefaultConfig } from '../config/loadConfig.js'
import type { Config } from '../config/schema.js'
import { classifyDrive, getRebootDrives, isDirty, listFixedDrives } from '../drives/index.js'
import { repairDrive, scanDrive } from '../repair/index.js'
import { createLogger } from '../shared/logger.js'
import { assertElevated } from '../system/index.js'
import type { DriveLetter, DriveResult } from '../types/drive.js'

const logger = createLogger('run')

export interface RunReport {
  drives: DriveLetter[]
  rebootDrives: DriveLetter[]
  results: DriveResult[]
}

export interface RepairPassOptions {
  config?: Config
  /** Called before each drive is inspected */
  onDriveStart?: (drive: DriveLetter, index: number, total: number) => void
  /** Called with each finished drive record */
  onDriveResult?: (result: DriveResult, index: number, total: number) => void
}

export async function processDrive(
  drive: DriveLetter,
  rebootDrives: ReadonlySet<DriveLetter>,
  config: Config
): Promise<DriveResult> {
  const classification = classifyDrive(drive, rebootDrives)

  if (await isDirty(drive, config.dirty.markers)) {
    logger.debug(`${drive} is already marked for repair, skipping`)
    return { drive, classification, outcome: 'already-dirty', idleTaskFailed: false, failures: [] }
  }

  const scanExitCode = await scanDrive(drive)
  if (scanExitCode === 0) {
    return { drive, classification, outcome: 'healthy', scanExitCode, idleTaskFailed: false, failures: [] }
  }

  logger.debug(`chkdsk found errors on ${drive} (exit ${scanExitCode})`)
  const repair = await repairDrive(drive, classification, config)
  return { drive, classification, scanExitCode, ...repair }
}

export async function runRepairPass(options: RepairPassOptions = {}): Promise<RunReport> {
  const config = options.config ?? getDefaultConfig()

  await assertElevated()

  const drives = await listFixedDrives()
  if (drives.length === 0) {
    return { drives, rebootDrives: [], results: [] }
  }

  const rebootDrives = await getRebootDrives(config)
  const results: DriveResult[] = []

  for (const [index, drive] of drives.entries()) {
    options.onDriveStart?.(drive, index, drives.length)
    const result = await processDrive(drive, rebootDrives, config)
    results.push(result)
    options.onDriveResult?.(result, index, drives.length)
  }

  return { drives, rebootDrives: [...rebootDrives], results }
}
