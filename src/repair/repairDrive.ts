import type { Config } from '../config/schema.js'
import { createLogger } from '../shared/logger.js'
import type { DriveClass, DriveLetter, DriveOutcome, RepairStepError } from '../types/drive.js'
import { createIdleRepairTask } from './idleTask.js'
import { scheduleRebootRepair } from './rebootRepair.js'

const logger = createLogger('repair')

export interface RepairOutcome {
  outcome: Extract<DriveOutcome, 'scheduled-reboot-repair' | 'scheduled-idle-repair'>
  idleTaskFailed: boolean
  taskName?: string
  failures: RepairStepError[]
}

// 失败的步骤只记录下来，结果仍为重启修复
async function repairAtRestart(drive: DriveLetter, failures: RepairStepError[]): Promise<RepairOutcome> {
  const stepFailures = await scheduleRebootRepair(drive)
  logger.debug(
    stepFailures.length === 0
      ? `${drive} will be repaired at the next restart`
      : `${drive} scheduled for restart-time repair with ${stepFailures.length} failed step(s)`
  )
  return { outcome: 'scheduled-reboot-repair', idleTaskFailed: false, failures: [...failures, ...stepFailures] }
}

/**
 * Schedule the repair of a drive on which the scan found errors.
 *
 * Restart-only drives go straight to the restart path. Other drives get an
 * idle-time task; if that cannot be created they fall back to the restart path
 * and keep the failure on record. Failed steps never change the outcome; they
 * are reported through `failures`.
 */
export async function repairDrive(
  drive: DriveLetter,
  classification: DriveClass,
  config?: Pick<Config, 'idle' | 'repair'>
): Promise<RepairOutcome> {
  if (classification === 'reboot-required') {
    return repairAtRestart(drive, [])
  }

  const task = await createIdleRepairTask(drive, config)
  if (task.ok) {
    logger.debug(`${drive} will be repaired after ${task.value.idleMinutes} idle minutes (${task.value.name})`)
    return { outcome: 'scheduled-idle-repair', idleTaskFailed: false, taskName: task.value.name, failures: [] }
  }

  logger.debug(`${task.error.message}; falling back to restart-time repair for ${drive}`)
  const fallback = await repairAtRestart(drive, [task.error])
  return { ...fallback, idleTaskFailed: true }
}
