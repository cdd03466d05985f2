import type { Config } from '../config/schema.js'
import { getDefaultConfig } from '../config/loadConfig.js'
import { driveLetter } from '../drives/normalizeDrive.js'
import { createLogger } from '../shared/logger.js'
import { err, ok, type Result } from '../shared/result.js'
import { runTool } from '../system/runTool.js'
import type { DriveLetter, RepairStepError, ScheduledTaskDescriptor } from '../types/drive.js'
import { toStepError } from './rebootRepair.js'

const logger = createLogger('idle-task')

export const DEFAULT_TASK_PREFIX = 'ChkdskRepair_'

/** ChkdskRepair_E for E: */
export function taskNameFor(drive: DriveLetter, prefix: string = DEFAULT_TASK_PREFIX): string {
  return `${prefix}${driveLetter(drive)}`
}

export function buildTaskDescriptor(
  drive: DriveLetter,
  config: Pick<Config, 'idle' | 'repair'> = getDefaultConfig()
): ScheduledTaskDescriptor {
  const name = taskNameFor(drive, config.idle.taskPrefix)
  const repair = ['chkdsk', drive, ...config.repair.fixArgs].join(' ')
  return {
    name,
    action: `cmd /c ${repair} & schtasks /Delete /TN ${name} /F`,
    idleMinutes: config.idle.minutes,
    runAs: 'SYSTEM',
  }
}

/**
 * No /F: a leftover task with the same name makes creation fail, and the
 * caller falls back to the restart path.
 */
export function buildCreateTaskArgs(task: ScheduledTaskDescriptor): string[] {
  return [
    '/Create',
    '/TN',
    task.name,
    '/TR',
    task.action,
    '/SC',
    'ONIDLE',
    '/I',
    String(task.idleMinutes),
    '/RU',
    task.runAs,
    '/RL',
    'HIGHEST',
  ]
}

export async function createIdleRepairTask(
  drive: DriveLetter,
  config?: Pick<Config, 'idle' | 'repair'>
): Promise<Result<ScheduledTaskDescriptor, RepairStepError>> {
  const task = buildTaskDescriptor(drive, config)
  const result = await runTool('schtasks', buildCreateTaskArgs(task), { mutates: true })

  if (result.skipped || result.exitCode === 0) {
    logger.debug(`Created task ${task.name} (idle ${task.idleMinutes} min)`)
    return ok(task)
  }
  return err(toStepError('create-idle-task', result))
}
