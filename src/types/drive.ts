/**
 * Drive 相关类型
 */

/** Normalized drive identifier: upper-case letter plus colon, e.g. "C:" */
export type DriveLetter = string

/**
 * - reboot-required: hosts the boot volume or a pagefile; repaired at next restart
 * - idle-eligible: data volume; repaired by a one-shot idle-time task
 */
export type DriveClass = 'reboot-required' | 'idle-eligible'

export type DriveOutcome =
  | 'healthy'
  | 'scheduled-reboot-repair'
  | 'scheduled-idle-repair'
  | 'already-dirty'

export type RepairStep =
  | 'schedule-boot-check'
  | 'force-boot-check'
  | 'set-dirty-bit'
  | 'create-idle-task'

export interface RepairStepError {
  step: RepairStep
  command: string
  exitCode: number | null
  message: string
}

/** One-shot, self-deleting idle-time task, owned by the OS once created */
export interface ScheduledTaskDescriptor {
  name: string
  /** Command line the task runs: repair, then delete itself by name */
  action: string
  idleMinutes: number
  runAs: 'SYSTEM'
}

/** Per-drive record produced by the repair pass */
export interface DriveResult {
  drive: DriveLetter
  classification: DriveClass
  outcome: DriveOutcome
  /** Exit status of the read-only scan; absent when the drive was skipped as dirty */
  scanExitCode?: number
  /** Idle task creation failed and the drive fell back to the restart path; listed as a scheduling failure */
  idleTaskFailed: boolean
  /** Name of the idle task that was created */
  taskName?: string
  /** Failed steps, in the order they happened */
  failures: RepairStepError[]
}

export interface RunSummary {
  healthy: DriveLetter[]
  rebootScheduled: DriveLetter[]
  idleScheduled: DriveLetter[]
  schedulingFailed: DriveLetter[]
  alreadyDirty: DriveLetter[]
}
