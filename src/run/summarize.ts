import { assertNever } from '../shared/error.js'
import type { DriveLetter, DriveResult, RunSummary } from '../types/drive.js'

function pushUnique(list: DriveLetter[], drive: DriveLetter): void {
  if (!list.includes(drive)) list.push(drive)
}

/**
 * Reduce per-drive records to outcome lists, in drive order. A drive lands in
 * exactly one list, except a failed idle task that fell back to the restart
 * path, which is in both rebootScheduled and schedulingFailed.
 */
export function summarize(results: readonly DriveResult[]): RunSummary {
  const summary: RunSummary = {
    healthy: [],
    rebootScheduled: [],
    idleScheduled: [],
    schedulingFailed: [],
    alreadyDirty: [],
  }

  for (const result of results) {
    switch (result.outcome) {
      case 'healthy':
        pushUnique(summary.healthy, result.drive)
        break
      case 'already-dirty':
        pushUnique(summary.alreadyDirty, result.drive)
        break
      case 'scheduled-idle-repair':
        pushUnique(summary.idleScheduled, result.drive)
        break
      case 'scheduled-reboot-repair':
        pushUnique(summary.rebootScheduled, result.drive)
        if (result.idleTaskFailed) pushUnique(summary.schedulingFailed, result.drive)
        break
      default:
        assertNever(result.outcome)
    }
  }

  return summary
}

export function requiresRestart(summary: RunSummary): boolean {
  return summary.rebootScheduled.length > 0
}
