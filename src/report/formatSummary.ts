import type { DriveOutcome, DriveResult, RunSummary } from '../types/drive.js'

const SUMMARY_ROWS: ReadonlyArray<{ key: keyof RunSummary; label: string }> = [
  { key: 'healthy', label: 'Healthy' },
  { key: 'rebootScheduled', label: 'Repair at next restart' },
  { key: 'idleScheduled', label: 'Repair when idle' },
  { key: 'alreadyDirty', label: 'Already marked for repair' },
  { key: 'schedulingFailed', label: 'Scheduling failed' },
]

const OUTCOME_LABELS: Record<DriveOutcome, string> = {
  healthy: 'no errors found',
  'scheduled-reboot-repair': 'repair scheduled for next restart',
  'scheduled-idle-repair': 'repair scheduled for idle time',
  'already-dirty': 'already marked for repair, skipped',
}

/** One line per drive, e.g. "E: repair scheduled for idle time (chkdsk exit 3, task ChkdskRepair_E)" */
export function formatDriveResult(result: DriveResult): string {
  const notes: string[] = []
  if (result.scanExitCode !== undefined && result.scanExitCode !== 0) {
    notes.push(`chkdsk exit ${result.scanExitCode}`)
  }
  if (result.taskName) notes.push(`task ${result.taskName}`)
  if (result.idleTaskFailed) notes.push('idle task failed, fell back to restart')
  const restartFailures = result.failures.filter(failure => failure.step !== 'create-idle-task').length
  if (restartFailures > 0) notes.push(`${restartFailures} restart step(s) failed`)

  const suffix = notes.length > 0 ? ` (${notes.join(', ')})` : ''
  return `${result.drive} ${OUTCOME_LABELS[result.outcome]}${suffix}`
}

/** "<label>: <drives>" rows; empty categories are left out */
export function formatSummary(summary: RunSummary): string[] {
  return SUMMARY_ROWS.filter(({ key }) => summary[key].length > 0).map(
    ({ key, label }) => `${label}: ${summary[key].join(', ')}`
  )
}

/** Failed steps of every drive, e.g. "G: create-idle-task failed (exit 1): ..." */
export function formatFailures(results: readonly DriveResult[]): string[] {
  return results.flatMap(result => result.failures.map(failure => `${result.drive} ${failure.message}`))
}
