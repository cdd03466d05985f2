import type { RunSummary } from '../types/drive.js'

/**
 * Dialog text for a run that needs a restart, or null when nothing waits for one.
 */
export function buildNotificationText(summary: RunSummary): string | null {
  if (summary.rebootScheduled.length === 0) return null

  const lines = [
    `Disk errors were found. A repair is scheduled for the next restart on: ${summary.rebootScheduled.join(', ')}.`,
    'Restart the computer to complete the repair.',
  ]

  if (summary.idleScheduled.length > 0) {
    lines.push(
      '',
      `Repairs for ${summary.idleScheduled.join(', ')} will run automatically once the computer has been idle.`
    )
  }

  return lines.join('\n')
}
