import chalk from 'chalk'
import type { NotifyConfig } from '../config/schema.js'
import { buildNotificationText, showDesktopNotification } from '../notify/index.js'
import { requiresRestart } from '../run/summarize.js'
import { printWarning } from '../shared/error.js'
import { createLogger } from '../shared/logger.js'
import type { DriveResult, RunSummary } from '../types/drive.js'
import { formatFailures, formatSummary } from './formatSummary.js'

const logger = createLogger('report')

export interface ReportOptions {
  notify: Pick<NotifyConfig, 'enabled' | 'title'>
}

export interface ReportResult {
  /** The dialog was shown and dismissed */
  notified: boolean
}

/**
 * Print the run summary and, when a restart is needed, show the desktop dialog.
 * A failed dialog only produces a warning.
 */
export async function reportSummary(
  summary: RunSummary,
  results: readonly DriveResult[],
  options: ReportOptions
): Promise<ReportResult> {
  console.log()
  console.log(chalk.bold('Summary'))
  for (const line of formatSummary(summary)) {
    console.log(`  ${line}`)
  }

  const failures = formatFailures(results)
  if (failures.length > 0) {
    console.log()
    console.log(chalk.yellow('Failed steps'))
    for (const line of failures) {
      console.log(chalk.gray(`  - ${line}`))
    }
  }

  if (requiresRestart(summary)) {
    console.log()
    console.log(chalk.cyan(`Restart the computer to repair ${summary.rebootScheduled.join(', ')}.`))
  }

  const text = buildNotificationText(summary)
  if (!text || !options.notify.enabled) {
    return { notified: false }
  }

  const shown = await showDesktopNotification(options.notify.title, text)
  if (!shown.ok) {
    logger.debug(`Notification error: ${shown.error.code}`)
    printWarning(`Could not show the restart notification: ${shown.error.message}`)
    return { notified: false }
  }
  return { notified: true }
}
