import type { Command } from 'commander'
import { loadConfig } from '../../config/index.js'
import { formatDriveResult, reportSummary } from '../../report/index.js'
import { runRepairPass, summarize } from '../../run/index.js'
import { createLogger, getLogLevel, printError, setLogLevel } from '../../shared/index.js'
import { assertWindows, setDryRun } from '../../system/index.js'
import { header, info, outcomeIcon, stepPrefix, success, warn } from '../output.js'
import { createSpinner } from '../spinner.js'

const logger = createLogger('cli')

export interface RunCommandOptions {
  verbose?: boolean
  dryRun?: boolean
  /** commander sets false for --no-notify */
  notify?: boolean
}

/**
 * One repair pass. Returns the process exit code:
 * 0 on completion (also when nothing was found), 1 on a failed precondition
 * or an unexpected error.
 */
export async function executeRepairRun(options: RunCommandOptions = {}): Promise<number> {
  if (options.verbose) setLogLevel('debug')
  setDryRun(options.dryRun ?? false)

  // debug 日志和 dry-run 命令逐行输出，此时关闭动画
  const spinner = createSpinner({ enabled: getLogLevel() !== 'debug' && !options.dryRun })

  try {
    assertWindows()
    const config = await loadConfig()

    header('Disk check')
    if (options.dryRun) {
      warn('Dry run: repairs and tasks are only logged, nothing is changed')
    }

    const report = await runRepairPass({
      config,
      onDriveStart: (drive, index, total) => {
        spinner.start(`${stepPrefix(index + 1, total)} Checking ${drive}`)
      },
      onDriveResult: (result, index, total) => {
        spinner.persist(outcomeIcon(result.outcome), `${stepPrefix(index + 1, total)} ${formatDriveResult(result)}`)
      },
    })

    if (report.drives.length === 0) {
      info('No fixed drives found, nothing to check')
      return 0
    }

    const summary = summarize(report.results)
    if (summary.healthy.length === report.drives.length) {
      success('All drives are healthy')
    }

    await reportSummary(summary, report.results, {
      notify: {
        ...config.notify,
        enabled: config.notify.enabled && options.notify !== false && !options.dryRun,
      },
    })
    return 0
  } catch (e) {
    spinner.fail('Disk check aborted')
    if (e instanceof Error && e.stack) logger.debug(e.stack)
    printError(e)
    return 1
  }
}

export function registerRunAction(program: Command): void {
  program
    .option('-v, --verbose', 'Show debug logs, including every external command')
    .option('--dry-run', 'Scan only; log repair scheduling and task creation without running them')
    .option('--no-notify', 'Do not show the desktop dialog when a restart is required')
    .action(async (options: RunCommandOptions) => {
      process.exitCode = await executeRepairRun(options)
    })
}
