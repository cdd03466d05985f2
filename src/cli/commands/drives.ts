import type { Command } from 'commander'
import chalk from 'chalk'
import { table } from 'table'
import { loadConfig } from '../../config/index.js'
import { classifyDrive, getRebootDrives, isDirty, listFixedDrives } from '../../drives/index.js'
import { taskNameFor } from '../../repair/index.js'
import { printError, setLogLevel } from '../../shared/index.js'
import { assertElevated, assertWindows } from '../../system/index.js'
import type { DriveClass, DriveLetter } from '../../types/index.js'
import { info } from '../output.js'

export interface DriveRow {
  drive: DriveLetter
  classification: DriveClass
  dirty: boolean
  taskName: string
}

/**
 * Classification and dirty state of every fixed drive; nothing is scanned or scheduled.
 */
export async function collectDriveRows(): Promise<DriveRow[]> {
  await assertElevated()
  const config = await loadConfig()

  const drives = await listFixedDrives()
  if (drives.length === 0) return []

  const rebootDrives = await getRebootDrives(config)
  const rows: DriveRow[] = []
  for (const drive of drives) {
    rows.push({
      drive,
      classification: classifyDrive(drive, rebootDrives),
      dirty: await isDirty(drive, config.dirty.markers),
      taskName: taskNameFor(drive, config.idle.taskPrefix),
    })
  }
  return rows
}

export function formatDriveTable(rows: readonly DriveRow[]): string {
  const data = [
    ['Drive', 'Repair mode', 'Dirty bit', 'Idle task name'].map(h => chalk.bold(h)),
    ...rows.map(row => [
      row.drive,
      row.classification === 'reboot-required' ? 'at restart' : 'when idle',
      row.dirty ? chalk.yellow('set') : chalk.green('clear'),
      row.classification === 'reboot-required' ? chalk.dim('-') : row.taskName,
    ]),
  ]
  return table(data)
}

export function registerDrivesCommand(program: Command): void {
  program
    .command('drives')
    .description('List fixed drives with their repair mode and dirty bit, without scanning')
    .option('-v, --verbose', 'Show debug logs')
    .action(async (options: { verbose?: boolean }) => {
      if (options.verbose) setLogLevel('debug')
      try {
        assertWindows()
        const rows = await collectDriveRows()
        if (rows.length === 0) {
          info('No fixed drives found')
          return
        }
        console.log(formatDriveTable(rows))
      } catch (e) {
        printError(e)
        process.exitCode = 1
      }
    })
}
