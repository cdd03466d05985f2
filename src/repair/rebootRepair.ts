/**
 * Restart-time repair
 *
 * Three steps, all of them always run; a failing step is recorded and the next
 * one still runs:
 *   1. chkdsk <drive> /f, answering "Y" to "schedule at next restart?"
 *   2. chkntfs /c <drive>, so the boot-time check is not skipped
 *   3. fsutil dirty set <drive>, so Windows checks the volume at boot
 */

import { createLogger } from '../shared/logger.js'
import { collectFailures, err, ok, type Result } from '../shared/result.js'
import { runTool, type RunToolOptions, type ToolResult } from '../system/runTool.js'
import type { DriveLetter, RepairStep, RepairStepError } from '../types/drive.js'

const logger = createLogger('reboot-repair')

/** English chkdsk prints this after accepting the restart-time check; other locales rely on exit 0 */
const BOOT_CHECK_SCHEDULED = /checked the next time the system restarts/i

export const CONFIRM_TOKEN = 'Y\r\n'

export function toStepError(step: RepairStep, result: ToolResult): RepairStepError {
  const status = result.exitCode === null ? 'did not start' : `exit ${result.exitCode}`
  const detail = result.stderr.trim() || result.stdout.trim().split(/\r?\n/).pop() || ''
  return {
    step,
    command: result.command,
    exitCode: result.exitCode,
    message: detail ? `${step} failed (${status}): ${detail}` : `${step} failed (${status})`,
  }
}

async function runStep(
  step: RepairStep,
  command: string,
  args: string[],
  options: RunToolOptions = {},
  accept: (result: ToolResult) => boolean = result => result.exitCode === 0
): Promise<Result<ToolResult, RepairStepError>> {
  const result = await runTool(command, args, { ...options, mutates: true })
  if (result.skipped || accept(result)) {
    logger.debug(`${step} ok for ${args.join(' ')}`)
    return ok(result)
  }
  const error = toStepError(step, result)
  logger.debug(error.message)
  return err(error)
}

/** Failed steps in order; empty when all three succeeded */
export function scheduleRebootRepair(drive: DriveLetter): Promise<RepairStepError[]> {
  return collectFailures<RepairStepError>([
    () =>
      runStep(
        'schedule-boot-check',
        'chkdsk',
        [drive, '/f'],
        { input: CONFIRM_TOKEN },
        result => result.exitCode === 0 || BOOT_CHECK_SCHEDULED.test(result.stdout)
      ),
    () => runStep('force-boot-check', 'chkntfs', ['/c', drive]),
    () => runStep('set-dirty-bit', 'fsutil', ['dirty', 'set', drive]),
  ])
}
