import { AppError } from '../shared/error.js'
import { err, ok, type Result } from '../shared/result.js'
import { runPowerShell } from '../system/powershell.js'

export const NOTIFY_TEXT_ENV = 'CKS_NOTIFY_TEXT'
export const NOTIFY_TITLE_ENV = 'CKS_NOTIFY_TITLE'

// Title and text come from the environment so no user-visible string is spliced into the script
const MESSAGE_BOX_SCRIPT = [
  'Add-Type -AssemblyName System.Windows.Forms',
  `[void][System.Windows.Forms.MessageBox]::Show($env:${NOTIFY_TEXT_ENV}, $env:${NOTIFY_TITLE_ENV}, 'OK', 'Warning')`,
].join('; ')

/**
 * Modal dialog on the interactive desktop; resolves once it is dismissed.
 * Skipped under dry-run.
 */
export async function showDesktopNotification(
  title: string,
  text: string
): Promise<Result<void, AppError>> {
  const result = await runPowerShell(MESSAGE_BOX_SCRIPT, {
    env: { [NOTIFY_TEXT_ENV]: text, [NOTIFY_TITLE_ENV]: title },
    mutates: true,
  })

  if (result.exitCode !== 0) {
    return err(AppError.toolFailed('NOTIFY_FAILED', 'Desktop notification', result, 'NOTIFY'))
  }
  return ok(undefined)
}
