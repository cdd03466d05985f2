import { runTool, type RunToolOptions, type ToolResult } from './runTool.js'

const POWERSHELL_ARGS = ['-NoProfile', '-NonInteractive', '-ExecutionPolicy', 'Bypass', '-Command']

/**
 * Run a fixed PowerShell script. Values that vary at run time are passed in
 * `options.env` and read as `$env:NAME` inside the script, never spliced into it.
 */
export function runPowerShell(script: string, options?: RunToolOptions): Promise<ToolResult> {
  return runTool('powershell.exe', [...POWERSHELL_ARGS, script], options)
}

/** Non-empty, trimmed output lines */
export function splitLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(Boolean)
}
