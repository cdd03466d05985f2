import type { DriveLetter } from '../types/drive.js'

const DRIVE_PATTERN = /^\s*([A-Za-z])(?::|\s*$)/

/**
 * "d:\\pagefile.sys" → "D:", "c:" → "C:", "E" → "E:".
 * Returns null for anything without a leading drive letter.
 */
export function normalizeDrive(value: string): DriveLetter | null {
  const match = DRIVE_PATTERN.exec(value)
  const letter = match?.[1]
  return letter ? `${letter.toUpperCase()}:` : null
}

/** "E:" → "E" */
export function driveLetter(drive: DriveLetter): string {
  return drive.replace(/:$/, '')
}

/** Normalize, drop invalid entries and deduplicate, keeping first-seen order */
export function uniqueDrives(values: Iterable<string>): DriveLetter[] {
  const seen = new Set<DriveLetter>()
  for (const value of values) {
    const drive = normalizeDrive(value)
    if (drive) seen.add(drive)
  }
  return [...seen]
}
