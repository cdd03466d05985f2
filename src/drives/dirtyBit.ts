import { createLogger } from '../shared/logger.js'
import { runTool } from '../system/runTool.js'
import type { DriveLetter } from '../types/drive.js'

const logger = createLogger('dirty-bit')

export const DEFAULT_DIRTY_MARKERS: readonly string[] = ['is Dirty']

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Whole-word, case-insensitive match of any marker. "is Dirty" does not match
 * the clean text "is NOT Dirty".
 */
export function matchesDirtyMarker(output: string, markers: readonly string[]): boolean {
  return markers.some(marker => new RegExp(`\\b${escapeRegExp(marker)}\\b`, 'i').test(output))
}

/**
 * `fsutil dirty query <drive>`; only the text is inspected, not the exit status.
 */
export async function isDirty(
  drive: DriveLetter,
  markers: readonly string[] = DEFAULT_DIRTY_MARKERS
): Promise<boolean> {
  const result = await runTool('fsutil', ['dirty', 'query', drive])
  const dirty = matchesDirtyMarker(result.stdout, markers)
  logger.debug(`${drive} dirty bit: ${dirty ? 'set' : 'clear'}`)
  return dirty
}
