/**
 * @entry Drives 驱动器发现与分类
 */

export { normalizeDrive, driveLetter, uniqueDrives } from './normalizeDrive.js'
export { listFixedDrives } from './listFixedDrives.js'
export { getBootDrive, listPagefileDrives, getRebootDrives, classifyDrive } from './classifyDrives.js'
export { isDirty, matchesDirtyMarker, DEFAULT_DIRTY_MARKERS } from './dirtyBit.js'
