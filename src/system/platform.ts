import { AppError } from '../shared/error.js'

export function isWindows(platform: NodeJS.Platform = process.platform): boolean {
  return platform === 'win32'
}

export function assertWindows(platform: NodeJS.Platform = process.platform): void {
  if (!isWindows(platform)) {
    throw AppError.unsupportedPlatform(platform)
  }
}
