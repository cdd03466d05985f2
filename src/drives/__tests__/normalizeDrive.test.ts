import { describe, it, expect } from 'vitest'
import { driveLetter, normalizeDrive, uniqueDrives } from '../normalizeDrive.js'

describe('normalizeDrive', () => {
  it('upper-cases and appends the colon', () => {
    expect(normalizeDrive('c:')).toBe('C:')
    expect(normalizeDrive('E')).toBe('E:')
    expect(normalizeDrive(' d: ')).toBe('D:')
  })

  it('takes the drive of a pagefile path', () => {
    expect(normalizeDrive('d:\\pagefile.sys')).toBe('D:')
  })

  it('rejects values without a leading drive letter', () => {
    expect(normalizeDrive('')).toBeNull()
    expect(normalizeDrive('\\\\?\\Volume{1234}')).toBeNull()
    expect(normalizeDrive('pagefile.sys')).toBeNull()
  })
})

describe('uniqueDrives', () => {
  it('deduplicates case-insensitively in first-seen order', () => {
    expect(uniqueDrives(['C:', 'd:\\pagefile.sys', 'c:\\swapfile.sys', 'D:', 'junk'])).toEqual(['C:', 'D:'])
  })
})

describe('driveLetter', () => {
  it('strips the colon', () => {
    expect(driveLetter('E:')).toBe('E')
  })
})
