/**
 * loadConfig tests
 * Tests config loading, merging, env overrides and fallback behavior
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdirSync, writeFileSync, rmSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'

const TEST_DIR = join(tmpdir(), `cks-config-test-${Date.now()}`)
const HOME_DIR = join(TEST_DIR, 'home')
const PROJECT_DIR = join(TEST_DIR, 'project')

// Mock homedir to prevent loading the user's real ~/.chkdsk-scheduler.yaml
vi.mock('os', async importOriginal => {
  const os = await importOriginal<typeof import('os')>()
  return { ...os, homedir: () => HOME_DIR }
})

const { loadConfig, getDefaultConfig, clearConfigCache, applyEnvOverrides, CONFIG_FILENAME } =
  await import('../loadConfig.js')

beforeEach(() => {
  clearConfigCache()
  mkdirSync(HOME_DIR, { recursive: true })
  mkdirSync(PROJECT_DIR, { recursive: true })
})

afterEach(() => {
  clearConfigCache()
  rmSync(TEST_DIR, { recursive: true, force: true })
})

describe('getDefaultConfig', () => {
  it('should match the built-in behavior', () => {
    expect(getDefaultConfig()).toEqual({
      idle: { minutes: 10, taskPrefix: 'ChkdskRepair_' },
      repair: { fixArgs: ['/f', '/x'] },
      dirty: { markers: ['is Dirty'] },
      notify: { enabled: true, title: 'Disk check' },
    })
  })
})

describe('loadConfig', () => {
  it('should return default config when no config file exists', async () => {
    const config = await loadConfig({ cwd: PROJECT_DIR })
    expect(config).toEqual(getDefaultConfig())
  })

  it('should load config from a YAML file in the working directory', async () => {
    writeFileSync(
      join(PROJECT_DIR, CONFIG_FILENAME),
      'idle:\n  minutes: 30\nnotify:\n  enabled: false\nbootDrive: "d:"\n'
    )

    const config = await loadConfig({ cwd: PROJECT_DIR })
    expect(config.idle).toEqual({ minutes: 30, taskPrefix: 'ChkdskRepair_' })
    expect(config.notify).toEqual({ enabled: false, title: 'Disk check' })
    expect(config.bootDrive).toBe('d:')
  })

  it('should let the project file override the home file', async () => {
    writeFileSync(join(HOME_DIR, CONFIG_FILENAME), 'idle:\n  minutes: 20\n  taskPrefix: HomeRepair_\n')
    writeFileSync(join(PROJECT_DIR, CONFIG_FILENAME), 'idle:\n  minutes: 45\n')

    const config = await loadConfig({ cwd: PROJECT_DIR })
    expect(config.idle).toEqual({ minutes: 45, taskPrefix: 'HomeRepair_' })
  })

  it('should replace arrays instead of merging them', async () => {
    writeFileSync(join(HOME_DIR, CONFIG_FILENAME), 'dirty:\n  markers: ["is Dirty", "ist fehlerhaft"]\n')
    writeFileSync(join(PROJECT_DIR, CONFIG_FILENAME), 'dirty:\n  markers: ["est incorrect"]\n')

    const config = await loadConfig({ cwd: PROJECT_DIR })
    expect(config.dirty.markers).toEqual(['est incorrect'])
  })

  it('should fall back to defaults on a schema error', async () => {
    writeFileSync(join(PROJECT_DIR, CONFIG_FILENAME), 'idle:\n  minutes: 5000\n')

    const config = await loadConfig({ cwd: PROJECT_DIR })
    expect(config).toEqual(getDefaultConfig())
  })

  it('should fall back to defaults on malformed YAML', async () => {
    writeFileSync(join(PROJECT_DIR, CONFIG_FILENAME), 'idle:\n  minutes: [30\n')

    const config = await loadConfig({ cwd: PROJECT_DIR })
    expect(config).toEqual(getDefaultConfig())
  })

  it('should treat an empty file as defaults', async () => {
    writeFileSync(join(PROJECT_DIR, CONFIG_FILENAME), '# nothing here\n')

    const config = await loadConfig({ cwd: PROJECT_DIR })
    expect(config).toEqual(getDefaultConfig())
  })

  it('should cache the first result until the cache is cleared', async () => {
    const first = await loadConfig({ cwd: PROJECT_DIR })
    writeFileSync(join(PROJECT_DIR, CONFIG_FILENAME), 'idle:\n  minutes: 30\n')

    expect(await loadConfig({ cwd: PROJECT_DIR })).toBe(first)

    clearConfigCache()
    expect((await loadConfig({ cwd: PROJECT_DIR })).idle.minutes).toBe(30)
  })
})

describe('applyEnvOverrides', () => {
  it('should take the idle time from CKS_IDLE_MINUTES', () => {
    vi.stubEnv('CKS_IDLE_MINUTES', '15')
    expect(applyEnvOverrides(getDefaultConfig()).idle.minutes).toBe(15)
  })

  it('should ignore an out-of-range CKS_IDLE_MINUTES', () => {
    vi.stubEnv('CKS_IDLE_MINUTES', '0')
    expect(applyEnvOverrides(getDefaultConfig()).idle.minutes).toBe(10)
  })

  it('should disable the dialog with CKS_NOTIFY=0', () => {
    vi.stubEnv('CKS_NOTIFY', '0')
    expect(applyEnvOverrides(getDefaultConfig()).notify.enabled).toBe(false)
  })

  it('should not mutate the input config', () => {
    vi.stubEnv('CKS_IDLE_MINUTES', '15')
    const config = getDefaultConfig()
    applyEnvOverrides(config)
    expect(config.idle.minutes).toBe(10)
  })
})
