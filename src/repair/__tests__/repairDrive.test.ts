import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { createFakeHost, type FakeHost, type FakeHostOptions } from '../../../tests/helpers/fakeHost.js'

vi.mock('../../system/runTool.js', async importOriginal => {
  const actual = await importOriginal<typeof import('../../system/runTool.js')>()
  return { ...actual, runTool: vi.fn() }
})

vi.mock('execa', () => ({ execa: vi.fn() }))

import { execa } from 'execa'
import { runTool } from '../../system/runTool.js'
import { getDefaultConfig } from '../../config/loadConfig.js'
import {
  buildCreateTaskArgs,
  buildTaskDescriptor,
  createIdleRepairTask,
  taskNameFor,
} from '../idleTask.js'
import { scheduleRebootRepair, toStepError } from '../rebootRepair.js'
import { repairDrive } from '../repairDrive.js'
import { scanDrive } from '../scanDrive.js'

const mockRunTool = vi.mocked(runTool)

function useHost(options: FakeHostOptions = {}): FakeHost {
  const host = createFakeHost(options)
  mockRunTool.mockImplementation(host.runTool)
  return host
}

beforeEach(() => {
  vi.clearAllMocks()
})

describe('idle task', () => {
  it('names the task after the drive letter', () => {
    expect(taskNameFor('E:')).toBe('ChkdskRepair_E')
    expect(taskNameFor('F:', 'Nightly-')).toBe('Nightly-F')
  })

  it('builds a self-deleting repair action', () => {
    expect(buildTaskDescriptor('E:')).toEqual({
      name: 'ChkdskRepair_E',
      action: 'cmd /c chkdsk E: /f /x & schtasks /Delete /TN ChkdskRepair_E /F',
      idleMinutes: 10,
      runAs: 'SYSTEM',
    })
  })

  it('uses the configured repair switches', () => {
    const config = { ...getDefaultConfig(), repair: { fixArgs: ['/f', '/r', '/x'] } }
    expect(buildTaskDescriptor('G:', config).action).toBe(
      'cmd /c chkdsk G: /f /r /x & schtasks /Delete /TN ChkdskRepair_G /F'
    )
  })

  it('never replaces an existing task', () => {
    expect(buildCreateTaskArgs(buildTaskDescriptor('E:'))).not.toContain('/F')
  })

  it('returns the failed step when schtasks fails', async () => {
    useHost({ schtasksExitCode: 1 })
    const result = await createIdleRepairTask('E:')
    expect(result).toEqual({
      ok: false,
      error: {
        step: 'create-idle-task',
        command: expect.stringContaining('schtasks /Create /TN ChkdskRepair_E'),
        exitCode: 1,
        message: 'create-idle-task failed (exit 1): ERROR: Cannot create a file when that file already exists.',
      },
    })
  })
})

describe('scheduleRebootRepair', () => {
  it('confirms the restart prompt and sets the dirty bit', async () => {
    const host = useHost()
    expect(await scheduleRebootRepair('D:')).toEqual([])
    expect(host.commandLines()).toEqual(['chkdsk D: /f', 'chkntfs /c D:', 'fsutil dirty set D:'])
    expect(host.calls[0]?.options.input).toBe('Y\r\n')
    expect(host.calls.every(call => call.options.mutates === true)).toBe(true)
  })

  it('reports a dirty bit that could not be set', async () => {
    const host = useHost({ fsutilSetExitCode: 1 })
    const failures = await scheduleRebootRepair('D:')
    expect(failures.map(f => f.step)).toEqual(['set-dirty-bit'])
    expect(host.dirty.has('D:')).toBe(false)
  })

  it('runs the later steps after an earlier one fails', async () => {
    const host = useHost({ chkdskScheduleExitCode: 3, chkdskScheduleOutput: 'Cannot lock current drive.' })
    const failures = await scheduleRebootRepair('D:')
    expect(failures.map(f => f.message)).toEqual(['schedule-boot-check failed (exit 3): Cannot lock current drive.'])
    expect(host.commandLines()).toEqual(['chkdsk D: /f', 'chkntfs /c D:', 'fsutil dirty set D:'])
    expect(host.dirty.has('D:')).toBe(true)
  })
})

describe('toStepError', () => {
  it('falls back to the last stdout line when stderr is empty', () => {
    expect(
      toStepError('schedule-boot-check', {
        command: 'chkdsk C: /f',
        exitCode: 3,
        stdout: 'The type of the file system is NTFS.\r\nCannot lock current drive.\r\n',
        stderr: '',
        skipped: false,
      }).message
    ).toBe('schedule-boot-check failed (exit 3): Cannot lock current drive.')
  })

  it('notes when the tool never started', () => {
    expect(
      toStepError('force-boot-check', {
        command: 'chkntfs /c C:',
        exitCode: null,
        stdout: '',
        stderr: '',
        skipped: false,
      }).message
    ).toBe('force-boot-check failed (did not start)')
  })
})

describe('repairDrive', () => {
  it('records the idle task name', async () => {
    useHost()
    expect(await repairDrive('E:', 'idle-eligible')).toEqual({
      outcome: 'scheduled-idle-repair',
      idleTaskFailed: false,
      taskName: 'ChkdskRepair_E',
      failures: [],
    })
  })

  it('keeps the restart outcome when a fallback step fails too', async () => {
    useHost({ schtasksExitCode: 1, chkntfsExitCode: 1 })
    const outcome = await repairDrive('E:', 'idle-eligible')
    expect(outcome.outcome).toBe('scheduled-reboot-repair')
    expect(outcome.idleTaskFailed).toBe(true)
    expect(outcome.failures.map(f => f.step)).toEqual(['create-idle-task', 'force-boot-check'])
  })
})

describe('scanDrive', () => {
  it('returns the chkdsk status', async () => {
    useHost({ scanExitCodes: { 'E:': 3 } })
    expect(await scanDrive('E:')).toBe(3)
  })

  it('throws SCAN_FAILED when chkdsk cannot start', async () => {
    mockRunTool.mockResolvedValue({
      command: 'chkdsk E:',
      exitCode: null,
      stdout: '',
      stderr: 'spawn chkdsk ENOENT',
      skipped: false,
    })
    await expect(scanDrive('E:')).rejects.toMatchObject({
      code: 'SCAN_FAILED',
      message: 'chkdsk E: failed (did not start): spawn chkdsk ENOENT',
    })
  })
})

describe('dry-run', () => {
  afterEach(async () => {
    const { setDryRun } = await vi.importActual<typeof import('../../system/runTool.js')>(
      '../../system/runTool.js'
    )
    setDryRun(false)
  })

  it('treats skipped steps as scheduled without touching the system', async () => {
    const actual = await vi.importActual<typeof import('../../system/runTool.js')>('../../system/runTool.js')
    actual.setDryRun(true)
    mockRunTool.mockImplementation(actual.runTool)

    expect(await repairDrive('C:', 'reboot-required')).toEqual({
      outcome: 'scheduled-reboot-repair',
      idleTaskFailed: false,
      failures: [],
    })
    expect(await repairDrive('E:', 'idle-eligible')).toMatchObject({ outcome: 'scheduled-idle-repair' })
    expect(vi.mocked(execa)).not.toHaveBeenCalled()
  })
})
