import { z } from 'zod'

export const idleConfigSchema = z.object({
  /** Minutes of system idle time before the repair task fires (schtasks /I accepts 1-999) */
  minutes: z.number().int().min(1).max(999).default(10),
  /** Task name prefix; the drive letter is appended */
  taskPrefix: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, 'letters, digits, "_" and "-" only')
    .default('ChkdskRepair_'),
})

export const repairConfigSchema = z.object({
  /** chkdsk switches used by the idle-time repair task */
  fixArgs: z
    .array(z.string().regex(/^\/[A-Za-z]+(:\d+)?$/, 'chkdsk switches look like /f or /l:size'))
    .min(1)
    .default(['/f', '/x']),
})

export const dirtyConfigSchema = z.object({
  /** Text markers in `fsutil dirty query` output meaning the volume is dirty */
  markers: z.array(z.string().min(1)).min(1).default(['is Dirty']),
})

export const notifyConfigSchema = z.object({
  enabled: z.boolean().default(true),
  title: z.string().min(1).default('Disk check'),
})

export const configSchema = z.object({
  /** Overrides the SystemDrive environment variable */
  bootDrive: z
    .string()
    .regex(/^[A-Za-z]:?$/, 'a drive letter such as C:')
    .optional(),
  idle: idleConfigSchema.default({}),
  repair: repairConfigSchema.default({}),
  dirty: dirtyConfigSchema.default({}),
  notify: notifyConfigSchema.default({}),
})

export type IdleConfig = z.infer<typeof idleConfigSchema>
export type RepairConfig = z.infer<typeof repairConfigSchema>
export type DirtyConfig = z.infer<typeof dirtyConfigSchema>
export type NotifyConfig = z.infer<typeof notifyConfigSchema>
export type Config = z.infer<typeof configSchema>
