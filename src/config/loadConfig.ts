import { readFile } from 'fs/promises'
import { existsSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'
import YAML from 'yaml'
import { AppError, getErrorMessage } from '../shared/error.js'
import { createLogger } from '../shared/logger.js'
import { configSchema, type Config } from './schema.js'

const logger = createLogger('config')

export const CONFIG_FILENAME = '.chkdsk-scheduler.yaml'

let cachedConfig: Config | null = null

/**
 * 查找配置文件路径（全局 + 项目）
 * 全局配置为基底，项目配置覆盖其上
 */
function findConfigPaths(cwd?: string): { globalPath: string | null; projectPath: string | null } {
  const home = homedir()
  const homePath = join(home, CONFIG_FILENAME)
  const projectDir = cwd || process.cwd()
  const projectPath = join(projectDir, CONFIG_FILENAME)

  // 项目目录与 home 目录相同时，不重复加载
  const isHomeCwd = projectDir === home

  return {
    globalPath: existsSync(homePath) ? homePath : null,
    projectPath: !isHomeCwd && existsSync(projectPath) ? projectPath : null,
  }
}

/**
 * 加载配置
 * 查找顺序：~/.chkdsk-scheduler.yaml 为基底 → 当前目录覆盖 → 环境变量覆盖
 * 没有任何配置文件时使用默认值
 */
export async function loadConfig(options: { cwd?: string } = {}): Promise<Config> {
  if (cachedConfig) return cachedConfig

  const { globalPath, projectPath } = findConfigPaths(options.cwd)

  if (!globalPath && !projectPath) {
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  let merged: Record<string, unknown>
  try {
    const globalRaw = globalPath ? await parseYamlFile(globalPath) : {}
    const projectRaw = projectPath ? await parseYamlFile(projectPath) : {}
    merged = mergeConfig(globalRaw, projectRaw)
  } catch (e) {
    return useDefaults(AppError.configInvalid(getErrorMessage(e)))
  }

  const result = configSchema.safeParse(merged)
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
    return useDefaults(AppError.configInvalid(issues.join('; ')))
  }

  cachedConfig = applyEnvOverrides(result.data)
  return cachedConfig
}

// 配置文件有误时不中断运行，退回默认值
function useDefaults(error: AppError): Config {
  logger.warn(`${error.message}, using defaults`)
  cachedConfig = applyEnvOverrides(getDefaultConfig())
  return cachedConfig
}

/**
 * Parse YAML file, returning empty object for empty/comment-only files
 */
async function parseYamlFile(filePath: string): Promise<Record<string, unknown>> {
  const content = await readFile(filePath, 'utf-8')
  const parsed: unknown = YAML.parse(content)
  return isPlainObject(parsed) ? parsed : {}
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Merge config objects: project fields override global fields.
 * Nested objects are merged, arrays are replaced.
 */
function mergeConfig(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...base }
  for (const [key, val] of Object.entries(override)) {
    if (val === undefined || val === null) continue
    const current = result[key]
    result[key] = isPlainObject(val) && isPlainObject(current) ? mergeConfig(current, val) : val
  }
  return result
}

/**
 * Apply environment variable overrides to config.
 * Values are checked here since they skip the schema.
 */
export function applyEnvOverrides(config: Config): Config {
  const env = process.env

  if (env.CKS_IDLE_MINUTES) {
    const minutes = Number(env.CKS_IDLE_MINUTES)
    if (Number.isInteger(minutes) && minutes >= 1 && minutes <= 999) {
      config = { ...config, idle: { ...config.idle, minutes } }
    } else {
      logger.warn(`Ignoring CKS_IDLE_MINUTES=${env.CKS_IDLE_MINUTES} (expected 1-999)`)
    }
  }

  if (env.CKS_NOTIFY === '0') {
    config = { ...config, notify: { ...config.notify, enabled: false } }
  }

  return config
}

/**
 * 获取默认配置
 */
export function getDefaultConfig(): Config {
  return configSchema.parse({})
}

/**
 * 清除配置缓存
 */
export function clearConfigCache(): void {
  cachedConfig = null
}
