import { readFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { z } from 'zod'
import { ConfigError, getErrorCode, getErrorMessage } from '@/shared/lib/error'

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on'])
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off'])

export type EnvSource = Record<string, string | undefined>

const cacheSchema = z
  .object({
    maxCapacity: z.number().int().positive().default(32_768),
    ttlMs: z.number().int().positive().default(30 * 60 * 1000),
    ttiMs: z.number().int().positive().default(10 * 60 * 1000),
    maxMemoryMb: z.number().positive().default(256),
    enableStats: z.boolean().default(true),
    numShards: z.number().int().positive().default(64),
    sweepMs: z.number().int().nonnegative().default(30_000),
  })
  .strict()

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])

export const appConfigSchema = z
  .object({
    cache: cacheSchema.default({}),
    showHidden: z.boolean().default(false),
    startDir: z.string().min(1).optional(),
    tickMs: z.number().int().positive().default(250),
    slowActionMs: z.number().int().positive().default(50),
    clipboardMaxItems: z.number().int().positive().default(1000),
    logLevel: logLevelSchema.default('info'),
    logFile: z.string().min(1).optional(),
  })
  .strict()

export type CacheConfig = z.infer<typeof cacheSchema>
export type AppConfig = z.infer<typeof appConfigSchema>

export const resolveCacheConfig = (overrides: Partial<CacheConfig> = {}): CacheConfig => cacheSchema.parse(overrides)

type Issue = {
  path: (string | number)[]
  message: string
}

const formatIssues = (source: string, issues: Issue[]) => {
  const details = issues
    .map(({ path: where, message }) => `  • ${where.length > 0 ? where.join('.') : '<root>'}: ${message}`)
    .join('\n')
  return `Invalid configuration in ${source}\n${details}`
}

const parseBoolean = (name: string, raw: string): boolean => {
  const lowered = raw.trim().toLowerCase()
  if (TRUE_VALUES.has(lowered)) return true
  if (FALSE_VALUES.has(lowered)) return false
  throw new ConfigError(`${name} must be a boolean (true/false), got "${raw}"`)
}

export const defaultConfigPath = (env: EnvSource = process.env) => {
  const base = env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config')
  return path.join(base, 'panewalk', 'config.json')
}

export const defaultLogFile = (env: EnvSource = process.env) => {
  const base = env.XDG_STATE_HOME || path.join(os.homedir(), '.local', 'state')
  return path.join(base, 'panewalk', 'panewalk.log')
}

const readConfigFile = async (file: string): Promise<unknown> => {
  let text: string
  try {
    text = await readFile(file, 'utf8')
  } catch (err) {
    if (getErrorCode(err) === 'ENOENT') return {}
    throw new ConfigError(`Cannot read ${file}: ${getErrorMessage(err)}`)
  }
  try {
    return JSON.parse(text)
  } catch (err) {
    throw new ConfigError(`Cannot parse ${file}: ${getErrorMessage(err)}`)
  }
}

export const parseConfig = (raw: unknown, source = 'config'): AppConfig => {
  const result = appConfigSchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigError(
      formatIssues(
        source,
        result.error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
      ),
    )
  }
  return result.data
}

type LoadOptions = {
  env?: EnvSource
  startDir?: string
}

export const loadConfig = async ({ env = process.env, startDir }: LoadOptions = {}): Promise<AppConfig> => {
  const file = env.PANEWALK_CONFIG || defaultConfigPath(env)
  const config = parseConfig(await readConfigFile(file), file)

  const level = env.PANEWALK_LOG_LEVEL
  if (level) {
    const parsed = logLevelSchema.safeParse(level.trim().toLowerCase())
    if (!parsed.success) {
      throw new ConfigError(`PANEWALK_LOG_LEVEL must be one of ${logLevelSchema.options.join(', ')}`)
    }
    config.logLevel = parsed.data
  }
  if (env.PANEWALK_SHOW_HIDDEN) {
    config.showHidden = parseBoolean('PANEWALK_SHOW_HIDDEN', env.PANEWALK_SHOW_HIDDEN)
  }
  if (env.PANEWALK_START_DIR) config.startDir = env.PANEWALK_START_DIR
  if (startDir) config.startDir = startDir
  if (!config.logFile) config.logFile = defaultLogFile(env)

  return config
}
