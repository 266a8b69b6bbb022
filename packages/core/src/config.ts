import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { IANAZone } from 'luxon'
import { parse } from 'yaml'
import { z } from 'zod'
import { DEFAULT_CATEGORIES } from './categories.js'
import { ConfigError } from './errors.js'

const DATA_DIRNAME = '.timeslot'
const CONFIG_FILENAME = 'config.yaml'
const DB_FILENAME = 'timeslot.db'

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

/**
 * Nearest `.timeslot/` directory at or above `from`, or `<from>/.timeslot`
 * when there is none yet.
 */
export function findDataDir(from: string = process.cwd()): string {
  for (let dir = path.resolve(from); ; dir = path.dirname(dir)) {
    const candidate = path.join(dir, DATA_DIRNAME)
    if (existsSync(candidate)) return candidate
    if (dir === path.dirname(dir)) break
  }
  return path.resolve(from, DATA_DIRNAME)
}

const LogLevelSchema = z.enum(LOG_LEVELS)

const YamlConfigSchema = z.object({
  timezone: z
    .string()
    .default('UTC')
    .refine((zone) => IANAZone.isValidZone(zone), { message: 'not a valid IANA time zone' }),
  categories: z.array(z.string()).min(1).default([...DEFAULT_CATEGORIES]),
  scheduling: z
    .object({
      slotMinutes: z.number().int().min(1).max(60).default(5),
      horizonWeeks: z.number().int().min(1).max(104).default(8),
    })
    .default({}),
  server: z
    .object({
      host: z.string().min(1).default('127.0.0.1'),
      port: z.number().int().min(0).max(65535).default(4321),
    })
    .default({}),
  log: z
    .object({
      level: LogLevelSchema.default('info'),
      pretty: z.boolean().default(false),
    })
    .default({}),
})

export type TimeslotConfig = z.infer<typeof YamlConfigSchema> & {
  dataDir: string
  dbPath: string
}

function readYamlConfig(dataDir: string): unknown {
  const configPath = path.join(dataDir, CONFIG_FILENAME)
  if (!existsSync(configPath)) {
    return {}
  }
  try {
    return parse(readFileSync(configPath, 'utf-8')) ?? {}
  } catch (err) {
    console.warn(
      `Warning: Could not parse ${configPath}: ${err instanceof Error ? err.message : String(err)}. Using defaults.`,
    )
    return {}
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ')
}

/**
 * Load configuration from `<dataDir>/config.yaml`.
 * PORT and LOG_LEVEL in `env` override the file.
 *
 * @throws ConfigError when a value fails validation
 */
export function loadConfig(
  dataDir: string = process.env.TIMESLOT_DIR ?? findDataDir(),
  env: NodeJS.ProcessEnv = process.env,
): TimeslotConfig {
  const parsed = YamlConfigSchema.safeParse(readYamlConfig(dataDir))
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${CONFIG_FILENAME}: ${formatIssues(parsed.error)}`)
  }
  const config = parsed.data

  if (env.PORT) {
    const port = z.coerce.number().int().min(0).max(65535).safeParse(env.PORT)
    if (!port.success) {
      throw new ConfigError(`Invalid PORT "${env.PORT}"`)
    }
    config.server.port = port.data
  }

  if (env.LOG_LEVEL) {
    const level = LogLevelSchema.safeParse(env.LOG_LEVEL)
    if (!level.success) {
      throw new ConfigError(`Invalid LOG_LEVEL "${env.LOG_LEVEL}"`)
    }
    config.log.level = level.data
  }

  return {
    ...config,
    dataDir,
    dbPath: path.join(dataDir, DB_FILENAME),
  }
}
