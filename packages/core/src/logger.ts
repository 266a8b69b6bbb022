import { pino } from 'pino'
import type { Logger, LevelWithSilent } from 'pino'

export type { Logger } from 'pino'

export interface LoggerOptions {
  level?: LevelWithSilent
  /** Human-readable output through pino-pretty */
  pretty?: boolean
  name?: string
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info'

  if (options.pretty) {
    return pino({
      name: options.name,
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    })
  }

  return pino({ name: options.name, level })
}

/** Logger that drops everything, for tests and embedding */
export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}
