import pino, { type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/server-config.js'

export type { Logger } from 'pino'

/**
 * Root logger for the application. Pretty-printed through pino-pretty when
 * asked for, or whenever NODE_ENV is not "production".
 */
export function createLogger(config: LoggingConfig, name = 'my-app'): Logger {
  const usePretty =
    config.pretty || process.env.NODE_ENV !== 'production'

  return pino({
    name,
    level: config.level,
    ...(usePretty
      ? {
          transport: {
            target: 'pino-pretty',
            options: { translateTime: 'SYS:standard', ignore: 'pid,hostname' },
          },
        }
      : {}),
  })
}
