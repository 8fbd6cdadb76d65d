import { destination, pino, type Logger } from 'pino'

/**
 * Log levels accepted by `--log-level` and `BRICKSTAT_LOG_LEVEL`.
 */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent'

export const LOG_LEVELS: readonly LogLevel[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn'

/**
 * Narrows a string to a supported log level.
 *
 * @param value Candidate level name.
 * @returns True when the value is a known level.
 */
export const isLogLevel = (value: string): value is LogLevel => {
  return LOG_LEVELS.some((level) => level === value)
}

/**
 * Creates the CLI logger. Logs go to stderr; stdout carries metric output only.
 *
 * @param level Minimum level to emit.
 * @returns pino logger.
 */
export const createLogger = (level: LogLevel): Logger => {
  return pino({ name: 'brickstat', level }, destination(2))
}
