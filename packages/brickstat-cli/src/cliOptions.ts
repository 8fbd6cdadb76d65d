import { resolve } from 'node:path'

import { isTimerDelay, MAX_TIMER_DELAY_MS } from '@brickstat/core'

import { isOutputFormat } from './config/loadConfig.js'
import type { OutputFormat } from './config/types.js'
import { isLogLevel, LOG_LEVELS, type LogLevel } from './logger.js'

/**
 * Parsed CLI runtime options. Unset overrides fall back to config, then to defaults.
 */
export interface CliOptions {
  /** Absolute working directory for config lookup. */
  readonly cwd: string
  /** Optional explicit config file path. */
  readonly configPath?: string
  /** Volumes replacing the configured list. */
  readonly volumes?: readonly string[]
  /** Gluster binary override. */
  readonly binary?: string
  /** Invocation timeout override in milliseconds. */
  readonly timeoutMs?: number
  /** Enables sudo when set. */
  readonly useSudo?: true
  /** Output format override. */
  readonly format?: OutputFormat
  /** Collection interval override in milliseconds. */
  readonly intervalMs?: number
  /** Logger level override. */
  readonly logLevel?: LogLevel
  /** Prints a sample config and exits when true. */
  readonly sampleConfig: boolean
  /** Prints usage and exits when true. */
  readonly help: boolean
}

/**
 * Parses process arguments for the brickstat CLI.
 *
 * @param argv Raw argument list excluding node and script path.
 * @param baseCwd Base working directory.
 * @returns Parsed CLI options.
 * @throws Error when an argument is invalid.
 */
export const parseCliOptions = (argv: readonly string[], baseCwd: string): CliOptions => {
  let configPath: string | undefined
  const volumes: string[] = []
  let binary: string | undefined
  let timeoutMs: number | undefined
  let useSudo = false
  let format: OutputFormat | undefined
  let intervalMs: number | undefined
  let logLevel: LogLevel | undefined
  let sampleConfig = false
  let help = false
  let cwd = baseCwd

  for (let index = 0; index < argv.length; index += 1) {
    const argument = argv[index]
    if (!argument) {
      continue
    }

    if (argument === '--help' || argument === '-h') {
      help = true
      continue
    }

    if (argument === '--sudo') {
      useSudo = true
      continue
    }

    if (argument === '--sample-config') {
      sampleConfig = true
      continue
    }

    const valueOption = splitValueOption(argument)
    if (!valueOption) {
      throw new Error(`Unknown argument: ${argument}`)
    }

    let value = valueOption.inlineValue
    if (value === undefined) {
      value = argv[index + 1]
      index += 1
    }
    if (!value) {
      throw new Error(`${valueOption.name} requires a value`)
    }

    switch (valueOption.name) {
      case '--config':
        configPath = value
        break
      case '--volume':
        volumes.push(value)
        break
      case '--binary':
        binary = value
        break
      case '--timeout':
        timeoutMs = parseMilliseconds(value, '--timeout', false)
        break
      case '--interval':
        intervalMs = parseMilliseconds(value, '--interval', true)
        break
      case '--format':
        if (!isOutputFormat(value)) {
          throw new Error('--format must be "pretty", "json" or "line"')
        }
        format = value
        break
      case '--log-level':
        logLevel = parseLogLevel(value, '--log-level')
        break
      case '--cwd':
        cwd = resolve(baseCwd, value)
        break
    }
  }

  return {
    cwd,
    configPath,
    ...(volumes.length > 0 ? { volumes } : {}),
    binary,
    timeoutMs,
    ...(useSudo ? { useSudo: true as const } : {}),
    format,
    intervalMs,
    logLevel,
    sampleConfig,
    help,
  }
}

const VALUE_OPTIONS = [
  '--config',
  '--volume',
  '--binary',
  '--timeout',
  '--interval',
  '--format',
  '--log-level',
  '--cwd',
] as const

type ValueOptionName = (typeof VALUE_OPTIONS)[number]

const splitValueOption = (
  argument: string
): { readonly name: ValueOptionName; readonly inlineValue?: string } | null => {
  for (const name of VALUE_OPTIONS) {
    if (argument === name) {
      return { name }
    }

    if (argument.startsWith(`${name}=`)) {
      return { name, inlineValue: argument.slice(name.length + 1) }
    }
  }

  return null
}

const parseMilliseconds = (value: string, flag: string, allowZero: boolean): number => {
  const parsed = /^\d+$/u.test(value) ? Number(value) : Number.NaN
  if (!isTimerDelay(parsed, allowZero)) {
    throw new Error(
      `${flag} must be an integer between ${allowZero ? 0 : 1} and ${MAX_TIMER_DELAY_MS}`
    )
  }

  return parsed
}

/**
 * Validates a log level name from a flag or environment variable.
 *
 * @param value Level name.
 * @param source Flag or variable name used in the error message.
 * @returns Log level.
 * @throws Error when the level is unknown.
 */
export const parseLogLevel = (value: string, source: string): LogLevel => {
  if (!isLogLevel(value)) {
    throw new Error(`${source} must be one of: ${LOG_LEVELS.join(', ')}`)
  }

  return value
}

/**
 * Returns help text for the brickstat CLI.
 *
 * @returns Human-readable usage text.
 */
export const getCliHelpText = (): string => {
  return [
    'Usage: brickstat [options]',
    '',
    'Collects GlusterFS cumulative profile statistics as tagged metrics.',
    '',
    'Options:',
    '  --config <path>     Config file path (default: brickstat.config.ts or brickstat.config.json)',
    '  --volume <name>     Volume to profile; repeat for several (default: vol0)',
    '  --binary <path>     gluster binary (default: /usr/sbin/gluster)',
    '  --timeout <ms>      Per-volume command timeout (default: 1000)',
    '  --sudo              Run gluster through sudo',
    '  --format <type>     Output format: pretty | json | line (default: pretty)',
    '  --interval <ms>     Repeat collection at this interval until interrupted',
    '  --log-level <lvl>   Diagnostics on stderr (default: warn, env BRICKSTAT_LOG_LEVEL)',
    '  --sample-config     Print a sample brickstat.config.json and exit',
    '  --cwd <path>        Base working directory',
    '  -h, --help          Show this help',
  ].join('\n')
}
