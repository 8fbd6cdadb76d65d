import {
  DEFAULT_GLUSTER_BINARY,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_USE_SUDO,
  DEFAULT_VOLUMES,
} from '@brickstat/core'

import type { CliOptions } from '../cliOptions.js'
import type { BrickstatConfig, OutputFormat } from './types.js'

/**
 * Effective settings for a CLI run after merging flags, config and defaults.
 */
export interface CollectionPlan {
  /** Volumes profiled in order. */
  readonly volumes: readonly string[]
  /** Path of the gluster binary. */
  readonly binary: string
  /** Per-invocation timeout in milliseconds. */
  readonly timeoutMs: number
  /** Runs the profiler through sudo when true. */
  readonly useSudo: boolean
  /** Cycle interval in milliseconds; 0 runs a single cycle. */
  readonly intervalMs: number
  /** Output format. */
  readonly format: OutputFormat
}

/**
 * Merges CLI overrides over config values over built-in defaults.
 *
 * @param config Loaded config, empty when running without a file.
 * @param options Parsed CLI options.
 * @returns Effective collection plan.
 */
export const resolveCollectionPlan = (
  config: BrickstatConfig,
  options: Pick<
    CliOptions,
    'volumes' | 'binary' | 'timeoutMs' | 'useSudo' | 'intervalMs' | 'format'
  >
): CollectionPlan => {
  return {
    volumes: [...(options.volumes ?? config.volumes ?? DEFAULT_VOLUMES)],
    binary: options.binary ?? config.binary ?? DEFAULT_GLUSTER_BINARY,
    timeoutMs: options.timeoutMs ?? config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    useSudo: options.useSudo ?? config.useSudo ?? DEFAULT_USE_SUDO,
    intervalMs: options.intervalMs ?? config.intervalMs ?? 0,
    format: options.format ?? config.output?.format ?? 'pretty',
  }
}
