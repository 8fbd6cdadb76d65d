import type { Logger } from 'pino'

import type { ProfileCommandRunner } from './executor.js'

/**
 * Construction options for a profile collector.
 */
export interface CollectorOptions {
  /** Volumes profiled in order, once per cycle. */
  readonly volumes?: readonly string[]
  /** Path of the gluster binary. */
  readonly binary?: string
  /** Per-invocation timeout in milliseconds. */
  readonly timeoutMs?: number
  /** Runs the profiler through sudo when true. */
  readonly useSudo?: boolean
  /** Command runner injection, defaults to spawning the gluster binary. */
  readonly runner?: ProfileCommandRunner
  /** Structured logger, silent by default. */
  readonly logger?: Logger
  /** Time source injection for deterministic tests. */
  readonly now?: () => number
}

/**
 * Counts for one completed collection cycle.
 */
export interface GatherSummary {
  /** Number of volumes profiled. */
  readonly volumes: number
  /** Number of records passed to the sink. */
  readonly records: number
  /** Number of field parse errors passed to the sink. */
  readonly fieldErrors: number
  /** Cycle duration in milliseconds. */
  readonly durationMs: number
}
