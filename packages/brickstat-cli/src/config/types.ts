/**
 * Supported output formats for collected metrics.
 */
export type OutputFormat = 'pretty' | 'json' | 'line'

/**
 * Accepted output format names, in help-text order.
 */
export const OUTPUT_FORMATS: readonly OutputFormat[] = ['pretty', 'json', 'line']

/**
 * Top-level config model of `brickstat.config.ts` / `brickstat.config.json`.
 */
export interface BrickstatConfig {
  /** Volumes profiled in order. */
  readonly volumes?: readonly string[]
  /** Path of the gluster binary. */
  readonly binary?: string
  /** Per-invocation timeout in milliseconds. */
  readonly timeoutMs?: number
  /** Runs the profiler through sudo when true. */
  readonly useSudo?: boolean
  /** Repeats collection at this interval in milliseconds; 0 runs once. */
  readonly intervalMs?: number
  /** Default output behavior from config. */
  readonly output?: {
    /** Preferred output format. */
    readonly format?: OutputFormat
  }
}

/**
 * Type helper for TypeScript config files.
 *
 * @param config Config object.
 * @returns The same config object.
 */
export const defineConfig = (config: BrickstatConfig): BrickstatConfig => {
  return config
}
