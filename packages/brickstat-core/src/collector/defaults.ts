/**
 * Volumes profiled when none are configured.
 */
export const DEFAULT_VOLUMES: readonly string[] = ['vol0']

/**
 * Default location of the gluster CLI.
 */
export const DEFAULT_GLUSTER_BINARY = '/usr/sbin/gluster'

/**
 * Default per-invocation timeout in milliseconds.
 */
export const DEFAULT_TIMEOUT_MS = 1_000

/**
 * Profiler runs without sudo unless enabled.
 */
export const DEFAULT_USE_SUDO = false

/**
 * Largest delay Node timers honor; longer delays fire after 1 ms.
 */
export const MAX_TIMER_DELAY_MS = 2_147_483_647

/**
 * Checks that a millisecond value can be handed to `setTimeout` or `setInterval` as is.
 *
 * @param value Candidate delay.
 * @param allowZero Accepts 0 when true.
 * @returns True for an integer within the timer range.
 */
export const isTimerDelay = (value: number, allowZero: boolean): boolean => {
  return Number.isInteger(value) && value >= (allowZero ? 0 : 1) && value <= MAX_TIMER_DELAY_MS
}

/**
 * Returns a sample `brickstat.config.json` with every default spelled out.
 *
 * @returns Pretty-printed JSON document.
 */
export const getSampleConfig = (): string => {
  return JSON.stringify(
    {
      volumes: DEFAULT_VOLUMES,
      binary: DEFAULT_GLUSTER_BINARY,
      timeoutMs: DEFAULT_TIMEOUT_MS,
      useSudo: DEFAULT_USE_SUDO,
      intervalMs: 0,
      output: {
        format: 'pretty',
      },
    },
    null,
    2
  )
}
