/**
 * Input contract for one profiler invocation.
 */
export interface ProfileCommandRequest {
  /** Path of the gluster binary. */
  readonly binary: string
  /** Volume passed to `volume profile`. */
  readonly volume: string
  /** Process timeout in milliseconds. */
  readonly timeoutMs: number
  /** Prefixes the invocation with sudo when true. */
  readonly useSudo: boolean
}

/**
 * Output contract from one profiler invocation.
 */
export interface ProfileCommandResult {
  /** True when the command exited with code 0 before the timeout. */
  readonly successful: boolean
  /** True when the command reached timeout handling path. */
  readonly timedOut: boolean
  /** Total command duration in milliseconds. */
  readonly durationMs: number
  /** Exit code returned by the process, or null when unavailable. */
  readonly exitCode: number | null
  /** Termination signal if process ended by signal. */
  readonly signal: NodeJS.Signals | null
  /** Captured stdout, also kept when the command failed. */
  readonly stdout: string
  /** Captured stderr content. */
  readonly stderr: string
  /** Executable that was spawned (`sudo` or the gluster binary). */
  readonly command: string
  /** Arguments passed to the spawned executable. */
  readonly args: readonly string[]
  /** Original error object for spawn-level failures. */
  readonly error?: unknown
}

/**
 * Asynchronous abstraction for running the profiler.
 *
 * @param request Invocation input data.
 * @returns Invocation result.
 */
export type ProfileCommandRunner = (request: ProfileCommandRequest) => Promise<ProfileCommandResult>
