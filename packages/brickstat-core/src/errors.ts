import type { ProfileCommandRequest, ProfileCommandResult } from './contracts/executor.js'
import type { FieldParseFailure, FopFieldLabel } from './contracts/report.js'

/**
 * Raised when the profiler could not be run for a volume. Aborts the collection cycle.
 */
export class ProfileCommandError extends Error {
  /** Volume whose invocation failed. */
  public readonly volume: string
  /** Invocation result, including any stdout captured before the failure. */
  public readonly result: ProfileCommandResult

  public constructor(request: ProfileCommandRequest, result: ProfileCommandResult) {
    super(
      `error gathering metrics: error running gluster command: ${describeFailure(request, result)} - use_sudo: ${request.useSudo} - cmdArgs: [${result.args.join(' ')}]`
    )
    this.name = 'ProfileCommandError'
    this.volume = request.volume
    this.result = result
  }
}

/**
 * Reported for a numeric fop column that did not parse. Never aborts a scan.
 */
export class FieldParseError extends Error {
  /** Bare column label. */
  public readonly label: FopFieldLabel
  /** Offending token text. */
  public readonly raw: string

  public constructor(failure: FieldParseFailure) {
    super(`Expected a numerical value for ${failure.label} = ${failure.raw}`)
    this.name = 'FieldParseError'
    this.label = failure.label
    this.raw = failure.raw
  }
}

const describeFailure = (request: ProfileCommandRequest, result: ProfileCommandResult): string => {
  if (result.error !== undefined) {
    return result.error instanceof Error ? result.error.message : String(result.error)
  }

  if (result.timedOut) {
    return `timed out after ${request.timeoutMs}ms`
  }

  if (result.signal) {
    return `terminated by signal ${result.signal}`
  }

  return `exited with code ${result.exitCode ?? 'unknown'}`
}
