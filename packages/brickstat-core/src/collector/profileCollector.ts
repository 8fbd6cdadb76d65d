import { pino, type Logger } from 'pino'

import type { CollectorOptions, GatherSummary } from '../contracts/collector.js'
import type { ProfileCommandRequest, ProfileCommandRunner } from '../contracts/executor.js'
import type { MetricsSink } from '../contracts/sink.js'
import { FieldParseError, ProfileCommandError } from '../errors.js'
import { createGlusterCommandRunner } from '../execution/glusterCommandRunner.js'
import { scanProfileReport } from '../report/reportScanner.js'
import {
  DEFAULT_GLUSTER_BINARY,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_USE_SUDO,
  DEFAULT_VOLUMES,
  isTimerDelay,
  MAX_TIMER_DELAY_MS,
} from './defaults.js'

/**
 * Runs the profiler for every configured volume and feeds the parsed report to a sink.
 *
 * Configuration is read-only after construction, so overlapping `gather` calls share
 * nothing but options.
 */
export class ProfileCollector {
  private readonly volumes: readonly string[]
  private readonly binary: string
  private readonly timeoutMs: number
  private readonly useSudo: boolean
  private readonly runner: ProfileCommandRunner
  private readonly logger: Logger
  private readonly now: () => number

  /**
   * Creates a profile collector.
   *
   * @param options Collector options; unset values fall back to the defaults.
   * @throws RangeError when the timeout is outside the timer range.
   */
  public constructor(options: CollectorOptions = {}) {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    if (!isTimerDelay(timeoutMs, false)) {
      throw new RangeError(`timeoutMs must be an integer between 1 and ${MAX_TIMER_DELAY_MS}`)
    }

    this.volumes = [...(options.volumes ?? DEFAULT_VOLUMES)]
    this.binary = options.binary ?? DEFAULT_GLUSTER_BINARY
    this.timeoutMs = timeoutMs
    this.useSudo = options.useSudo ?? DEFAULT_USE_SUDO
    this.runner = options.runner ?? createGlusterCommandRunner()
    this.logger = options.logger ?? pino({ level: 'silent' })
    this.now = options.now ?? Date.now
  }

  /**
   * Executes one collection cycle.
   *
   * Volumes are processed sequentially. The first failed invocation rejects the cycle
   * and the remaining volumes are not tried. Field parse failures go to the sink as
   * errors and do not stop the cycle.
   *
   * @param sink Receiver for records and field errors.
   * @returns Cycle counts.
   * @throws ProfileCommandError when the profiler fails for a volume.
   */
  public async gather(sink: MetricsSink): Promise<GatherSummary> {
    const startedAt = this.now()
    let records = 0
    let fieldErrors = 0

    for (const volume of this.volumes) {
      const request: ProfileCommandRequest = {
        binary: this.binary,
        volume,
        timeoutMs: this.timeoutMs,
        useSudo: this.useSudo,
      }

      this.logger.debug({ volume, binary: this.binary, useSudo: this.useSudo }, 'running profiler')
      const result = await this.runner(request)
      if (!result.successful) {
        const error = new ProfileCommandError(request, result)
        this.logger.error({ volume, stderr: result.stderr.trim() }, error.message)
        throw error
      }

      let volumeRecords = 0
      let volumeErrors = 0
      for (const event of scanProfileReport(volume, result.stdout)) {
        if (event.kind === 'failure') {
          const error = new FieldParseError(event.failure)
          this.logger.warn({ volume, label: event.failure.label }, error.message)
          sink.addError(error)
          volumeErrors += 1
          continue
        }

        sink.addFields(event.record.measurement, event.record.fields, event.record.tags)
        volumeRecords += 1
      }

      this.logger.debug(
        { volume, records: volumeRecords, fieldErrors: volumeErrors },
        'scanned profile report'
      )
      records += volumeRecords
      fieldErrors += volumeErrors
    }

    return {
      volumes: this.volumes.length,
      records,
      fieldErrors,
      durationMs: this.now() - startedAt,
    }
  }
}

/**
 * Creates a profile collector instance.
 *
 * @param options Collector options.
 * @returns Profile collector.
 */
export const createProfileCollector = (options: CollectorOptions = {}): ProfileCollector => {
  return new ProfileCollector(options)
}
