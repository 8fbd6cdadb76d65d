import {
  createProfileCollector,
  ProfileCommandError,
  type ProfileCollector,
  type ProfileCommandRunner,
} from '@brickstat/core'
import type { Logger } from 'pino'

import type { CliOptions } from './cliOptions.js'
import { loadBrickstatConfig } from './config/loadConfig.js'
import { resolveCollectionPlan } from './config/resolveCollectionPlan.js'
import { createLogger, DEFAULT_LOG_LEVEL } from './logger.js'
import { createOutputSink, type OutputSink } from './sinks/outputSink.js'

/**
 * Collaborators replaceable in tests.
 */
export interface RunCollectionDependencies {
  /** Profile command runner; defaults to spawning gluster. */
  readonly runner?: ProfileCommandRunner
  /** Logger; defaults to a stderr pino logger at the requested level. */
  readonly logger?: Logger
  /** Output sink; defaults to the sink of the resolved format. */
  readonly sink?: OutputSink
  /** Source of stop signals for interval mode; defaults to the process. */
  readonly signalSource?: SignalSource
}

/**
 * Minimal event source for SIGINT/SIGTERM subscriptions.
 */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: () => void): unknown
  off(event: NodeJS.Signals, listener: () => void): unknown
}

interface IntervalLoopState {
  lastExitCode: number
  inFlight: Promise<void> | null
  stopped: boolean
  failure: { readonly error: unknown } | undefined
}

/**
 * Runs one collection cycle, or repeats cycles when an interval is configured.
 *
 * @param options CLI runtime options.
 * @param dependencies Optional collaborator overrides.
 * @returns Exit code of the last cycle.
 */
export const runCollection = async (
  options: CliOptions,
  dependencies: RunCollectionDependencies = {}
): Promise<number> => {
  const loadedConfig = await loadBrickstatConfig(options.cwd, options.configPath)
  const plan = resolveCollectionPlan(loadedConfig.config, options)
  const logger = dependencies.logger ?? createLogger(options.logLevel ?? DEFAULT_LOG_LEVEL)
  const sink = dependencies.sink ?? createOutputSink(plan.format)

  logger.debug({ configFilePath: loadedConfig.configFilePath, plan }, 'resolved collection plan')

  const collector = createProfileCollector({
    volumes: plan.volumes,
    binary: plan.binary,
    timeoutMs: plan.timeoutMs,
    useSudo: plan.useSudo,
    runner: dependencies.runner,
    logger,
  })

  const execute = async (): Promise<number> => {
    return await runCycle(collector, plan.volumes, sink)
  }

  if (plan.intervalMs <= 0) {
    return await execute()
  }

  return await runIntervalLoop(
    plan.intervalMs,
    execute,
    logger,
    dependencies.signalSource ?? process
  )
}

const runCycle = async (
  collector: ProfileCollector,
  volumes: readonly string[],
  sink: OutputSink
): Promise<number> => {
  sink.onCycleStart?.(volumes)

  try {
    const summary = await collector.gather(sink)
    sink.onCycleEnd?.(summary)
    return 0
  } catch (error: unknown) {
    if (!(error instanceof ProfileCommandError)) {
      throw error
    }

    sink.addError(error)
    sink.onCycleEnd?.(null)
    return 1
  }
}

const runIntervalLoop = async (
  intervalMs: number,
  execute: () => Promise<number>,
  logger: Logger,
  signalSource: SignalSource
): Promise<number> => {
  const state: IntervalLoopState = {
    lastExitCode: 0,
    inFlight: null,
    stopped: false,
    failure: undefined,
  }

  let resolveStopped: () => void = () => undefined
  const stoppedSignal = new Promise<void>((resolve) => {
    resolveStopped = resolve
  })

  const runExclusive = (): void => {
    if (state.stopped) {
      return
    }

    if (state.inFlight) {
      logger.warn({ intervalMs }, 'previous collection cycle still running, skipping tick')
      return
    }

    state.inFlight = execute()
      .then((exitCode) => {
        state.lastExitCode = exitCode
      })
      .catch((error: unknown) => {
        state.failure = { error }
        stop()
      })
      .finally(() => {
        state.inFlight = null
      })
  }

  const intervalHandle = setInterval(runExclusive, intervalMs)

  const stop = (): void => {
    if (state.stopped) {
      return
    }
    state.stopped = true

    clearInterval(intervalHandle)
    signalSource.off('SIGINT', stop)
    signalSource.off('SIGTERM', stop)
    resolveStopped()
  }

  signalSource.on('SIGINT', stop)
  signalSource.on('SIGTERM', stop)

  runExclusive()
  await stoppedSignal

  // Let a cycle that was running when the signal arrived finish writing its output.
  if (state.inFlight) {
    await state.inFlight
  }

  if (state.failure) {
    throw state.failure.error
  }

  logger.info({ lastExitCode: state.lastExitCode }, 'collection loop stopped')
  return state.lastExitCode
}
