import { spawn } from 'node:child_process'

import { isTimerDelay, MAX_TIMER_DELAY_MS } from '../collector/defaults.js'
import type {
  ProfileCommandRequest,
  ProfileCommandResult,
  ProfileCommandRunner,
} from '../contracts/executor.js'

/**
 * Executable and argument vector for one profiler invocation.
 */
export interface ProfileCommandLine {
  /** Executable to spawn. */
  readonly command: string
  /** Arguments passed to the executable. */
  readonly args: readonly string[]
}

/**
 * Builds `<binary> volume profile <volume> info cumulative`, prefixed with sudo on request.
 *
 * @param request Invocation input data.
 * @returns Executable and arguments.
 */
export const buildProfileCommand = (request: ProfileCommandRequest): ProfileCommandLine => {
  const profileArgs = ['volume', 'profile', request.volume, 'info', 'cumulative']

  if (request.useSudo) {
    return {
      command: 'sudo',
      args: [request.binary, ...profileArgs],
    }
  }

  return {
    command: request.binary,
    args: profileArgs,
  }
}

/**
 * Creates a profiler runner backed by `child_process.spawn`.
 *
 * @returns Profile command runner implementation.
 */
export const createGlusterCommandRunner = (): ProfileCommandRunner => {
  return async (request: ProfileCommandRequest): Promise<ProfileCommandResult> => {
    if (!isTimerDelay(request.timeoutMs, false)) {
      throw new RangeError(`timeoutMs must be an integer between 1 and ${MAX_TIMER_DELAY_MS}`)
    }

    const startedAt = Date.now()
    const commandLine = buildProfileCommand(request)

    return await new Promise<ProfileCommandResult>((resolve) => {
      const child = spawn(commandLine.command, [...commandLine.args], {
        stdio: ['ignore', 'pipe', 'pipe'],
      })

      let stdout = ''
      let stderr = ''
      let timedOut = false
      let error: unknown
      let closed = false

      const timeoutHandle = setTimeout(() => {
        timedOut = true
        child.kill('SIGTERM')
      }, request.timeoutMs)

      // Multi-byte characters may straddle pipe chunks; the stream decoder joins them.
      child.stdout.setEncoding('utf8')
      child.stderr.setEncoding('utf8')

      child.stdout.on('data', (chunk: string) => {
        stdout += chunk
      })

      child.stderr.on('data', (chunk: string) => {
        stderr += chunk
      })

      const finish = (exitCode: number | null, signal: NodeJS.Signals | null): void => {
        if (closed) {
          return
        }

        closed = true
        clearTimeout(timeoutHandle)

        const successful = !timedOut && exitCode === 0 && error === undefined

        resolve({
          successful,
          timedOut,
          durationMs: Date.now() - startedAt,
          exitCode,
          signal,
          stdout,
          stderr,
          command: commandLine.command,
          args: commandLine.args,
          error,
        })
      }

      child.on('error', (spawnError: Error) => {
        error = spawnError
        // No pid means the process never started and 'close' may not follow.
        if (child.pid === undefined) {
          finish(null, null)
        }
      })

      child.on('close', (exitCode: number | null, signal: NodeJS.Signals | null) => {
        finish(exitCode, signal)
      })
    })
  }
}
