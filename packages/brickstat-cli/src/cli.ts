#!/usr/bin/env node

import { getSampleConfig } from '@brickstat/core'

import { getCliHelpText, parseCliOptions, parseLogLevel } from './cliOptions.js'
import { runCollection } from './runCollection.js'

const run = async (): Promise<void> => {
  const options = parseCliOptions(process.argv.slice(2), process.cwd())

  if (options.help) {
    process.stdout.write(`${getCliHelpText()}\n`)
    process.exitCode = 0
    return
  }

  if (options.sampleConfig) {
    process.stdout.write(`${getSampleConfig()}\n`)
    process.exitCode = 0
    return
  }

  const environmentLevel = process.env.BRICKSTAT_LOG_LEVEL
  const logLevel =
    options.logLevel ??
    (environmentLevel ? parseLogLevel(environmentLevel, 'BRICKSTAT_LOG_LEVEL') : undefined)

  const exitCode = await runCollection({ ...options, logLevel })
  process.exitCode = exitCode
}

void run().catch((error: unknown) => {
  const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error)
  process.stderr.write(`${message}\n`)
  process.exitCode = 1
})
