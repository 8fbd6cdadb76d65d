import { FieldParseError, type FieldMap, type GatherSummary, type TagSet } from '@brickstat/core'

import type { OutputSink } from './outputSink.js'

/**
 * Human-readable console sink: one line per record, warnings for field errors.
 */
export class PrettySink implements OutputSink {
  /**
   * Handles cycle start.
   *
   * @param volumes Scheduled volumes.
   */
  public onCycleStart(volumes: readonly string[]): void {
    const noun = volumes.length === 1 ? 'volume' : 'volumes'
    process.stdout.write(
      colorize(`brickstat: profiling ${volumes.length} ${noun} (${volumes.join(', ')})\n`, 'blue')
    )
  }

  public addFields(measurement: string, fields: FieldMap, tags: TagSet): void {
    const parts = [measurement, ...formatPairs(tags), ...formatPairs(fields)]
    process.stdout.write(`${colorize(parts.join(' '), 'green')}\n`)
  }

  public addError(error: Error): void {
    if (error instanceof FieldParseError) {
      process.stdout.write(colorize(`warning: ${error.message}\n`, 'yellow'))
      return
    }

    process.stdout.write(colorize(`error: ${error.message}\n`, 'red'))
  }

  /**
   * Handles cycle completion.
   *
   * @param summary Cycle counts, or null for a failed cycle.
   */
  public onCycleEnd(summary: GatherSummary | null): void {
    if (!summary) {
      process.stdout.write(colorize('Result: FAIL\n', 'red'))
      return
    }

    process.stdout.write(
      `Summary: volumes=${summary.volumes} records=${summary.records} fieldErrors=${summary.fieldErrors} duration=${summary.durationMs}ms\n`
    )
  }
}

const formatPairs = (values: Readonly<Record<string, string | number>>): string[] => {
  return Object.entries(values).map(([key, value]) => `${key}=${value}`)
}

type Color = 'red' | 'green' | 'yellow' | 'blue'

const colorize = (text: string, color: Color): string => {
  const colors: Record<Color, string> = {
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
  }

  return `${colors[color]}${text}\x1b[0m`
}
