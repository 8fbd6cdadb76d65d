import { Point } from '@influxdata/influxdb-client'
import type { FieldMap, TagSet } from '@brickstat/core'

import type { OutputSink } from './outputSink.js'

/**
 * Options for the line protocol sink.
 */
export interface LineProtocolSinkOptions {
  /** Time source for point timestamps, in Unix milliseconds. */
  readonly now?: () => number
}

/**
 * Writes each record as one InfluxDB line protocol line on stdout; errors go to stderr.
 */
export class LineProtocolSink implements OutputSink {
  private readonly now: () => number

  public constructor(options: LineProtocolSinkOptions = {}) {
    this.now = options.now ?? Date.now
  }

  public addFields(measurement: string, fields: FieldMap, tags: TagSet): void {
    const line = toLineProtocol(measurement, fields, tags, new Date(this.now()))
    if (line) {
      process.stdout.write(`${line}\n`)
    }
  }

  public addError(error: Error): void {
    process.stderr.write(`${error.name}: ${error.message}\n`)
  }
}

/**
 * Renders one record as a line protocol line.
 *
 * Every field is written as a float. Non-finite values cannot be expressed in line
 * protocol and are dropped.
 *
 * @param measurement Measurement name.
 * @param fields Numeric fields.
 * @param tags Tag set.
 * @param timestamp Point timestamp.
 * @returns Line protocol text, or undefined when no field is left.
 */
export const toLineProtocol = (
  measurement: string,
  fields: FieldMap,
  tags: TagSet,
  timestamp: Date
): string | undefined => {
  const point = new Point(measurement).timestamp(timestamp)

  for (const [key, value] of Object.entries(tags)) {
    point.tag(key, value)
  }

  for (const [key, value] of Object.entries(fields)) {
    if (Number.isFinite(value)) {
      point.floatField(key, value)
    }
  }

  return point.toLineProtocol()
}
