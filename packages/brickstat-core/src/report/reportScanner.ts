import type { FieldParseFailure, ProfileReportScan, ScanEvent } from '../contracts/report.js'
import type { FieldMap, MeasurementRecord, TagSet } from '../contracts/sink.js'
import { BrickContext } from './brickContext.js'
import { extractFopFields } from './fopExtractor.js'
import { classifyReportLine } from './lineClassifier.js'

/**
 * Measurement name used for every profile record.
 */
export const PROFILE_MEASUREMENT = 'glusterfs'

/**
 * Walks a cumulative profile report line by line.
 *
 * The generator keeps the current brick as its only state. It yields records and
 * parse failures in report order and can be consumed once; scanning the same text
 * again needs a new call.
 *
 * @param volume Volume the report belongs to.
 * @param output Raw profiler stdout.
 * @returns Lazy sequence of scan events.
 */
export function* scanProfileReport(volume: string, output: string): Generator<ScanEvent, void> {
  const context = new BrickContext(volume)

  for (const line of output.split(/\r?\n/u)) {
    const shape = classifyReportLine(line)

    switch (shape.kind) {
      case 'brick_header':
        context.enterBrick(shape.brick)
        break
      case 'data_read':
        yield recordEvent({ read: shape.bytes }, context.tags)
        break
      case 'data_written':
        yield recordEvent({ write: shape.bytes }, context.tags)
        break
      case 'fop_candidate': {
        const extraction = extractFopFields(line.trim())
        if (extraction.kind === 'skip') {
          break
        }

        for (const failure of extraction.failures) {
          yield { kind: 'failure', failure }
        }
        yield recordEvent(extraction.fields, context.tags)
        break
      }
      case 'no_match':
        break
    }
  }
}

/**
 * Scans a report and returns all records and failures at once.
 *
 * @param volume Volume the report belongs to.
 * @param output Raw profiler stdout.
 * @returns Drained scan result.
 */
export const collectProfileReport = (volume: string, output: string): ProfileReportScan => {
  const records: MeasurementRecord[] = []
  const failures: FieldParseFailure[] = []

  for (const event of scanProfileReport(volume, output)) {
    if (event.kind === 'record') {
      records.push(event.record)
    } else {
      failures.push(event.failure)
    }
  }

  return { records, failures }
}

const recordEvent = (fields: FieldMap, tags: TagSet): ScanEvent => {
  return {
    kind: 'record',
    record: {
      measurement: PROFILE_MEASUREMENT,
      fields,
      tags,
    },
  }
}
