import type { ReportLine } from '../contracts/report.js'

const BRICK_HEADER_PATTERN = /^Brick: (.*)$/u
const DATA_READ_PATTERN = /Data Read: ([0-9]+) bytes$/u
const DATA_WRITTEN_PATTERN = /Data Written: ([0-9]+) bytes$/u
const FOP_CANDIDATE_PATTERN = /^[0-9]+\.[0-9]+/u

/**
 * Classifies one line of a cumulative profile report.
 *
 * Checks run in a fixed order and the first match wins: brick header, data read,
 * data written, fop candidate. A fop candidate is only pre-filtered here; column
 * validation happens in the fop extractor.
 *
 * @param line Report line without its line terminator.
 * @returns Recognized line shape.
 */
export const classifyReportLine = (line: string): ReportLine => {
  const brickMatch = line.match(BRICK_HEADER_PATTERN)
  if (brickMatch) {
    return { kind: 'brick_header', brick: brickMatch[1] ?? '' }
  }

  const readMatch = line.match(DATA_READ_PATTERN)
  if (readMatch) {
    return { kind: 'data_read', bytes: Number(readMatch[1]) }
  }

  const writtenMatch = line.match(DATA_WRITTEN_PATTERN)
  if (writtenMatch) {
    return { kind: 'data_written', bytes: Number(writtenMatch[1]) }
  }

  if (FOP_CANDIDATE_PATTERN.test(line.trim())) {
    return { kind: 'fop_candidate' }
  }

  return { kind: 'no_match' }
}
