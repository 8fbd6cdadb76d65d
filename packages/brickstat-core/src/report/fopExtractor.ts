import type { FieldParseFailure, FopExtraction, FopFieldLabel } from '../contracts/report.js'

/**
 * Column layout of a fop statistics line:
 *
 * ```
 * %-latency  Avg-latency     Min-Latency     Max-Latency     No. of calls  Fop
 *      0.00   1234.00 us        10.00 us      5000.00 us               42  WRITE
 * ```
 *
 * Columns 2, 4 and 6 are the `us` unit markers and are not read. This table is the
 * only place that knows the report's column positions.
 */
const FOP_TOKEN_COUNT = 9
const FOP_NAME_INDEX = 8
const FOP_NUMERIC_COLUMNS: readonly { readonly index: number; readonly label: FopFieldLabel }[] = [
  { index: 0, label: 'pct_latency' },
  { index: 1, label: 'avg_latency' },
  { index: 3, label: 'min_latency' },
  { index: 5, label: 'max_latency' },
  { index: 7, label: 'ncalls' },
]

const DECIMAL_FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/u
const SPECIAL_FLOAT_PATTERN = /^([+-]?)(inf|infinity|nan)$/iu

/**
 * Extracts per-operation latency and call count fields from a fop statistics line.
 *
 * Lines that do not split into exactly nine tokens are skipped without error. Each
 * numeric column is parsed on its own; a column that fails is reported and left out
 * of the fields while the others are kept.
 *
 * @param trimmedLine Report line with surrounding whitespace removed.
 * @returns Extracted fields or a skip marker.
 */
export const extractFopFields = (trimmedLine: string): FopExtraction => {
  const tokens = trimmedLine.length === 0 ? [] : trimmedLine.split(/\s+/u)
  if (tokens.length !== FOP_TOKEN_COUNT) {
    return { kind: 'skip' }
  }

  const operation = (tokens[FOP_NAME_INDEX] ?? '').toLowerCase()
  const fields: Record<string, number> = {}
  const failures: FieldParseFailure[] = []

  for (const column of FOP_NUMERIC_COLUMNS) {
    const raw = tokens[column.index] ?? ''
    const value = parseFloatToken(raw)
    if (value === null) {
      failures.push({
        label: column.label,
        raw,
        cause: `invalid syntax: ${JSON.stringify(raw)}`,
      })
      continue
    }

    fields[`${operation}_${column.label}`] = value
  }

  return {
    kind: 'fop',
    operation,
    fields,
    failures,
  }
}

/**
 * Parses a whole token as a floating point number.
 *
 * @param token Token text.
 * @returns Parsed value, or null when the token is not a number in its entirety.
 */
export const parseFloatToken = (token: string): number | null => {
  if (DECIMAL_FLOAT_PATTERN.test(token)) {
    return Number(token)
  }

  const special = token.match(SPECIAL_FLOAT_PATTERN)
  if (!special) {
    return null
  }

  if (special[2]?.toLowerCase() === 'nan') {
    return Number.NaN
  }

  return special[1] === '-' ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY
}
