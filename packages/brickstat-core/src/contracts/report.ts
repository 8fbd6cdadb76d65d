import type { FieldMap, MeasurementRecord } from './sink.js'

/**
 * Shape of one report line as seen by the classifier.
 */
export type ReportLine =
  | { readonly kind: 'brick_header'; readonly brick: string }
  | { readonly kind: 'data_read'; readonly bytes: number }
  | { readonly kind: 'data_written'; readonly bytes: number }
  | { readonly kind: 'fop_candidate' }
  | { readonly kind: 'no_match' }

/**
 * Bare label of a numeric fop column, used in parse failures.
 */
export type FopFieldLabel = 'pct_latency' | 'avg_latency' | 'min_latency' | 'max_latency' | 'ncalls'

/**
 * A numeric token that could not be parsed.
 */
export interface FieldParseFailure {
  /** Bare column label, without the operation prefix. */
  readonly label: FopFieldLabel
  /** Token text as found in the report. */
  readonly raw: string
  /** Human-readable parse failure cause. */
  readonly cause: string
}

/**
 * Extraction outcome for a fop candidate line.
 */
export type FopExtraction =
  | {
      readonly kind: 'fop'
      /** Lower-cased operation name. */
      readonly operation: string
      /** Fields that parsed, prefixed with the operation name. */
      readonly fields: FieldMap
      /** Tokens that failed to parse. */
      readonly failures: readonly FieldParseFailure[]
    }
  | { readonly kind: 'skip' }

/**
 * Item produced by the report scanner, in report order.
 */
export type ScanEvent =
  | { readonly kind: 'record'; readonly record: MeasurementRecord }
  | { readonly kind: 'failure'; readonly failure: FieldParseFailure }

/**
 * Fully drained scan of one volume report.
 */
export interface ProfileReportScan {
  /** Records in report order. */
  readonly records: readonly MeasurementRecord[]
  /** Parse failures in report order. */
  readonly failures: readonly FieldParseFailure[]
}
