import type { FieldMap, GatherSummary, MeasurementRecord, TagSet } from '@brickstat/core'

import type { OutputSink } from './outputSink.js'

/**
 * JSON document written once per cycle.
 */
export interface CycleReport {
  /** Records in arrival order. */
  readonly records: readonly MeasurementRecord[]
  /** Errors reported during the cycle. */
  readonly errors: readonly { readonly name: string; readonly message: string }[]
  /** Cycle counts, or null when the cycle failed. */
  readonly summary: GatherSummary | null
}

/**
 * Buffers one cycle and writes it as a single JSON document.
 */
export class JsonSink implements OutputSink {
  private records: MeasurementRecord[] = []
  private errors: { name: string; message: string }[] = []

  public onCycleStart(): void {
    this.records = []
    this.errors = []
  }

  public addFields(measurement: string, fields: FieldMap, tags: TagSet): void {
    this.records.push({ measurement, fields, tags })
  }

  public addError(error: Error): void {
    this.errors.push({ name: error.name, message: error.message })
  }

  public onCycleEnd(summary: GatherSummary | null): void {
    process.stdout.write(
      `${formatCycleReportAsJson({ records: this.records, errors: this.errors, summary })}\n`
    )
    this.records = []
    this.errors = []
  }
}

/**
 * Formats a cycle report as JSON output.
 *
 * @param report Cycle report.
 * @param indentation Number of spaces used for indentation.
 * @returns JSON representation.
 */
export const formatCycleReportAsJson = (report: CycleReport, indentation = 2): string => {
  return JSON.stringify(report, null, indentation)
}
