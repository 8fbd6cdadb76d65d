import type { FieldMap, MeasurementRecord, MetricsSink, TagSet } from '../contracts/sink.js'

/**
 * In-memory sink that keeps everything it receives, in arrival order.
 */
export class RecordingSink implements MetricsSink {
  private readonly recordedMeasurements: MeasurementRecord[] = []
  private readonly recordedErrors: Error[] = []

  public addFields(measurement: string, fields: FieldMap, tags: TagSet): void {
    this.recordedMeasurements.push({ measurement, fields, tags })
  }

  public addError(error: Error): void {
    this.recordedErrors.push(error)
  }

  public get records(): readonly MeasurementRecord[] {
    return this.recordedMeasurements
  }

  public get errors(): readonly Error[] {
    return this.recordedErrors
  }

  /**
   * Drops everything recorded so far.
   */
  public clear(): void {
    this.recordedMeasurements.length = 0
    this.recordedErrors.length = 0
  }
}
