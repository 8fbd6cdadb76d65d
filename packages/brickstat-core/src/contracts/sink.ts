/**
 * Tags attached to a measurement. Keys are `volume` and `brick` once a brick header was seen.
 */
export type TagSet = Readonly<Record<string, string>>

/**
 * Numeric fields of one measurement keyed by field name.
 */
export type FieldMap = Readonly<Record<string, number>>

/**
 * One tagged measurement produced from a profile report.
 */
export interface MeasurementRecord {
  /** Measurement name, always `glusterfs` for profile reports. */
  readonly measurement: string
  /** Parsed numeric fields. */
  readonly fields: FieldMap
  /** Volume and brick context of the line. */
  readonly tags: TagSet
}

/**
 * Receiver for collected measurements and non-fatal errors.
 */
export interface MetricsSink {
  /**
   * Accepts one measurement.
   *
   * @param measurement Measurement name.
   * @param fields Numeric fields.
   * @param tags Tag set.
   */
  addFields(measurement: string, fields: FieldMap, tags: TagSet): void

  /**
   * Accepts a field-level parse error or a failed collection cycle.
   *
   * @param error Error to record.
   */
  addError(error: Error): void
}
