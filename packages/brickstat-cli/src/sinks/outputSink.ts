import type { GatherSummary, MetricsSink } from '@brickstat/core'

import type { OutputFormat } from '../config/types.js'
import { JsonSink } from './jsonSink.js'
import { LineProtocolSink } from './lineProtocolSink.js'
import { PrettySink } from './prettySink.js'

/**
 * Metrics sink with cycle lifecycle hooks for console output.
 */
export interface OutputSink extends MetricsSink {
  /**
   * Called before a collection cycle starts.
   *
   * @param volumes Volumes scheduled for profiling.
   */
  onCycleStart?(volumes: readonly string[]): void

  /**
   * Called after a collection cycle ends.
   *
   * @param summary Cycle counts, or null when the cycle failed.
   */
  onCycleEnd?(summary: GatherSummary | null): void
}

/**
 * Creates the sink for an output format.
 *
 * @param format Selected output format.
 * @returns Output sink.
 */
export const createOutputSink = (format: OutputFormat): OutputSink => {
  switch (format) {
    case 'json':
      return new JsonSink()
    case 'line':
      return new LineProtocolSink()
    case 'pretty':
      return new PrettySink()
  }
}
