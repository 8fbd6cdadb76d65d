export type { CollectorOptions, GatherSummary } from './contracts/collector.js'
export type {
  ProfileCommandRequest,
  ProfileCommandResult,
  ProfileCommandRunner,
} from './contracts/executor.js'
export type {
  FieldParseFailure,
  FopExtraction,
  FopFieldLabel,
  ProfileReportScan,
  ReportLine,
  ScanEvent,
} from './contracts/report.js'
export type { FieldMap, MeasurementRecord, MetricsSink, TagSet } from './contracts/sink.js'

export {
  DEFAULT_GLUSTER_BINARY,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_USE_SUDO,
  DEFAULT_VOLUMES,
  getSampleConfig,
  isTimerDelay,
  MAX_TIMER_DELAY_MS,
} from './collector/defaults.js'
export { createProfileCollector, ProfileCollector } from './collector/profileCollector.js'
export { FieldParseError, ProfileCommandError } from './errors.js'
export type { ProfileCommandLine } from './execution/glusterCommandRunner.js'
export { buildProfileCommand, createGlusterCommandRunner } from './execution/glusterCommandRunner.js'
export { BrickContext } from './report/brickContext.js'
export { extractFopFields, parseFloatToken } from './report/fopExtractor.js'
export { classifyReportLine } from './report/lineClassifier.js'
export {
  collectProfileReport,
  PROFILE_MEASUREMENT,
  scanProfileReport,
} from './report/reportScanner.js'
export { RecordingSink } from './sinks/recordingSink.js'
