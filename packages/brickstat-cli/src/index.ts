export type { CliOptions } from './cliOptions.js'
export { getCliHelpText, parseCliOptions, parseLogLevel } from './cliOptions.js'

export type { BrickstatConfig, OutputFormat } from './config/types.js'
export { defineConfig, OUTPUT_FORMATS } from './config/types.js'
export type { LoadedBrickstatConfig } from './config/loadConfig.js'
export { isOutputFormat, loadBrickstatConfig, parseBrickstatConfig } from './config/loadConfig.js'
export type { CollectionPlan } from './config/resolveCollectionPlan.js'
export { resolveCollectionPlan } from './config/resolveCollectionPlan.js'

export type { LogLevel } from './logger.js'
export { createLogger, DEFAULT_LOG_LEVEL, isLogLevel, LOG_LEVELS } from './logger.js'

export type { OutputSink } from './sinks/outputSink.js'
export { createOutputSink } from './sinks/outputSink.js'
export type { CycleReport } from './sinks/jsonSink.js'
export { formatCycleReportAsJson, JsonSink } from './sinks/jsonSink.js'
export type { LineProtocolSinkOptions } from './sinks/lineProtocolSink.js'
export { LineProtocolSink, toLineProtocol } from './sinks/lineProtocolSink.js'
export { PrettySink } from './sinks/prettySink.js'

export type { RunCollectionDependencies, SignalSource } from './runCollection.js'
export { runCollection } from './runCollection.js'
