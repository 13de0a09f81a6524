export {
  DEFAULT_EXTRACTOR_CONFIG,
  MALFORMED_POLICIES,
  OUTPUT_FORMATS,
  configFromEnv,
  resolveConfig,
  type ExtractorConfig,
  type MalformedLinePolicy,
  type OutputFormat,
} from './config'
export { ConfigError, ExtractorError, InputFileError, MalformedLineError, OutputFileError } from './errors'
export { extractMatchArms, extractMatchArmsFromFile, type ExtractionResult } from './extractor'
export { cleanGroupKey, groupRecords, type GroupMap } from './grouping'
export { createLogger, silentLogger, type Logger } from './logger'
export { renderGroup, renderJson, renderReport, type ReportOptions } from './report'
export { scanLine, scanSource, type OpcodeRecord, type ScanStats } from './scanner'
