export { parseDescriptionInput, type ParsedDescriptionInput } from './description-input.js';
export { buildCatalog, DEFAULT_IGNORE_DIRS, type BuildCatalogOptions } from './file-indexer.js';
export { resolveRecord, resolveRecords } from './resolver.js';
export {
  buildExecutionPlan,
  describeOutcome,
  formatPlanReport,
  isWriteAction,
  summarizePlan,
  toPlanJson,
  type PlanEntryJson,
  type PlanJson,
  type PlanReportOptions,
} from './plan-builder.js';
export { countResults, executePlan, formatExecutionReport, type ExecutePlanOptions } from './plan-executor.js';
export {
  createExifToolWriterFactory,
  ExifToolDescriptionWriter,
  withDescriptionWriter,
  type DescriptionWriter,
  type DescriptionWriterFactory,
  type ExifToolClient,
  type ExifToolWriterOptions,
  type WriteRequest,
} from './description-writer.js';
export { runDescribe, type DescribeRunDeps, type DescribeRunOptions, type DescribeRunReport } from './describe-pipeline.js';
export {
  ConfigManager,
  configFromEnv,
  DEFAULT_CONFIG,
  findDefaultConfigFile,
  validateConfig,
  type DescribeConfig,
} from './config.js';
export {
  ConfigError,
  DuplicateStemError,
  InvalidSearchRootError,
  MalformedRowError,
  ScanLimitExceededError,
  WriteError,
  type WriteErrorCode,
} from './errors.js';
export { AppError, Logger, logger, type LogLevel } from './logger.js';
export {
  classifyExtension,
  classifyPath,
  RECOGNIZED_EXTENSIONS,
  SIDECAR_EXTENSION,
  sidecarPathFor,
  stemOf,
} from './media-formats.js';
export type {
  AmbiguityReason,
  AmbiguousOutcome,
  CandidateFile,
  Catalog,
  CatalogFormatClass,
  ExecutionPlan,
  ExecutionReport,
  FormatClass,
  InputRecord,
  MatchedOutcome,
  NotFoundOutcome,
  PlanEntry,
  PlanSummary,
  ResolutionOutcome,
  WriteAction,
  WriterStatus,
  InspectStatus,
  WriteResult,
  WriteResultCounts,
  WriteResultStatus,
} from './media-types.js';
