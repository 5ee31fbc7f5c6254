/**
 * @fileoverview Public API of the overtime engine.
 */

export { OvertimeSession } from './state.js';
export {
    summarize,
    summarizeByEmployee,
    summarizeByMonth,
    summarizeByDay,
    topEmployees,
    calculateOverallStats,
    type CalcOptions,
} from './calc.js';
export { cleanRecords, type CleanOptions, type DedupePolicy } from './clean.js';
export {
    DEFAULT_CONFIG,
    ENV_VARS,
    loadConfig,
    loadErrorReportingConfig,
    resolveConfig,
    type EngineConfig,
    type EnvSource,
} from './config.js';
export { COLUMN_ALIASES, CONSTANTS, ERROR_TYPES, EXPORT_COLUMNS, EXPORT_SHEETS } from './constants.js';
export {
    EmptyResultError,
    InvalidConfigurationError,
    MalformedValueError,
    NotFoundError,
    OvertimeError,
    SchemaError,
    UploadValidationError,
    classifyError,
    toFriendlyError,
} from './errors.js';
export {
    flushErrorReports,
    initErrorReporting,
    isErrorReportingEnabled,
    reportError,
    reportMessage,
    type ErrorContext,
    type SentryConfig,
} from './error-reporting.js';
export { buildSummaryWorkbook, exportSummaryCsv, exportSummaryWorkbook, type SummaryViews } from './export.js';
export { formatDdhhmmss, formatDecimalHours, formatHhmmss } from './format.js';
export {
    ingestSheet,
    ingestWorkbook,
    readWorkbook,
    resolveColumns,
    usesDate1904,
    type SheetIngestOptions,
} from './ingest.js';
export {
    configureLogger,
    createLogger,
    disableDebugMode,
    enableDebugMode,
    logger,
    LogLevel,
    resetLogger,
    setLogLevel,
    type LoggerConfig,
} from './logger.js';
export {
    classifyTimeCell,
    normalizeDate,
    normalizeDuration,
    normalizeTimeOfDay,
    parseDurationText,
    unwrapNegativeDuration,
    type DateOptions,
} from './time.js';
export type * from './types.js';
