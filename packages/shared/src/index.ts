export { SEVERITIES } from "./types.js";
export type {
  Severity,
  Matcher,
  RuleDefinition,
  Classification,
  MatchEvent,
  SummaryRecord,
  FileBreakdownRecord,
  ScanFailure,
  ScanFailureKind,
  AggregationResult,
  CategorizationResult,
  DetailedRow,
  SummaryRow,
  CategorizationProgress,
  ApiResponse,
} from "./types.js";
export { RuleSetError, SummarizerError, ConfigError } from "./errors.js";
export type { SummarizerErrorKind } from "./errors.js";
export { logInfo, logWarn, logError } from "./logger.js";
export { escapeMarkup, escapeMarkdownCell, isValidFilename, truncate } from "./sanitize.js";
