/**
 * Severity attached to a pattern rule and carried onto every event it produces
 */
export type Severity = "Low" | "Medium" | "High";

export const SEVERITIES: readonly Severity[] = ["Low", "Medium", "High"];

/**
 * How a rule recognizes a line. All variants are case-sensitive.
 */
export type Matcher =
  | { type: "contains"; value: string }
  | { type: "prefix"; value: string }
  | { type: "regex"; pattern: string };

/**
 * Declarative rule as written in a rule file or built into the tool
 */
export interface RuleDefinition {
  label: string;
  matcher: Matcher;
  severity?: Severity;
}

/**
 * Result of classifying a single line
 */
export interface Classification {
  label: string;
  severity?: Severity;
}

/**
 * One classified occurrence of an error pattern on one log line
 */
export interface MatchEvent {
  label: string;
  sourceFile: string;
  /** 1-indexed */
  lineNumber: number;
  /** Line content without its terminator */
  rawText: string;
  severity?: Severity;
  /** ISO-8601 UTC */
  timestamp?: string;
  sessionUuid?: string;
  sessionId?: string;
}

/**
 * Per-label aggregate derived from the detailed table
 */
export interface SummaryRecord {
  label: string;
  count: number;
  percentage: number;
  severity?: Severity;
  firstSeen?: string;
  lastSeen?: string;
  /** Distinct source files, sorted */
  files: string[];
  sampleMessage: string;
}

/**
 * Occurrence count for one (label, source file) pair
 */
export interface FileBreakdownRecord {
  label: string;
  sourceFile: string;
  count: number;
}

export type ScanFailureKind = "not-found" | "unreadable" | "undecodable";

/**
 * A file that could not be scanned. Never fatal to the run.
 */
export interface ScanFailure {
  sourceFile: string;
  kind: ScanFailureKind;
  reason: string;
}

export interface AggregationResult {
  detailed: MatchEvent[];
  summary: SummaryRecord[];
}

/**
 * Everything a categorization run produces
 */
export interface CategorizationResult extends AggregationResult {
  breakdown: FileBreakdownRecord[];
  skipped: ScanFailure[];
  filesScanned: number;
}

/**
 * Row of the detailed report, shared by every report writer
 */
export interface DetailedRow {
  label: string;
  source_file: string;
  line_number: number;
  severity: string;
  timestamp: string;
  session_uuid: string;
  session_id: string;
  raw_text: string;
}

/**
 * Row of the summary report, shared by every report writer
 */
export interface SummaryRow {
  label: string;
  count: number;
  percentage: string;
  severity: string;
  first_seen: string;
  last_seen: string;
  files: string;
  sample_message: string;
}

/**
 * Progress update during categorization
 */
export interface CategorizationProgress {
  stage: "scanning" | "aggregating" | "complete";
  progress: number; // 0-100
  message: string;
  filesDone?: number;
  totalFiles?: number;
}

/**
 * API response wrapper
 */
export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
  kind?: string;
}
