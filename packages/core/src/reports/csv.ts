import type { DetailedRow, MatchEvent, SummaryRecord, SummaryRow } from "@log-categorizer/shared";

export const DETAILED_COLUMNS: readonly (keyof DetailedRow)[] = [
  "label",
  "source_file",
  "line_number",
  "severity",
  "timestamp",
  "session_uuid",
  "session_id",
  "raw_text",
];

export const SUMMARY_COLUMNS: readonly (keyof SummaryRow)[] = [
  "label",
  "count",
  "percentage",
  "severity",
  "first_seen",
  "last_seen",
  "files",
  "sample_message",
];

export function toDetailedRow(event: MatchEvent): DetailedRow {
  return {
    label: event.label,
    source_file: event.sourceFile,
    line_number: event.lineNumber,
    severity: event.severity ?? "",
    timestamp: event.timestamp ?? "",
    session_uuid: event.sessionUuid ?? "",
    session_id: event.sessionId ?? "",
    raw_text: event.rawText,
  };
}

export function toSummaryRow(record: SummaryRecord): SummaryRow {
  return {
    label: record.label,
    count: record.count,
    percentage: record.percentage.toFixed(2),
    severity: record.severity ?? "",
    first_seen: record.firstSeen ?? "",
    last_seen: record.lastSeen ?? "",
    files: record.files.join(";"),
    sample_message: record.sampleMessage,
  };
}

/**
 * Quote a field when it contains a delimiter, quote or line break
 */
export function escapeCsvField(value: string | number): string {
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function formatCsv<T>(columns: readonly (keyof T & string)[], rows: readonly T[]): string {
  const lines = [columns.join(",")];
  for (const row of rows) {
    lines.push(columns.map((column) => escapeCsvField(String(row[column]))).join(","));
  }
  return lines.join("\n") + "\n";
}

export function renderDetailedCsv(events: readonly MatchEvent[]): string {
  return formatCsv(DETAILED_COLUMNS, events.map(toDetailedRow));
}

export function renderSummaryCsv(summary: readonly SummaryRecord[]): string {
  return formatCsv(SUMMARY_COLUMNS, summary.map(toSummaryRow));
}

/**
 * Parse CSV text into records (RFC 4180 quoting)
 */
export function parseCsv(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ",") {
      record.push(field);
      field = "";
    } else if (char === "\n" || char === "\r") {
      if (char === "\r" && text[i + 1] === "\n") {
        i++;
      }
      record.push(field);
      records.push(record);
      record = [];
      field = "";
    } else {
      field += char;
    }
  }

  if (field !== "" || record.length > 0) {
    record.push(field);
    records.push(record);
  }

  return records;
}
