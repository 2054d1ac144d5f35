import type {
  AggregationResult,
  FileBreakdownRecord,
  MatchEvent,
  Severity,
  SummaryRecord,
} from "@log-categorizer/shared";
import { compareStrings, uniqueSorted } from "./ordering.js";

interface LabelGroup {
  label: string;
  count: number;
  severity?: Severity;
  firstSeen?: string;
  lastSeen?: string;
  files: string[];
  sampleMessage: string;
}

/**
 * Count descending, then label ascending
 */
export function compareSummaryRecords(
  a: Pick<SummaryRecord, "label" | "count">,
  b: Pick<SummaryRecord, "label" | "count">
): number {
  if (a.count !== b.count) {
    return b.count - a.count;
  }
  return compareStrings(a.label, b.label);
}

/**
 * Build the detailed and summary tables from match events.
 * The detailed table keeps the input order; the summary is sorted by
 * count descending with ties broken by label.
 */
export function aggregate(events: readonly MatchEvent[]): AggregationResult {
  const detailed = [...events];
  const total = detailed.length;

  if (total === 0) {
    return { detailed, summary: [] };
  }

  const groups = new Map<string, LabelGroup>();

  for (const event of detailed) {
    let group = groups.get(event.label);
    if (!group) {
      group = {
        label: event.label,
        count: 0,
        severity: event.severity,
        files: [],
        sampleMessage: event.rawText.trim(),
      };
      groups.set(event.label, group);
    }

    group.count++;
    group.files.push(event.sourceFile);

    if (event.timestamp) {
      // ISO-8601 UTC strings order lexicographically
      if (!group.firstSeen || event.timestamp < group.firstSeen) {
        group.firstSeen = event.timestamp;
      }
      if (!group.lastSeen || event.timestamp > group.lastSeen) {
        group.lastSeen = event.timestamp;
      }
    }
  }

  const summary = Array.from(groups.values())
    .map((group): SummaryRecord => {
      const record: SummaryRecord = {
        label: group.label,
        count: group.count,
        percentage: (100 * group.count) / total,
        files: uniqueSorted(group.files),
        sampleMessage: group.sampleMessage,
      };
      if (group.severity) record.severity = group.severity;
      if (group.firstSeen) record.firstSeen = group.firstSeen;
      if (group.lastSeen) record.lastSeen = group.lastSeen;
      return record;
    })
    .sort(compareSummaryRecords);

  return { detailed, summary };
}

/**
 * Occurrences per (label, source file), sorted by label then file
 */
export function breakdownByFile(events: readonly MatchEvent[]): FileBreakdownRecord[] {
  const counts = new Map<string, FileBreakdownRecord>();

  for (const event of events) {
    const key = `${event.label}\u0000${event.sourceFile}`;
    const existing = counts.get(key);
    if (existing) {
      existing.count++;
    } else {
      counts.set(key, { label: event.label, sourceFile: event.sourceFile, count: 1 });
    }
  }

  return Array.from(counts.values()).sort(
    (a, b) => compareStrings(a.label, b.label) || compareStrings(a.sourceFile, b.sourceFile)
  );
}
