import type {
  CategorizationResult,
  FileBreakdownRecord,
  ScanFailure,
  SummaryRow,
} from "@log-categorizer/shared";
import { toSummaryRow } from "./csv.js";

export interface JsonSummary {
  generatedAt: string;
  totals: {
    categories: number;
    occurrences: number;
    filesScanned: number;
  };
  summary: SummaryRow[];
  breakdown: FileBreakdownRecord[];
  skipped: ScanFailure[];
}

export function buildJsonSummary(result: CategorizationResult, generatedAt: Date = new Date()): JsonSummary {
  return {
    generatedAt: generatedAt.toISOString(),
    totals: {
      categories: result.summary.length,
      occurrences: result.detailed.length,
      filesScanned: result.filesScanned,
    },
    summary: result.summary.map(toSummaryRow),
    breakdown: result.breakdown,
    skipped: result.skipped,
  };
}

export function renderJsonSummary(result: CategorizationResult, generatedAt?: Date): string {
  return JSON.stringify(buildJsonSummary(result, generatedAt), null, 2) + "\n";
}
