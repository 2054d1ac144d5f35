import { basename } from "path";
import { escapeMarkdownCell } from "@log-categorizer/shared";
import type { ScanFailure, SummaryRecord } from "@log-categorizer/shared";

export interface MarkdownSummaryOptions {
  title?: string;
  skipped?: readonly ScanFailure[];
}

function cell(value: string | undefined): string {
  return value ? escapeMarkdownCell(value) : "-";
}

/**
 * Render the summary table as a Markdown report
 */
export function renderMarkdownSummary(
  summary: readonly SummaryRecord[],
  options: MarkdownSummaryOptions = {}
): string {
  const total = summary.reduce((sum, record) => sum + record.count, 0);
  const lines: string[] = [];

  lines.push(`# ${options.title ?? "Error Summary"}`, "");
  lines.push(`- Total error categories: **${summary.length}**`);
  lines.push(`- Total occurrences: **${total}**`);
  lines.push("");

  if (summary.length === 0) {
    lines.push("> No errors matched.");
  } else {
    lines.push("| Error | Occurrences | % | Severity | First seen | Last seen | Files |");
    lines.push("|---|---:|---:|---|---|---|---|");
    for (const record of summary) {
      const files = record.files.map((file) => basename(file)).join(", ");
      lines.push(
        `| ${cell(record.label)} | ${record.count} | ${record.percentage.toFixed(2)} | ${cell(record.severity)} | ${cell(record.firstSeen)} | ${cell(record.lastSeen)} | ${cell(files)} |`
      );
    }
  }

  const skipped = options.skipped ?? [];
  if (skipped.length > 0) {
    lines.push("", "## Skipped files", "");
    for (const failure of skipped) {
      lines.push(`- ${escapeMarkdownCell(failure.sourceFile)} (${failure.kind}): ${escapeMarkdownCell(failure.reason)}`);
    }
  }

  return lines.join("\n") + "\n";
}
