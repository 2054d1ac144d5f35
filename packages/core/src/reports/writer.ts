import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import type { CategorizationResult } from "@log-categorizer/shared";
import { renderDetailedCsv, renderSummaryCsv } from "./csv.js";
import { renderJsonSummary } from "./json.js";
import { renderMarkdownSummary } from "./markdown.js";

export interface WriteReportsOptions {
  outputDir: string;
  /** Prefix for every report file (default: "logs") */
  basename?: string;
  exportJson?: boolean;
}

export interface ReportPaths {
  detailedCsv: string;
  summaryCsv: string;
  markdown: string;
  json?: string;
}

/**
 * Write the CSV, Markdown and optional JSON reports for a run
 */
export async function writeReports(
  result: CategorizationResult,
  options: WriteReportsOptions
): Promise<ReportPaths> {
  const prefix = options.basename ?? "logs";
  await mkdir(options.outputDir, { recursive: true });

  const paths: ReportPaths = {
    detailedCsv: join(options.outputDir, `${prefix}_errors_detailed.csv`),
    summaryCsv: join(options.outputDir, `${prefix}_errors_summary.csv`),
    markdown: join(options.outputDir, `${prefix}_SUMMARY_REPORT.md`),
  };

  await writeFile(paths.detailedCsv, renderDetailedCsv(result.detailed), "utf-8");
  await writeFile(paths.summaryCsv, renderSummaryCsv(result.summary), "utf-8");
  await writeFile(
    paths.markdown,
    renderMarkdownSummary(result.summary, { skipped: result.skipped }),
    "utf-8"
  );

  if (options.exportJson) {
    paths.json = join(options.outputDir, `${prefix}_summary.json`);
    await writeFile(paths.json, renderJsonSummary(result), "utf-8");
  }

  return paths;
}
