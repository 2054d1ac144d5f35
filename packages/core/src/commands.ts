import { readFile, writeFile } from "fs/promises";
import { join } from "path";
import { logInfo, logWarn } from "@log-categorizer/shared";
import type { CategorizationProgress, CategorizationResult, RuleDefinition } from "@log-categorizer/shared";
import { defaultAnalysisPath, summarizeMarkdown } from "./ai-summarizer.js";
import type { SummarizeFn } from "./ai-summarizer.js";
import { LogCategorizer } from "./categorizer.js";
import { parseSummaryCsv, writeCharts } from "./charts.js";
import type { CategorizeOptions, ChartsOptions, RulesOptions, SummarizeOptions } from "./cli-options.js";
import type { Config } from "./config.js";
import { writeReports } from "./reports/writer.js";
import { buildRuleSet, loadRuleFile } from "./rules.js";
import type { PatternRuleSet } from "./rules.js";

export interface CommandContext {
  config: Config;
  /** Overrides the Copilot-backed summarizer */
  summarize?: SummarizeFn;
  onProgress?: (progress: CategorizationProgress) => void;
}

function summarizerFor(context: CommandContext, model?: string): SummarizeFn {
  if (context.summarize) {
    return context.summarize;
  }
  const { config } = context;
  return (markdown) =>
    summarizeMarkdown(markdown, {
      credential: config.githubToken,
      model: model ?? config.aiModel,
      timeoutMs: config.aiTimeoutMs,
    });
}

async function loadRuleSet(rulesFile: string | undefined, includeBuiltIn: boolean): Promise<PatternRuleSet> {
  const userRules = rulesFile ? await loadRuleFile(rulesFile) : [];
  return buildRuleSet({ userRules, includeBuiltIn });
}

function reportSkipped(result: CategorizationResult): void {
  for (const failure of result.skipped) {
    logWarn(`Skipped ${failure.sourceFile} (${failure.kind}): ${failure.reason}`);
  }
}

/**
 * Scan the inputs and write every report
 * @returns process exit code
 */
export async function runCategorize(options: CategorizeOptions, context: CommandContext): Promise<number> {
  const ruleSet = await loadRuleSet(options.rulesFile, options.includeBuiltIn);
  const categorizer = new LogCategorizer({
    ruleSet,
    concurrency: options.concurrency ?? context.config.scanConcurrency,
  });
  if (context.onProgress) {
    categorizer.on("progress", context.onProgress);
  }

  const result = await categorizer.categorizePaths(options.inputs);
  const paths = await writeReports(result, {
    outputDir: options.outputDir,
    basename: options.basename,
    exportJson: options.exportJson,
  });

  if (result.filesScanned === 0 && result.skipped.length === 0) {
    logWarn("No .txt files found in the given inputs");
  }
  reportSkipped(result);

  const occurrences = result.summary.reduce((sum, record) => sum + record.count, 0);
  console.log(`\n[OK] ${result.filesScanned} file(s) scanned, ${occurrences} error line(s) categorized`);
  console.log(`  • Detailed: ${paths.detailedCsv}`);
  console.log(`  • Summary:  ${paths.summaryCsv}`);
  console.log(`  • Markdown: ${paths.markdown}`);
  if (paths.json) {
    console.log(`  • JSON:     ${paths.json}`);
  }

  if (options.charts) {
    const chartDir = join(options.outputDir, "charts");
    const written = await writeCharts(result.summary, chartDir, options.top ?? context.config.chartTop);
    console.log(`[OK] ${written.length} chart(s) written to ${chartDir}`);
  }

  if (options.summarize) {
    const markdown = await readFile(paths.markdown, "utf-8");
    const analysis = await summarizerFor(context, options.model)(markdown);
    const analysisPath = defaultAnalysisPath(paths.markdown);
    await writeFile(analysisPath, `${analysis}\n`, "utf-8");
    console.log(`[OK] AI analysis written to ${analysisPath}`);
  }

  return 0;
}

/**
 * Render charts from a summary CSV written by an earlier run
 * @returns 2 when the CSV holds no usable rows
 */
export async function runCharts(options: ChartsOptions, context: CommandContext): Promise<number> {
  const rows = parseSummaryCsv(await readFile(options.summaryCsv, "utf-8"));
  if (rows.length === 0) {
    console.error(`No chartable rows in ${options.summaryCsv}`);
    return 2;
  }

  const written = await writeCharts(rows, options.outputDir, options.top ?? context.config.chartTop);
  written.forEach((path) => console.log(`[OK] ${path}`));
  return 0;
}

/**
 * Send a Markdown summary to the AI summarizer and save its analysis
 */
export async function runSummarize(options: SummarizeOptions, context: CommandContext): Promise<number> {
  const markdown = await readFile(options.inputMarkdown, "utf-8");
  logInfo(`Sending ${options.inputMarkdown} for analysis...`);

  const analysis = await summarizerFor(context, options.model)(markdown);
  const outputPath = options.output ?? defaultAnalysisPath(options.inputMarkdown);
  await writeFile(outputPath, `${analysis}\n`, "utf-8");

  console.log(`[OK] AI analysis written to ${outputPath}`);
  return 0;
}

export function describeRule(rule: RuleDefinition): string {
  const matcher =
    rule.matcher.type === "regex" ? `regex ${rule.matcher.pattern}` : `${rule.matcher.type} ${rule.matcher.value}`;
  return `${rule.label} [${rule.severity ?? "-"}] ${matcher}`;
}

/**
 * List the effective rule set in priority order
 */
export async function runRules(options: RulesOptions): Promise<number> {
  const ruleSet = await loadRuleSet(options.rulesFile, options.includeBuiltIn);
  ruleSet.rules.forEach((rule, idx) => console.log(`${idx + 1}. ${describeRule(rule)}`));
  console.log(`\n${ruleSet.size} rule(s)`);
  return 0;
}
