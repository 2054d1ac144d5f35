export { aggregate, breakdownByFile, compareSummaryRecords } from "./aggregator.js";
export {
  AiSummarizer,
  buildSummaryPrompt,
  classifySummarizerFailure,
  defaultAnalysisPath,
  summarizeMarkdown,
} from "./ai-summarizer.js";
export type { AiSummarizerOptions, SummarizeFn } from "./ai-summarizer.js";
export { BUILT_IN_RULES } from "./builtin-rules.js";
export { DEFAULT_CONCURRENCY, LogCategorizer, parallelMap } from "./categorizer.js";
export type { LogBuffer, LogCategorizerOptions } from "./categorizer.js";
export {
  DEFAULT_TOP,
  paretoSeries,
  parseSummaryCsv,
  pieSlices,
  renderBarChart,
  renderHorizontalBarChart,
  renderParetoChart,
  renderPieChart,
  renderSeverityChart,
  selectTop,
  severityTotals,
  writeCharts,
} from "./charts.js";
export type { ChartRow, ParetoPoint, PieSlice, SeverityTotal } from "./charts.js";
export { loadConfig, loadConfigFromEnvironment } from "./config.js";
export type { Config } from "./config.js";
export { collectInputFiles } from "./input.js";
export type { InputFiles } from "./input.js";
export {
  buildRuleSet,
  createRuleSet,
  loadRuleFile,
  parseRuleFileContent,
  PatternRuleSet,
  ruleDefinitionSchema,
} from "./rules.js";
export type { BuildRuleSetOptions } from "./rules.js";
export { decodeLogBuffer, scanBuffer, scanContent, scanFile, splitLines } from "./scanner.js";
export type { ScanOutcome } from "./scanner.js";
export { extractSessionId, extractSessionUuid, extractTimestamp } from "./timestamp.js";
export {
  DETAILED_COLUMNS,
  SUMMARY_COLUMNS,
  escapeCsvField,
  formatCsv,
  parseCsv,
  renderDetailedCsv,
  renderSummaryCsv,
  toDetailedRow,
  toSummaryRow,
} from "./reports/csv.js";
export { buildJsonSummary, renderJsonSummary } from "./reports/json.js";
export type { JsonSummary } from "./reports/json.js";
export { renderMarkdownSummary } from "./reports/markdown.js";
export type { MarkdownSummaryOptions } from "./reports/markdown.js";
export { writeReports } from "./reports/writer.js";
export type { ReportPaths, WriteReportsOptions } from "./reports/writer.js";
