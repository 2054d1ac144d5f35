#!/usr/bin/env node

import { ConfigError, RuleSetError, SummarizerError, logError } from "@log-categorizer/shared";
import type { CategorizationProgress } from "@log-categorizer/shared";
import { parseCliArgs } from "./cli-options.js";
import type { CliOptions } from "./cli-options.js";
import { runCategorize, runCharts, runRules, runSummarize } from "./commands.js";
import { loadConfigFromEnvironment } from "./config.js";

function printUsage() {
  console.log(`
Log Categorizer - rule-based error categorization for text logs

Usage:
  log-categorizer [categorize] -i <path> [-i <path>...] -o <dir> [options]
  log-categorizer charts --summary <csv> --out <dir> [--top <n>]
  log-categorizer summarize <input.md> [-o <output.md>] [--model <id>]
  log-categorizer rules [--rules <file>] [--no-builtin]

Categorize options:
  -i, --input <path>    Log file or directory (.txt files, recursive); repeatable
  -o, --output <dir>    Directory for the reports
  -b, --basename <name> Prefix for report file names (default: logs)
  --export-json         Also write <basename>_summary.json
  --rules <file>        JSON rule file, evaluated before the built-in rules
  --no-builtin          Use only the rules from --rules
  --concurrency <n>     Files scanned in parallel (default: 4)
  --charts              Render SVG charts into <output>/charts
  --top <n>             Categories shown in charts (default: 12)
  --summarize           Send the Markdown summary for AI analysis
  --model <id>          Model used for AI analysis (default: gpt-4o)
  --help                Show this help message

Examples:
  # Categorize a directory of logs
  log-categorizer -i ./logs -o ./reports

  # Custom rules only, with charts and JSON
  log-categorizer -i ./logs -o ./reports --rules rules.json --no-builtin --charts --export-json

  # Charts from an earlier run
  log-categorizer charts --summary reports/logs_errors_summary.csv --out reports/charts

Environment:
  GITHUB_TOKEN is required for AI analysis.
`);
}

function printProgress(progress: CategorizationProgress) {
  const progressBar = createProgressBar(progress.progress);
  process.stdout.write(`\r${progressBar} ${progress.message.padEnd(50)}`);
  if (progress.stage === "complete") {
    console.log();
  }
}

function createProgressBar(percent: number): string {
  const width = 30;
  const filled = Math.round((percent / 100) * width);
  const empty = width - filled;
  return `[${"█".repeat(filled)}${"░".repeat(empty)}] ${percent.toString().padStart(3)}%`;
}

async function main(): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    printUsage();
    return 1;
  }

  if (options.command === "help") {
    printUsage();
    return 0;
  }

  try {
    const config = loadConfigFromEnvironment();
    const context = { config, onProgress: printProgress };

    switch (options.command) {
      case "categorize":
        console.log(`\nCategorizing ${options.inputs.length} input(s)...`);
        options.inputs.forEach((input) => console.log(`  • ${input}`));
        console.log();
        return await runCategorize(options, context);
      case "charts":
        return await runCharts(options, context);
      case "summarize":
        return await runSummarize(options, context);
      case "rules":
        return await runRules(options);
    }
  } catch (error) {
    if (error instanceof RuleSetError || error instanceof ConfigError) {
      console.error(`\n${error.message}`);
    } else if (error instanceof SummarizerError) {
      console.error(`\nAI analysis failed (${error.kind}): ${error.message}`);
    } else {
      logError("\nError during categorization", error);
    }
    return 1;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logError("Fatal error", error);
    process.exitCode = 1;
  });
