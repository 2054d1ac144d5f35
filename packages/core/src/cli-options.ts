import { resolve } from "path";

export interface CategorizeOptions {
  command: "categorize";
  inputs: string[];
  outputDir: string;
  basename: string;
  exportJson: boolean;
  rulesFile?: string;
  includeBuiltIn: boolean;
  concurrency?: number;
  charts: boolean;
  top?: number;
  summarize: boolean;
  model?: string;
}

export interface ChartsOptions {
  command: "charts";
  summaryCsv: string;
  outputDir: string;
  top?: number;
}

export interface SummarizeOptions {
  command: "summarize";
  inputMarkdown: string;
  output?: string;
  model?: string;
}

export interface RulesOptions {
  command: "rules";
  rulesFile?: string;
  includeBuiltIn: boolean;
}

export type CliOptions =
  | { command: "help" }
  | CategorizeOptions
  | ChartsOptions
  | SummarizeOptions
  | RulesOptions;

const COMMANDS = ["categorize", "charts", "summarize", "rules"] as const;
type CommandName = (typeof COMMANDS)[number];

function isCommand(value: string | undefined): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

function requireValue(args: readonly string[], index: number, flag: string, what: string): string {
  const value = args[index];
  if (!value || value.startsWith("-")) {
    throw new Error(`${flag} requires ${what}`);
  }
  return value;
}

function positiveInt(value: string, flag: string): number {
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new Error(`${flag} must be a positive integer`);
  }
  return Number(value);
}

/**
 * Parse command-line arguments (without the node and script entries)
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  if (argv.includes("--help") || argv.includes("-h")) {
    return { command: "help" };
  }

  const first = argv[0];
  const command: CommandName = isCommand(first) ? first : "categorize";
  const args = isCommand(first) ? argv.slice(1) : argv;

  const inputs: string[] = [];
  const positionals: string[] = [];
  let outputDir: string | undefined;
  let summaryCsv: string | undefined;
  let basename = "logs";
  let exportJson = false;
  let rulesFile: string | undefined;
  let includeBuiltIn = true;
  let concurrency: number | undefined;
  let charts = false;
  let top: number | undefined;
  let summarize = false;
  let model: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--input" || arg === "-i") {
      inputs.push(requireValue(args, ++i, arg, "a file or directory"));
    } else if (arg === "--output" || arg === "-o" || arg === "--out") {
      outputDir = requireValue(args, ++i, arg, "a path");
    } else if (arg === "--basename" || arg === "-b") {
      basename = requireValue(args, ++i, arg, "a file name prefix");
    } else if (arg === "--export-json") {
      exportJson = true;
    } else if (arg === "--rules") {
      rulesFile = resolve(requireValue(args, ++i, arg, "a rule file path"));
    } else if (arg === "--no-builtin") {
      includeBuiltIn = false;
    } else if (arg === "--concurrency") {
      concurrency = positiveInt(requireValue(args, ++i, arg, "a number"), arg);
    } else if (arg === "--charts") {
      charts = true;
    } else if (arg === "--top") {
      top = positiveInt(requireValue(args, ++i, arg, "a number"), arg);
    } else if (arg === "--summarize") {
      summarize = true;
    } else if (arg === "--model") {
      model = requireValue(args, ++i, arg, "a model id");
    } else if (arg === "--summary") {
      summaryCsv = resolve(requireValue(args, ++i, arg, "a summary CSV path"));
    } else if (arg.startsWith("-")) {
      throw new Error(`Unknown argument: ${arg}`);
    } else {
      positionals.push(arg);
    }
  }

  switch (command) {
    case "categorize": {
      if (positionals.length > 0) {
        throw new Error(`Unexpected argument: ${positionals[0]}`);
      }
      if (inputs.length === 0) {
        throw new Error("At least one --input is required");
      }
      if (!outputDir) {
        throw new Error("--output is required");
      }
      return {
        command,
        inputs,
        outputDir: resolve(outputDir),
        basename,
        exportJson,
        rulesFile,
        includeBuiltIn,
        concurrency,
        charts,
        top,
        summarize,
        model,
      };
    }
    case "charts": {
      if (!summaryCsv) {
        throw new Error("--summary is required");
      }
      if (!outputDir) {
        throw new Error("--out is required");
      }
      return { command, summaryCsv, outputDir: resolve(outputDir), top };
    }
    case "summarize": {
      if (positionals.length !== 1) {
        throw new Error("summarize takes exactly one Markdown file");
      }
      return {
        command,
        inputMarkdown: resolve(positionals[0]),
        output: outputDir ? resolve(outputDir) : undefined,
        model,
      };
    }
    case "rules":
      return { command, rulesFile, includeBuiltIn };
  }
}
