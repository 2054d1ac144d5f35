import { EventEmitter } from "events";
import type {
  CategorizationProgress,
  CategorizationResult,
  ScanFailure,
} from "@log-categorizer/shared";
import { aggregate, breakdownByFile } from "./aggregator.js";
import { collectInputFiles } from "./input.js";
import { compareStrings, uniqueSorted } from "./ordering.js";
import type { PatternRuleSet } from "./rules.js";
import { scanBuffer, scanFile } from "./scanner.js";
import type { ScanOutcome } from "./scanner.js";

/** Default number of files scanned concurrently */
export const DEFAULT_CONCURRENCY = 4;

/**
 * Options for the LogCategorizer
 */
export interface LogCategorizerOptions {
  /** Rules applied to every line, in priority order */
  ruleSet: PatternRuleSet;
  /** Number of files scanned in parallel (default: 4) */
  concurrency?: number;
}

export interface LogBuffer {
  buffer: Uint8Array;
  filename: string;
}

/**
 * Process items in parallel with a concurrency limit.
 * Results keep the position of their input regardless of completion order.
 */
export async function parallelMap<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  concurrency: number
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let currentIndex = 0;

  const workers = Array.from({ length: Math.min(Math.max(1, concurrency), items.length) }, async () => {
    while (currentIndex < items.length) {
      const index = currentIndex++;
      results[index] = await fn(items[index], index);
    }
  });

  await Promise.all(workers);
  return results;
}

function sortFailures(failures: ScanFailure[]): ScanFailure[] {
  return [...failures].sort((a, b) => compareStrings(a.sourceFile, b.sourceFile));
}

/**
 * Scans log files against a rule set and aggregates the matches
 */
export class LogCategorizer extends EventEmitter {
  private readonly ruleSet: PatternRuleSet;
  private readonly concurrency: number;

  constructor(options: LogCategorizerOptions) {
    super();
    this.ruleSet = options.ruleSet;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  }

  /**
   * Emit a progress update
   */
  private emitProgress(progress: CategorizationProgress): void {
    this.emit("progress", progress);
  }

  /**
   * Categorize files and directories given on the command line
   */
  async categorizePaths(inputs: readonly string[]): Promise<CategorizationResult> {
    const { files, missing } = await collectInputFiles(inputs);
    const result = await this.categorizeFiles(files);
    return { ...result, skipped: sortFailures([...missing, ...result.skipped]) };
  }

  /**
   * Categorize an explicit list of files. Files are scanned in parallel,
   * then merged in path order.
   */
  async categorizeFiles(filePaths: readonly string[]): Promise<CategorizationResult> {
    const ordered = uniqueSorted(filePaths);
    let completed = 0;

    this.emitProgress({
      stage: "scanning",
      progress: 0,
      message: `Scanning ${ordered.length} file(s)...`,
      filesDone: 0,
      totalFiles: ordered.length,
    });

    const outcomes = await parallelMap(
      ordered,
      async (filePath) => {
        const outcome = await scanFile(filePath, this.ruleSet);
        completed++;

        this.emitProgress({
          stage: "scanning",
          progress: Math.round((completed / ordered.length) * 90),
          message: `Scanned ${completed} of ${ordered.length} file(s)`,
          filesDone: completed,
          totalFiles: ordered.length,
        });

        return outcome;
      },
      this.concurrency
    );

    return this.finish(outcomes);
  }

  /**
   * Categorize in-memory files, ordered by filename
   */
  async categorizeBuffers(files: readonly LogBuffer[]): Promise<CategorizationResult> {
    const ordered = [...files].sort((a, b) => compareStrings(a.filename, b.filename));

    this.emitProgress({
      stage: "scanning",
      progress: 0,
      message: `Scanning ${ordered.length} file(s)...`,
      filesDone: 0,
      totalFiles: ordered.length,
    });

    const outcomes = ordered.map((file) => scanBuffer(file.buffer, file.filename, this.ruleSet));
    return this.finish(outcomes);
  }

  private finish(outcomes: ScanOutcome[]): CategorizationResult {
    this.emitProgress({
      stage: "aggregating",
      progress: 95,
      message: "Aggregating matches...",
    });

    const skipped: ScanFailure[] = [];
    for (const outcome of outcomes) {
      if (outcome.failure) {
        skipped.push(outcome.failure);
      }
    }

    const events = outcomes.flatMap((outcome) => outcome.events);
    const { detailed, summary } = aggregate(events);

    this.emitProgress({
      stage: "complete",
      progress: 100,
      message: `Found ${detailed.length} error line(s) in ${summary.length} categor${summary.length === 1 ? "y" : "ies"}`,
    });

    return {
      detailed,
      summary,
      breakdown: breakdownByFile(detailed),
      skipped: sortFailures(skipped),
      filesScanned: outcomes.length - skipped.length,
    };
  }
}
