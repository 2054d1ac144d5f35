import { readdir, stat } from "fs/promises";
import { join, resolve } from "path";
import type { ScanFailure } from "@log-categorizer/shared";
import { compareStrings, uniqueSorted } from "./ordering.js";

/** Extension picked up when walking directories */
const LOG_EXTENSION = ".txt";

export interface InputFiles {
  /** Absolute paths, sorted and de-duplicated */
  files: string[];
  /** Inputs that could not be resolved */
  missing: ScanFailure[];
}

async function walkDirectory(dir: string, files: string[], missing: ScanFailure[]): Promise<void> {
  let entries;
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    missing.push({
      sourceFile: dir,
      kind: "unreadable",
      reason: error instanceof Error ? error.message : String(error),
    });
    return;
  }

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      await walkDirectory(fullPath, files, missing);
    } else if (entry.isFile() && entry.name.endsWith(LOG_EXTENSION)) {
      files.push(fullPath);
    }
  }
}

/**
 * Resolve CLI inputs to log files. Directories are searched recursively
 * for `.txt` files; explicit files are taken whatever their extension.
 */
export async function collectInputFiles(inputs: readonly string[]): Promise<InputFiles> {
  const files: string[] = [];
  const missing: ScanFailure[] = [];

  for (const input of inputs) {
    const path = resolve(input);
    let stats;
    try {
      stats = await stat(path);
    } catch (error) {
      const notFound = error instanceof Error && "code" in error && error.code === "ENOENT";
      missing.push({
        sourceFile: path,
        kind: notFound ? "not-found" : "unreadable",
        reason: notFound ? `Path not found: ${input}` : error instanceof Error ? error.message : String(error),
      });
      continue;
    }

    if (stats.isDirectory()) {
      await walkDirectory(path, files, missing);
    } else {
      files.push(path);
    }
  }

  return {
    files: uniqueSorted(files),
    missing: missing.sort((a, b) => compareStrings(a.sourceFile, b.sourceFile)),
  };
}
