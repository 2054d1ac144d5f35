import { readFile } from "fs/promises";
import { TextDecoder } from "util";
import type { MatchEvent, ScanFailure, ScanFailureKind } from "@log-categorizer/shared";
import type { PatternRuleSet } from "./rules.js";
import { extractSessionId, extractSessionUuid, extractTimestamp } from "./timestamp.js";

/**
 * Result of scanning one file: its events, or the reason it was skipped
 */
export interface ScanOutcome {
  sourceFile: string;
  events: MatchEvent[];
  failure?: ScanFailure;
}

class UndecodableContentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UndecodableContentError";
  }
}

/**
 * Decode log bytes as strict UTF-8. A leading BOM is dropped.
 * @throws UndecodableContentError for invalid UTF-8 or binary (NUL-containing) content
 */
export function decodeLogBuffer(buffer: Uint8Array): string {
  if (buffer.includes(0)) {
    throw new UndecodableContentError("binary content (NUL byte found)");
  }

  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(buffer);
  } catch {
    throw new UndecodableContentError("content is not valid UTF-8");
  }
}

/**
 * Split text into lines, dropping the empty segment after a trailing newline
 */
export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Classify every line of already-decoded text
 */
export function scanContent(text: string, sourceFile: string, ruleSet: PatternRuleSet): MatchEvent[] {
  const events: MatchEvent[] = [];
  const lines = splitLines(text);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const classification = ruleSet.classify(line);
    if (!classification) {
      continue;
    }

    const event: MatchEvent = {
      label: classification.label,
      sourceFile,
      lineNumber: i + 1,
      rawText: line,
    };
    if (classification.severity) event.severity = classification.severity;

    const timestamp = extractTimestamp(line);
    if (timestamp) event.timestamp = timestamp;
    const sessionUuid = extractSessionUuid(line);
    if (sessionUuid) event.sessionUuid = sessionUuid;
    const sessionId = extractSessionId(line);
    if (sessionId) event.sessionId = sessionId;

    events.push(event);
  }

  return events;
}

/**
 * Scan in-memory content (e.g. an uploaded file)
 */
export function scanBuffer(buffer: Uint8Array, sourceFile: string, ruleSet: PatternRuleSet): ScanOutcome {
  let text: string;
  try {
    text = decodeLogBuffer(buffer);
  } catch (error) {
    return failed(sourceFile, "undecodable", error);
  }

  return { sourceFile, events: scanContent(text, sourceFile, ruleSet) };
}

/**
 * Read and scan a file. Missing, unreadable or undecodable files are
 * reported as a failure on the outcome and never throw.
 */
export async function scanFile(filePath: string, ruleSet: PatternRuleSet): Promise<ScanOutcome> {
  let buffer: Buffer;
  try {
    buffer = await readFile(filePath);
  } catch (error) {
    const kind: ScanFailureKind = errorCode(error) === "ENOENT" ? "not-found" : "unreadable";
    return failed(filePath, kind, error);
  }

  return scanBuffer(buffer, filePath, ruleSet);
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function failed(sourceFile: string, kind: ScanFailureKind, error: unknown): ScanOutcome {
  return {
    sourceFile,
    events: [],
    failure: {
      sourceFile,
      kind,
      reason: error instanceof Error ? error.message : String(error),
    },
  };
}
