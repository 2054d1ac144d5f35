import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createRuleSet } from "./rules.js";
import { decodeLogBuffer, scanBuffer, scanContent, scanFile, splitLines } from "./scanner.js";

const ruleSet = createRuleSet([
  { label: "DiskFull", matcher: { type: "contains", value: "disk full" }, severity: "High" },
  { label: "Timeout", matcher: { type: "contains", value: "timeout" } },
]);

describe("splitLines", () => {
  it("should split on LF and CRLF", () => {
    expect(splitLines("a\r\nb\nc")).toEqual(["a", "b", "c"]);
  });

  it("should drop the segment after a trailing newline", () => {
    expect(splitLines("a\nb\n")).toEqual(["a", "b"]);
    expect(splitLines("")).toEqual([]);
  });

  it("should keep blank lines in the middle", () => {
    expect(splitLines("a\n\nb")).toEqual(["a", "", "b"]);
  });
});

describe("decodeLogBuffer", () => {
  it("should decode UTF-8 and drop a BOM", () => {
    expect(decodeLogBuffer(Buffer.from("\uFEFFcafé", "utf-8"))).toBe("café");
  });

  it("should reject invalid UTF-8", () => {
    expect(() => decodeLogBuffer(Buffer.from([0x61, 0xff, 0x62]))).toThrow("content is not valid UTF-8");
  });

  it("should reject binary content", () => {
    expect(() => decodeLogBuffer(Buffer.from([0x61, 0x00, 0x62]))).toThrow("binary content (NUL byte found)");
  });
});

describe("scanContent", () => {
  it("should emit one event per matching line with 1-based line numbers", () => {
    const events = scanContent("ok\n2024-01-01 disk full\ntimeout on session id 7\n", "app.txt", ruleSet);
    expect(events).toEqual([
      {
        label: "DiskFull",
        sourceFile: "app.txt",
        lineNumber: 2,
        rawText: "2024-01-01 disk full",
        severity: "High",
        timestamp: "2024-01-01T00:00:00.000Z",
      },
      {
        label: "Timeout",
        sourceFile: "app.txt",
        lineNumber: 3,
        rawText: "timeout on session id 7",
        sessionId: "7",
      },
    ]);
  });

  it("should keep the raw text including surrounding whitespace", () => {
    const [event] = scanContent("  disk full  \r\n", "a.txt", ruleSet);
    expect(event.rawText).toBe("  disk full  ");
  });

  it("should return nothing for empty content", () => {
    expect(scanContent("", "a.txt", ruleSet)).toEqual([]);
  });
});

describe("scanBuffer", () => {
  it("should report undecodable content as a failure", () => {
    const outcome = scanBuffer(Buffer.from([0xc3, 0x28]), "bad.txt", ruleSet);
    expect(outcome.events).toEqual([]);
    expect(outcome.failure).toEqual({
      sourceFile: "bad.txt",
      kind: "undecodable",
      reason: "content is not valid UTF-8",
    });
  });
});

describe("scanFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "scanner-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should scan a file from disk", async () => {
    const path = join(dir, "a.txt");
    await writeFile(path, "disk full\n");
    const outcome = await scanFile(path, ruleSet);
    expect(outcome.failure).toBeUndefined();
    expect(outcome.events.map((event) => event.label)).toEqual(["DiskFull"]);
  });

  it("should report a missing file as not-found", async () => {
    const path = join(dir, "missing.txt");
    const outcome = await scanFile(path, ruleSet);
    expect(outcome.events).toEqual([]);
    expect(outcome.failure?.kind).toBe("not-found");
    expect(outcome.failure?.sourceFile).toBe(path);
  });

  it("should report a directory as unreadable", async () => {
    const outcome = await scanFile(dir, ruleSet);
    expect(outcome.failure?.kind).toBe("unreadable");
  });
});
