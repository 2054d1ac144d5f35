import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { RuleSetError } from "@log-categorizer/shared";
import { BUILT_IN_RULES } from "./builtin-rules.js";
import { buildRuleSet, createRuleSet, loadRuleFile, parseRuleFileContent } from "./rules.js";

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof RuleSetError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error("expected a RuleSetError");
}

describe("PatternRuleSet", () => {
  const ruleSet = createRuleSet([
    { label: "DiskFull", matcher: { type: "contains", value: "disk full" }, severity: "High" },
    { label: "Timeout", matcher: { type: "regex", pattern: "timed out after \\d+" } },
    { label: "Fatal", matcher: { type: "prefix", value: "FATAL" }, severity: "High" },
  ]);

  it("should classify with the first matching rule", () => {
    expect(ruleSet.classify("disk full and timed out after 30")).toEqual({ label: "DiskFull", severity: "High" });
    expect(ruleSet.classify("request timed out after 30s")).toEqual({ label: "Timeout" });
  });

  it("should return undefined when no rule matches", () => {
    expect(ruleSet.classify("all good")).toBeUndefined();
    expect(ruleSet.classify("")).toBeUndefined();
  });

  it("should match case-sensitively", () => {
    expect(ruleSet.classify("DISK FULL")).toBeUndefined();
    expect(ruleSet.classify("Request Timed Out after 3")).toBeUndefined();
  });

  it("should anchor prefix matchers at the start of the line", () => {
    expect(ruleSet.classify("FATAL: boom")).toEqual({ label: "Fatal", severity: "High" });
    expect(ruleSet.classify("  FATAL: boom")).toBeUndefined();
  });

  it("should expose rules in priority order", () => {
    expect(ruleSet.size).toBe(3);
    expect(ruleSet.rules.map((rule) => rule.label)).toEqual(["DiskFull", "Timeout", "Fatal"]);
  });

  it("should not be affected by later changes to the input definitions", () => {
    const definition = { label: "A", matcher: { type: "contains", value: "a" } };
    const set = createRuleSet([definition]);
    definition.label = "B";
    expect(set.classify("a")).toEqual({ label: "A" });
  });

  it("should accept an empty rule list", () => {
    const empty = createRuleSet([]);
    expect(empty.size).toBe(0);
    expect(empty.classify("anything")).toBeUndefined();
  });

  it("should reject an empty label", () => {
    expect(issuesOf(() => createRuleSet([{ label: " ", matcher: { type: "contains", value: "x" } }]))).toEqual([
      'rule #1 " ": label must not be empty',
    ]);
  });

  it("should reject duplicate labels", () => {
    expect(
      issuesOf(() =>
        createRuleSet([
          { label: "A", matcher: { type: "contains", value: "x" } },
          { label: "A", matcher: { type: "contains", value: "y" } },
        ])
      )
    ).toEqual(['rule #2 "A": duplicate label']);
  });

  it("should reject an invalid regular expression", () => {
    const issues = issuesOf(() => createRuleSet([{ label: "Bad", matcher: { type: "regex", pattern: "(unclosed" } }]));
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^rule #1 "Bad": invalid regular expression: /);
  });

  it("should reject a regular expression that matches the empty string", () => {
    expect(issuesOf(() => createRuleSet([{ label: "Any", matcher: { type: "regex", pattern: "x*" } }]))).toEqual([
      'rule #1 "Any": regular expression matches the empty string',
    ]);
  });

  it("should reject an empty literal", () => {
    expect(issuesOf(() => createRuleSet([{ label: "Empty", matcher: { type: "prefix", value: "" } }]))).toHaveLength(1);
  });

  it("should reject definitions with the wrong shape", () => {
    const issues = issuesOf(() => createRuleSet([{ label: "X", matcher: { type: "glob", value: "*" } }]));
    expect(issues.length).toBeGreaterThan(0);
    expect(issues[0]).toMatch(/^rule #1 \(matcher\.type\): /);
  });

  it("should report every invalid rule at once", () => {
    const issues = issuesOf(() =>
      createRuleSet([
        { label: "", matcher: { type: "contains", value: "x" } },
        { label: "Ok", matcher: { type: "contains", value: "ok" } },
        { label: "Re", matcher: { type: "regex", pattern: "[" } },
      ])
    );
    expect(issues).toHaveLength(2);
  });
});

describe("buildRuleSet", () => {
  it("should include the built-in rules by default", () => {
    const ruleSet = buildRuleSet();
    expect(ruleSet.size).toBe(BUILT_IN_RULES.length);
    expect(ruleSet.classify("HTTP response code: 403")).toEqual({ label: "Proxy403", severity: "Medium" });
  });

  it("should evaluate user rules before the built-in ones", () => {
    const ruleSet = buildRuleSet({
      userRules: [{ label: "Mine", matcher: { type: "contains", value: "Forbidden" } }],
    });
    expect(ruleSet.rules[0].label).toBe("Mine");
    expect(ruleSet.classify("403 Forbidden")).toEqual({ label: "Mine" });
  });

  it("should drop the built-in rules on request", () => {
    const ruleSet = buildRuleSet({ userRules: [], includeBuiltIn: false });
    expect(ruleSet.size).toBe(0);
  });

  it("should reject a user label that collides with a built-in label", () => {
    expect(() =>
      buildRuleSet({ userRules: [{ label: "TunnelError", matcher: { type: "contains", value: "x" } }] })
    ).toThrow(RuleSetError);
  });
});

describe("built-in rules", () => {
  const ruleSet = buildRuleSet();

  it.each([
    ["nsUtils::Query err: 5", "NetworkError"],
    ["CTunnelMgr::Open No tunnel found for id 7", "TunnelError"],
    ["Access Forbidden by proxy", "Proxy403"],
    ["Failed to finalize record for session", "RecordingCorrupted"],
    ["Duplicated session was deleted", "PSM_DuplicateSession"],
    ["Vault session abc does not exist", "PSM_VaultIssues"],
    ["TSSession logoff event received", "PSM_ListenerLogoff"],
    ["InternalConnectionClient has stopped", "PSM_InternalConn"],
    ["Ticket ID was not found", "Auth_TicketMissing"],
  ])("should classify %j as %s", (line, label) => {
    expect(ruleSet.classify(line)?.label).toBe(label);
  });
});

describe("rule files", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "rules-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should accept a bare array or a rules object", () => {
    const rule = { label: "A", matcher: { type: "contains", value: "a" } };
    expect(parseRuleFileContent(JSON.stringify([rule]), "rules.json")).toEqual([rule]);
    expect(parseRuleFileContent(JSON.stringify({ rules: [rule] }), "rules.json")).toEqual([rule]);
  });

  it("should reject malformed JSON", () => {
    const issues = issuesOf(() => parseRuleFileContent("{nope", "rules.json"));
    expect(issues[0]).toMatch(/^rules\.json: invalid JSON: /);
  });

  it("should reject a document of the wrong shape", () => {
    expect(issuesOf(() => parseRuleFileContent('{"label":"A"}', "rules.json"))).toEqual([
      'rules.json: expected an array of rules or an object with a "rules" array',
    ]);
  });

  it("should load rules from disk", async () => {
    const path = join(dir, "rules.json");
    await writeFile(path, JSON.stringify({ rules: [{ label: "A", matcher: { type: "prefix", value: "A:" } }] }));
    const rules = await loadRuleFile(path);
    expect(buildRuleSet({ userRules: rules, includeBuiltIn: false }).classify("A: x")).toEqual({ label: "A" });
  });

  it("should raise a RuleSetError for a missing file", async () => {
    await expect(loadRuleFile(join(dir, "missing.json"))).rejects.toBeInstanceOf(RuleSetError);
  });
});
