import { readFile } from "fs/promises";
import { z } from "zod";
import { RuleSetError } from "@log-categorizer/shared";
import type { Classification, Matcher, RuleDefinition } from "@log-categorizer/shared";
import { BUILT_IN_RULES } from "./builtin-rules.js";

const severitySchema = z.enum(["Low", "Medium", "High"]);

const matcherSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("contains"), value: z.string() }),
  z.object({ type: z.literal("prefix"), value: z.string() }),
  z.object({ type: z.literal("regex"), pattern: z.string() }),
]);

export const ruleDefinitionSchema = z.object({
  label: z.string(),
  matcher: matcherSchema,
  severity: severitySchema.optional(),
});

const ruleFileSchema = z.union([
  z.array(z.unknown()),
  z.object({ rules: z.array(z.unknown()) }),
]);

interface CompiledRule {
  definition: RuleDefinition;
  test: (line: string) => boolean;
}

function compileMatcher(matcher: Matcher): (line: string) => boolean {
  switch (matcher.type) {
    case "contains": {
      const value = matcher.value;
      return (line) => line.includes(value);
    }
    case "prefix": {
      const value = matcher.value;
      return (line) => line.startsWith(value);
    }
    case "regex": {
      // No flags: matching stays case-sensitive and stateless
      const regex = new RegExp(matcher.pattern);
      return (line) => regex.test(line);
    }
  }
}

function freezeDefinition(definition: RuleDefinition): RuleDefinition {
  const frozen: RuleDefinition = {
    label: definition.label,
    matcher: Object.freeze({ ...definition.matcher }),
  };
  if (definition.severity) {
    frozen.severity = definition.severity;
  }
  return Object.freeze(frozen);
}

/**
 * Validate one definition, returning its problems (empty when valid)
 */
function checkDefinition(definition: RuleDefinition, name: string): string[] {
  const issues: string[] = [];

  if (definition.label.trim() === "") {
    issues.push(`${name}: label must not be empty`);
  }

  const { matcher } = definition;
  if (matcher.type === "regex") {
    let regex: RegExp | null = null;
    try {
      regex = new RegExp(matcher.pattern);
    } catch (error) {
      issues.push(
        `${name}: invalid regular expression: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    if (regex && regex.test("")) {
      issues.push(`${name}: regular expression matches the empty string`);
    }
  } else if (matcher.value === "") {
    issues.push(`${name}: ${matcher.type} matcher value must not be empty`);
  }

  return issues;
}

/**
 * Ordered, immutable collection of pattern rules. The first matching rule wins.
 */
export class PatternRuleSet {
  private readonly compiled: readonly CompiledRule[];

  /**
   * @throws RuleSetError listing every invalid definition
   */
  constructor(definitions: readonly unknown[]) {
    const issues: string[] = [];
    const compiled: CompiledRule[] = [];
    const labels = new Set<string>();

    definitions.forEach((raw, index) => {
      const parsed = ruleDefinitionSchema.safeParse(raw);
      if (!parsed.success) {
        for (const issue of parsed.error.issues) {
          const path = issue.path.length > 0 ? ` (${issue.path.join(".")})` : "";
          issues.push(`rule #${index + 1}${path}: ${issue.message}`);
        }
        return;
      }

      const definition = parsed.data;
      const name = `rule #${index + 1} "${definition.label}"`;
      const problems = checkDefinition(definition, name);

      if (labels.has(definition.label)) {
        problems.push(`${name}: duplicate label`);
      }
      labels.add(definition.label);

      if (problems.length > 0) {
        issues.push(...problems);
        return;
      }

      const frozen = freezeDefinition(definition);
      compiled.push({ definition: frozen, test: compileMatcher(frozen.matcher) });
    });

    if (issues.length > 0) {
      throw new RuleSetError(issues);
    }

    this.compiled = Object.freeze(compiled);
  }

  get size(): number {
    return this.compiled.length;
  }

  /**
   * Rule definitions in priority order
   */
  get rules(): RuleDefinition[] {
    return this.compiled.map((rule) => rule.definition);
  }

  /**
   * Classify a single line against the rules in priority order
   * @returns the first matching rule's label and severity, or undefined
   */
  classify(line: string): Classification | undefined {
    for (const rule of this.compiled) {
      if (rule.test(line)) {
        const { label, severity } = rule.definition;
        return severity ? { label, severity } : { label };
      }
    }
    return undefined;
  }
}

export function createRuleSet(definitions: readonly unknown[]): PatternRuleSet {
  return new PatternRuleSet(definitions);
}

export interface BuildRuleSetOptions {
  /** User rules, evaluated before the built-in rules */
  userRules?: readonly unknown[];
  /** Include the built-in rules (default: true) */
  includeBuiltIn?: boolean;
}

/**
 * Combine user-supplied and built-in rules into one validated set
 */
export function buildRuleSet(options: BuildRuleSetOptions = {}): PatternRuleSet {
  const includeBuiltIn = options.includeBuiltIn ?? true;
  return createRuleSet([...(options.userRules ?? []), ...(includeBuiltIn ? BUILT_IN_RULES : [])]);
}

/**
 * Parse rule file content: either an array of rules or `{ "rules": [...] }`
 * @param source Name used in error messages
 */
export function parseRuleFileContent(content: string, source: string): unknown[] {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new RuleSetError([
      `${source}: invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }

  const parsed = ruleFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new RuleSetError([`${source}: expected an array of rules or an object with a "rules" array`]);
  }

  return Array.isArray(parsed.data) ? parsed.data : parsed.data.rules;
}

/**
 * Read a user rule file from disk
 */
export async function loadRuleFile(path: string): Promise<unknown[]> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    throw new RuleSetError([
      `${path}: cannot read rule file: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }
  return parseRuleFileContent(content, path);
}
