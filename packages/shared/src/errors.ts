/**
 * Raised while building a rule set. Aborts the run before any file is scanned.
 */
export class RuleSetError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid rule set:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
    this.name = "RuleSetError";
    this.issues = issues;
  }
}

export type SummarizerErrorKind =
  | "missing-credential"
  | "auth"
  | "rate-limit"
  | "timeout"
  | "empty-response"
  | "request-failed";

/**
 * Failure of the outbound AI call. Categorization output is unaffected.
 */
export class SummarizerError extends Error {
  readonly kind: SummarizerErrorKind;

  constructor(kind: SummarizerErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SummarizerError";
    this.kind = kind;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Configuration validation failed:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
