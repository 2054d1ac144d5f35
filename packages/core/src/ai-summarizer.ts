import type { CopilotClient, CopilotSession } from "@github/copilot-sdk";
import { existsSync } from "fs";
import { basename, dirname, extname, join } from "path";
import { fileURLToPath } from "url";
import { SummarizerError, logError } from "@log-categorizer/shared";

/** Summaries longer than this are sent as numbered parts */
const CHUNK_SIZE = 12_000;

const DEFAULT_MODEL = "gpt-4o";
const DEFAULT_TIMEOUT_MS = 120_000;

const SYSTEM_INSTRUCTIONS =
  "You are an SRE engineer focused on diagnosis and action plans. " +
  "Be direct and assertive and prioritize practical recommendations.";

const REQUEST =
  "Analyze the content below (a Markdown error summary report). " +
  "For each error listed, produce in Markdown:\n" +
  "1) Possible root causes; 2) Evidence/checks to collect; " +
  "3) Immediate mitigations (quick wins) and permanent fixes; " +
  "4) Indicators/KPIs to monitor; 5) Priority (High/Medium/Low). " +
  "Be concise and objective. Content to analyze:";

/**
 * Options for the AiSummarizer
 */
export interface AiSummarizerOptions {
  /** GitHub token forwarded to the Copilot CLI */
  credential?: string;
  /** Model to use (default: gpt-4o) */
  model?: string;
  /** Time allowed for the single request (default: 120s) */
  timeoutMs?: number;
  /** Copilot CLI entry point (default: resolved next to the SDK) */
  cliPath?: string;
}

export type SummarizeFn = (markdown: string) => Promise<string>;

type SessionOptions = NonNullable<Parameters<CopilotClient["createSession"]>[0]>;
type PermissionHandler = NonNullable<SessionOptions["onPermissionRequest"]>;

/**
 * The summary request needs no tools, so every permission request is refused.
 */
export function denyAllPermissions(): ReturnType<PermissionHandler> {
  return { kind: "denied-no-approval-rule-and-could-not-request-from-user" };
}

/**
 * Resolves the path to the copilot CLI binary.
 */
function resolveCopilotCliPath(): string {
  try {
    const copilotSdkPath = import.meta.resolve("@github/copilot-sdk");
    const sdkDir = dirname(fileURLToPath(copilotSdkPath));
    const cliPath = join(sdkDir, "..", "..", "copilot", "npm-loader.js");

    if (!existsSync(cliPath)) {
      throw new Error(`Copilot CLI not found at expected path: ${cliPath}`);
    }

    return cliPath;
  } catch (error) {
    throw new SummarizerError(
      "request-failed",
      `Failed to resolve Copilot CLI path: ${error instanceof Error ? error.message : String(error)}. ` +
        "Ensure @github/copilot is installed as a dependency.",
      { cause: error }
    );
  }
}

/**
 * Build the single prompt sent for a Markdown summary.
 * Long text is split into numbered parts within the same prompt.
 */
export function buildSummaryPrompt(markdown: string): string {
  if (markdown.length <= CHUNK_SIZE) {
    return `${SYSTEM_INSTRUCTIONS}\n\n${REQUEST}\n\n${markdown}`;
  }

  const parts: string[] = [];
  for (let i = 0; i < markdown.length; i += CHUNK_SIZE) {
    parts.push(markdown.slice(i, i + CHUNK_SIZE));
  }

  return [
    SYSTEM_INSTRUCTIONS,
    "",
    REQUEST,
    ...parts.map((part, i) => `\n(Part ${i + 1} of ${parts.length})\n\n${part}`),
  ].join("\n");
}

/**
 * Map any failure of the outbound call to a SummarizerError kind
 */
export function classifySummarizerFailure(error: unknown): SummarizerError {
  if (error instanceof SummarizerError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  if (/\b401\b|unauthori[sz]ed|authentication/i.test(message)) {
    return new SummarizerError("auth", `Credential rejected: ${message}`, { cause: error });
  }
  if (/\b429\b|rate limit|limit exceeded|quota/i.test(message)) {
    return new SummarizerError("rate-limit", `Quota or rate limit reached: ${message}`, { cause: error });
  }
  if (/timed? ?out/i.test(message)) {
    return new SummarizerError("timeout", `AI request timed out: ${message}`, { cause: error });
  }
  return new SummarizerError("request-failed", `AI request failed: ${message}`, { cause: error });
}

/**
 * Default output path: `<stem>__analysis_<YYYYMMDD_HHMMSS>.md` beside the input
 */
export function defaultAnalysisPath(inputPath: string, now: Date = new Date()): string {
  const pad = (value: number) => value.toString().padStart(2, "0");
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  const stem = basename(inputPath, extname(inputPath));
  return join(dirname(inputPath), `${stem}__analysis_${stamp}.md`);
}

/**
 * Sends a rendered Markdown summary to Copilot and returns its free-text analysis.
 * One request per summary; failures surface as SummarizerError.
 */
export class AiSummarizer {
  private client: CopilotClient | null = null;
  private session: CopilotSession | null = null;
  private readonly credential?: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly cliPath?: string;

  constructor(options: AiSummarizerOptions = {}) {
    this.credential = options.credential;
    this.model = options.model ?? DEFAULT_MODEL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.cliPath = options.cliPath;
  }

  /**
   * Start the Copilot client and create a session
   */
  async initialize(): Promise<void> {
    if (!this.credential) {
      throw new SummarizerError(
        "missing-credential",
        "No credential configured. Set GITHUB_TOKEN to enable AI summaries."
      );
    }

    try {
      // Loaded here so that categorizing never pulls in the SDK
      const { CopilotClient } = await import("@github/copilot-sdk");
      this.client = new CopilotClient({
        cliPath: this.cliPath ?? resolveCopilotCliPath(),
        githubToken: this.credential,
      });
      await this.client.start();
      this.session = await this.client.createSession({
        model: this.model,
        onPermissionRequest: denyAllPermissions,
      });
    } catch (error) {
      throw classifySummarizerFailure(error);
    }
  }

  /**
   * Analyze a Markdown summary
   * @returns the model's Markdown analysis, trimmed
   */
  async summarize(markdown: string): Promise<string> {
    if (!this.session) {
      throw new Error("Summarizer not initialized. Call initialize() first.");
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new SummarizerError("timeout", `AI request timed out after ${this.timeoutMs} ms`)),
        this.timeoutMs
      );
    });

    try {
      const response = await Promise.race([
        this.session.sendAndWait({ prompt: buildSummaryPrompt(markdown) }, this.timeoutMs),
        timeout,
      ]);

      if (!response || !response.data.content) {
        throw new SummarizerError("empty-response", "No response received from Copilot");
      }

      return response.data.content.trim();
    } catch (error) {
      throw classifySummarizerFailure(error);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Clean up resources
   */
  async cleanup(): Promise<void> {
    if (this.session) {
      await this.session.destroy();
      this.session = null;
    }
    if (this.client) {
      await this.client.stop();
      this.client = null;
    }
  }
}

/**
 * Initialize, summarize once and clean up
 */
export async function summarizeMarkdown(markdown: string, options: AiSummarizerOptions): Promise<string> {
  const summarizer = new AiSummarizer(options);
  try {
    await summarizer.initialize();
    return await summarizer.summarize(markdown);
  } finally {
    await summarizer.cleanup().catch((error: unknown) => logError("Summarizer cleanup error", error));
  }
}
