import { describe, expect, it } from "vitest";
import { ConfigError } from "@log-categorizer/shared";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("should use defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      nodeEnv: "development",
      port: 3001,
      aiModel: "gpt-4o",
      aiTimeoutMs: 120_000,
      scanConcurrency: 4,
      chartTop: 12,
    });
  });

  it("should read every variable", () => {
    const config = loadConfig({
      NODE_ENV: "production",
      PORT: "8080",
      GITHUB_TOKEN: "test-secret",
      LOG_CATEGORIZER_MODEL: "test-model",
      LOG_CATEGORIZER_AI_TIMEOUT_MS: "5000",
      LOG_CATEGORIZER_CONCURRENCY: "16",
      LOG_CATEGORIZER_CHART_TOP: "5",
    });

    expect(config).toEqual({
      nodeEnv: "production",
      port: 8080,
      githubToken: "test-secret",
      aiModel: "test-model",
      aiTimeoutMs: 5000,
      scanConcurrency: 16,
      chartTop: 5,
    });
  });

  it("should treat empty strings as unset", () => {
    const config = loadConfig({ GITHUB_TOKEN: "", LOG_CATEGORIZER_CONCURRENCY: "  " });
    expect(config.githubToken).toBeUndefined();
    expect(config.scanConcurrency).toBe(4);
  });

  it("should reject out-of-range concurrency", () => {
    expect(() => loadConfig({ LOG_CATEGORIZER_CONCURRENCY: "65" })).toThrow(ConfigError);
    expect(() => loadConfig({ LOG_CATEGORIZER_CONCURRENCY: "0" })).toThrow(ConfigError);
  });

  it("should list each invalid variable", () => {
    try {
      loadConfig({ PORT: "abc", NODE_ENV: "staging" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues).toHaveLength(2);
        expect(error.issues.some((issue) => issue.startsWith("nodeEnv: "))).toBe(true);
        expect(error.issues.some((issue) => issue.startsWith("port: "))).toBe(true);
        expect(error.message.startsWith("Configuration validation failed:")).toBe(true);
      }
    }
  });
});
