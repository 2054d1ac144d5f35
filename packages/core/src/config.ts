import { z } from "zod";
import dotenv from "dotenv";
import { ConfigError } from "@log-categorizer/shared";

// Configuration schema with validation
const configSchema = z.object({
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  port: z.coerce.number().int().positive().default(3001),

  // Credential forwarded to the AI summarizer
  githubToken: z.string().optional(),

  aiModel: z.string().default("gpt-4o"),
  aiTimeoutMs: z.coerce.number().int().positive().default(120_000),

  scanConcurrency: z.coerce.number().int().min(1).max(64).default(4),
  chartTop: z.coerce.number().int().positive().default(12),
});

export type Config = z.infer<typeof configSchema>;

function readVar(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value.trim() === "" ? undefined : value;
}

/**
 * Validate configuration from an environment
 * @throws ConfigError listing each invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    nodeEnv: readVar(env, "NODE_ENV"),
    port: readVar(env, "PORT"),
    githubToken: readVar(env, "GITHUB_TOKEN"),
    aiModel: readVar(env, "LOG_CATEGORIZER_MODEL"),
    aiTimeoutMs: readVar(env, "LOG_CATEGORIZER_AI_TIMEOUT_MS"),
    scanConcurrency: readVar(env, "LOG_CATEGORIZER_CONCURRENCY"),
    chartTop: readVar(env, "LOG_CATEGORIZER_CHART_TOP"),
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  return result.data;
}

/**
 * Load `.env` into process.env, then validate
 */
export function loadConfigFromEnvironment(): Config {
  dotenv.config();
  return loadConfig(process.env);
}
