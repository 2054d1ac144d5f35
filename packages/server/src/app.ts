import express from "express";
import type { Express } from "express";
import cors from "cors";
import { summarizeMarkdown } from "@log-categorizer/core";
import type { Config, SummarizeFn } from "@log-categorizer/core";
import { errorHandler } from "./middleware/error-handler.js";
import { securityMiddleware } from "./middleware/security.js";
import { createCategorizeRouter } from "./routes/categorize.js";
import { createSummarizeRouter } from "./routes/summarize.js";

export interface AppOptions {
  config: Config;
  /** Replaces the Copilot-backed summarizer */
  summarize?: SummarizeFn;
  /** Requests per minute per IP (default: 30) */
  rateLimitPerMinute?: number;
}

/**
 * Build the express application without binding a port
 */
export function createApp(options: AppOptions): Express {
  const { config } = options;
  const summarize: SummarizeFn =
    options.summarize ??
    ((markdown) =>
      summarizeMarkdown(markdown, {
        credential: config.githubToken,
        model: config.aiModel,
        timeoutMs: config.aiTimeoutMs,
      }));

  const app = express();

  // Security middleware
  app.use(securityMiddleware(options.rateLimitPerMinute));

  // CORS configuration
  app.use(
    cors({
      origin: config.nodeEnv === "production" ? false : [`http://localhost:${config.port}`],
      credentials: true,
    })
  );

  // Body parsing
  app.use(express.json({ limit: "1mb" }));

  // API routes
  app.use("/api", createCategorizeRouter({ concurrency: config.scanConcurrency }));
  app.use("/api", createSummarizeRouter(summarize));

  // Health check
  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  // Error handling
  app.use(errorHandler);

  return app;
}
