import { Router } from "express";
import type { NextFunction, Request, Response } from "express";
import { LogCategorizer, buildRuleSet, parseRuleFileContent } from "@log-categorizer/core";
import type { PatternRuleSet } from "@log-categorizer/core";
import type { ApiResponse, CategorizationResult, RuleDefinition } from "@log-categorizer/shared";
import { uploadMiddleware } from "../middleware/upload.js";

export interface CategorizeRouterOptions {
  /** Files scanned in parallel */
  concurrency: number;
}

/**
 * Rules sent alongside an upload, as JSON text in the `rules` field
 */
function ruleSetFromBody(body: unknown): PatternRuleSet {
  const rules = typeof body === "object" && body !== null && "rules" in body ? body.rules : undefined;
  if (typeof rules !== "string" || rules.trim() === "") {
    return buildRuleSet();
  }
  return buildRuleSet({ userRules: parseRuleFileContent(rules, "rules") });
}

export function createCategorizeRouter(options: CategorizeRouterOptions): Router {
  const router = Router();

  /**
   * POST /api/categorize
   * Categorize up to 10 uploaded log files
   */
  router.post("/categorize", uploadMiddleware.array("files"), async (req: Request, res: Response, next: NextFunction) => {
    const files = Array.isArray(req.files) ? req.files : [];

    if (files.length === 0) {
      const body: ApiResponse<never> = { success: false, error: "No files uploaded" };
      res.status(400).json(body);
      return;
    }

    try {
      const categorizer = new LogCategorizer({
        ruleSet: ruleSetFromBody(req.body),
        concurrency: options.concurrency,
      });
      const result = await categorizer.categorizeBuffers(
        files.map((file) => ({ buffer: file.buffer, filename: file.originalname }))
      );

      const response: ApiResponse<Omit<CategorizationResult, "filesScanned">> = {
        success: true,
        data: {
          detailed: result.detailed,
          summary: result.summary,
          breakdown: result.breakdown,
          skipped: result.skipped,
        },
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/rules
   * Built-in rules in priority order
   */
  router.get("/rules", (_req: Request, res: Response) => {
    const response: ApiResponse<RuleDefinition[]> = { success: true, data: buildRuleSet().rules };
    res.json(response);
  });

  return router;
}
