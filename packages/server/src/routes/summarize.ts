import { Router } from "express";
import type { NextFunction, Request, Response } from "express";
import type { SummarizeFn } from "@log-categorizer/core";
import type { ApiResponse } from "@log-categorizer/shared";

function markdownFrom(body: unknown): string | undefined {
  if (typeof body === "object" && body !== null && "markdown" in body && typeof body.markdown === "string") {
    return body.markdown;
  }
  return undefined;
}

export function createSummarizeRouter(summarize: SummarizeFn): Router {
  const router = Router();

  /**
   * POST /api/summarize
   * Forward a Markdown summary to the AI summarizer
   */
  router.post("/summarize", async (req: Request, res: Response, next: NextFunction) => {
    const markdown = markdownFrom(req.body);

    if (!markdown || markdown.trim() === "") {
      const body: ApiResponse<never> = {
        success: false,
        error: "Request body must include a non-empty markdown string",
      };
      res.status(400).json(body);
      return;
    }

    try {
      const analysis = await summarize(markdown);
      const response: ApiResponse<{ analysis: string }> = { success: true, data: { analysis } };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
