import type { NextFunction, Request, Response } from "express";
import multer from "multer";
import { RuleSetError, SummarizerError, logError } from "@log-categorizer/shared";
import type { ApiResponse } from "@log-categorizer/shared";
import { InvalidUploadError, MAX_FILE_COUNT } from "./upload.js";

function send(res: Response, status: number, body: ApiResponse<never>): void {
  res.status(status).json(body);
}

/**
 * Global error handler middleware
 */
export const errorHandler = (err: Error, _req: Request, res: Response, _next: NextFunction) => {
  if (err instanceof multer.MulterError) {
    if (err.code === "LIMIT_FILE_COUNT") {
      send(res, 400, { success: false, error: `Too many files. Maximum is ${MAX_FILE_COUNT} files per request.` });
      return;
    }
    if (err.code === "LIMIT_FILE_SIZE") {
      send(res, 413, { success: false, error: "File too large" });
      return;
    }
    send(res, 400, { success: false, error: err.code === "LIMIT_UNEXPECTED_FILE" ? "Unexpected file field" : err.message });
    return;
  }

  if (err instanceof InvalidUploadError) {
    send(res, 400, { success: false, error: err.message });
    return;
  }

  if (err instanceof RuleSetError) {
    send(res, 400, { success: false, error: err.message });
    return;
  }

  if (err instanceof SummarizerError) {
    logError("Summarizer error", err);
    send(res, 502, { success: false, error: err.message, kind: err.kind });
    return;
  }

  // Body parser failures (malformed JSON, oversized body) carry their own status
  if ("status" in err && typeof err.status === "number" && err.status >= 400 && err.status < 500) {
    send(res, err.status, { success: false, error: err.message });
    return;
  }

  logError("Server error", err);
  send(res, 500, {
    success: false,
    error: process.env.NODE_ENV === "production" ? "Internal server error" : err.message,
  });
};
