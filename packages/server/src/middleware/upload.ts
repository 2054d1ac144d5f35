import multer from "multer";
import type { Request } from "express";
import { isValidFilename } from "@log-categorizer/shared";

/**
 * Maximum file count per request
 */
export const MAX_FILE_COUNT = 10;

/**
 * Rejected upload; mapped to a 400 response
 */
export class InvalidUploadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidUploadError";
  }
}

/**
 * File filter to validate uploads
 */
const fileFilter = (_req: Request, file: Express.Multer.File, callback: multer.FileFilterCallback) => {
  if (!isValidFilename(file.originalname)) {
    callback(new InvalidUploadError(`Invalid file: ${file.originalname}. Allowed types: .log, .txt`));
    return;
  }

  callback(null, true);
};

/**
 * Upload middleware with memory storage and validation.
 * No files are written to disk.
 */
export const uploadMiddleware = multer({
  storage: multer.memoryStorage(),
  fileFilter,
  limits: {
    files: MAX_FILE_COUNT,
  },
});
