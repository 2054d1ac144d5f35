/**
 * Console logging helpers shared by the CLI and the server
 */

export function logInfo(message: string): void {
  console.log(`[INFO] ${message}`);
}

export function logWarn(message: string): void {
  console.warn(`[WARN] ${message}`);
}

/**
 * Safely log an error with sanitized information in production
 * @param context Context or label for the error (e.g., "Categorization error")
 */
export function logError(context: string, error: unknown): void {
  if (process.env.NODE_ENV === "production") {
    // In production, only log error message and type, not full stack trace
    console.error(`${context}:`, {
      message: error instanceof Error ? error.message : "Unknown error",
      name: error instanceof Error ? error.name : "Error",
      timestamp: new Date().toISOString(),
    });
  } else {
    console.error(`${context}:`, error);
  }
}
