import { loadConfigFromEnvironment } from "@log-categorizer/core";
import { logError, logInfo } from "@log-categorizer/shared";
import { createApp } from "./app.js";

try {
  const config = loadConfigFromEnvironment();
  const app = createApp({ config });

  app.listen(config.port, () => {
    logInfo(`Log Categorizer API server running on http://localhost:${config.port}`);
    logInfo("API endpoints:");
    logInfo("   POST /api/categorize - Categorize uploaded log files");
    logInfo("   GET  /api/rules      - List built-in rules");
    logInfo("   POST /api/summarize  - AI analysis of a Markdown summary");
    logInfo("   GET  /api/health     - Health check");
  });
} catch (error) {
  logError("Failed to start server", error);
  process.exitCode = 1;
}
