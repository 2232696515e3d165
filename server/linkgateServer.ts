import "dotenv/config";
import http from "http";

import { ConfigError, loadLinkgateConfig } from "../config/linkgateConfig.js";
import { createLogger } from "../core/logging/createLogger.js";
import { createLinkgateApp } from "./linkgateApp.js";

function startServer() {
  const config = loadLinkgateConfig();

  const logger = createLogger(config.logger, {
    filePath: config.logFile,
    level: config.logLevel
  });

  logger?.({
    level: "info",
    msg: "server environment",
    NODE_ENV: process.env.NODE_ENV ?? "development",
    backend: config.backendUrl,
    publicUrl: config.publicUrl,
    maxRedirects: config.maxRedirects,
    rateLimit: config.rateLimit.enabled
  });

  if (config.allowNonExpiring) {
    logger?.({
      level: "warn",
      msg: "tokens with expiry 0 or below are accepted as non-expiring; set LINKGATE_ALLOW_NON_EXPIRING=off to reject them"
    });
  }

  // ---- HTTP server ----
  const app = createLinkgateApp(config, { logger });
  const server = http.createServer(app);

  server.listen(config.port, () => {
    logger?.({
      level: "info",
      msg: "Gateway started",
      port: config.port,
      health: config.healthPath
    });
  });

  // ---- Graceful shutdown ----
  const shutdown = (signal: string) => {
    logger?.({
      level: "info",
      msg: "Shutdown initiated",
      signal
    });

    server.close(() => {
      logger?.({
        level: "info",
        msg: "HTTP server closed"
      });
      process.exit(0);
    });
    server.closeIdleConnections();
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

try {
  startServer();
} catch (err) {
  if (err instanceof ConfigError) {
    console.error(`Invalid configuration: ${err.message}`);
  } else {
    console.error("Fatal startup error:", err);
  }
  process.exit(1);
}
