import "dotenv/config";
import http from "http";

import { loadConfig } from "../config/snapstashConfig.js";
import { createLogger } from "../core/logging/createLogger.js";
import { createApp, createServices } from "./createApp.js";

async function startServer() {
  const config = loadConfig();

  const logger = createLogger(config.logger.mode, {
    filePath: config.logger.filePath,
    level: config.logger.level
  });

  const services = createServices(config, { logger });
  await services.store.init();

  logger?.({
    level: "info",
    msg: "server configuration",
    imagesDir: config.imagesDir,
    cacheDir: config.cacheDir,
    nudityFilter: config.nudity.threshold !== null,
    allowVideo: config.video.allow,
    deleteEnabled: Boolean(config.auth.apiKey) && config.auth.requireForDelete
  });

  // ---- HTTP server ----
  const server = http.createServer(createApp(services));

  server.listen(config.port, () => {
    logger?.({
      level: "info",
      msg: "Media server started",
      port: config.port
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
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

startServer().catch(err => {
  console.error("Fatal startup error:", err);
  process.exit(1);
});
