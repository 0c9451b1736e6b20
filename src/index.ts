#!/usr/bin/env node
import { runServer } from "./app.js";
import { loadNewsConfig } from "./config.js";
import { createLogger } from "./logger.js";

const config = loadNewsConfig();
const logger = createLogger(config.logLevel);

if (!config.verifyCertificates) {
  logger.warn("NEWS_VERIFY_CERTIFICATES is off: TLS certificates will not be checked");
}

process.on("uncaughtException", (error) => {
  logger.fatal("Uncaught exception", { error });
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  logger.fatal("Unhandled rejection", { reason });
  process.exit(1);
});

runServer({ config, logger }).catch((error: unknown) => {
  logger.fatal("Failed to start server", { error });
  process.exit(1);
});
