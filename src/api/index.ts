import dotenv from "dotenv";

import { createServices } from "../bootstrap";
import { loadConfig } from "../config";
import { logger, setLogLevel } from "../lib/logger";
import { createApp } from "./app";

dotenv.config();

const log = logger.child("server");

const config = loadConfig();
setLogLevel(config.logLevel);

const services = createServices(config);
const app = createApp(services, {
  corsOrigins: config.environment === "development" ? ["http://localhost:5173", "http://localhost:3000"] : undefined,
});
const stopSweeper = services.sessions.startSweeper(config.sessionSweepIntervalMs);

// Start server
const server = app.listen(config.apiPort, () => {
  log.info(`API server running on http://localhost:${config.apiPort}`);
});

async function shutdown(signal: string): Promise<void> {
  log.info("Shutting down", { signal });
  stopSweeper();
  const swept = await services.sessions.sweepExpired();
  log.info("Final session sweep", { swept });
  server.close();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      log.error("Shutdown failed", error);
      process.exitCode = 1;
    });
  });
}
