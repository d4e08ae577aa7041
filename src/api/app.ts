import express from "express";
import cors from "cors";
import { errorMessage } from "../domain/errors";
import { AppServices } from "../bootstrap";
import { createChatRouter } from "./routes/chat";
import { createMiniAppRouter } from "./routes/miniapp";

export interface AppOptions {
  /** Origins allowed to call the API from a browser */
  corsOrigins?: string[];
}

export function createApp(services: AppServices, options: AppOptions = {}): express.Express {
  const app = express();

  // Middleware
  app.use(cors({
    origin: options.corsOrigins ?? true,
    credentials: true,
  }));
  app.use(express.json());

  // Routes
  app.use("/api/miniapp", createMiniAppRouter(services.roster));
  app.use("/api/chat", createChatRouter(services.engine));

  // Health check: probes the spreadsheet by re-reading the main table
  app.get("/api/health", async (req, res) => {
    let sheets = "connected";
    try {
      await services.cache.refresh(services.tables.main);
    } catch (error) {
      sheets = `error: ${errorMessage(error)}`;
    }
    res.json({
      status: sheets === "connected" ? "healthy" : "degraded",
      timestamp: new Date().toISOString(),
      components: { api: "ok", sheets, assistant: services.assistantMode },
    });
  });

  return app;
}
