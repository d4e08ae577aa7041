import fs from "fs";
import path from "path";
import { z } from "zod";
import { ConversationEngine } from "./bot/conversation";
import { BotServices } from "./bot/flow";
import { AppConfig } from "./config";
import { ACCESS_LOG_HEADER, ACTION_LOG_HEADER, USERS_HEADER } from "./domain/user";
import { logger } from "./lib/logger";
import { AccessControl } from "./services/accessControl";
import { HeuristicQueryAssistant } from "./services/heuristicQueryAssistant";
import { LLMQueryAssistant } from "./services/llmQueryAssistant";
import { QueryAssistant } from "./services/queryAssistant";
import { RosterService } from "./services/rosterService";
import { GoogleSheetsStore } from "./stores/googleSheetsStore";
import { InMemoryTabularStore } from "./stores/inMemoryTabularStore";
import { RemoteTabularStore } from "./stores/remoteTabularStore";
import { SessionStore } from "./stores/sessionStore";
import { TableCache } from "./stores/tableCache";

const log = logger.child("bootstrap");

export const DEMO_ROSTER_FILE = path.resolve(__dirname, "../data/demo-roster.json");

const demoRosterSchema = z.object({
  headers: z.array(z.string()).min(1),
  rows: z.array(z.array(z.string())),
  users: z.array(z.array(z.string())).default([]),
});

export interface AppServices extends BotServices {
  sessions: SessionStore;
  engine: ConversationEngine;
  assistantMode: "model" | "heuristic";
}

/** In-memory store holding the demo roster, used when no spreadsheet is configured. */
export function loadDemoStore(config: AppConfig, file = DEMO_ROSTER_FILE): InMemoryTabularStore {
  const demo = demoRosterSchema.parse(JSON.parse(fs.readFileSync(file, "utf-8")));
  return new InMemoryTabularStore({
    [config.tables.main]: [demo.headers, ...demo.rows],
    [config.tables.users]: [USERS_HEADER, ...demo.users],
  });
}

export function createRemoteStore(config: AppConfig): RemoteTabularStore {
  if (config.sheetId) {
    log.info("Using Google Sheets", { primaryTable: config.tables.main });
    return new GoogleSheetsStore({
      spreadsheetId: config.sheetId,
      credentialsFile: config.googleCredentialsFile,
      primaryTable: config.tables.main,
    });
  }
  log.warn("SHEET_ID not set, serving the in-memory demo roster");
  return loadDemoStore(config);
}

function createAssistant(config: AppConfig): QueryAssistant {
  const { apiKey, model, baseURL, maxTokens } = config.assistant;
  if (!apiKey) {
    log.warn("No assistant API key, questions get keyword answers only");
    return new HeuristicQueryAssistant();
  }
  return new LLMQueryAssistant({ apiKey, model, baseURL, maxTokens });
}

/** Wire every service once; the API server and console chat share this. */
export function createServices(
  config: AppConfig,
  remote: RemoteTabularStore = createRemoteStore(config)
): AppServices {
  const { tables } = config;
  const cache = new TableCache(remote, {
    knownTables: Object.values(tables),
    initialHeaders: {
      [tables.users]: USERS_HEADER,
      [tables.accessLog]: ACCESS_LOG_HEADER,
      [tables.actionLog]: ACTION_LOG_HEADER,
    },
  });
  const assistant = createAssistant(config);
  const roster = new RosterService(cache, assistant, { table: tables.main, schema: config.roster });
  const access = new AccessControl(cache, { mainAdminId: config.mainAdminId, tables });
  const sessions = new SessionStore({ timeoutMs: config.sessionTimeoutMs });

  const services: BotServices = { roster, access, cache, tables, webAppUrl: config.webappUrl };
  return {
    ...services,
    sessions,
    engine: new ConversationEngine(sessions, services),
    assistantMode: assistant instanceof LLMQueryAssistant ? "model" : "heuristic",
  };
}
