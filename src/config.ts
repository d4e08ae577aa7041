import { z } from "zod";
import { LogLevel } from "./lib/logger";

/**
 * Roster layout: which spreadsheet columns carry meaning for the bot,
 * and the fixed choices offered for the group and status fields.
 */
export interface RosterSchema {
  firstNameColumn: string;
  lastNameColumn: string;
  birthDateColumn: string;
  groupColumn: string;
  statusColumn: string;
  photoColumn: string;
  dateColumns: readonly string[];
  groupValues: readonly string[];
  /** Group assigned to records whose group cell is blank */
  unassignedGroup: string;
  statusValues: readonly string[];
}

export interface TableNames {
  main: string;
  users: string;
  accessLog: string;
  actionLog: string;
}

export interface AppConfig {
  environment: "production" | "development";
  logLevel: LogLevel;
  mainAdminId: number;
  sheetId: string | null;
  googleCredentialsFile: string | null;
  tables: TableNames;
  assistant: {
    apiKey: string | null;
    model: string;
    baseURL: string;
    maxTokens: number;
  };
  sessionTimeoutMs: number;
  sessionSweepIntervalMs: number;
  apiPort: number;
  webappUrl: string | null;
  roster: RosterSchema;
}

export const DEFAULT_ROSTER_SCHEMA: RosterSchema = {
  firstNameColumn: "Имя",
  lastNameColumn: "Фамилия",
  birthDateColumn: "Дата рождения",
  groupColumn: "Домашка",
  statusColumn: "Статус",
  photoColumn: "Фото",
  dateColumns: ["Дата рождения", "Дата", "Дата регистрации"],
  groupValues: [
    "т. Лилия / Иордан",
    "Т.Роза / Grace",
    "Аркадий, Татьяна / Ковчег",
    "Руслан, Наталья / Осанна",
    "Слава, Ная / Домашка №1",
    "Гоша / Zion",
    "Ирина / Miracle",
    "Регина / Yeshua",
    "Диана / Yeshua Alive",
    "Виталик / Lion",
    "Лия / Heaven",
    "Ричард / Grace",
    "Ребенок",
    "Предподросток",
    "Не распределен",
  ],
  unassignedGroup: "Не распределен",
  statusValues: ["активный", "неактивный", "вип"],
};

const GEMINI_OPENAI_ENDPOINT = "https://generativelanguage.googleapis.com/v1beta/openai/";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : null));

const envSchema = z.object({
  ENVIRONMENT: z.enum(["production", "development"]).default("production"),
  LOG_LEVEL: z
    .string()
    .default("info")
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(["debug", "info", "warn", "error"])),
  MAIN_ADMIN_ID: z.coerce.number().int().positive().default(526710245),
  SHEET_ID: optionalString.refine((value) => value === null || value.length >= 10, {
    message: "Invalid Google Sheet ID",
  }),
  GOOGLE_CREDENTIALS_FILE: optionalString,
  MAIN_SHEET_NAME: z.string().min(1).default("MainSheet"),
  ASSISTANT_API_KEY: optionalString,
  GEMINI_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  ASSISTANT_MODEL: z.string().min(1).default("gemini-2.5-flash"),
  ASSISTANT_BASE_URL: z.string().url().default(GEMINI_OPENAI_ENDPOINT),
  MAX_ASSISTANT_TOKENS: z.coerce.number().int().positive().default(1000),
  SESSION_TIMEOUT_MINUTES: z.coerce.number().positive().default(30),
  SESSION_SWEEP_INTERVAL_MINUTES: z.coerce.number().positive().default(5),
  API_PORT: z.coerce.number().int().positive().default(3001),
  WEBAPP_URL: optionalString,
});

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Parse and validate settings from an environment map.
 * Pure: callers pass process.env (after dotenv) or a literal map in tests.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  return {
    environment: values.ENVIRONMENT,
    logLevel: values.LOG_LEVEL,
    mainAdminId: values.MAIN_ADMIN_ID,
    sheetId: values.SHEET_ID,
    googleCredentialsFile: values.GOOGLE_CREDENTIALS_FILE,
    tables: {
      main: values.MAIN_SHEET_NAME,
      users: "Users",
      accessLog: "AccessLog",
      actionLog: "ActionLog",
    },
    assistant: {
      apiKey: values.ASSISTANT_API_KEY ?? values.GEMINI_API_KEY ?? values.OPENAI_API_KEY,
      model: values.ASSISTANT_MODEL,
      baseURL: values.ASSISTANT_BASE_URL,
      maxTokens: values.MAX_ASSISTANT_TOKENS,
    },
    sessionTimeoutMs: values.SESSION_TIMEOUT_MINUTES * 60_000,
    sessionSweepIntervalMs: values.SESSION_SWEEP_INTERVAL_MINUTES * 60_000,
    apiPort: values.API_PORT,
    webappUrl: values.WEBAPP_URL,
    roster: DEFAULT_ROSTER_SCHEMA,
  };
}
