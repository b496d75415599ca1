import dotenv from "dotenv";
import path from "node:path";
import { ConfigurationError } from "../shared/errors";
import { LogLevel } from "./logger";

dotenv.config();

export type AcknowledgementMode = "llm" | "static";

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  openaiApiKey: string;
  openaiChatModel: string;
  openaiBaseUrl: string;
  llmTimeoutMs: number;
  maxAttempts: number;
  questionsPerTechnology: number;
  phoneMinDigits: number;
  phoneMaxDigits: number;
  acknowledgementMode: AcknowledgementMode;
  exitKeywords: string[];
  knowledgeBasePath: string;
  sessionsDir: string;
  exportCsvPath: string;
  exportAnonymize: boolean;
  logLevel: LogLevel;
  logWebhookUrl?: string;
  logWebhookLevel: LogLevel;
}

type Source = Record<string, string | undefined>;

export const DEFAULT_EXIT_KEYWORDS = ["bye", "exit", "quit", "goodbye"];

function getRequiredString(source: Source, name: string): string {
  const value = source[name]?.trim();
  if (!value) {
    throw new ConfigurationError(`Missing required environment variable: ${name}`);
  }
  return value;
}

function getOptionalTrimmed(source: Source, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: Source = process.env): EnvConfig {
  const portRaw = source.PORT ?? "3000";
  const timeoutRaw = source.LLM_TIMEOUT_MS ?? "25000";
  const maxAttemptsRaw = source.MAX_ATTEMPTS ?? "2";
  const questionsRaw = source.QUESTIONS_PER_TECHNOLOGY ?? "3";
  const phoneMinRaw = source.PHONE_MIN_DIGITS ?? "7";
  const phoneMaxRaw = source.PHONE_MAX_DIGITS ?? "15";

  const port = Number(portRaw);
  const llmTimeoutMs = Number(timeoutRaw);
  const maxAttempts = Number(maxAttemptsRaw);
  const questionsPerTechnology = Number(questionsRaw);
  const phoneMinDigits = Number(phoneMinRaw);
  const phoneMaxDigits = Number(phoneMaxRaw);

  if (!Number.isInteger(port) || port <= 0) {
    throw new ConfigurationError(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isInteger(llmTimeoutMs) || llmTimeoutMs < 1000) {
    throw new ConfigurationError(`Invalid LLM_TIMEOUT_MS value: ${timeoutRaw}`);
  }
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new ConfigurationError(`Invalid MAX_ATTEMPTS value: ${maxAttemptsRaw}`);
  }
  if (!Number.isInteger(questionsPerTechnology) || questionsPerTechnology < 1) {
    throw new ConfigurationError(`Invalid QUESTIONS_PER_TECHNOLOGY value: ${questionsRaw}`);
  }
  if (!Number.isInteger(phoneMinDigits) || phoneMinDigits < 1) {
    throw new ConfigurationError(`Invalid PHONE_MIN_DIGITS value: ${phoneMinRaw}`);
  }
  if (!Number.isInteger(phoneMaxDigits) || phoneMaxDigits < phoneMinDigits) {
    throw new ConfigurationError(
      `Invalid PHONE_MAX_DIGITS value: ${phoneMaxRaw}. Expected an integer >= PHONE_MIN_DIGITS.`,
    );
  }

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    port,
    openaiApiKey: getRequiredString(source, "OPENAI_API_KEY"),
    openaiChatModel: getOptionalTrimmed(source, "OPENAI_CHAT_MODEL") ?? "gpt-4o-mini",
    openaiBaseUrl: (getOptionalTrimmed(source, "OPENAI_BASE_URL") ?? "https://api.openai.com/v1").replace(/\/+$/, ""),
    llmTimeoutMs,
    maxAttempts,
    questionsPerTechnology,
    phoneMinDigits,
    phoneMaxDigits,
    acknowledgementMode: parseAcknowledgementMode(source.ACKNOWLEDGEMENT_MODE ?? "llm"),
    exitKeywords: parseKeywordList(source.EXIT_KEYWORDS),
    knowledgeBasePath: resolveDataPath(source, "KNOWLEDGE_BASE_PATH", "data/knowledge-base.json"),
    sessionsDir: resolveDataPath(source, "SESSIONS_DIR", "data/sessions"),
    exportCsvPath: resolveDataPath(source, "EXPORT_CSV_PATH", "data/candidates.csv"),
    exportAnonymize: parseBoolean(source.EXPORT_ANONYMIZE ?? "false"),
    logLevel: parseLogLevel(source.LOG_LEVEL ?? "info", "LOG_LEVEL"),
    logWebhookUrl: getOptionalTrimmed(source, "LOG_WEBHOOK_URL"),
    logWebhookLevel: parseLogLevel(source.LOG_WEBHOOK_LEVEL ?? "warn", "LOG_WEBHOOK_LEVEL"),
  };
}

function resolveDataPath(source: Source, name: string, fallback: string): string {
  return path.resolve(process.cwd(), getOptionalTrimmed(source, name) ?? fallback);
}

function parseKeywordList(rawValue: string | undefined): string[] {
  const values = (rawValue ?? "")
    .split(",")
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
  if (values.length === 0) {
    return [...DEFAULT_EXIT_KEYWORDS];
  }
  return Array.from(new Set(values));
}

function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  throw new ConfigurationError(`Invalid boolean value: ${value}`);
}

function parseAcknowledgementMode(value: string): AcknowledgementMode {
  const normalized = value.trim().toLowerCase();
  if (normalized === "llm" || normalized === "static") {
    return normalized;
  }
  throw new ConfigurationError(`Invalid ACKNOWLEDGEMENT_MODE value: ${value}`);
}

function parseLogLevel(value: string, name: string): LogLevel {
  const normalized = value.trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  throw new ConfigurationError(`Invalid ${name} value: ${value}`);
}
