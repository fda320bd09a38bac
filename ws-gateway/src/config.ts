import path from "node:path";
import { fileURLToPath } from "node:url";

const gatewayRoot = path.join(path.dirname(fileURLToPath(import.meta.url)), "..");
const defaultCatalogPath = path.join(gatewayRoot, "data", "cards.json");
const defaultLocalesDir = path.join(gatewayRoot, "locales");

type Env = Record<string, string | undefined>;

export type LogLevel = "debug" | "info" | "warn" | "error";

const logLevels: LogLevel[] = ["debug", "info", "warn", "error"];

const parseLogLevel = (value: string | undefined): LogLevel => {
  const normalized = (value || "info").trim().toLowerCase();
  return logLevels.find((level) => level === normalized) ?? "info";
};

const parseNumber = (value: string | undefined, fallback: number) => {
  if (value == null || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

// Comma-separated user ids. Blank entries are dropped; ids stay strings so
// numeric and opaque transport identities compare the same way.
export const parseAllowlist = (value: string | undefined) =>
  (value || "")
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);

export const loadConfig = (env: Env = process.env) => ({
  port: parseNumber(env.WS_PORT, 8080),
  environment: env.ENVIRONMENT || "development",
  logLevel: parseLogLevel(env.LOG_LEVEL),
  // Shared secret the transport presents when it opens a socket. Empty disables the check.
  botToken: env.BOT_TOKEN || "",
  openaiApiKey: env.OPENAI_API_KEY || "",
  generationModel: env.GENERATION_MODEL || "gpt-4o-mini",
  generationTimeoutMs: parseNumber(env.GENERATION_TIMEOUT_MS, 30000),
  redisUrl: env.REDIS_URL || "",
  storeTimeoutMs: parseNumber(env.STORE_TIMEOUT_MS, 2000),
  paymentAllowlist: parseAllowlist(env.PAYMENT_ALLOWLIST),
  paymentTimeoutMs: parseNumber(env.PAYMENT_TIMEOUT_MS, 10000),
  readingPrice: parseNumber(env.READING_PRICE, 20),
  matchThreshold: parseNumber(env.MATCH_THRESHOLD, 75),
  rateLimitMax: parseNumber(env.RATE_LIMIT_MAX, 5),
  rateLimitWindowMs: parseNumber(env.RATE_LIMIT_WINDOW_MS, 60000),
  catalogPath: env.CATALOG_PATH || defaultCatalogPath,
  localesDir: env.LOCALES_DIR || defaultLocalesDir,
});

export type GatewayConfig = ReturnType<typeof loadConfig>;
