import path from "path";
import dotenv from "dotenv";
import { CacheThresholds, DEFAULT_CACHE_THRESHOLDS, parseCacheDirective } from "./cachePolicy";
import { isLogLevel, LogLevel } from "./logger";
import { DEFAULT_REQUIREMENTS, ReadinessRequirements } from "./readiness";
import { CacheDirective } from "./types";

export interface PortalConfig {
  baseUrl: string;
  sessionCookie?: string;
  requestTimeoutMs: number;
  userAgent: string;
}

export interface AppConfig {
  portal: PortalConfig;
  cronPattern: string;
  timezone: string;
  dbPath: string;
  cacheDirective: CacheDirective;
  cacheThresholds: CacheThresholds;
  maxDays: number;
  // Stop a sync once every crew member's next change is known.
  syncEarlyStop: boolean;
  slotMinutes: number;
  unitId: string;
  // Crew ids that ride the unit; empty means the whole station roster.
  unitCrew: string[];
  requirements: ReadinessRequirements;
  logLevel: LogLevel;
  telegram?: {
    botToken: string;
    chatId: string;
  };
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readInt(env: Env, key: string, fallback: number, min: number, max: number): number {
  const raw = readString(env, key);
  if (raw === undefined) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${key} must be an integer between ${min} and ${max}, got "${raw}"`);
  }
  return value;
}

function readBool(env: Env, key: string, fallback: boolean): boolean {
  const raw = readString(env, key)?.toLowerCase();
  if (raw === undefined) {
    return fallback;
  }
  if (["1", "true", "yes", "on"].includes(raw)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(raw)) {
    return false;
  }
  throw new Error(`${key} must be true or false, got "${raw}"`);
}

function readList(env: Env, key: string): string[] {
  return (readString(env, key) ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * Builds the configuration from an environment map. Components receive the
 * result (or the slice they need) at construction time.
 */
export function loadConfig(env: Env): AppConfig {
  const cacheModeRaw = readString(env, "CACHE_MODE") ?? "cache-preferred";
  const cacheDirective = parseCacheDirective(cacheModeRaw);
  if (!cacheDirective) {
    throw new Error(`Unknown CACHE_MODE "${cacheModeRaw}"`);
  }

  const logLevelRaw = (readString(env, "LOG_LEVEL") ?? "info").toLowerCase();
  if (!isLogLevel(logLevelRaw)) {
    throw new Error(`Unknown LOG_LEVEL "${logLevelRaw}"`);
  }

  const officerRoles = readList(env, "OFFICER_ROLES");

  const config: AppConfig = {
    portal: {
      baseUrl: readString(env, "PORTAL_BASE_URL") ?? "https://portal.example.org/crewing",
      requestTimeoutMs: readInt(env, "REQUEST_TIMEOUT_MS", 20000, 1000, 300000),
      userAgent:
        readString(env, "USER_AGENT") ??
        "Mozilla/5.0 (compatible; StationAvailability/1.0)",
    },
    cronPattern: readString(env, "CRON_PATTERN") ?? "*/15 * * * *",
    timezone: readString(env, "TZ") ?? "Europe/London",
    dbPath: path.resolve(readString(env, "DB_PATH") ?? path.join("data", "availability.db")),
    cacheDirective,
    cacheThresholds: DEFAULT_CACHE_THRESHOLDS,
    maxDays: readInt(env, "MAX_DAYS", 28, 1, 365),
    syncEarlyStop: readBool(env, "SYNC_EARLY_STOP", true),
    slotMinutes: readInt(env, "SLOT_MINUTES", 15, 1, 60),
    unitId: readString(env, "UNIT_ID") ?? "P22P6",
    unitCrew: readList(env, "UNIT_CREW"),
    requirements:
      officerRoles.length > 0
        ? { ...DEFAULT_REQUIREMENTS, officerRoles }
        : DEFAULT_REQUIREMENTS,
    logLevel: logLevelRaw,
  };

  const sessionCookie = readString(env, "PORTAL_SESSION_COOKIE");
  if (sessionCookie) {
    config.portal.sessionCookie = sessionCookie;
  }

  const botToken = readString(env, "TELEGRAM_BOT_TOKEN");
  const chatId = readString(env, "TELEGRAM_CHAT_ID");
  if (botToken && chatId) {
    config.telegram = { botToken, chatId };
  }

  return config;
}

/** Reads .env into process.env, then builds the configuration. */
export function loadConfigFromEnvironment(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
