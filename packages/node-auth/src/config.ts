import path from "node:path";
import { fileURLToPath } from "node:url";
import { parseLogLevel, type LogLevel } from "./logger";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export type JournalMode = "WAL" | "DELETE" | "TRUNCATE" | "PERSIST";

export type AppConfig = {
  port: number;
  databasePath: string;
  journalMode: JournalMode;
  busyTimeoutMs: number;
  lockRetryAttempts: number;
  lockRetryDelayMs: number;
  bcryptRounds: number;
  modelUsersPath: string;
  modelPath: string;
  modelMinConfidence?: number;
  zscoreThreshold: number;
  maxProfileSamples: number;
  appendSampleOnSuccess: boolean;
  logLevel: LogLevel;
};

type Env = Record<string, string | undefined>;

export const DEFAULT_CONFIG: AppConfig = {
  port: 3001,
  databasePath: "./data/keyprint.db",
  journalMode: "WAL",
  busyTimeoutMs: 5000,
  lockRetryAttempts: 5,
  lockRetryDelayMs: 50,
  bcryptRounds: 12,
  modelUsersPath: path.resolve(__dirname, "../config/model-users.txt"),
  modelPath: path.resolve(__dirname, "../models/keystroke-classifier.json"),
  modelMinConfidence: undefined,
  zscoreThreshold: 0.5,
  maxProfileSamples: 50,
  appendSampleOnSuccess: true,
  logLevel: "info",
};

function readString(raw: string | undefined, fallback: string): string {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : fallback;
}

function readPositiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  return Math.round(parsed);
}

function readNonNegativeInt(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) return fallback;
  return Math.round(parsed);
}

function readUnitInterval(raw: string | undefined): number | undefined {
  if (!raw) return undefined;

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) return undefined;
  return parsed;
}

function readBoolean(raw: string | undefined, fallback: boolean): boolean {
  const normalized = raw?.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") return true;
  if (normalized === "false" || normalized === "0" || normalized === "no") return false;
  return fallback;
}

function readJournalMode(raw: string | undefined): JournalMode {
  const normalized = raw?.trim().toUpperCase();
  return normalized === "WAL" || normalized === "DELETE" || normalized === "TRUNCATE" || normalized === "PERSIST"
    ? normalized
    : DEFAULT_CONFIG.journalMode;
}

export function resolveConfig(env: Env = process.env): AppConfig {
  const bcryptRounds = readPositiveInt(env.BCRYPT_ROUNDS, DEFAULT_CONFIG.bcryptRounds);

  return {
    port: readPositiveInt(env.PORT, DEFAULT_CONFIG.port),
    databasePath: readString(env.DATABASE_PATH, DEFAULT_CONFIG.databasePath),
    journalMode: readJournalMode(env.SQLITE_JOURNAL_MODE),
    busyTimeoutMs: readNonNegativeInt(env.SQLITE_BUSY_TIMEOUT_MS, DEFAULT_CONFIG.busyTimeoutMs),
    lockRetryAttempts: readNonNegativeInt(env.DB_LOCK_RETRY_ATTEMPTS, DEFAULT_CONFIG.lockRetryAttempts),
    lockRetryDelayMs: readNonNegativeInt(env.DB_LOCK_RETRY_DELAY_MS, DEFAULT_CONFIG.lockRetryDelayMs),
    bcryptRounds: Math.min(15, Math.max(4, bcryptRounds)),
    modelUsersPath: readString(env.MODEL_USERS_PATH, DEFAULT_CONFIG.modelUsersPath),
    modelPath: readString(env.MODEL_PATH, DEFAULT_CONFIG.modelPath),
    modelMinConfidence: readUnitInterval(env.MODEL_MIN_CONFIDENCE),
    zscoreThreshold: readUnitInterval(env.ZSCORE_SIMILARITY_THRESHOLD) ?? DEFAULT_CONFIG.zscoreThreshold,
    maxProfileSamples: readPositiveInt(env.MAX_PROFILE_SAMPLES, DEFAULT_CONFIG.maxProfileSamples),
    appendSampleOnSuccess: readBoolean(env.APPEND_SAMPLE_ON_SUCCESS, DEFAULT_CONFIG.appendSampleOnSuccess),
    logLevel: parseLogLevel(env.LOG_LEVEL, DEFAULT_CONFIG.logLevel),
  };
}
