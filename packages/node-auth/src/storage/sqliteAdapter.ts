import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import Database from "libsql";
import {
  isFiniteNumber,
  isRecord,
  parseKeystrokeFeatures,
  type KeystrokeFeatures,
  type KeystrokeSampleRecord,
  type LoginMethod,
  type LoginSessionRecord,
  type LoginStatus,
  type OverviewStats,
  type UserDashboardStats,
  type UserRecord,
} from "@keyprint/core";
import type { JournalMode } from "../config";
import { UsernameTakenError } from "../errors";
import { silentLogger, type Logger } from "../logger";
import type { StorageAdapter } from "./adapter";
import { withLockRetry } from "./lockRetry";
import {
  emptyMethodCounts,
  successRate,
  type NewLoginSession,
  type NewRegistration,
} from "./types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const SCHEMA_PATH = path.resolve(__dirname, "schema.sql");

type Connection = InstanceType<typeof Database>;

type Row = Record<string, unknown>;

export type SqliteAdapterOptions = {
  /** File path, or ":memory:" for a private in-process database. */
  filename: string;
  journalMode?: JournalMode;
  busyTimeoutMs?: number;
  lockRetryAttempts?: number;
  lockRetryDelayMs?: number;
  schemaPath?: string;
  logger?: Logger;
};

function asRow(value: unknown, table: string): Row {
  if (!isRecord(value)) throw new Error(`Unexpected ${table} row shape.`);
  return value;
}

function readInt(row: Row, column: string): number {
  const value = row[column];
  if (typeof value === "bigint") return Number(value);
  if (isFiniteNumber(value)) return value;
  throw new Error(`Column ${column} is not a number.`);
}

function readText(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== "string") throw new Error(`Column ${column} is not text.`);
  return value;
}

function readStatus(row: Row): LoginStatus {
  const value = readText(row, "status");
  if (value === "granted" || value === "denied") return value;
  throw new Error(`Unexpected login_session.status: ${value}`);
}

function readMethod(row: Row): LoginMethod {
  const value = readText(row, "method");
  if (value === "password" || value === "zscore" || value === "model") return value;
  throw new Error(`Unexpected login_session.method: ${value}`);
}

function rowToUser(value: unknown): UserRecord {
  const row = asRow(value, "user");
  return {
    id: readInt(row, "id"),
    name: readText(row, "name"),
    createdAt: readText(row, "created_at"),
  };
}

function rowToSession(value: unknown): LoginSessionRecord {
  const row = asRow(value, "login_session");
  return {
    id: readInt(row, "id"),
    userId: readInt(row, "user_id"),
    timestamp: readText(row, "timestamp"),
    status: readStatus(row),
    method: readMethod(row),
  };
}

function rowToSample(value: unknown): KeystrokeSampleRecord {
  const row = asRow(value, "biometric_profile");
  const id = readInt(row, "id");
  const features = parseKeystrokeFeatures(JSON.parse(readText(row, "features")));
  if (!features) {
    throw new Error(`biometric_profile row ${id} holds an invalid feature vector.`);
  }
  return {
    id,
    userId: readInt(row, "user_id"),
    features,
    createdAt: readText(row, "created_at"),
  };
}

function readCount(value: unknown): number {
  return value === undefined ? 0 : readInt(asRow(value, "count"), "count");
}

/** `run()` reports `changes` and `lastInsertRowid`. */
function readRunResult(value: unknown): { changes: number; lastInsertRowid: number } {
  const row = asRow(value, "run result");
  return { changes: readInt(row, "changes"), lastInsertRowid: readInt(row, "lastInsertRowid") };
}

const isUniqueViolation = (error: unknown): boolean =>
  error instanceof Error &&
  "code" in error &&
  typeof error.code === "string" &&
  error.code.startsWith("SQLITE_CONSTRAINT") &&
  error.message.includes("UNIQUE");

function tallySessions(rows: unknown[]): {
  total: number;
  granted: number;
  byMethod: Record<LoginMethod, number>;
} {
  const byMethod = emptyMethodCounts();
  let total = 0;
  let granted = 0;

  for (const value of rows) {
    const row = asRow(value, "login_session");
    const count = readInt(row, "count");
    byMethod[readMethod(row)] += count;
    total += count;
    if (readStatus(row) === "granted") granted += count;
  }

  return { total, granted, byMethod };
}

export class SqliteAdapter implements StorageAdapter {
  private readonly db: Connection;
  private readonly logger: Logger;
  private readonly lockRetryAttempts: number;
  private readonly lockRetryDelayMs: number;

  constructor(options: SqliteAdapterOptions) {
    if (options.filename !== ":memory:") {
      fs.mkdirSync(path.dirname(path.resolve(options.filename)), { recursive: true });
    }

    this.db = new Database(options.filename, {});
    this.logger = options.logger ?? silentLogger;
    this.lockRetryAttempts = options.lockRetryAttempts ?? 5;
    this.lockRetryDelayMs = options.lockRetryDelayMs ?? 50;

    try {
      this.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 5000}`);
      this.pragma(`journal_mode = ${options.journalMode ?? "WAL"}`);
      this.pragma("foreign_keys = ON");
      this.db.exec(fs.readFileSync(options.schemaPath ?? SCHEMA_PATH, "utf8"));
    } catch (error) {
      this.db.close();
      throw error;
    }
  }

  async registerUser(registration: NewRegistration): Promise<UserRecord> {
    try {
      return await this.withRetry(() =>
        this.inTransaction(() => {
          const userId = readRunResult(
            this.db
              .prepare('INSERT INTO "user" (name, created_at) VALUES (?, ?)')
              .run(registration.name, registration.createdAt)
          ).lastInsertRowid;

          this.db
            .prepare("INSERT INTO user_registration (user_id, password_hash, registered_at) VALUES (?, ?, ?)")
            .run(userId, registration.passwordHash, registration.createdAt);

          const insertSample = this.db.prepare(
            "INSERT INTO biometric_profile (user_id, features, created_at) VALUES (?, ?, ?)"
          );
          for (const features of registration.samples) {
            insertSample.run(userId, JSON.stringify(features), registration.createdAt);
          }

          return { id: userId, name: registration.name, createdAt: registration.createdAt };
        })
      );
    } catch (error) {
      if (isUniqueViolation(error)) throw new UsernameTakenError(registration.name);
      throw error;
    }
  }

  async findUserByName(name: string): Promise<UserRecord | null> {
    const row: unknown = await this.withRetry(() =>
      this.db.prepare('SELECT id, name, created_at FROM "user" WHERE name = ?').get(name)
    );
    return row === undefined ? null : rowToUser(row);
  }

  async getPasswordHash(userId: number): Promise<string | null> {
    const row: unknown = await this.withRetry(() =>
      this.db.prepare("SELECT password_hash FROM user_registration WHERE user_id = ?").get(userId)
    );
    return row === undefined ? null : readText(asRow(row, "user_registration"), "password_hash");
  }

  async listKeystrokeSamples(userId: number, limit: number): Promise<KeystrokeSampleRecord[]> {
    const rows: unknown[] = await this.withRetry(() =>
      this.db
        .prepare(
          "SELECT id, user_id, features, created_at FROM biometric_profile WHERE user_id = ? ORDER BY id DESC LIMIT ?"
        )
        .all(userId, limit)
    );
    return rows.map(rowToSample);
  }

  async appendKeystrokeSample(
    userId: number,
    features: KeystrokeFeatures,
    createdAt: string
  ): Promise<KeystrokeSampleRecord> {
    const result = await this.withRetry(() =>
      readRunResult(
        this.db
          .prepare("INSERT INTO biometric_profile (user_id, features, created_at) VALUES (?, ?, ?)")
          .run(userId, JSON.stringify(features), createdAt)
      )
    );
    return {
      id: result.lastInsertRowid,
      userId,
      features: { ...features },
      createdAt,
    };
  }

  async recordLoginSession(session: NewLoginSession): Promise<LoginSessionRecord> {
    const result = await this.withRetry(() =>
      readRunResult(
        this.db
          .prepare("INSERT INTO login_session (user_id, timestamp, status, method) VALUES (?, ?, ?, ?)")
          .run(session.userId, session.timestamp, session.status, session.method)
      )
    );
    return { id: result.lastInsertRowid, ...session };
  }

  async getOverviewStats(): Promise<OverviewStats> {
    return this.withRetry(() => {
      const users = readCount(this.db.prepare('SELECT COUNT(*) AS count FROM "user"').get());
      const samples = readCount(this.db.prepare("SELECT COUNT(*) AS count FROM biometric_profile").get());
      const sessions = tallySessions(
        this.db.prepare("SELECT status, method, COUNT(*) AS count FROM login_session GROUP BY status, method").all()
      );

      return {
        userCount: users,
        sampleCount: samples,
        sessionCount: sessions.total,
        sessionsByStatus: {
          granted: sessions.granted,
          denied: sessions.total - sessions.granted,
        },
        sessionsByMethod: sessions.byMethod,
        successRate: successRate(sessions.granted, sessions.total),
      };
    });
  }

  async getUserDashboard(userId: number, recentLimit: number): Promise<UserDashboardStats | null> {
    return this.withRetry(() => {
      const user: unknown = this.db.prepare('SELECT id, name, created_at FROM "user" WHERE id = ?').get(userId);
      if (user === undefined) return null;

      const samples = readCount(
        this.db.prepare("SELECT COUNT(*) AS count FROM biometric_profile WHERE user_id = ?").get(userId)
      );
      const sessions = tallySessions(
        this.db
          .prepare(
            "SELECT status, method, COUNT(*) AS count FROM login_session WHERE user_id = ? GROUP BY status, method"
          )
          .all(userId)
      );
      const lastGranted = asRow(
        this.db
          .prepare("SELECT MAX(timestamp) AS last FROM login_session WHERE user_id = ? AND status = 'granted'")
          .get(userId),
        "login_session"
      ).last;
      const recent: unknown[] = this.db
        .prepare(
          "SELECT id, user_id, timestamp, status, method FROM login_session WHERE user_id = ? ORDER BY id DESC LIMIT ?"
        )
        .all(userId, recentLimit);

      return {
        user: rowToUser(user),
        sampleCount: samples,
        attempts: {
          total: sessions.total,
          granted: sessions.granted,
          denied: sessions.total - sessions.granted,
        },
        sessionsByMethod: sessions.byMethod,
        lastGrantedAt: typeof lastGranted === "string" ? lastGranted : null,
        recentSessions: recent.map(rowToSession),
      };
    });
  }

  async deleteUser(userId: number): Promise<boolean> {
    const result = await this.withRetry(() =>
      readRunResult(this.db.prepare('DELETE FROM "user" WHERE id = ?').run(userId))
    );
    return result.changes > 0;
  }

  async purgeLoginSessionsBefore(timestamp: string): Promise<number> {
    const result = await this.withRetry(() =>
      readRunResult(this.db.prepare("DELETE FROM login_session WHERE timestamp < ?").run(timestamp))
    );
    return result.changes;
  }

  async ping(): Promise<boolean> {
    try {
      const row: unknown = await this.withRetry(() => this.db.prepare("SELECT 1 AS ok").get());
      return isRecord(row) && readInt(row, "ok") === 1;
    } catch (error) {
      this.logger.warn("database ping failed", { error: String(error) });
      return false;
    }
  }

  journalMode(): string {
    const row: unknown = this.pragma("journal_mode");
    return isRecord(row) ? String(row.journal_mode) : "unknown";
  }

  close(): void {
    this.db.close();
  }

  private pragma(statement: string): unknown {
    return this.db.prepare(`PRAGMA ${statement}`).get();
  }

  private inTransaction<T>(fn: () => T): T {
    this.db.exec("BEGIN IMMEDIATE");
    try {
      const result = fn();
      this.db.exec("COMMIT");
      return result;
    } catch (error) {
      this.db.exec("ROLLBACK");
      throw error;
    }
  }

  private withRetry<T>(fn: () => T): Promise<T> {
    return withLockRetry(fn, {
      attempts: this.lockRetryAttempts,
      baseDelayMs: this.lockRetryDelayMs,
      onRetry: (attempt, error, delayMs) => {
        this.logger.warn("database locked, retrying", {
          attempt,
          delayMs,
          error: error instanceof Error ? error.message : String(error),
        });
      },
    });
  }
}
