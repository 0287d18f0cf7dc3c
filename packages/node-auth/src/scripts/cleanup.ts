import { resolveConfig } from "../config";
import { createConsoleLogger, describeError, type Logger } from "../logger";
import type { StorageAdapter } from "../storage/adapter";
import { SqliteAdapter } from "../storage/sqliteAdapter";

export type CleanupArgs = {
  usernames: string[];
  sessionsBefore: string | null;
};

export class CleanupUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CleanupUsageError";
  }
}

const USAGE = "usage: npm run cleanup -- <username>... [--sessions-before <ISO timestamp>]";

export function parseCleanupArgs(argv: string[]): CleanupArgs {
  const usernames: string[] = [];
  let sessionsBefore: string | null = null;

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === "--sessions-before") {
      const value = argv[index + 1];
      if (value === undefined || Number.isNaN(Date.parse(value))) {
        throw new CleanupUsageError("--sessions-before needs an ISO timestamp.");
      }
      sessionsBefore = new Date(value).toISOString();
      index += 1;
    } else if (arg.startsWith("--")) {
      throw new CleanupUsageError(`Unknown option ${arg}.`);
    } else {
      usernames.push(arg);
    }
  }

  if (usernames.length === 0 && sessionsBefore === null) {
    throw new CleanupUsageError(USAGE);
  }
  return { usernames, sessionsBefore };
}

export type CleanupReport = {
  deleted: string[];
  missing: string[];
  sessionsPurged: number;
};

export async function runCleanup(
  storage: StorageAdapter,
  args: CleanupArgs,
  logger: Logger
): Promise<CleanupReport> {
  const report: CleanupReport = { deleted: [], missing: [], sessionsPurged: 0 };

  for (const username of args.usernames) {
    const user = await storage.findUserByName(username);
    if (user && (await storage.deleteUser(user.id))) {
      report.deleted.push(username);
      logger.info("user deleted", { username, userId: user.id });
    } else {
      report.missing.push(username);
      logger.warn("user not found", { username });
    }
  }

  if (args.sessionsBefore !== null) {
    report.sessionsPurged = await storage.purgeLoginSessionsBefore(args.sessionsBefore);
    logger.info("login sessions purged", {
      before: args.sessionsBefore,
      count: report.sessionsPurged,
    });
  }

  return report;
}

async function main(): Promise<void> {
  const config = resolveConfig();
  const logger = createConsoleLogger("keyprint:cleanup", config.logLevel);

  let args: CleanupArgs;
  try {
    args = parseCleanupArgs(process.argv.slice(2));
  } catch (error) {
    if (!(error instanceof CleanupUsageError)) throw error;
    logger.error(error.message);
    process.exitCode = 2;
    return;
  }

  const storage = new SqliteAdapter({
    filename: config.databasePath,
    journalMode: config.journalMode,
    busyTimeoutMs: config.busyTimeoutMs,
    lockRetryAttempts: config.lockRetryAttempts,
    lockRetryDelayMs: config.lockRetryDelayMs,
    logger,
  });

  try {
    const report = await runCleanup(storage, args, logger);
    if (report.missing.length > 0) process.exitCode = 1;
  } finally {
    storage.close();
  }
}

const invokedDirectly = process.argv[1]?.endsWith("cleanup.ts") || process.argv[1]?.endsWith("cleanup.js");
if (invokedDirectly) {
  main().catch((error: unknown) => {
    createConsoleLogger("keyprint:cleanup").error("cleanup failed", describeError(error));
    process.exit(1);
  });
}
