import { resolveConfig } from "./config";
import { createConsoleLogger, describeError } from "./logger";
import { createApp } from "./server";
import { loadClassifier, loadModelUsers } from "./services/modelLoader";
import { createBcryptHasher } from "./services/passwordHasher";
import { SqliteAdapter } from "./storage/sqliteAdapter";

async function main(): Promise<void> {
  const config = resolveConfig();
  const logger = createConsoleLogger("keyprint", config.logLevel);

  const storage = new SqliteAdapter({
    filename: config.databasePath,
    journalMode: config.journalMode,
    busyTimeoutMs: config.busyTimeoutMs,
    lockRetryAttempts: config.lockRetryAttempts,
    lockRetryDelayMs: config.lockRetryDelayMs,
    logger,
  });
  const modelUsers = await loadModelUsers(config.modelUsersPath, logger);
  const classifier = await loadClassifier(config.modelPath, logger);

  const app = createApp({
    storage,
    passwordHasher: createBcryptHasher(config.bcryptRounds),
    classifier,
    modelUsers,
    policy: {
      zscoreThreshold: config.zscoreThreshold,
      modelMinConfidence: config.modelMinConfidence,
    },
    logger,
    maxProfileSamples: config.maxProfileSamples,
    appendSampleOnSuccess: config.appendSampleOnSuccess,
  });

  const server = app.listen(config.port, () => {
    logger.info(`listening on http://localhost:${config.port}`, {
      database: config.databasePath,
      journalMode: storage.journalMode(),
      modelUsers: modelUsers.size,
      model: classifier ? "loaded" : "unavailable",
    });
  });

  const shutdown = (signal: string): void => {
    logger.info("shutting down", { signal });
    server.close(() => {
      storage.close();
      process.exit(0);
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  createConsoleLogger("keyprint").error("startup failed", describeError(error));
  process.exit(1);
});
