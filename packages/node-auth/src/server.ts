import express from "express";
import cors from "cors";
import type { HybridPolicy, KeystrokeClassifier } from "@keyprint/core";
import { DEFAULT_CONFIG } from "./config";
import { createErrorHandler, notFoundHandler } from "./errors";
import { silentLogger, type Logger } from "./logger";
import { createAuthRouter } from "./routes/auth";
import { createDashboardRouter } from "./routes/dashboard";
import { createHealthRouter } from "./routes/health";
import { createBcryptHasher, type PasswordHasher } from "./services/passwordHasher";
import type { StorageAdapter } from "./storage/adapter";
import { InMemoryAdapter } from "./storage/inMemoryAdapter";

export type CreateAppOptions = {
  storage?: StorageAdapter;
  passwordHasher?: PasswordHasher;
  classifier?: KeystrokeClassifier | null;
  modelUsers?: ReadonlySet<string>;
  policy?: HybridPolicy;
  logger?: Logger;
  nowFnIso?: () => string;
  maxProfileSamples?: number;
  appendSampleOnSuccess?: boolean;
};

export function createApp(options: CreateAppOptions = {}) {
  const storage = options.storage ?? new InMemoryAdapter();
  const logger = options.logger ?? silentLogger;

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  app.use(createHealthRouter({ storage }));
  app.use(
    createAuthRouter({
      storage,
      passwordHasher: options.passwordHasher ?? createBcryptHasher(DEFAULT_CONFIG.bcryptRounds),
      modelUsers: options.modelUsers ?? new Set<string>(),
      classifier: options.classifier ?? null,
      policy: options.policy,
      maxProfileSamples: options.maxProfileSamples ?? DEFAULT_CONFIG.maxProfileSamples,
      appendSampleOnSuccess: options.appendSampleOnSuccess ?? DEFAULT_CONFIG.appendSampleOnSuccess,
      nowFnIso: options.nowFnIso ?? (() => new Date().toISOString()),
      logger,
    })
  );
  app.use(createDashboardRouter({ storage }));

  app.use(notFoundHandler);
  app.use(createErrorHandler(logger));

  return app;
}
