import express, { type Request, type Response } from "express";
import type {
  BiometricRejectionDetails,
  HybridPolicy,
  KeystrokeClassifier,
  LoginResponse,
  RegisterResponse,
} from "@keyprint/core";
import { sendError, UsernameTakenError } from "../errors";
import type { Logger } from "../logger";
import { authenticate } from "../services/authentication";
import type { PasswordHasher } from "../services/passwordHasher";
import { registerUser } from "../services/registration";
import type { StorageAdapter } from "../storage/adapter";
import { parseLoginBody, parseRegisterBody } from "./validation";

export interface CreateAuthRouterArgs {
  storage: StorageAdapter;
  passwordHasher: PasswordHasher;
  modelUsers: ReadonlySet<string>;
  classifier: KeystrokeClassifier | null;
  policy?: HybridPolicy;
  maxProfileSamples: number;
  appendSampleOnSuccess: boolean;
  nowFnIso: () => string;
  logger: Logger;
}

export function createAuthRouter(args: CreateAuthRouterArgs) {
  const router = express.Router();

  router.post("/register", async (req: Request, res: Response) => {
    const parsed = parseRegisterBody(req.body);
    if (!parsed.ok) {
      sendError(res, 400, "VALIDATION_ERROR", parsed.message, { field: parsed.field });
      return;
    }

    try {
      const result = await registerUser({
        input: {
          username: parsed.value.username,
          password: parsed.value.password,
          samples: parsed.value.samples.map((sample) => sample.features),
        },
        storage: args.storage,
        passwordHasher: args.passwordHasher,
        nowIso: args.nowFnIso(),
        logger: args.logger,
      });

      const response: RegisterResponse = {
        ok: true,
        userId: result.user.id,
        username: result.user.name,
        sampleCount: result.sampleCount,
        createdAt: result.user.createdAt,
      };
      res.status(201).json(response);
    } catch (error) {
      if (error instanceof UsernameTakenError) {
        sendError(res, 409, "USERNAME_TAKEN", error.message);
        return;
      }
      throw error;
    }
  });

  router.post("/login", async (req: Request, res: Response) => {
    const parsed = parseLoginBody(req.body);
    if (!parsed.ok) {
      sendError(res, 400, "VALIDATION_ERROR", parsed.message, { field: parsed.field });
      return;
    }

    const result = await authenticate({
      username: parsed.value.username,
      password: parsed.value.password,
      keystroke: parsed.value.keystroke,
      storage: args.storage,
      passwordHasher: args.passwordHasher,
      modelUsers: args.modelUsers,
      classifier: args.classifier,
      policy: args.policy,
      maxProfileSamples: args.maxProfileSamples,
      appendSampleOnSuccess: args.appendSampleOnSuccess,
      nowIso: args.nowFnIso(),
      logger: args.logger,
    });

    if (result.outcome !== "decided") {
      sendError(res, 401, "INVALID_CREDENTIALS", "Invalid username or password.");
      return;
    }

    const { decision } = result;
    if (!decision.granted) {
      const details: BiometricRejectionDetails = {
        method: decision.method,
        score: decision.score,
        threshold: decision.threshold,
        reasons: decision.reasons,
      };
      sendError(res, 401, "BIOMETRIC_REJECTED", "Keystroke pattern did not match the profile.", details);
      return;
    }

    const response: LoginResponse = {
      ok: true,
      userId: result.user.id,
      username: result.user.name,
      method: decision.method,
      score: decision.score,
      threshold: decision.threshold,
      reasons: decision.reasons,
      sessionId: result.session.id,
      sampleAppended: result.sampleAppended,
    };
    res.json(response);
  });

  return router;
}
