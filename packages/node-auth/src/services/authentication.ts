import {
  decideHybrid,
  type HybridDecision,
  type HybridPolicy,
  type KeystrokeClassifier,
  type LoginSessionRecord,
  type ResolvedKeystroke,
  type UserRecord,
} from "@keyprint/core";
import { describeError, type Logger } from "../logger";
import type { StorageAdapter } from "../storage/adapter";
import type { PasswordHasher } from "./passwordHasher";

export type AuthenticateResult =
  | { outcome: "unknown_user" }
  | { outcome: "invalid_password"; user: UserRecord; session: LoginSessionRecord }
  | {
      outcome: "decided";
      user: UserRecord;
      decision: HybridDecision;
      session: LoginSessionRecord;
      sampleAppended: boolean;
    };

export type AuthenticateArgs = {
  username: string;
  password: string;
  keystroke: ResolvedKeystroke;
  storage: StorageAdapter;
  passwordHasher: PasswordHasher;
  modelUsers: ReadonlySet<string>;
  classifier: KeystrokeClassifier | null;
  policy?: HybridPolicy;
  maxProfileSamples: number;
  appendSampleOnSuccess: boolean;
  nowIso: string;
  logger: Logger;
};

export async function authenticate(args: AuthenticateArgs): Promise<AuthenticateResult> {
  const user = await args.storage.findUserByName(args.username);
  if (!user) {
    args.logger.info("login rejected", { username: args.username, reason: "unknown_user" });
    return { outcome: "unknown_user" };
  }

  const passwordHash = await args.storage.getPasswordHash(user.id);
  const passwordOk = passwordHash !== null && (await args.passwordHasher.verify(args.password, passwordHash));
  if (!passwordOk) {
    const session = await args.storage.recordLoginSession({
      userId: user.id,
      timestamp: args.nowIso,
      status: "denied",
      method: "password",
    });
    args.logger.info("login decision", {
      username: user.name,
      method: "password",
      status: "denied",
    });
    return { outcome: "invalid_password", user, session };
  }

  const stored = await args.storage.listKeystrokeSamples(user.id, args.maxProfileSamples);
  const decision = await decideHybrid({
    username: user.name,
    features: args.keystroke.features,
    storedSamples: stored.map((sample) => sample.features),
    modelUsers: args.modelUsers,
    classifier: args.classifier,
    policy: args.policy,
    reasons: args.keystroke.reasons,
    onModelError: (error) => {
      args.logger.warn("classifier failed, falling back to z-score", {
        username: user.name,
        ...describeError(error),
      });
    },
  });

  const session = await args.storage.recordLoginSession({
    userId: user.id,
    timestamp: args.nowIso,
    status: decision.granted ? "granted" : "denied",
    method: decision.method,
  });

  let sampleAppended = false;
  if (decision.granted && args.appendSampleOnSuccess) {
    await args.storage.appendKeystrokeSample(user.id, args.keystroke.features, args.nowIso);
    sampleAppended = true;
  }

  args.logger.info("login decision", {
    username: user.name,
    method: decision.method,
    status: session.status,
    score: decision.score,
    threshold: decision.threshold,
  });

  return { outcome: "decided", user, decision, session, sampleAppended };
}
