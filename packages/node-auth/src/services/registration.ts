import type { KeystrokeFeatures, UserRecord } from "@keyprint/core";
import type { Logger } from "../logger";
import type { StorageAdapter } from "../storage/adapter";
import type { PasswordHasher } from "./passwordHasher";

export type RegisterUserInput = {
  username: string;
  password: string;
  samples: KeystrokeFeatures[];
};

export type RegisterUserResult = {
  user: UserRecord;
  sampleCount: number;
};

/** Throws UsernameTakenError from the storage layer when the name exists. */
export async function registerUser(args: {
  input: RegisterUserInput;
  storage: StorageAdapter;
  passwordHasher: PasswordHasher;
  nowIso: string;
  logger: Logger;
}): Promise<RegisterUserResult> {
  const passwordHash = await args.passwordHasher.hash(args.input.password);
  const user = await args.storage.registerUser({
    name: args.input.username,
    passwordHash,
    samples: args.input.samples,
    createdAt: args.nowIso,
  });

  args.logger.info("user registered", {
    userId: user.id,
    username: user.name,
    samples: args.input.samples.length,
  });

  return { user, sampleCount: args.input.samples.length };
}
