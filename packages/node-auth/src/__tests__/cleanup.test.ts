import { describe, expect, it } from "vitest";
import { CleanupUsageError, parseCleanupArgs, runCleanup } from "../scripts/cleanup";
import { InMemoryAdapter } from "../storage/inMemoryAdapter";
import { BASE_FEATURES, NOW_ISO, createSpyLogger } from "./helpers";

describe("cleanup script", () => {
  it("parses usernames and the session cutoff", () => {
    expect(parseCleanupArgs(["carol", "--sessions-before", "2026-01-02", "dave"])).toEqual({
      usernames: ["carol", "dave"],
      sessionsBefore: "2026-01-02T00:00:00.000Z",
    });
  });

  it("rejects empty or malformed arguments", () => {
    expect(() => parseCleanupArgs([])).toThrow(CleanupUsageError);
    expect(() => parseCleanupArgs(["--sessions-before", "yesterday"])).toThrow(
      "--sessions-before needs an ISO timestamp."
    );
    expect(() => parseCleanupArgs(["--force"])).toThrow("Unknown option --force.");
  });

  it("deletes named users and reports the ones it could not find", async () => {
    const storage = new InMemoryAdapter();
    await storage.registerUser({ name: "carol", passwordHash: "plain:x", samples: [BASE_FEATURES], createdAt: NOW_ISO });
    await storage.recordLoginSession({ userId: 1, timestamp: NOW_ISO, status: "granted", method: "zscore" });

    const report = await runCleanup(
      storage,
      { usernames: ["carol", "mallory"], sessionsBefore: null },
      createSpyLogger()
    );

    expect(report).toEqual({ deleted: ["carol"], missing: ["mallory"], sessionsPurged: 0 });
    expect(await storage.getOverviewStats()).toMatchObject({ userCount: 0, sampleCount: 0, sessionCount: 0 });
  });
});
