import { vi } from "vitest";
import type { KeystrokeFeatures } from "@keyprint/core";
import type { Logger } from "../logger";
import type { PasswordHasher } from "../services/passwordHasher";

export const NOW_ISO = "2026-01-01T10:00:00.000Z";

export const BASE_FEATURES: KeystrokeFeatures = {
  keystrokeCount: 20,
  digraphCount: 19,
  durationMs: 4000,
  holdMeanMs: 100,
  holdStdMs: 12,
  flightMeanMs: 60,
  flightStdMs: 15,
  ddMeanMs: 160,
  ddStdMs: 20,
  udMeanMs: 60,
  udStdMs: 15,
  uuMeanMs: 160,
  uuStdMs: 20,
  typingSpeedCharsPerSec: 5,
  errorRate: 0.02,
  backspaceRate: 0.01,
};

// hold z = 5 against identical samples: distance = sqrt(5), similarity ≈ 0.457
export const FAR_FEATURES: KeystrokeFeatures = { ...BASE_FEATURES, holdMeanMs: 140 };

/** Stand-in for bcrypt so endpoint tests stay fast. */
export const plainHasher: PasswordHasher = {
  hash: async (password) => `plain:${password}`,
  verify: async (password, hash) => hash === `plain:${password}`,
};

export function createSpyLogger(): Logger & {
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
} {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}
