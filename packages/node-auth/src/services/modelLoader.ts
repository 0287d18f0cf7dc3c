import fs from "node:fs/promises";
import {
  createSoftmaxClassifier,
  parseModelArtifact,
  type KeystrokeClassifier,
} from "@keyprint/core";
import type { Logger } from "../logger";

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** One username per line; `#` starts a comment. */
export function parseModelUsers(text: string): Set<string> {
  const users = new Set<string>();
  for (const line of text.split(/\r?\n/)) {
    const name = line.replace(/#.*$/, "").trim();
    if (name) users.add(name);
  }
  return users;
}

export async function loadModelUsers(filePath: string, logger: Logger): Promise<Set<string>> {
  try {
    return parseModelUsers(await fs.readFile(filePath, "utf8"));
  } catch (error) {
    if (!isMissingFile(error)) throw error;
    logger.warn("model allow-list not found, every user goes through z-score", { path: filePath });
    return new Set();
  }
}

/**
 * Returns null when the artifact file does not exist. A file that exists but
 * does not parse is a startup error.
 */
export async function loadClassifier(filePath: string, logger: Logger): Promise<KeystrokeClassifier | null> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (!isMissingFile(error)) throw error;
    logger.warn("model artifact not found, model branch disabled", { path: filePath });
    return null;
  }

  const classifier = createSoftmaxClassifier(parseModelArtifact(JSON.parse(raw)));
  logger.info("model artifact loaded", { path: filePath, classes: classifier.classes.length });
  return classifier;
}
