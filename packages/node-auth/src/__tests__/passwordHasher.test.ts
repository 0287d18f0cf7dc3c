import { describe, expect, it } from "vitest";
import { createBcryptHasher } from "../services/passwordHasher";

describe("bcrypt password hasher", () => {
  it("hashes with a salt and verifies", async () => {
    const hasher = createBcryptHasher(4);

    const first = await hasher.hash("correct-horse");
    const second = await hasher.hash("correct-horse");

    expect(first).toMatch(/^\$2[aby]\$04\$/);
    expect(first).not.toBe(second);
    expect(await hasher.verify("correct-horse", first)).toBe(true);
    expect(await hasher.verify("wrong-horse", first)).toBe(false);
  });
});
