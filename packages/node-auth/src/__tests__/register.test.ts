import request from "supertest";
import { describe, expect, it } from "vitest";
import { createApp } from "../server";
import { InMemoryAdapter } from "../storage/inMemoryAdapter";
import { BASE_FEATURES, NOW_ISO, plainHasher } from "./helpers";

function buildApp(storage = new InMemoryAdapter()) {
  return createApp({ storage, passwordHasher: plainHasher, nowFnIso: () => NOW_ISO });
}

describe("POST /register", () => {
  it("creates the user with its enrolment samples", async () => {
    const storage = new InMemoryAdapter();
    const app = buildApp(storage);

    const response = await request(app)
      .post("/register")
      .send({ username: "  carol ", password: "correct-horse", keystrokeSamples: [BASE_FEATURES, BASE_FEATURES] });

    expect(response.status).toBe(201);
    expect(response.body).toEqual({
      ok: true,
      userId: 1,
      username: "carol",
      sampleCount: 2,
      createdAt: NOW_ISO,
    });
    expect(await storage.getPasswordHash(1)).toBe("plain:correct-horse");
    expect(await storage.listKeystrokeSamples(1, 50)).toHaveLength(2);
  });

  it("rejects a taken username with 409", async () => {
    const app = buildApp();
    const body = { username: "carol", password: "correct-horse", keystrokeSamples: [BASE_FEATURES] };

    await request(app).post("/register").send(body);
    const response = await request(app).post("/register").send(body);

    expect(response.status).toBe(409);
    expect(response.body.error.code).toBe("USERNAME_TAKEN");
  });

  it("validates username, password and samples", async () => {
    const app = buildApp();

    const shortName = await request(app)
      .post("/register")
      .send({ username: "ab", password: "correct-horse", keystrokeSamples: [BASE_FEATURES] });
    expect(shortName.status).toBe(400);
    expect(shortName.body.error.code).toBe("VALIDATION_ERROR");
    expect(shortName.body.error.details).toEqual({ field: "username" });

    const shortPassword = await request(app)
      .post("/register")
      .send({ username: "carol", password: "short", keystrokeSamples: [BASE_FEATURES] });
    expect(shortPassword.status).toBe(400);
    expect(shortPassword.body.error.details).toEqual({ field: "password" });

    const noSamples = await request(app)
      .post("/register")
      .send({ username: "carol", password: "correct-horse", keystrokeSamples: [] });
    expect(noSamples.status).toBe(400);
    expect(noSamples.body.error.details).toEqual({ field: "keystrokeSamples" });

    const badSample = await request(app)
      .post("/register")
      .send({
        username: "carol",
        password: "correct-horse",
        keystrokeSamples: [BASE_FEATURES, { ...BASE_FEATURES, holdMeanMs: -1 }],
      });
    expect(badSample.status).toBe(400);
    expect(badSample.body.error.details).toEqual({ field: "keystrokeSamples[1]" });
  });

  it("refuses raw enrolment samples with fewer than 3 keystrokes", async () => {
    const storage = new InMemoryAdapter();
    const app = buildApp(storage);
    const twoPresses = [
      { code: "KeyA", type: "down", t: 0 },
      { code: "KeyA", type: "up", t: 90 },
      { code: "KeyB", type: "down", t: 130 },
      { code: "KeyB", type: "up", t: 230 },
    ];

    const empty = await request(app)
      .post("/register")
      .send({ username: "carol", password: "correct-horse", keystrokeSamples: [{ events: [] }] });
    expect(empty.status).toBe(400);
    expect(empty.body.error).toEqual({
      code: "VALIDATION_ERROR",
      message: "keystrokeSamples[0] must contain at least 3 keystrokes.",
      details: { field: "keystrokeSamples[0]" },
    });

    const short = await request(app)
      .post("/register")
      .send({
        username: "carol",
        password: "correct-horse",
        keystrokeSamples: [BASE_FEATURES, { events: twoPresses }],
      });
    expect(short.status).toBe(400);
    expect(short.body.error.details).toEqual({ field: "keystrokeSamples[1]" });

    expect(await storage.findUserByName("carol")).toBeNull();
  });

  it("caps passwords at the 72 bytes bcrypt reads", async () => {
    const app = buildApp();
    const send = (password: string) =>
      request(app).post("/register").send({ username: "carol", password, keystrokeSamples: [BASE_FEATURES] });

    const tooLong = await send("é".repeat(37));
    expect(tooLong.status).toBe(400);
    expect(tooLong.body.error).toEqual({
      code: "VALIDATION_ERROR",
      message: "password must be at least 8 characters and at most 72 bytes.",
      details: { field: "password" },
    });

    const atLimit = await send("x".repeat(72));
    expect(atLimit.status).toBe(201);
  });

  it("extracts features from raw keystroke samples", async () => {
    const storage = new InMemoryAdapter();
    const app = buildApp(storage);
    const events = [
      { key: "a", code: "KeyA", type: "down", t: 0 },
      { key: "a", code: "KeyA", type: "up", t: 90 },
      { key: "b", code: "KeyB", type: "down", t: 130 },
      { key: "b", code: "KeyB", type: "up", t: 230 },
      { key: "c", code: "KeyC", type: "down", t: 270 },
      { key: "c", code: "KeyC", type: "up", t: 380 },
    ];

    const response = await request(app)
      .post("/register")
      .send({ username: "carol", password: "correct-horse", keystrokeSamples: [{ events }] });

    expect(response.status).toBe(201);
    const [sample] = await storage.listKeystrokeSamples(1, 50);
    expect(sample.features.keystrokeCount).toBe(3);
    expect(sample.features.holdMeanMs).toBe(100);
    expect(sample.features.udMeanMs).toBe(40);
  });

  it("answers malformed JSON with INVALID_JSON", async () => {
    const response = await request(buildApp())
      .post("/register")
      .set("Content-Type", "application/json")
      .send('{"username":');

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      error: { code: "INVALID_JSON", message: "Request body is not valid JSON." },
    });
  });
});
