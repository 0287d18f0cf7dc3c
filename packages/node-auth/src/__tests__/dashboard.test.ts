import request from "supertest";
import { describe, expect, it } from "vitest";
import { createApp } from "../server";
import { InMemoryAdapter } from "../storage/inMemoryAdapter";
import { BASE_FEATURES, FAR_FEATURES, plainHasher } from "./helpers";

const PASSWORD = "correct-horse";

function clock(): () => string {
  let tick = 0;
  return () => {
    tick += 1;
    return new Date(Date.UTC(2026, 0, 1, 10, 0, tick)).toISOString();
  };
}

async function seed() {
  const storage = new InMemoryAdapter();
  const app = createApp({ storage, passwordHasher: plainHasher, nowFnIso: clock() });

  for (const username of ["carol", "dave"]) {
    await request(app)
      .post("/register")
      .send({ username, password: PASSWORD, keystrokeSamples: [BASE_FEATURES, BASE_FEATURES] })
      .expect(201);
  }

  // carol: granted, wrong password, biometric denial
  await request(app).post("/login").send({ username: "carol", password: PASSWORD, keystroke: BASE_FEATURES });
  await request(app).post("/login").send({ username: "carol", password: "wrong-password", keystroke: BASE_FEATURES });
  await request(app).post("/login").send({ username: "carol", password: PASSWORD, keystroke: FAR_FEATURES });
  // dave: granted
  await request(app).post("/login").send({ username: "dave", password: PASSWORD, keystroke: BASE_FEATURES });

  return { app, storage };
}

describe("dashboard endpoints", () => {
  it("GET /dashboard/overview aggregates every user", async () => {
    const { app } = await seed();

    const response = await request(app).get("/dashboard/overview");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      ok: true,
      overview: {
        userCount: 2,
        sampleCount: 6,
        sessionCount: 4,
        sessionsByStatus: { granted: 2, denied: 2 },
        sessionsByMethod: { password: 1, zscore: 3, model: 0 },
        successRate: 0.5,
      },
    });
  });

  it("GET /dashboard/users/:username summarises one user", async () => {
    const { app } = await seed();

    const response = await request(app).get("/dashboard/users/carol");

    expect(response.status).toBe(200);
    const { dashboard } = response.body;
    expect(dashboard.user).toEqual({ id: 1, name: "carol", createdAt: "2026-01-01T10:00:01.000Z" });
    expect(dashboard.sampleCount).toBe(3);
    expect(dashboard.attempts).toEqual({ total: 3, granted: 1, denied: 2 });
    expect(dashboard.sessionsByMethod).toEqual({ password: 1, zscore: 2, model: 0 });
    expect(dashboard.lastGrantedAt).toBe("2026-01-01T10:00:03.000Z");
    expect(dashboard.recentSessions.map((session: { id: number }) => session.id)).toEqual([3, 2, 1]);
  });

  it("returns 404 for an unknown user", async () => {
    const { app } = await seed();

    const response = await request(app).get("/dashboard/users/mallory");

    expect(response.status).toBe(404);
    expect(response.body.error.code).toBe("USER_NOT_FOUND");
  });

  it("reports an empty system with a zero success rate", async () => {
    const app = createApp({ storage: new InMemoryAdapter(), passwordHasher: plainHasher });

    const response = await request(app).get("/dashboard/overview");

    expect(response.body.overview.successRate).toBe(0);
    expect(response.body.overview.sessionCount).toBe(0);
  });
});
