import { describe, it, expect, afterAll } from "vitest";

import { buildServer } from "../src/server";

describe("GET /healthz", () => {
  const app = buildServer({
    gate: {
      app: "shop",
      outcome: "migrated",
      appliedIds: [20240101120000],
      checkedAt: "2026-01-01T00:00:00.000Z",
    },
  });

  afterAll(async () => {
    await app.close();
  });

  it("reports the gate outcome", async () => {
    const response = await app.inject({ method: "GET", url: "/healthz" });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.ok).toBe(true);
    expect(body.service).toBe("boot-gate");
    expect(body.gate).toEqual({
      app: "shop",
      outcome: "migrated",
      appliedIds: [20240101120000],
      checkedAt: "2026-01-01T00:00:00.000Z",
    });
  });

  it("allows cross-origin callers", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/healthz",
      headers: { origin: "http://example.test" },
    });

    expect(response.headers["access-control-allow-origin"]).toBe("http://example.test");
  });
});
