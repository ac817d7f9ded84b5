import { describe, it, expect, beforeAll, afterAll, vi } from "vitest";
import type { FastifyInstance } from "fastify";

vi.stubEnv("LLM_PROVIDER", "fixtures");

vi.mock("../../src/platform/redis.js", () => ({
  getRedis: vi.fn(() => Promise.resolve(null)),
  isRedisAvailable: vi.fn(() => false),
  redisHealthProbe: vi.fn(() => Promise.resolve(false)),
  closeRedis: vi.fn(() => Promise.resolve()),
}));

import { build } from "../../src/server.js";
import { createServiceDeps } from "../../src/orchestrator/deps.js";

describe("GET /npc/v1/ambient (fixtures provider)", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await build(createServiceDeps());
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it("returns one line per roster NPC from a single batch", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/npc/v1/ambient?scene=Release%20day",
      headers: { "x-request-id": "ambient-1" },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body).toMatchObject({
      scene: "Release day",
      source: "llm",
      lines: [
        { npc: "ada", name: "Ada", line: "Ada is getting on with the day." },
        { npc: "bruno", name: "Bruno", line: "Bruno is getting on with the day." },
        { npc: "cleo", name: "Cleo", line: "Cleo is getting on with the day." },
      ],
      request_id: "ambient-1",
    });
    expect(["morning", "noon", "afternoon", "evening"]).toContain(body.period);
  });

  it("rejects an overlong scene", async () => {
    const res = await app.inject({ method: "GET", url: `/npc/v1/ambient?scene=${"x".repeat(501)}` });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ code: "BAD_INPUT" });
  });
});
