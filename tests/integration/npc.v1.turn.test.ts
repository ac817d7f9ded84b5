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
import { createServiceDeps, type ServiceDeps } from "../../src/orchestrator/deps.js";
import { ContextRegistry } from "../../src/orchestrator/context/registry.js";
import { TurnCoordinator } from "../../src/orchestrator/coordinator.js";
import { unconfigured } from "../../src/orchestrator/types.js";
import { AmbientLineGenerator } from "../../src/dialogue/ambient.js";
import { FixturesAdapter } from "../../src/adapters/llm/fixtures.js";
import { SERVICE_VERSION } from "../../src/version.js";
import { FakeGenerator, FakeShortTermStore, makeProfile } from "../helpers/npc-fakes.js";

const ADA_FIXTURE_REPLY = "Hello! I'm Ada. (Fixture mode: set LLM_PROVIDER and an API key to enable real dialogue.)";

describe("POST /npc/v1/turn (fixtures provider)", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await build(createServiceDeps());
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it("runs a full turn and returns the reply with per-stage flags", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/npc/v1/turn",
      headers: { "x-request-id": "turn-test-1" },
      payload: { npc: "ada", player_id: "p-turn", message: "  Hello there  " },
    });

    expect(res.statusCode).toBe(200);
    expect(res.headers["x-request-id"]).toBe("turn-test-1");
    const body = res.json();
    expect(body).toMatchObject({
      reply: ADA_FIXTURE_REPLY,
      affinity_score: 50,
      affinity_changed: false,
      revised: false,
      stages: {
        memory: true,
        affinity: true,
        dialogue: true,
        reflection: true,
        affinity_update: true,
        memory_save: true,
      },
      diagnostics: [],
      request_id: "turn-test-1",
    });
    expect(typeof body.elapsed_ms).toBe("number");
  });

  it("defaults the player id", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/npc/v1/turn",
      payload: { npc: "cleo", message: "Nice sketch" },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json().reply).toBe(
      "Hello! I'm Cleo. (Fixture mode: set LLM_PROVIDER and an API key to enable real dialogue.)",
    );
  });

  it("rejects a blank message", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/npc/v1/turn",
      payload: { npc: "ada", message: "   " },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ schema: "error.v1", code: "BAD_INPUT", message: "Validation failed" });
  });

  it("rejects an unknown NPC", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/npc/v1/turn",
      payload: { npc: "zed", message: "hi" },
    });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toMatchObject({ code: "NOT_FOUND", message: "Unknown NPC: zed" });
  });

  it("answers unknown routes with error.v1", async () => {
    const res = await app.inject({ method: "GET", url: "/npc/v1/nope" });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toMatchObject({ schema: "error.v1", code: "NOT_FOUND" });
  });

  it("reports service health", async () => {
    const res = await app.inject({ method: "GET", url: "/healthz" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      ok: true,
      service: "npc-dialogue-service",
      version: SERVICE_VERSION,
      provider: "fixtures",
      model: "fixture-v1",
      redis: "in-memory",
      reflection_enabled: true,
      affinity_enabled: true,
    });
  });
});

describe("POST /npc/v1/turn (generation failure)", () => {
  let app: FastifyInstance;
  let shortTerm: FakeShortTermStore;

  beforeAll(async () => {
    shortTerm = new FakeShortTermStore();
    const generator = new FakeGenerator();
    generator.failWith = new Error("model unavailable");
    const registry = new ContextRegistry({ idleTimeoutMs: 60_000, maxEntries: 10 });
    const profile = makeProfile();

    const deps: ServiceDeps = {
      coordinator: new TurnCoordinator(
        { shortTerm, episodic: () => unconfigured(), relationships: unconfigured(), generator, reviewer: unconfigured() },
        registry,
        { reflectionEnabled: true, parallelRetrieval: true, episodicTopK: 3, llmTimeoutMs: 1000 },
      ),
      registry,
      shortTerm,
      relationships: unconfigured(),
      roles: { get: (id) => (id === profile.id ? profile : null), list: () => [profile] },
      ambient: new AmbientLineGenerator(new FixturesAdapter()),
    };

    app = await build(deps);
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it("returns 502 with the stage flags and stores nothing", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/npc/v1/turn",
      payload: { npc: "ada", player_id: "p1", message: "hello" },
    });

    expect(res.statusCode).toBe(502);
    expect(res.json()).toMatchObject({
      schema: "error.v1",
      code: "UPSTREAM_FAILED",
      message: "dialogue generation failed: model unavailable",
      details: {
        stages: {
          memory: true,
          affinity: true,
          dialogue: false,
          reflection: false,
          affinity_update: false,
          memory_save: false,
        },
        diagnostics: [],
      },
    });
    expect(shortTerm.turns("ada", "p1")).toEqual([]);
  });
});
