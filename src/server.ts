// Load environment variables from .env file (local development only)
import "dotenv/config";

import Fastify from "fastify";
import { config } from "./config/index.js";
import { ROUTE_TIMEOUT_MS, LLM_TIMEOUT_MS } from "./config/timeouts.js";
import { getAdapter } from "./adapters/llm/router.js";
import { closeRedis, redisHealthProbe } from "./platform/redis.js";
import { createServiceDeps, type ServiceDeps } from "./orchestrator/deps.js";
import turnRoute from "./routes/npc.v1.turn.js";
import npcRoutes from "./routes/npc.v1.npcs.js";
import ambientRoute from "./routes/npc.v1.ambient.js";
import { listRoles } from "./roles/roster.js";
import { SERVICE_VERSION } from "./version.js";
import { getOrGenerateRequestId, getRequestId, REQUEST_ID_HEADER } from "./utils/request-id.js";
import { buildErrorV1, toErrorV1, getStatusCodeForErrorCode } from "./utils/errors.js";
import { createLoggerConfig } from "./utils/logger-config.js";
import { closeTelemetry } from "./utils/telemetry.js";

const SERVICE_NAME = "npc-dialogue-service";

/**
 * Build and configure Fastify server instance
 * (Can be imported for testing or run directly)
 */
export async function build(deps: ServiceDeps = createServiceDeps()) {
  // Fail-fast: Verify LLM provider and API key configuration
  const llmProvider = config.llm.provider;
  if (llmProvider === "openai" && !config.llm.openaiApiKey) {
    throw new Error("FATAL: LLM_PROVIDER=openai but OPENAI_API_KEY is not set");
  }
  if (llmProvider === "anthropic" && !config.llm.anthropicApiKey) {
    throw new Error("FATAL: LLM_PROVIDER=anthropic but ANTHROPIC_API_KEY is not set");
  }

  const app = Fastify({
    logger: createLoggerConfig(config.server.logLevel),
    bodyLimit: config.server.bodyLimitBytes,
    connectionTimeout: ROUTE_TIMEOUT_MS,
    requestTimeout: ROUTE_TIMEOUT_MS,
    genReqId: getOrGenerateRequestId,
  });

  // Response hook: Add X-Request-Id header to every response
  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, getRequestId(request));
    return payload;
  });

  app.setErrorHandler((error, request, reply) => {
    const errorV1 = toErrorV1(error, request);
    const statusCode = getStatusCodeForErrorCode(errorV1.code);

    if (statusCode >= 500) {
      app.log.error(
        { error, request_id: errorV1.request_id, method: request.method, url: request.url },
        `[${errorV1.code}] ${errorV1.message}`,
      );
    } else {
      app.log.warn(
        { request_id: errorV1.request_id, code: errorV1.code, method: request.method, url: request.url },
        `[${errorV1.code}] ${errorV1.message}`,
      );
    }

    return reply.status(statusCode).send(errorV1);
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send(buildErrorV1("NOT_FOUND", "Not found", undefined, getRequestId(request)));
  });

  // Idle turn contexts are also dropped lazily on lookup; this sweep bounds memory
  const sweep = setInterval(() => {
    deps.registry.cleanup();
  }, config.orchestrator.contextIdleTimeoutMs);
  sweep.unref();

  app.addHook("onClose", async () => {
    clearInterval(sweep);
  });

  app.get("/healthz", async () => {
    const adapter = getAdapter("dialogue");
    return {
      ok: true,
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      provider: adapter.name,
      model: adapter.model,
      redis: (await redisHealthProbe()) ? "connected" : "in-memory",
      reflection_enabled: config.orchestrator.reflectionEnabled,
      affinity_enabled: config.relationship.enabled,
      active_contexts: deps.registry.size,
    };
  });

  await turnRoute(app, deps);
  await npcRoutes(app, deps);
  await ambientRoute(app, deps);

  return app;
}

// If running directly (not imported), start the server
if (import.meta.url === `file://${process.argv[1]}`) {
  const port = config.server.port;

  build()
    .then(async (app) => {
      // Fail-fast: a broken roster should stop startup, not every request
      const npcCount = listRoles().length;
      const adapter = getAdapter("dialogue");
      app.log.info(
        {
          service: SERVICE_NAME,
          version: SERVICE_VERSION,
          provider: adapter.name,
          model: adapter.model,
          npc_count: npcCount,
          body_limit_mb: (config.server.bodyLimitBytes / 1024 / 1024).toFixed(1),
          route_timeout_ms: ROUTE_TIMEOUT_MS,
          llm_timeout_ms: LLM_TIMEOUT_MS,
          parallel_retrieval: config.orchestrator.parallelRetrieval,
          reflection_enabled: config.orchestrator.reflectionEnabled,
        },
        "NPC dialogue service starting",
      );

      const shutdown = (signal: string) => {
        app.log.info({ signal }, "Shutting down");
        app
          .close()
          .then(() => Promise.all([closeRedis(), closeTelemetry()]))
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            app.log.error({ error }, "Shutdown failed");
            process.exit(1);
          });
      };
      process.once("SIGTERM", shutdown);
      process.once("SIGINT", shutdown);

      await app.listen({ port, host: "0.0.0.0" });
    })
    .catch((err: unknown) => {
      console.error("Failed to start server:", err);
      process.exit(1);
    });
}
