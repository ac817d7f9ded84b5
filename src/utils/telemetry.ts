import { env } from "node:process";
import pino from "pino";
import { StatsD } from "hot-shots";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret redaction
 *
 * SECURITY: Redaction paths centralized in src/utils/logger-config.ts
 * so both Fastify and standalone Pino loggers stay in sync.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

export type TelemetryData = Record<string, unknown>;

type TestSink = (eventName: string, data: TelemetryData) => void;

let testSink: TestSink | null = null;

/**
 * Capture emitted events in tests. Refuses to install outside a test run.
 */
export function setTestSink(sink: TestSink | null): void {
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 * DO NOT rename without updating dashboards
 */
export const TelemetryEvents = {
  TurnStarted: "npc.turn.started",
  TurnCompleted: "npc.turn.completed",
  TurnFailed: "npc.turn.failed",

  StageCompleted: "npc.stage.completed",
  StageDegraded: "npc.stage.degraded",

  ReflectionRevised: "npc.reflection.revised",
  ReflectionUnmarkedVerdict: "npc.reflection.unmarked_verdict",

  PersistFault: "npc.persist.fault",

  AmbientGenerated: "npc.ambient.generated",
  AmbientFallback: "npc.ambient.fallback",

  LlmRetry: "llm.retry",
  LlmRetryExhausted: "llm.retry_exhausted",
  LlmRetrySuccess: "llm.retry_success",
} as const;

export type TelemetryEvent = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

let statsdClient: StatsD | null = null;
let statsdInitialized = false;

function getStatsd(): StatsD | null {
  if (statsdInitialized) {
    return statsdClient;
  }
  statsdInitialized = true;

  const host = env.DD_AGENT_HOST;
  if (!host) {
    return null;
  }

  statsdClient = new StatsD({
    host,
    port: Number(env.DD_AGENT_PORT) || 8125,
    prefix: "npc_dialogue.",
    errorHandler: (error) => {
      log.warn({ error: error.message }, "StatsD send failed");
    },
  });
  return statsdClient;
}

function tagsFrom(data: TelemetryData): Record<string, string> {
  const tags: Record<string, string> = {};
  for (const key of ["npc", "stage", "adapter", "operation"]) {
    const value = data[key];
    if (typeof value === "string") {
      tags[key] = value;
    }
  }
  return tags;
}

/**
 * Emit a telemetry event.
 *
 * Always logs through pino; forwards a counter (and a timing when the
 * payload carries `elapsed_ms`) to StatsD when DD_AGENT_HOST is set.
 */
export function emit(event: TelemetryEvent, data: TelemetryData): void {
  if (testSink) {
    testSink(event, data);
  }

  log.info({ event, ...data });

  const statsd = getStatsd();
  if (!statsd) {
    return;
  }

  const tags = tagsFrom(data);
  statsd.increment(event, 1, tags);
  if (typeof data.elapsed_ms === "number") {
    statsd.timing(`${event}.elapsed_ms`, data.elapsed_ms, tags);
  }
}

/**
 * Flush and close the StatsD socket (shutdown hook).
 */
export async function closeTelemetry(): Promise<void> {
  const client = statsdClient;
  statsdClient = null;
  statsdInitialized = false;
  if (!client) {
    return;
  }
  await new Promise<void>((resolve) => {
    client.close((error) => {
      if (error) {
        log.warn({ error: error.message }, "StatsD close failed");
      }
      resolve();
    });
  });
}
