/**
 * Centralized Configuration Module
 *
 * Type-safe, validated access to all environment variables.
 * Parsed lazily on first access so tests can stub env vars beforehand.
 */

import { z } from "zod";

/**
 * Custom boolean coercion that handles string "false" and "true"
 */
const booleanString = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    const lower = val.toLowerCase().trim();
    if (lower === "false" || lower === "0" || lower === "") return false;
    if (lower === "true" || lower === "1") return true;
    return Boolean(val);
  });

const Environment = z.enum(["development", "test", "production"]);

const LLMProvider = z.enum(["anthropic", "openai", "fixtures"]);

const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().positive().default(3101),
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
    bodyLimitBytes: z.coerce.number().int().positive().default(1024 * 1024),
  }),

  llm: z.object({
    provider: LLMProvider.default("fixtures"),
    model: z.string().optional(),
    anthropicApiKey: z.string().optional(),
    openaiApiKey: z.string().optional(),
    temperature: z.coerce.number().min(0).max(2).default(0.7),
    models: z.object({
      dialogue: z.string().optional(),
      review: z.string().optional(),
      affinity: z.string().optional(),
      ambient: z.string().optional(),
    }),
  }),

  redis: z.object({
    url: z.string().optional(),
    tls: booleanString.default(false),
    namespace: z.string().default("npc"),
    connectTimeout: z.coerce.number().int().positive().default(10000),
    commandTimeout: z.coerce.number().int().positive().default(5000),
  }),

  memory: z.object({
    shortTermMaxHistory: z.coerce.number().int().positive().default(10),
    shortTermTtlSeconds: z.coerce.number().int().positive().default(3600),
    episodicTopK: z.coerce.number().int().positive().default(3),
  }),

  orchestrator: z.object({
    reflectionEnabled: booleanString.default(true),
    parallelRetrieval: booleanString.default(true),
    contextIdleTimeoutMs: z.coerce.number().int().positive().default(300_000),
    contextMaxEntries: z.coerce.number().int().positive().default(1000),
  }),

  relationship: z.object({
    enabled: booleanString.default(true),
    maxDelta: z.coerce.number().positive().default(10),
  }),

  roster: z.object({
    path: z.string().optional(),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Treat empty strings as unset so `FOO=` in a .env file falls back to the default.
 */
function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = env[name];
  return raw === undefined || raw.trim() === "" ? undefined : raw;
}

function parseConfig(): Config {
  const env = process.env;
  const v = (name: string) => envValue(env, name);

  const rawConfig = {
    server: {
      port: v("PORT"),
      nodeEnv: v("NODE_ENV"),
      logLevel: v("LOG_LEVEL"),
      bodyLimitBytes: v("BODY_LIMIT_BYTES"),
    },
    llm: {
      provider: v("LLM_PROVIDER"),
      model: v("LLM_MODEL"),
      anthropicApiKey: v("ANTHROPIC_API_KEY"),
      openaiApiKey: v("OPENAI_API_KEY"),
      temperature: v("LLM_TEMPERATURE"),
      models: {
        dialogue: v("LLM_MODEL_DIALOGUE"),
        review: v("LLM_MODEL_REVIEW"),
        affinity: v("LLM_MODEL_AFFINITY"),
        ambient: v("LLM_MODEL_AMBIENT"),
      },
    },
    redis: {
      url: v("REDIS_URL"),
      tls: v("REDIS_TLS"),
      namespace: v("REDIS_NAMESPACE"),
      connectTimeout: v("REDIS_CONNECT_TIMEOUT"),
      commandTimeout: v("REDIS_COMMAND_TIMEOUT"),
    },
    memory: {
      shortTermMaxHistory: v("SHORT_TERM_MAX_HISTORY"),
      shortTermTtlSeconds: v("SHORT_TERM_TTL_SECONDS"),
      episodicTopK: v("EPISODIC_TOP_K"),
    },
    orchestrator: {
      reflectionEnabled: v("REFLECTION_ENABLED"),
      parallelRetrieval: v("PARALLEL_RETRIEVAL"),
      contextIdleTimeoutMs: v("CONTEXT_IDLE_TIMEOUT_MS"),
      contextMaxEntries: v("CONTEXT_MAX_ENTRIES"),
    },
    relationship: {
      enabled: v("AFFINITY_ENABLED"),
      maxDelta: v("AFFINITY_MAX_DELTA"),
    },
    roster: {
      path: v("NPC_ROSTER_PATH"),
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration. Please check environment variables. ${issues}`);
  }
  return result.data;
}

let _cachedConfig: Config | null = null;

function loadConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

/**
 * Lazy-initialized configuration using Proxy pattern
 *
 * Defers parsing until first property access, then caches the result.
 *
 * ```
 * import { config } from './config/index.js';
 * const port = config.server.port;
 * ```
 */
export const config: Config = new Proxy({} as Config, {
  get(_target, prop) {
    return Reflect.get(loadConfig(), prop);
  },

  ownKeys() {
    return Reflect.ownKeys(loadConfig());
  },

  getOwnPropertyDescriptor(_target, prop) {
    return Reflect.getOwnPropertyDescriptor(loadConfig(), prop);
  },

  has(_target, prop) {
    return prop in loadConfig();
  },
});

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}

export function isProduction(): boolean {
  return config.server.nodeEnv === "production";
}
