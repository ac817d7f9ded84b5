/**
 * LLM Provider Router
 *
 * Selects an adapter per task from configuration:
 * - LLM_PROVIDER: anthropic | openai | fixtures (default: fixtures)
 * - LLM_MODEL: default model for the provider
 * - LLM_MODEL_DIALOGUE / LLM_MODEL_REVIEW / LLM_MODEL_AFFINITY / LLM_MODEL_AMBIENT: per-task override
 *
 * Usage:
 * ```
 * const adapter = getAdapter("dialogue");
 * const { content } = await adapter.chat(args, opts);
 * ```
 */

import { log } from "../../utils/telemetry.js";
import { config } from "../../config/index.js";
import type { LLMAdapter, LLMTask } from "./types.js";
import type { LLMProviderName } from "./errors.js";
import { AnthropicAdapter } from "./anthropic.js";
import { OpenAIAdapter } from "./openai.js";
import { FixturesAdapter } from "./fixtures.js";

const adapters = new Map<string, LLMAdapter>();

function createAdapter(provider: LLMProviderName, model?: string): LLMAdapter {
  switch (provider) {
    case "anthropic":
      return new AnthropicAdapter(model);
    case "openai":
      return new OpenAIAdapter(model);
    case "fixtures":
      return new FixturesAdapter();
  }
}

/**
 * Get or create an adapter instance for the given provider and model.
 */
export function getAdapterForProvider(provider: LLMProviderName, model?: string): LLMAdapter {
  const cacheKey = `${provider}:${model || "default"}`;
  const cached = adapters.get(cacheKey);
  if (cached) {
    return cached;
  }

  const adapter = createAdapter(provider, model);
  adapters.set(cacheKey, adapter);
  log.info(
    { provider: adapter.name, model: adapter.model, cache_key: cacheKey },
    "Created LLM adapter instance"
  );
  return adapter;
}

/**
 * Resolve the adapter serving one pipeline task.
 */
export function getAdapter(task: LLMTask): LLMAdapter {
  const model = config.llm.models[task] ?? config.llm.model;
  return getAdapterForProvider(config.llm.provider, model);
}

/**
 * Reset adapter cache (useful for testing).
 */
export function resetAdapterCache(): void {
  adapters.clear();
}
