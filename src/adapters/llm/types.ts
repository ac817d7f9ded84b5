/**
 * Provider-agnostic LLM adapter interface.
 *
 * Every caller that talks to a model (dialogue generation, reply review,
 * affinity analysis, ambient lines) goes through `chat`, so providers stay swappable and
 * tests can substitute a scripted adapter.
 */

import type { ChatTurn } from "../../memory/types.js";
import type { LLMProviderName } from "./errors.js";

/**
 * Which pipeline task a call serves. Selects the model override and
 * the canned fixture reply.
 */
export type LLMTask = "dialogue" | "review" | "affinity" | "ambient";

export interface ChatArgs {
  task: LLMTask;
  system: string;
  /** Prior transcript, oldest first. */
  history?: ChatTurn[];
  userMessage: string;
  /** Request a JSON object response where the provider supports it. */
  json?: boolean;
}

export interface UsageMetrics {
  input_tokens: number;
  output_tokens: number;
}

export interface ChatResult {
  content: string;
  usage: UsageMetrics;
}

export interface CallOpts {
  requestId: string;
  timeoutMs: number;
}

export interface LLMAdapter {
  readonly name: LLMProviderName;
  readonly model: string;
  chat(args: ChatArgs, opts: CallOpts): Promise<ChatResult>;
}
