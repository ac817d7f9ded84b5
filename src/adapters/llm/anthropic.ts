import Anthropic from "@anthropic-ai/sdk";
import { config } from "../../config/index.js";
import { log } from "../../utils/telemetry.js";
import { withRetry } from "../../utils/retry.js";
import type { LLMAdapter, ChatArgs, ChatResult, CallOpts } from "./types.js";
import { classifyUpstreamError, UpstreamContentError } from "./errors.js";

const DEFAULT_MODEL = "claude-3-5-haiku-20241022";
const MAX_TOKENS = 1024;

let client: Anthropic | null = null;

function getClient(): Anthropic {
  const apiKey = config.llm.anthropicApiKey;
  if (!apiKey) {
    throw new Error("ANTHROPIC_API_KEY environment variable is required but not set");
  }
  if (!client) {
    client = new Anthropic({ apiKey, maxRetries: 0 });
  }
  return client;
}

function toMessages(args: ChatArgs): Anthropic.MessageParam[] {
  const messages: Anthropic.MessageParam[] = [];
  for (const turn of args.history ?? []) {
    messages.push({ role: turn.role === "human" ? "user" : "assistant", content: turn.content });
  }
  messages.push({ role: "user", content: args.userMessage });
  return messages;
}

export class AnthropicAdapter implements LLMAdapter {
  readonly name = "anthropic" as const;
  readonly model: string;

  constructor(model?: string) {
    this.model = model || DEFAULT_MODEL;
  }

  async chat(args: ChatArgs, opts: CallOpts): Promise<ChatResult> {
    const start = Date.now();
    const apiClient = getClient();

    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), opts.timeoutMs);

    try {
      const response = await withRetry(
        () =>
          apiClient.messages.create(
            {
              model: this.model,
              max_tokens: MAX_TOKENS,
              temperature: config.llm.temperature,
              system: args.json
                ? `${args.system}\n\nRespond with a single JSON object and nothing else.`
                : args.system,
              messages: toMessages(args),
            },
            { signal: abortController.signal }
          ),
        { adapter: this.name, model: this.model, operation: args.task }
      );

      const content = response.content
        .map((block) => (block.type === "text" ? block.text : ""))
        .join("")
        .trim();
      if (!content) {
        throw new UpstreamContentError("Anthropic returned no text content", this.name, args.task);
      }

      log.info(
        {
          request_id: opts.requestId,
          task: args.task,
          model: this.model,
          elapsed_ms: Date.now() - start,
          input_tokens: response.usage.input_tokens,
          output_tokens: response.usage.output_tokens,
        },
        "Anthropic chat completed"
      );

      return {
        content,
        usage: {
          input_tokens: response.usage.input_tokens,
          output_tokens: response.usage.output_tokens,
        },
      };
    } catch (error) {
      if (error instanceof UpstreamContentError) {
        throw error;
      }
      const classified = classifyUpstreamError(error, this.name, args.task, Date.now() - start);
      log.error({ request_id: opts.requestId, task: args.task, error: classified.message }, "Anthropic chat failed");
      throw classified;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
