import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import { config } from "../../config/index.js";
import { log } from "../../utils/telemetry.js";
import { withRetry } from "../../utils/retry.js";
import type { LLMAdapter, ChatArgs, ChatResult, CallOpts } from "./types.js";
import { classifyUpstreamError, UpstreamContentError } from "./errors.js";

const DEFAULT_MODEL = "gpt-4o-mini";
const MAX_TOKENS = 1024;

// Lazy initialization to allow testing without API key
let client: OpenAI | null = null;

function getClient(): OpenAI {
  const apiKey = config.llm.openaiApiKey;
  if (!apiKey) {
    throw new Error("OPENAI_API_KEY environment variable is required but not set");
  }
  if (!client) {
    client = new OpenAI({ apiKey, maxRetries: 0 });
  }
  return client;
}

function toMessages(args: ChatArgs): ChatCompletionMessageParam[] {
  const messages: ChatCompletionMessageParam[] = [{ role: "system", content: args.system }];
  for (const turn of args.history ?? []) {
    messages.push(
      turn.role === "human"
        ? { role: "user", content: turn.content }
        : { role: "assistant", content: turn.content }
    );
  }
  messages.push({ role: "user", content: args.userMessage });
  return messages;
}

export class OpenAIAdapter implements LLMAdapter {
  readonly name = "openai" as const;
  readonly model: string;

  constructor(model?: string) {
    this.model = model || DEFAULT_MODEL;
  }

  async chat(args: ChatArgs, opts: CallOpts): Promise<ChatResult> {
    const start = Date.now();
    const apiClient = getClient();

    log.debug(
      { request_id: opts.requestId, task: args.task, model: this.model, history_turns: args.history?.length ?? 0 },
      "Calling OpenAI chat"
    );

    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), opts.timeoutMs);

    try {
      const response = await withRetry(
        () =>
          apiClient.chat.completions.create(
            {
              model: this.model,
              messages: toMessages(args),
              temperature: config.llm.temperature,
              max_tokens: MAX_TOKENS,
              ...(args.json ? { response_format: { type: "json_object" as const } } : {}),
            },
            { signal: abortController.signal }
          ),
        { adapter: this.name, model: this.model, operation: args.task }
      );

      const content = response.choices[0]?.message?.content?.trim() ?? "";
      if (!content) {
        throw new UpstreamContentError("OpenAI returned an empty completion", this.name, args.task);
      }

      log.info(
        {
          request_id: opts.requestId,
          task: args.task,
          model: this.model,
          elapsed_ms: Date.now() - start,
          input_tokens: response.usage?.prompt_tokens ?? 0,
          output_tokens: response.usage?.completion_tokens ?? 0,
        },
        "OpenAI chat completed"
      );

      return {
        content,
        usage: {
          input_tokens: response.usage?.prompt_tokens ?? 0,
          output_tokens: response.usage?.completion_tokens ?? 0,
        },
      };
    } catch (error) {
      if (error instanceof UpstreamContentError) {
        throw error;
      }
      const classified = classifyUpstreamError(error, this.name, args.task, Date.now() - start);
      log.error({ request_id: opts.requestId, task: args.task, error: classified.message }, "OpenAI chat failed");
      throw classified;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
