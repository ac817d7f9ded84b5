import { describeError } from "../../utils/errors.js";
import type { ConversationContext } from "../context/conversation-context.js";
import type { AgentResult, StageName } from "../types.js";

/**
 * Failed result for a stage that never produced one (e.g. a rejected branch).
 */
export function failedResult<T>(producer: StageName, error: unknown, elapsedMs = 0): AgentResult<T> {
  return {
    success: false,
    error: describeError(error) || "unknown error",
    producer,
    elapsedMs,
    completedAt: new Date().toISOString(),
  };
}

/**
 * One pipeline stage.
 *
 * `execute` never rejects: whatever `run` throws becomes a failed result
 * carrying the fault's description.
 */
export abstract class BaseAgent<T> {
  abstract readonly name: StageName;

  protected abstract run(context: ConversationContext): Promise<T>;

  async execute(context: ConversationContext): Promise<AgentResult<T>> {
    const start = Date.now();
    try {
      const payload = await this.run(context);
      return {
        success: true,
        payload,
        error: "",
        producer: this.name,
        elapsedMs: Date.now() - start,
        completedAt: new Date().toISOString(),
      };
    } catch (error) {
      return failedResult<T>(this.name, error, Date.now() - start);
    }
  }
}
