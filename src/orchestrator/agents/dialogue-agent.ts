/**
 * Response Generation Stage
 *
 * Composes relationship block, memory block and the current turn into one
 * input and asks the generator for a reply, with working memory as history.
 */

import type { ConversationContext } from "../context/conversation-context.js";
import type { AffinityPayload, DialogueGenerator, DialoguePayload, MemoryPayload } from "../types.js";
import { BaseAgent } from "./base.js";

export function composeDialogueInput(
  affinity: Pick<AffinityPayload, "narrative">,
  memory: Pick<MemoryPayload, "narrative">,
  utterance: string,
): string {
  let composed = affinity.narrative;
  if (memory.narrative) {
    composed += `${memory.narrative}\n\n`;
  }
  composed += `[Current turn]\nPlayer: ${utterance}`;
  return composed;
}

export class DialogueAgent extends BaseAgent<DialoguePayload> {
  readonly name = "dialogue";

  constructor(
    private readonly generator: DialogueGenerator,
    private readonly timeoutMs: number,
  ) {
    super();
  }

  protected async run(context: ConversationContext): Promise<DialoguePayload> {
    const memory = context.requireMemory();
    const composedInput = composeDialogueInput(context.requireAffinity(), memory, context.utterance);

    const reply = await this.generator.generate(composedInput, memory.workingMemory, context.profile, {
      requestId: context.requestId,
      timeoutMs: this.timeoutMs,
    });
    if (!reply.trim()) {
      throw new Error("generator returned an empty reply");
    }

    return { reply, composedInput };
  }
}
