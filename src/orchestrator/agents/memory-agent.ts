/**
 * Memory Retrieval Stage
 *
 * Reads the working-memory transcript and, when this NPC has an episodic
 * store, the top-k snippets relevant to the utterance.
 */

import type { ShortTermStore } from "../../memory/types.js";
import type { ConversationContext } from "../context/conversation-context.js";
import type { EpisodicResolver, MemoryPayload } from "../types.js";
import { BaseAgent } from "./base.js";

export const MEMORY_NARRATIVE_HEADER = "[Relevant memories]";
const MAX_NARRATIVE_SNIPPETS = 3;

export function buildMemoryNarrative(snippets: readonly string[]): string {
  if (snippets.length === 0) {
    return "";
  }
  const lines = [MEMORY_NARRATIVE_HEADER];
  for (const snippet of snippets.slice(0, MAX_NARRATIVE_SNIPPETS)) {
    lines.push(`- ${snippet}`);
  }
  return lines.join("\n");
}

export class MemoryAgent extends BaseAgent<MemoryPayload> {
  readonly name = "memory";

  constructor(
    private readonly shortTerm: ShortTermStore,
    private readonly episodic: EpisodicResolver,
    private readonly topK: number,
  ) {
    super();
  }

  protected async run(context: ConversationContext): Promise<MemoryPayload> {
    const workingMemory = await this.shortTerm.getHistory(context.npcId, context.playerId);

    let snippets: string[] = [];
    const store = this.episodic(context.npcId);
    switch (store.kind) {
      case "configured": {
        const found = await store.handle.search(context.npcId, context.utterance, this.topK);
        snippets = found.map((snippet) => snippet.content);
        break;
      }
      case "unconfigured":
        break;
    }

    return {
      workingMemory,
      snippets,
      narrative: buildMemoryNarrative(snippets),
    };
  }
}
