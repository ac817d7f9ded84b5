/**
 * Affinity Retrieval Stage
 *
 * Reads the current score through the relationship service and formats the
 * relationship block injected ahead of the player's utterance.
 */

import { DEFAULT_AFFINITY, describeAffinity } from "../../relationship/levels.js";
import type { RelationshipService } from "../../relationship/manager.js";
import type { ConversationContext } from "../context/conversation-context.js";
import type { AffinityPayload, Collaborator } from "../types.js";
import { BaseAgent } from "./base.js";

export function buildAffinityNarrative(score: number, level: string, style: string): string {
  return (
    `[Current relationship]\n` +
    `Your relationship with the player: ${level} (affinity: ${score.toFixed(0)}/100)\n` +
    `[Speaking style] ${style}\n\n`
  );
}

/**
 * Triple used when relationships are not tracked; equal to a brand-new pair.
 */
export function neutralAffinity(): AffinityPayload {
  const { level, style } = describeAffinity(DEFAULT_AFFINITY);
  return {
    score: DEFAULT_AFFINITY,
    level,
    style,
    narrative: buildAffinityNarrative(DEFAULT_AFFINITY, level, style),
  };
}

export class AffinityAgent extends BaseAgent<AffinityPayload> {
  readonly name = "affinity";

  constructor(private readonly relationships: Collaborator<RelationshipService>) {
    super();
  }

  protected async run(context: ConversationContext): Promise<AffinityPayload> {
    switch (this.relationships.kind) {
      case "unconfigured":
        return neutralAffinity();
      case "configured": {
        const service = this.relationships.handle;
        const score = await service.getScore(context.npcId, context.playerId);
        const level = service.getLevel(score);
        const style = service.getStyle(score);
        return { score, level, style, narrative: buildAffinityNarrative(score, level, style) };
      }
    }
  }
}
