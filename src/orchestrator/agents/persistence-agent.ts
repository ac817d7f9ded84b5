/**
 * Affinity Update + Memory Persistence Stage
 *
 * Two best-effort side effects on the final reply, run concurrently. Their
 * faults are recorded in the payload; the stage itself always succeeds.
 */

import { describeError } from "../../utils/errors.js";
import { emit, TelemetryEvents } from "../../utils/telemetry.js";
import type { EpisodicEntry, ShortTermStore } from "../../memory/types.js";
import type { AffinityUpdate, RelationshipService } from "../../relationship/manager.js";
import type { ConversationContext } from "../context/conversation-context.js";
import type {
  Collaborator,
  EpisodicResolver,
  PersistencePayload,
  SideEffectOutcome,
} from "../types.js";
import { BaseAgent } from "./base.js";

export function buildEpisodicEntries(
  context: Pick<ConversationContext, "playerId" | "utterance" | "profile">,
  reply: string,
  timestamp: string,
): EpisodicEntry[] {
  return [
    {
      content: `Player said: ${context.utterance}`,
      metadata: {
        speaker: "player",
        speaker_name: context.playerId,
        player_id: context.playerId,
        timestamp,
        type: "player_message",
      },
    },
    {
      content: `${context.profile.name} said: ${reply}`,
      metadata: {
        speaker: "npc",
        speaker_name: context.profile.name,
        player_id: context.playerId,
        timestamp,
        type: "npc_response",
      },
    },
  ];
}

export class PersistenceAgent extends BaseAgent<PersistencePayload> {
  readonly name = "persistence";

  constructor(
    private readonly shortTerm: ShortTermStore,
    private readonly episodic: EpisodicResolver,
    private readonly relationships: Collaborator<RelationshipService>,
    private readonly timeoutMs: number,
  ) {
    super();
  }

  protected async run(context: ConversationContext): Promise<PersistencePayload> {
    const reply = context.finalReply();
    const [affinityUpdate, memorySave] = await Promise.all([
      this.updateAffinity(context, reply),
      this.saveMemory(context, reply),
    ]);
    return { affinityUpdate, memorySave };
  }

  private async updateAffinity(
    context: ConversationContext,
    reply: string,
  ): Promise<SideEffectOutcome<AffinityUpdate>> {
    switch (this.relationships.kind) {
      case "unconfigured":
        return { status: "skipped", reason: "relationship tracking disabled" };
      case "configured":
        try {
          const value = await this.relationships.handle.analyzeAndUpdate(
            {
              npcId: context.npcId,
              npcName: context.profile.name,
              playerId: context.playerId,
              playerMessage: context.utterance,
              npcReply: reply,
            },
            { requestId: context.requestId, timeoutMs: this.timeoutMs },
          );
          return { status: "applied", value };
        } catch (error) {
          return this.fault(context, "affinity_update", error);
        }
    }
  }

  private async saveMemory(
    context: ConversationContext,
    reply: string,
  ): Promise<SideEffectOutcome<{ episodicEntries: number }>> {
    try {
      await this.shortTerm.append(context.npcId, context.playerId, "human", context.utterance);
      await this.shortTerm.append(context.npcId, context.playerId, "ai", reply);
      await this.shortTerm.extendExpiry(context.npcId, context.playerId);

      const store = this.episodic(context.npcId);
      switch (store.kind) {
        case "unconfigured":
          return { status: "applied", value: { episodicEntries: 0 } };
        case "configured": {
          const entries = buildEpisodicEntries(context, reply, new Date().toISOString());
          await store.handle.add(context.npcId, entries);
          return { status: "applied", value: { episodicEntries: entries.length } };
        }
      }
    } catch (error) {
      return this.fault(context, "memory_save", error);
    }
  }

  private fault(
    context: ConversationContext,
    operation: "affinity_update" | "memory_save",
    error: unknown,
  ): { status: "faulted"; fault: string } {
    const fault = describeError(error);
    emit(TelemetryEvents.PersistFault, {
      request_id: context.requestId,
      npc: context.npcId,
      operation,
      error: fault,
    });
    return { status: "faulted", fault };
  }
}
