/**
 * Relationship Manager
 *
 * Owns affinity scores between NPCs and players: reads, manual overrides,
 * and the post-turn LLM judgement of how the exchange moved the score.
 */

import { z } from "zod";
import type { LLMAdapter, CallOpts } from "../adapters/llm/types.js";
import { log } from "../utils/telemetry.js";
import type { AffinityStore } from "./store.js";
import {
  DEFAULT_AFFINITY,
  clampAffinity,
  describeAffinity,
  type AffinityLevel,
} from "./levels.js";

export interface AffinityExchange {
  npcId: string;
  npcName: string;
  playerId: string;
  playerMessage: string;
  npcReply: string;
}

export interface AffinityUpdate {
  changed: boolean;
  previousScore: number;
  newScore: number;
  delta: number;
  reason: string;
}

/**
 * What the pipeline needs from a relationship collaborator.
 */
export interface RelationshipService {
  getScore(npcId: string, playerId: string): Promise<number>;
  getLevel(score: number): AffinityLevel;
  getStyle(score: number): string;
  analyzeAndUpdate(exchange: AffinityExchange, opts: CallOpts): Promise<AffinityUpdate>;
}

const AffinityVerdict = z.object({
  delta: z.number().finite(),
  reason: z.string().default(""),
});

export interface RelationshipManagerOptions {
  maxDelta: number;
}

function buildAnalysisPrompt(maxDelta: number): string {
  return [
    "You judge how one exchange in a game conversation changes an NPC's feelings toward the player.",
    `Reply with a JSON object {"delta": number, "reason": string}.`,
    `delta is an integer between -${maxDelta} and ${maxDelta}:`,
    "positive when the player was kind, curious or helpful; negative when rude, hostile or dismissive; 0 for neutral small talk.",
    "reason is one short sentence.",
  ].join("\n");
}

/**
 * Strip a markdown code fence around a JSON body, if present.
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const fenced = /^```(?:json)?\s*\n([\s\S]*?)\n?```$/.exec(trimmed);
  return fenced ? fenced[1].trim() : trimmed;
}

export class RelationshipManager implements RelationshipService {
  constructor(
    private readonly store: AffinityStore,
    private readonly llm: LLMAdapter,
    private readonly options: RelationshipManagerOptions,
  ) {}

  async getScore(npcId: string, playerId: string): Promise<number> {
    return (await this.store.get(npcId, playerId)) ?? DEFAULT_AFFINITY;
  }

  getLevel(score: number): AffinityLevel {
    return describeAffinity(score).level;
  }

  getStyle(score: number): string {
    return describeAffinity(score).style;
  }

  async setScore(npcId: string, playerId: string, score: number): Promise<number> {
    const clamped = clampAffinity(score);
    await this.store.set(npcId, playerId, clamped);
    log.info({ npc: npcId, player_id: playerId, score: clamped }, "Affinity set manually");
    return clamped;
  }

  async listScores(playerId: string): Promise<Record<string, number>> {
    return this.store.list(playerId);
  }

  async analyzeAndUpdate(exchange: AffinityExchange, opts: CallOpts): Promise<AffinityUpdate> {
    const previousScore = await this.getScore(exchange.npcId, exchange.playerId);

    const { content } = await this.llm.chat(
      {
        task: "affinity",
        system: buildAnalysisPrompt(this.options.maxDelta),
        userMessage: `NPC: ${exchange.npcName}\nPlayer said: ${exchange.playerMessage}\n${exchange.npcName} replied: ${exchange.npcReply}`,
        json: true,
      },
      opts,
    );

    const verdict = AffinityVerdict.parse(JSON.parse(stripCodeFence(content)));
    const maxDelta = this.options.maxDelta;
    const delta = Math.max(-maxDelta, Math.min(maxDelta, Math.round(verdict.delta)));
    const newScore = clampAffinity(previousScore + delta);
    const changed = newScore !== previousScore;

    if (changed) {
      await this.store.set(exchange.npcId, exchange.playerId, newScore);
    }

    log.info(
      {
        request_id: opts.requestId,
        npc: exchange.npcId,
        player_id: exchange.playerId,
        previous_score: previousScore,
        new_score: newScore,
        delta,
      },
      changed ? "Affinity updated" : "Affinity unchanged",
    );

    return {
      changed,
      previousScore,
      newScore,
      delta: newScore - previousScore,
      reason: verdict.reason,
    };
  }
}
