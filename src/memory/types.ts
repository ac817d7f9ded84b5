/**
 * Memory store contracts
 *
 * Working memory is the bounded recent transcript for one npc+player pair.
 * Episodic memory is an optional, semantically searchable store per NPC.
 */

export type ChatRole = "human" | "ai";

export interface ChatTurn {
  role: ChatRole;
  content: string;
}

export interface ShortTermStore {
  /** Oldest first, at most the configured history cap. */
  getHistory(npcId: string, playerId: string): Promise<ChatTurn[]>;
  append(npcId: string, playerId: string, role: ChatRole, content: string): Promise<void>;
  extendExpiry(npcId: string, playerId: string): Promise<void>;
  clear(npcId: string, playerId: string): Promise<void>;
}

export type EpisodicSpeaker = "player" | "npc";

export interface EpisodicMetadata {
  speaker: EpisodicSpeaker;
  /** Display name of whoever spoke: the player id or the NPC name. */
  speaker_name: string;
  player_id: string;
  timestamp: string;
  type: "player_message" | "npc_response";
}

export interface EpisodicEntry {
  content: string;
  metadata: EpisodicMetadata;
}

export interface EpisodicSnippet {
  content: string;
  metadata: Record<string, unknown>;
}

export interface EpisodicStore {
  search(npcId: string, query: string, k: number): Promise<EpisodicSnippet[]>;
  add(npcId: string, entries: EpisodicEntry[]): Promise<void>;
}
