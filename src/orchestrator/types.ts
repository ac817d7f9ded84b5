/**
 * Turn Pipeline Types
 *
 * Contracts shared by the stages, the context and the coordinator.
 */

import type { CallOpts } from "../adapters/llm/types.js";
import type { ChatTurn, EpisodicStore, ShortTermStore } from "../memory/types.js";
import type { AffinityLevel } from "../relationship/levels.js";
import type { AffinityUpdate, RelationshipService } from "../relationship/manager.js";
import type { RoleProfile } from "../roles/roster.js";

// ============================================================================
// Optional Collaborators
// ============================================================================

/**
 * A collaborator that may be absent. Call sites switch on `kind` instead of
 * null-checking a handle.
 */
export type Collaborator<T> =
  | { kind: "configured"; handle: T }
  | { kind: "unconfigured" };

export function configured<T>(handle: T): Collaborator<T> {
  return { kind: "configured", handle };
}

export function unconfigured<T>(): Collaborator<T> {
  return { kind: "unconfigured" };
}

// ============================================================================
// Agent Results
// ============================================================================

export type StageName = "memory" | "affinity" | "dialogue" | "reflection" | "persistence";

interface AgentResultMeta {
  producer: StageName;
  elapsedMs: number;
  completedAt: string;
}

/**
 * Outcome of one stage. `error` is non-empty iff `success` is false; a failed
 * result's payload is diagnostic only.
 */
export type AgentResult<T> =
  | (AgentResultMeta & { success: true; payload: T; error: "" })
  | (AgentResultMeta & { success: false; payload?: unknown; error: string });

// ============================================================================
// Stage Payloads
// ============================================================================

export interface MemoryPayload {
  readonly workingMemory: readonly ChatTurn[];
  readonly snippets: readonly string[];
  readonly narrative: string;
}

export interface AffinityPayload {
  readonly score: number;
  readonly level: AffinityLevel;
  readonly style: string;
  readonly narrative: string;
}

export interface DialoguePayload {
  readonly reply: string;
  /** Exact text sent to generation, kept for diagnostics. */
  readonly composedInput: string;
}

export interface RevisionPayload {
  readonly finalReply: string;
  readonly revised: boolean;
  readonly note?: string;
}

/**
 * Result of one best-effort side effect. A fault is recorded here rather
 * than failing the stage.
 */
export type SideEffectOutcome<T> =
  | { status: "applied"; value: T }
  | { status: "skipped"; reason: string }
  | { status: "faulted"; fault: string };

export interface PersistencePayload {
  readonly affinityUpdate: SideEffectOutcome<AffinityUpdate>;
  readonly memorySave: SideEffectOutcome<{ episodicEntries: number }>;
}

// ============================================================================
// Generation / Review Collaborators
// ============================================================================

export interface DialogueGenerator {
  generate(
    composedInput: string,
    history: readonly ChatTurn[],
    profile: RoleProfile,
    opts: CallOpts,
  ): Promise<string>;
}

export interface ReviewRequest {
  reply: string;
  utterance: string;
  profile: RoleProfile;
  affinityLevel: AffinityLevel;
  affinityStyle: string;
}

export interface ReplyReviewer {
  /** Raw verdict text: "PASS" or "REVISED: <reply>". */
  review(request: ReviewRequest, opts: CallOpts): Promise<string>;
}

export type EpisodicResolver = (npcId: string) => Collaborator<EpisodicStore>;

// ============================================================================
// Coordinator
// ============================================================================

export interface CoordinatorOptions {
  reflectionEnabled: boolean;
  parallelRetrieval: boolean;
  episodicTopK: number;
  llmTimeoutMs: number;
}

export interface CoordinatorDeps {
  shortTerm: ShortTermStore;
  episodic: EpisodicResolver;
  relationships: Collaborator<RelationshipService>;
  generator: DialogueGenerator;
  reviewer: Collaborator<ReplyReviewer>;
}

export type PerStageSuccess = {
  memory: boolean;
  affinity: boolean;
  dialogue: boolean;
  reflection: boolean;
  affinity_update: boolean;
  memory_save: boolean;
};

export interface TurnRequest {
  npcId: string;
  playerId: string;
  utterance: string;
  profile: RoleProfile;
  requestId: string;
}

export type TurnOutcome =
  | {
      ok: true;
      reply: string;
      /** Score read during retrieval, before this turn's update. */
      affinityScore: number;
      affinityChanged: boolean;
      revised: boolean;
      perStageSuccess: PerStageSuccess;
      diagnostics: string[];
      elapsedMs: number;
      contextId: string;
    }
  | {
      ok: false;
      error: string;
      perStageSuccess: PerStageSuccess;
      diagnostics: string[];
      elapsedMs: number;
      contextId: string;
    };
