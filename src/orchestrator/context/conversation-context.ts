/**
 * Conversation Context
 *
 * Working state for one turn. Input fields are fixed at construction; each
 * stage's output slot is written exactly once, through its own record method,
 * and is frozen from then on.
 */

import type { RoleProfile } from "../../roles/roster.js";
import type {
  AffinityPayload,
  DialoguePayload,
  MemoryPayload,
  RevisionPayload,
} from "../types.js";

export interface ContextInput {
  npcId: string;
  playerId: string;
  utterance: string;
  profile: RoleProfile;
  requestId: string;
}

export interface ContextSummary {
  npc_id: string;
  player_id: string;
  /** First 50 characters of the utterance. */
  utterance: string;
  created_at: string;
  has_memory: boolean;
  has_affinity: boolean;
  has_dialogue: boolean;
  has_revision: boolean;
}

export class ContextFieldError extends Error {
  readonly name = "ContextFieldError";
}

export class ConversationContext {
  readonly npcId: string;
  readonly playerId: string;
  readonly utterance: string;
  readonly profile: Readonly<RoleProfile>;
  readonly requestId: string;
  readonly createdAt: Date;

  private memoryOutput: Readonly<MemoryPayload> | undefined;
  private affinityOutput: Readonly<AffinityPayload> | undefined;
  private dialogueOutput: Readonly<DialoguePayload> | undefined;
  private revisionOutput: Readonly<RevisionPayload> | undefined;

  constructor(input: ContextInput, createdAt: Date = new Date()) {
    this.npcId = input.npcId;
    this.playerId = input.playerId;
    this.utterance = input.utterance;
    this.profile = Object.freeze({ ...input.profile });
    this.requestId = input.requestId;
    this.createdAt = createdAt;
  }

  get memory(): Readonly<MemoryPayload> | undefined {
    return this.memoryOutput;
  }

  get affinity(): Readonly<AffinityPayload> | undefined {
    return this.affinityOutput;
  }

  get dialogue(): Readonly<DialoguePayload> | undefined {
    return this.dialogueOutput;
  }

  get revision(): Readonly<RevisionPayload> | undefined {
    return this.revisionOutput;
  }

  recordMemory(payload: MemoryPayload): void {
    if (this.memoryOutput) {
      throw new ContextFieldError("memory output already recorded");
    }
    this.memoryOutput = Object.freeze({
      ...payload,
      workingMemory: Object.freeze(payload.workingMemory.map((turn) => Object.freeze({ ...turn }))),
      snippets: Object.freeze([...payload.snippets]),
    });
  }

  recordAffinity(payload: AffinityPayload): void {
    if (this.affinityOutput) {
      throw new ContextFieldError("affinity output already recorded");
    }
    this.affinityOutput = Object.freeze({ ...payload });
  }

  recordDialogue(payload: DialoguePayload): void {
    if (this.dialogueOutput) {
      throw new ContextFieldError("dialogue output already recorded");
    }
    this.dialogueOutput = Object.freeze({ ...payload });
  }

  recordRevision(payload: RevisionPayload): void {
    if (this.revisionOutput) {
      throw new ContextFieldError("revision output already recorded");
    }
    if (!this.dialogueOutput) {
      throw new ContextFieldError("revision recorded before dialogue");
    }
    this.revisionOutput = Object.freeze({ ...payload });
  }

  requireMemory(): Readonly<MemoryPayload> {
    if (!this.memoryOutput) {
      throw new ContextFieldError("memory output not recorded");
    }
    return this.memoryOutput;
  }

  requireAffinity(): Readonly<AffinityPayload> {
    if (!this.affinityOutput) {
      throw new ContextFieldError("affinity output not recorded");
    }
    return this.affinityOutput;
  }

  requireDialogue(): Readonly<DialoguePayload> {
    if (!this.dialogueOutput) {
      throw new ContextFieldError("dialogue output not recorded");
    }
    return this.dialogueOutput;
  }

  /**
   * Reply after revision, or the generated reply when no revision ran.
   */
  finalReply(): string {
    return this.revisionOutput?.finalReply ?? this.requireDialogue().reply;
  }

  summary(): ContextSummary {
    return {
      npc_id: this.npcId,
      player_id: this.playerId,
      utterance: this.utterance.slice(0, 50),
      created_at: this.createdAt.toISOString(),
      has_memory: this.memoryOutput !== undefined,
      has_affinity: this.affinityOutput !== undefined,
      has_dialogue: this.dialogueOutput !== undefined,
      has_revision: this.revisionOutput !== undefined,
    };
  }
}
