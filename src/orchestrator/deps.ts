/**
 * Composition root: builds the one service object the HTTP layer runs on.
 */

import { config } from "../config/index.js";
import { LLM_TIMEOUT_MS } from "../config/timeouts.js";
import { getAdapter } from "../adapters/llm/router.js";
import { RedisShortTermStore } from "../memory/short-term.js";
import type { ShortTermStore } from "../memory/types.js";
import { RedisAffinityStore } from "../relationship/store.js";
import { RelationshipManager } from "../relationship/manager.js";
import { LlmDialogueGenerator, LlmReplyReviewer } from "../dialogue/collaborators.js";
import { AmbientLineGenerator } from "../dialogue/ambient.js";
import { getRoleProfile, listRoles, type RoleProfile } from "../roles/roster.js";
import { ContextRegistry } from "./context/registry.js";
import { TurnCoordinator } from "./coordinator.js";
import {
  configured,
  unconfigured,
  type Collaborator,
  type CoordinatorDeps,
  type CoordinatorOptions,
  type EpisodicResolver,
} from "./types.js";

export interface RoleDirectory {
  get(npcId: string): RoleProfile | null;
  list(): RoleProfile[];
}

export interface ServiceDeps {
  coordinator: TurnCoordinator;
  registry: ContextRegistry;
  shortTerm: ShortTermStore;
  relationships: Collaborator<RelationshipManager>;
  roles: RoleDirectory;
  ambient: AmbientLineGenerator;
}

/**
 * No vector store ships with this service: every NPC runs without
 * episodic memory unless a resolver is injected.
 */
const noEpisodicMemory: EpisodicResolver = () => unconfigured();

export function coordinatorOptionsFromConfig(): CoordinatorOptions {
  return {
    reflectionEnabled: config.orchestrator.reflectionEnabled,
    parallelRetrieval: config.orchestrator.parallelRetrieval,
    episodicTopK: config.memory.episodicTopK,
    llmTimeoutMs: LLM_TIMEOUT_MS,
  };
}

export function createServiceDeps(): ServiceDeps {
  const shortTerm = new RedisShortTermStore({
    maxHistory: config.memory.shortTermMaxHistory,
    ttlSeconds: config.memory.shortTermTtlSeconds,
  });

  const relationships: Collaborator<RelationshipManager> = config.relationship.enabled
    ? configured(
        new RelationshipManager(new RedisAffinityStore(), getAdapter("affinity"), {
          maxDelta: config.relationship.maxDelta,
        }),
      )
    : unconfigured();

  const registry = new ContextRegistry({
    idleTimeoutMs: config.orchestrator.contextIdleTimeoutMs,
    maxEntries: config.orchestrator.contextMaxEntries,
  });

  const coordinatorDeps: CoordinatorDeps = {
    shortTerm,
    episodic: noEpisodicMemory,
    relationships,
    generator: new LlmDialogueGenerator(getAdapter("dialogue")),
    reviewer: configured(new LlmReplyReviewer(getAdapter("review"))),
  };

  const coordinator = new TurnCoordinator(coordinatorDeps, registry, coordinatorOptionsFromConfig());

  return {
    coordinator,
    registry,
    shortTerm,
    relationships,
    roles: { get: getRoleProfile, list: listRoles },
    ambient: new AmbientLineGenerator(getAdapter("ambient")),
  };
}
