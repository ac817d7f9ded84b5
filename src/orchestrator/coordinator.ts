/**
 * Turn Coordinator
 *
 * Fixed stage order, forward only:
 *   RETRIEVE (memory ∥ affinity) → MERGE → GENERATE → [REVISE] → PERSIST
 *
 * Only GENERATE is fatal. Retrieval and revision failures degrade to their
 * defaults; persistence faults are reported through diagnostics and the
 * per-stage flags, never as a failed turn.
 */

import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { describeError } from "../utils/errors.js";
import type { ConversationContext } from "./context/conversation-context.js";
import type { ContextRegistry } from "./context/registry.js";
import { failedResult } from "./agents/base.js";
import { MemoryAgent } from "./agents/memory-agent.js";
import { AffinityAgent, neutralAffinity } from "./agents/affinity-agent.js";
import { DialogueAgent } from "./agents/dialogue-agent.js";
import { ReflectionAgent } from "./agents/reflection-agent.js";
import { PersistenceAgent } from "./agents/persistence-agent.js";
import type {
  AffinityPayload,
  AgentResult,
  Collaborator,
  CoordinatorDeps,
  CoordinatorOptions,
  MemoryPayload,
  PerStageSuccess,
  TurnOutcome,
  TurnRequest,
} from "./types.js";

const EMPTY_MEMORY: MemoryPayload = { workingMemory: [], snippets: [], narrative: "" };

function settled<T>(
  outcome: PromiseSettledResult<AgentResult<T>>,
  producer: AgentResult<T>["producer"],
): AgentResult<T> {
  return outcome.status === "fulfilled" ? outcome.value : failedResult<T>(producer, outcome.reason);
}

export class TurnCoordinator {
  private readonly memoryAgent: MemoryAgent;
  private readonly affinityAgent: AffinityAgent;
  private readonly dialogueAgent: DialogueAgent;
  private readonly reflectionAgent: Collaborator<ReflectionAgent>;
  private readonly persistenceAgent: PersistenceAgent;

  constructor(
    deps: CoordinatorDeps,
    private readonly registry: ContextRegistry,
    private readonly options: CoordinatorOptions,
  ) {
    this.memoryAgent = new MemoryAgent(deps.shortTerm, deps.episodic, options.episodicTopK);
    this.affinityAgent = new AffinityAgent(deps.relationships);
    this.dialogueAgent = new DialogueAgent(deps.generator, options.llmTimeoutMs);
    this.reflectionAgent =
      deps.reviewer.kind === "configured"
        ? { kind: "configured", handle: new ReflectionAgent(deps.reviewer.handle, options.llmTimeoutMs) }
        : { kind: "unconfigured" };
    this.persistenceAgent = new PersistenceAgent(
      deps.shortTerm,
      deps.episodic,
      deps.relationships,
      options.llmTimeoutMs,
    );
  }

  async runTurn(request: TurnRequest): Promise<TurnOutcome> {
    const start = Date.now();
    const { id: contextId, context } = this.registry.create(request);
    const perStageSuccess: PerStageSuccess = {
      memory: false,
      affinity: false,
      dialogue: false,
      reflection: false,
      affinity_update: false,
      memory_save: false,
    };
    const diagnostics: string[] = [];
    const telemetryBase = { request_id: request.requestId, npc: request.npcId, context_id: contextId };

    emit(TelemetryEvents.TurnStarted, telemetryBase);

    try {
      // RETRIEVE
      const [memoryResult, affinityResult] = await this.retrieve(context);
      this.observe(memoryResult, telemetryBase);
      this.observe(affinityResult, telemetryBase);

      // MERGE
      perStageSuccess.memory = this.merge(memoryResult, EMPTY_MEMORY, diagnostics, (payload) =>
        context.recordMemory(payload),
      );
      perStageSuccess.affinity = this.merge(affinityResult, neutralAffinity(), diagnostics, (payload) =>
        context.recordAffinity(payload),
      );
      this.registry.touch(contextId);

      // GENERATE
      const dialogueResult = await this.dialogueAgent.execute(context);
      this.observe(dialogueResult, telemetryBase);
      if (!dialogueResult.success) {
        const error = `dialogue generation failed: ${dialogueResult.error}`;
        const elapsedMs = Date.now() - start;
        emit(TelemetryEvents.TurnFailed, { ...telemetryBase, elapsed_ms: elapsedMs, error });
        return { ok: false, error, perStageSuccess, diagnostics, elapsedMs, contextId };
      }
      perStageSuccess.dialogue = true;
      context.recordDialogue(dialogueResult.payload);
      this.registry.touch(contextId);

      // REVISE
      perStageSuccess.reflection = await this.revise(context, diagnostics, telemetryBase);
      this.registry.touch(contextId);

      // PERSIST
      const affinityChanged = await this.persist(context, perStageSuccess, diagnostics, telemetryBase);
      this.registry.touch(contextId);

      const elapsedMs = Date.now() - start;
      const revised = context.revision?.revised ?? false;
      emit(TelemetryEvents.TurnCompleted, {
        ...telemetryBase,
        elapsed_ms: elapsedMs,
        revised,
        affinity_changed: affinityChanged,
        degraded: diagnostics.length,
      });

      return {
        ok: true,
        reply: context.finalReply(),
        affinityScore: context.requireAffinity().score,
        affinityChanged,
        revised,
        perStageSuccess,
        diagnostics,
        elapsedMs,
        contextId,
      };
    } catch (error) {
      const message = describeError(error);
      const elapsedMs = Date.now() - start;
      log.error({ ...telemetryBase, error: message }, "Turn coordinator failed unexpectedly");
      emit(TelemetryEvents.TurnFailed, { ...telemetryBase, elapsed_ms: elapsedMs, error: message });
      return { ok: false, error: message, perStageSuccess, diagnostics, elapsedMs, contextId };
    }
  }

  private async retrieve(
    context: ConversationContext,
  ): Promise<[AgentResult<MemoryPayload>, AgentResult<AffinityPayload>]> {
    if (!this.options.parallelRetrieval) {
      const memory = await this.memoryAgent.execute(context);
      const affinity = await this.affinityAgent.execute(context);
      return [memory, affinity];
    }

    const [memory, affinity] = await Promise.allSettled([
      this.memoryAgent.execute(context),
      this.affinityAgent.execute(context),
    ]);
    return [settled(memory, "memory"), settled(affinity, "affinity")];
  }

  private merge<T>(
    result: AgentResult<T>,
    fallback: T,
    diagnostics: string[],
    record: (payload: T) => void,
  ): boolean {
    if (result.success) {
      record(result.payload);
      return true;
    }
    log.warn({ stage: result.producer, error: result.error }, "Retrieval stage failed, using default");
    diagnostics.push(`${result.producer} degraded: ${result.error}`);
    record(fallback);
    return false;
  }

  private async revise(
    context: ConversationContext,
    diagnostics: string[],
    telemetryBase: Record<string, string>,
  ): Promise<boolean> {
    if (!this.options.reflectionEnabled) {
      diagnostics.push("reflection skipped: disabled");
      return false;
    }

    switch (this.reflectionAgent.kind) {
      case "unconfigured":
        diagnostics.push("reflection skipped: no reviewer configured");
        return false;
      case "configured": {
        const result = await this.reflectionAgent.handle.execute(context);
        this.observe(result, telemetryBase);
        if (!result.success) {
          diagnostics.push(`reflection degraded: ${result.error}`);
          return false;
        }
        context.recordRevision(result.payload);
        if (result.payload.note) {
          diagnostics.push(`reflection: ${result.payload.note}`);
        }
        return true;
      }
    }
  }

  /** Returns whether the affinity score changed. */
  private async persist(
    context: ConversationContext,
    perStageSuccess: PerStageSuccess,
    diagnostics: string[],
    telemetryBase: Record<string, string>,
  ): Promise<boolean> {
    const result = await this.persistenceAgent.execute(context);
    this.observe(result, telemetryBase);
    if (!result.success) {
      diagnostics.push(`persistence failed: ${result.error}`);
      return false;
    }

    const { affinityUpdate, memorySave } = result.payload;
    let affinityChanged = false;

    switch (affinityUpdate.status) {
      case "applied":
        perStageSuccess.affinity_update = true;
        affinityChanged = affinityUpdate.value.changed;
        break;
      case "skipped":
        perStageSuccess.affinity_update = true;
        break;
      case "faulted":
        diagnostics.push(`affinity update failed: ${affinityUpdate.fault}`);
        break;
    }

    switch (memorySave.status) {
      case "applied":
        perStageSuccess.memory_save = true;
        break;
      case "skipped":
        diagnostics.push(`memory save skipped: ${memorySave.reason}`);
        break;
      case "faulted":
        diagnostics.push(`memory save failed: ${memorySave.fault}`);
        break;
    }

    return affinityChanged;
  }

  private observe<T>(result: AgentResult<T>, telemetryBase: Record<string, string>): void {
    if (result.success) {
      emit(TelemetryEvents.StageCompleted, {
        ...telemetryBase,
        stage: result.producer,
        elapsed_ms: result.elapsedMs,
      });
    } else {
      emit(TelemetryEvents.StageDegraded, {
        ...telemetryBase,
        stage: result.producer,
        elapsed_ms: result.elapsedMs,
        error: result.error,
      });
    }
  }
}
