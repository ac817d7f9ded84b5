/**
 * POST /npc/v1/turn
 *
 * One player utterance in, one NPC reply out. Unknown NPCs are 404; a turn
 * whose generation stage failed is 502 with the per-stage flags attached.
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { log } from "../utils/telemetry.js";
import { getRequestId } from "../utils/request-id.js";
import { buildErrorV1, getStatusCodeForErrorCode, HttpError, sanitizeErrorMessage } from "../utils/errors.js";
import type { ServiceDeps } from "../orchestrator/deps.js";

export const DEFAULT_PLAYER_ID = "player";

// ============================================================================
// Request Validation Schema
// ============================================================================

export const PlayerId = z.string().trim().min(1).max(128);

const TurnRequestSchema = z.object({
  npc: z.string().min(1).max(64),
  player_id: PlayerId.default(DEFAULT_PLAYER_ID),
  message: z.string().trim().min(1).max(2000),
});

// ============================================================================
// Route Registration
// ============================================================================

export default async function route(app: FastifyInstance, deps: ServiceDeps): Promise<void> {
  app.post("/npc/v1/turn", async (req, reply) => {
    const requestId = getRequestId(req);

    const parsed = TurnRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      log.warn({ request_id: requestId, errors: parsed.error.flatten() }, "Turn request validation failed");
      reply.code(400);
      return reply.send(
        buildErrorV1("BAD_INPUT", "Validation failed", { validation_errors: parsed.error.flatten() }, requestId),
      );
    }

    const { npc, player_id: playerId, message } = parsed.data;
    const profile = deps.roles.get(npc);
    if (!profile) {
      throw new HttpError("NOT_FOUND", `Unknown NPC: ${npc}`);
    }

    const outcome = await deps.coordinator.runTurn({
      npcId: npc,
      playerId,
      utterance: message,
      profile,
      requestId,
    });

    log.info(
      {
        request_id: requestId,
        npc,
        player_id: playerId,
        ok: outcome.ok,
        elapsed_ms: outcome.elapsedMs,
        stages: outcome.perStageSuccess,
      },
      "NPC turn completed",
    );

    if (!outcome.ok) {
      reply.code(getStatusCodeForErrorCode("UPSTREAM_FAILED"));
      return reply.send(
        buildErrorV1(
          "UPSTREAM_FAILED",
          sanitizeErrorMessage(outcome.error),
          { stages: outcome.perStageSuccess, diagnostics: outcome.diagnostics },
          requestId,
        ),
      );
    }

    return {
      reply: outcome.reply,
      affinity_score: outcome.affinityScore,
      affinity_changed: outcome.affinityChanged,
      revised: outcome.revised,
      stages: outcome.perStageSuccess,
      diagnostics: outcome.diagnostics,
      elapsed_ms: outcome.elapsedMs,
      request_id: requestId,
    };
  });
}
