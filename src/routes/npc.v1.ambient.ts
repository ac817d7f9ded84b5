/**
 * GET /npc/v1/ambient?scene=
 *
 * A short status line for every NPC in the roster, from one model call.
 * Falls back to the roster's idle lines, so this route does not fail on
 * upstream errors.
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { LLM_TIMEOUT_MS } from "../config/timeouts.js";
import { getRequestId } from "../utils/request-id.js";
import type { ServiceDeps } from "../orchestrator/deps.js";

const AmbientQuery = z.object({
  scene: z.string().trim().min(1).max(500).optional(),
});

export default async function route(app: FastifyInstance, deps: ServiceDeps): Promise<void> {
  app.get("/npc/v1/ambient", async (req) => {
    const { scene } = AmbientQuery.parse(req.query);
    const requestId = getRequestId(req);
    const roles = deps.roles.list();

    const batch = await deps.ambient.generate(
      { roles, scene },
      { requestId, timeoutMs: LLM_TIMEOUT_MS },
    );

    return {
      scene: batch.scene,
      period: batch.period,
      source: batch.source,
      lines: roles.map((role) => ({ npc: role.id, name: role.name, line: batch.lines[role.id] })),
      request_id: requestId,
    };
  });
}
