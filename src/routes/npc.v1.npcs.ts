/**
 * NPC directory and relationship admin routes:
 *
 *   GET    /npc/v1/npcs
 *   GET    /npc/v1/affinity?player_id=
 *   GET    /npc/v1/npcs/:npc/affinity?player_id=
 *   PUT    /npc/v1/npcs/:npc/affinity
 *   GET    /npc/v1/npcs/:npc/memory?player_id=
 *   DELETE /npc/v1/npcs/:npc/memory?player_id=
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { log } from "../utils/telemetry.js";
import { getRequestId } from "../utils/request-id.js";
import { HttpError } from "../utils/errors.js";
import { DEFAULT_AFFINITY, describeAffinity, MAX_AFFINITY, MIN_AFFINITY } from "../relationship/levels.js";
import type { RoleProfile } from "../roles/roster.js";
import type { ServiceDeps } from "../orchestrator/deps.js";
import { DEFAULT_PLAYER_ID, PlayerId } from "./npc.v1.turn.js";

const NpcParams = z.object({ npc: z.string().min(1).max(64) });

const PlayerQuery = z.object({ player_id: PlayerId.default(DEFAULT_PLAYER_ID) });

const SetAffinityBody = z.object({
  player_id: PlayerId.default(DEFAULT_PLAYER_ID),
  score: z.number().min(MIN_AFFINITY).max(MAX_AFFINITY),
});

function affinityView(npcId: string, playerId: string, score: number) {
  const { level, style } = describeAffinity(score);
  return { npc: npcId, player_id: playerId, score, level, style };
}

export default async function route(app: FastifyInstance, deps: ServiceDeps): Promise<void> {
  function requireProfile(npcId: string): RoleProfile {
    const profile = deps.roles.get(npcId);
    if (!profile) {
      throw new HttpError("NOT_FOUND", `Unknown NPC: ${npcId}`);
    }
    return profile;
  }

  app.get("/npc/v1/npcs", async () => {
    return {
      npcs: deps.roles.list().map((role) => ({
        id: role.id,
        name: role.name,
        title: role.title,
        location: role.location,
        activity: role.activity,
      })),
    };
  });

  app.get("/npc/v1/affinity", async (req) => {
    const { player_id: playerId } = PlayerQuery.parse(req.query);
    const roles = deps.roles.list();

    let scores: Record<string, number> = {};
    let tracked = false;
    switch (deps.relationships.kind) {
      case "unconfigured":
        break;
      case "configured":
        scores = await deps.relationships.handle.listScores(playerId);
        tracked = true;
        break;
    }

    // Unscored NPCs report the neutral score; scores for NPCs no longer on the roster are omitted
    return {
      player_id: playerId,
      tracked,
      npcs: roles.map((role) => {
        const { npc, score, level, style } = affinityView(role.id, playerId, scores[role.id] ?? DEFAULT_AFFINITY);
        return { npc, name: role.name, score, level, style };
      }),
    };
  });

  app.get("/npc/v1/npcs/:npc/affinity", async (req) => {
    const { npc } = NpcParams.parse(req.params);
    const { player_id: playerId } = PlayerQuery.parse(req.query);
    requireProfile(npc);

    switch (deps.relationships.kind) {
      case "unconfigured":
        return { ...affinityView(npc, playerId, DEFAULT_AFFINITY), tracked: false };
      case "configured": {
        const score = await deps.relationships.handle.getScore(npc, playerId);
        return { ...affinityView(npc, playerId, score), tracked: true };
      }
    }
  });

  app.put("/npc/v1/npcs/:npc/affinity", async (req) => {
    const { npc } = NpcParams.parse(req.params);
    const body = SetAffinityBody.parse(req.body);
    requireProfile(npc);

    switch (deps.relationships.kind) {
      case "unconfigured":
        throw new HttpError("BAD_INPUT", "Relationship tracking is disabled (AFFINITY_ENABLED=false)");
      case "configured": {
        const score = await deps.relationships.handle.setScore(npc, body.player_id, body.score);
        return { ...affinityView(npc, body.player_id, score), tracked: true };
      }
    }
  });

  app.get("/npc/v1/npcs/:npc/memory", async (req) => {
    const { npc } = NpcParams.parse(req.params);
    const { player_id: playerId } = PlayerQuery.parse(req.query);
    requireProfile(npc);

    const turns = await deps.shortTerm.getHistory(npc, playerId);
    return { npc, player_id: playerId, turns };
  });

  app.delete("/npc/v1/npcs/:npc/memory", async (req) => {
    const { npc } = NpcParams.parse(req.params);
    const { player_id: playerId } = PlayerQuery.parse(req.query);
    requireProfile(npc);

    await deps.shortTerm.clear(npc, playerId);
    log.info({ request_id: getRequestId(req), npc, player_id: playerId }, "Working memory cleared");
    return { npc, player_id: playerId, cleared: true };
  });
}
