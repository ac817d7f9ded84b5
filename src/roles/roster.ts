/**
 * NPC Role Roster
 *
 * Static character profiles, loaded once from a JSON file
 * (NPC_ROSTER_PATH, default data/npc-roles.json under the working directory).
 */

import { readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { config } from "../config/index.js";
import { log } from "../utils/telemetry.js";
import { describeError } from "../utils/errors.js";

/** Canned ambient line per part of the day, used when batch generation is unavailable. */
export const IdleLines = z.object({
  morning: z.string().min(1),
  noon: z.string().min(1),
  afternoon: z.string().min(1),
  evening: z.string().min(1),
});

export type IdleLines = z.infer<typeof IdleLines>;

export const RoleProfile = z.object({
  id: z.string().regex(/^[a-z0-9_-]+$/),
  name: z.string().min(1),
  title: z.string().min(1),
  location: z.string(),
  activity: z.string(),
  personality: z.string(),
  expertise: z.string(),
  style: z.string(),
  hobbies: z.string(),
  idleLines: IdleLines.optional(),
});

export type RoleProfile = z.infer<typeof RoleProfile>;

const Roster = z.array(RoleProfile).superRefine((roles, ctx) => {
  const seen = new Set<string>();
  roles.forEach((role, index) => {
    if (seen.has(role.id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, "id"], message: `Duplicate NPC id "${role.id}"` });
    }
    seen.add(role.id);
  });
});

function getRosterPath(): string {
  return config.roster.path || join(process.cwd(), "data", "npc-roles.json");
}

let rosterCache: ReadonlyMap<string, RoleProfile> | null = null;

/**
 * Parse and index roster JSON. Throws a plain Error on malformed content,
 * so a broken roster surfaces as a server fault rather than a request one.
 */
export function parseRoster(content: string): ReadonlyMap<string, RoleProfile> {
  const result = Roster.safeParse(JSON.parse(content));
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid NPC roster. ${issues}`);
  }
  return new Map(result.data.map((role) => [role.id, role]));
}

function loadRoster(): ReadonlyMap<string, RoleProfile> {
  if (rosterCache === null) {
    const rosterPath = getRosterPath();
    try {
      rosterCache = parseRoster(readFileSync(rosterPath, "utf-8"));
    } catch (error) {
      throw new Error(`Failed to load NPC roster (${rosterPath}): ${describeError(error)}`);
    }
    log.info({ roster_path: rosterPath, npc_count: rosterCache.size }, "Loaded NPC roster");
  }
  return rosterCache;
}

export function getRoleProfile(npcId: string): RoleProfile | null {
  return loadRoster().get(npcId) ?? null;
}

export function listRoles(): RoleProfile[] {
  return [...loadRoster().values()];
}

/**
 * Reset the cached roster (for testing only)
 *
 * @internal
 */
export function _resetRosterCache(): void {
  rosterCache = null;
}
