import type { RoleProfile } from "../roles/roster.js";
import type { ReviewRequest } from "../orchestrator/types.js";

/**
 * Persona prompt for dialogue generation. Must open with "You are {name},".
 */
export function buildPersonaPrompt(profile: RoleProfile): string {
  return `You are ${profile.name}, the ${profile.title} in a small game-studio office.

[Character]
- Title: ${profile.title}
- Personality: ${profile.personality}
- Expertise: ${profile.expertise}
- Speaking style: ${profile.style}
- Hobbies: ${profile.hobbies}
- Current location: ${profile.location}
- Current activity: ${profile.activity}

[Rules]
1. Stay in character and answer in the first person.
2. Keep replies short and natural, one to three sentences.
3. Mention your work or hobbies when it fits.
4. Match the relationship and speaking style given with each message.
5. If a question is outside your expertise, suggest a colleague.
6. Never say you are an AI or a language model.`;
}

export const REVIEW_SYSTEM_PROMPT = `You review replies written by a game NPC.

[Criteria]
1. Character consistency: does the reply fit the NPC's personality, title and speaking style?
2. Content: does it answer the player?
3. Length: one to three natural sentences.
4. Tone: does it match the current relationship level?

[Output]
- If the reply needs no change, output exactly: PASS
- Otherwise output: REVISED: <the improved reply>

Output the verdict only, with no explanation.`;

export function buildReviewMessage(request: ReviewRequest): string {
  const { profile } = request;
  return `[NPC]
- Name: ${profile.name}
- Title: ${profile.title}
- Personality: ${profile.personality}
- Speaking style: ${profile.style}

[Exchange]
Player: ${request.utterance}
NPC reply: ${request.reply}

[Relationship]
- Level: ${request.affinityLevel}
- Style: ${request.affinityStyle}

Review this reply:`;
}

export const AMBIENT_SYSTEM_PROMPT =
  "You write ambient lines for the NPCs of a small game-studio office. Lines sound like real colleagues.";

/**
 * One roster line per NPC, formatted "- {id}: {name} ({title}) ...".
 */
export function buildAmbientMessage(roles: readonly RoleProfile[], scene: string): string {
  const npcs = roles
    .map((role) => `- ${role.id}: ${role.name} (${role.title}) at the ${role.location}, ${role.activity}. ${role.personality}`)
    .join("\n");
  const shape = roles.map((role) => `"${role.id}": "..."`).join(", ");

  return `[Scene]
${scene}

[NPCs]
${npcs}

[Rules]
1. Write one sentence per NPC, about 8 to 20 words.
2. Fit the character, the current activity and the scene.
3. Talking to oneself, a remark about work or a passing thought all work.
4. Return JSON only, keyed by NPC id: {${shape}}`;
}
