import type { LLMAdapter, ChatArgs, ChatResult, CallOpts } from "./types.js";

const NO_USAGE = { input_tokens: 0, output_tokens: 0 };

/** Persona prompts open with "You are {name}, ...". */
const PERSONA_NAME = /^You are ([^,\n]+),/;

/** Ambient roster lines read "- {id}: {name} ({title}) ...". */
const AMBIENT_NPC = /^- ([a-z0-9_-]+): ([^(\n]+?) \(/gm;

/**
 * Fixtures adapter for running without API keys.
 *
 * Dialogue gets a canned greeting, review always passes, affinity
 * analysis reports no change, and each listed NPC gets a canned ambient line.
 */
export class FixturesAdapter implements LLMAdapter {
  readonly name = "fixtures" as const;
  readonly model = "fixture-v1";

  async chat(args: ChatArgs, _opts: CallOpts): Promise<ChatResult> {
    switch (args.task) {
      case "dialogue": {
        const name = PERSONA_NAME.exec(args.system)?.[1] ?? "a local";
        return {
          content: `Hello! I'm ${name}. (Fixture mode: set LLM_PROVIDER and an API key to enable real dialogue.)`,
          usage: NO_USAGE,
        };
      }
      case "review":
        return { content: "PASS", usage: NO_USAGE };
      case "affinity":
        return { content: JSON.stringify({ delta: 0, reason: "fixture" }), usage: NO_USAGE };
      case "ambient": {
        const lines: Record<string, string> = {};
        for (const match of args.userMessage.matchAll(AMBIENT_NPC)) {
          lines[match[1]] = `${match[2]} is getting on with the day.`;
        }
        return { content: JSON.stringify(lines), usage: NO_USAGE };
      }
    }
  }
}
