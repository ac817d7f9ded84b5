import { describe, it, expect } from "vitest";
import {
  ConversationContext,
  ContextFieldError,
} from "../../src/orchestrator/context/conversation-context.js";
import { makeProfile } from "../helpers/npc-fakes.js";

function makeContext(utterance = "Hi there"): ConversationContext {
  return new ConversationContext(
    {
      npcId: "ada",
      playerId: "p1",
      utterance,
      profile: makeProfile(),
      requestId: "req-1",
    },
    new Date("2026-01-02T03:04:05.000Z"),
  );
}

const MEMORY = { workingMemory: [{ role: "human" as const, content: "earlier" }], snippets: ["a"], narrative: "n" };
const AFFINITY = { score: 50, level: "stranger" as const, style: "polite", narrative: "r" };

describe("ConversationContext", () => {
  it("starts with every output slot empty", () => {
    const ctx = makeContext();

    expect(ctx.memory).toBeUndefined();
    expect(ctx.affinity).toBeUndefined();
    expect(ctx.dialogue).toBeUndefined();
    expect(ctx.revision).toBeUndefined();
  });

  it("freezes the profile copy", () => {
    const ctx = makeContext();
    expect(Object.isFrozen(ctx.profile)).toBe(true);
  });

  it("records each output exactly once", () => {
    const ctx = makeContext();
    ctx.recordMemory(MEMORY);
    ctx.recordAffinity(AFFINITY);
    ctx.recordDialogue({ reply: "Hello.", composedInput: "x" });
    ctx.recordRevision({ finalReply: "Hello!", revised: true });

    expect(() => ctx.recordMemory(MEMORY)).toThrow("memory output already recorded");
    expect(() => ctx.recordAffinity(AFFINITY)).toThrow("affinity output already recorded");
    expect(() => ctx.recordDialogue({ reply: "again", composedInput: "x" })).toThrow(
      "dialogue output already recorded",
    );
    expect(() => ctx.recordRevision({ finalReply: "again", revised: true })).toThrow(
      "revision output already recorded",
    );
  });

  it("rejects a revision before a reply exists", () => {
    const ctx = makeContext();
    expect(() => ctx.recordRevision({ finalReply: "x", revised: true })).toThrow(ContextFieldError);
  });

  it("freezes recorded outputs, including the working-memory turns", () => {
    const ctx = makeContext();
    ctx.recordMemory(MEMORY);

    const memory = ctx.requireMemory();
    expect(Object.isFrozen(memory)).toBe(true);
    expect(Object.isFrozen(memory.workingMemory)).toBe(true);
    expect(Object.isFrozen(memory.workingMemory[0])).toBe(true);
    expect(Object.isFrozen(memory.snippets)).toBe(true);
  });

  it("does not share arrays with the caller's payload", () => {
    const ctx = makeContext();
    const snippets = ["one"];
    ctx.recordMemory({ workingMemory: [], snippets, narrative: "" });
    snippets.push("two");

    expect(ctx.requireMemory().snippets).toEqual(["one"]);
  });

  it("throws when a required output is missing", () => {
    const ctx = makeContext();
    expect(() => ctx.requireMemory()).toThrow("memory output not recorded");
    expect(() => ctx.requireAffinity()).toThrow("affinity output not recorded");
    expect(() => ctx.requireDialogue()).toThrow("dialogue output not recorded");
  });

  describe("finalReply", () => {
    it("is the generated reply when no revision ran", () => {
      const ctx = makeContext();
      ctx.recordDialogue({ reply: "Hello.", composedInput: "x" });
      expect(ctx.finalReply()).toBe("Hello.");
    });

    it("is the revised reply after a revision", () => {
      const ctx = makeContext();
      ctx.recordDialogue({ reply: "Hello.", composedInput: "x" });
      ctx.recordRevision({ finalReply: "Hi there", revised: true });
      expect(ctx.finalReply()).toBe("Hi there");
    });
  });

  it("summarises inputs and which outputs are present", () => {
    const ctx = makeContext("x".repeat(80));
    ctx.recordMemory(MEMORY);

    expect(ctx.summary()).toEqual({
      npc_id: "ada",
      player_id: "p1",
      utterance: "x".repeat(50),
      created_at: "2026-01-02T03:04:05.000Z",
      has_memory: true,
      has_affinity: false,
      has_dialogue: false,
      has_revision: false,
    });
  });
});
