/**
 * LLM-backed generation and review collaborators.
 */

import type { CallOpts, LLMAdapter } from "../adapters/llm/types.js";
import type { ChatTurn } from "../memory/types.js";
import type { RoleProfile } from "../roles/roster.js";
import type { DialogueGenerator, ReplyReviewer, ReviewRequest } from "../orchestrator/types.js";
import { buildPersonaPrompt, buildReviewMessage, REVIEW_SYSTEM_PROMPT } from "./prompts.js";

export class LlmDialogueGenerator implements DialogueGenerator {
  constructor(private readonly llm: LLMAdapter) {}

  async generate(
    composedInput: string,
    history: readonly ChatTurn[],
    profile: RoleProfile,
    opts: CallOpts,
  ): Promise<string> {
    const { content } = await this.llm.chat(
      {
        task: "dialogue",
        system: buildPersonaPrompt(profile),
        history: [...history],
        userMessage: composedInput,
      },
      opts,
    );
    return content;
  }
}

export class LlmReplyReviewer implements ReplyReviewer {
  constructor(private readonly llm: LLMAdapter) {}

  async review(request: ReviewRequest, opts: CallOpts): Promise<string> {
    const { content } = await this.llm.chat(
      {
        task: "review",
        system: REVIEW_SYSTEM_PROMPT,
        userMessage: buildReviewMessage(request),
      },
      opts,
    );
    return content;
  }
}
