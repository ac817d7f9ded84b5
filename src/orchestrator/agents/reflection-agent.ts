/**
 * Revision Stage
 *
 * Asks the reviewer to approve or rewrite the generated reply. Review is
 * best-effort: a reviewer fault keeps the original reply and still succeeds.
 */

import { describeError } from "../../utils/errors.js";
import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";
import type { ConversationContext } from "../context/conversation-context.js";
import type { ReplyReviewer, RevisionPayload } from "../types.js";
import { BaseAgent } from "./base.js";

export const APPROVAL_TOKEN = "PASS";
export const REVISION_MARKER = "REVISED:";

export type Verdict =
  | { kind: "approved" }
  | { kind: "revised"; reply: string; marked: boolean }
  | { kind: "empty" };

/**
 * Interpret raw reviewer output.
 *
 * Only the exact approval token means "no change". Anything else non-empty
 * replaces the reply, with the revision marker stripped when present.
 */
export function parseVerdict(raw: string): Verdict {
  const verdict = raw.trim();
  if (verdict === APPROVAL_TOKEN) {
    return { kind: "approved" };
  }
  if (verdict.startsWith(REVISION_MARKER)) {
    const reply = verdict.slice(REVISION_MARKER.length).trim();
    return reply ? { kind: "revised", reply, marked: true } : { kind: "empty" };
  }
  if (!verdict) {
    return { kind: "empty" };
  }
  return { kind: "revised", reply: verdict, marked: false };
}

export class ReflectionAgent extends BaseAgent<RevisionPayload> {
  readonly name = "reflection";

  constructor(
    private readonly reviewer: ReplyReviewer,
    private readonly timeoutMs: number,
  ) {
    super();
  }

  protected async run(context: ConversationContext): Promise<RevisionPayload> {
    const original = context.requireDialogue().reply;
    const affinity = context.requireAffinity();

    let raw: string;
    try {
      raw = await this.reviewer.review(
        {
          reply: original,
          utterance: context.utterance,
          profile: context.profile,
          affinityLevel: affinity.level,
          affinityStyle: affinity.style,
        },
        { requestId: context.requestId, timeoutMs: this.timeoutMs },
      );
    } catch (error) {
      log.warn(
        { request_id: context.requestId, npc: context.npcId, error: describeError(error) },
        "Reviewer failed, keeping generated reply",
      );
      return { finalReply: original, revised: false, note: `reviewer fault: ${describeError(error)}` };
    }

    const verdict = parseVerdict(raw);
    switch (verdict.kind) {
      case "approved":
        return { finalReply: original, revised: false };
      case "empty":
        return { finalReply: original, revised: false, note: "reviewer returned an empty verdict" };
      case "revised":
        if (!verdict.marked) {
          emit(TelemetryEvents.ReflectionUnmarkedVerdict, {
            request_id: context.requestId,
            npc: context.npcId,
            verdict_chars: verdict.reply.length,
          });
        }
        emit(TelemetryEvents.ReflectionRevised, {
          request_id: context.requestId,
          npc: context.npcId,
          marked: verdict.marked,
        });
        return {
          finalReply: verdict.reply,
          revised: true,
          ...(verdict.marked ? {} : { note: "unmarked verdict used as replacement reply" }),
        };
    }
  }
}
