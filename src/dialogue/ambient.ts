/**
 * Ambient NPC lines.
 *
 * One model call writes a short status line for every NPC in the roster.
 * When the call fails, or its reply is not a JSON object with a line for
 * each NPC, the roster's canned idle lines for the current part of the day
 * are returned instead.
 */

import { z } from "zod";
import type { CallOpts, LLMAdapter } from "../adapters/llm/types.js";
import type { IdleLines, RoleProfile } from "../roles/roster.js";
import { stripCodeFence } from "../relationship/manager.js";
import { describeError } from "../utils/errors.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { AMBIENT_SYSTEM_PROMPT, buildAmbientMessage } from "./prompts.js";

export type DayPeriod = keyof IdleLines;

export type AmbientSource = "llm" | "preset";

export interface AmbientBatch {
  scene: string;
  period: DayPeriod;
  source: AmbientSource;
  /** Line per NPC id, in roster order. */
  lines: Record<string, string>;
}

export interface AmbientRequest {
  roles: readonly RoleProfile[];
  /** Overrides the scene derived from the clock. */
  scene?: string;
}

export interface AmbientGeneratorOptions {
  now?: () => Date;
}

const AmbientLines = z.record(z.string().trim().min(1));

export function describeScene(hour: number): string {
  if (hour >= 6 && hour < 9) return "Early morning. People are arriving and settling in for the day.";
  if (hour >= 9 && hour < 12) return "Mid-morning. Everyone is heads-down and the office is busy.";
  if (hour >= 12 && hour < 14) return "Lunch break. People are relaxing, chatting or checking their phones.";
  if (hour >= 14 && hour < 17) return "Afternoon. Projects are moving and the coffee machine is in demand.";
  if (hour >= 17 && hour < 19) return "Early evening. People are wrapping up and planning tomorrow.";
  return "Night. The office is quiet, with the odd person working late.";
}

export function dayPeriod(hour: number): DayPeriod {
  if (hour >= 6 && hour < 12) return "morning";
  if (hour >= 12 && hour < 14) return "noon";
  if (hour >= 14 && hour < 18) return "afternoon";
  return "evening";
}

export function presetLines(roles: readonly RoleProfile[], period: DayPeriod): Record<string, string> {
  return Object.fromEntries(roles.map((role) => [role.id, role.idleLines?.[period] ?? `${role.activity}.`]));
}

/**
 * Parse a whole-body JSON object, or failing that the outermost `{...}`
 * inside the reply.
 */
function extractJsonObject(content: string): unknown {
  const body = stripCodeFence(content);
  try {
    return JSON.parse(body);
  } catch {
    const start = body.indexOf("{");
    const end = body.lastIndexOf("}");
    if (start === -1 || end <= start) {
      return undefined;
    }
    try {
      return JSON.parse(body.slice(start, end + 1));
    } catch {
      return undefined;
    }
  }
}

/**
 * Lines keyed by NPC id, or `null` unless every role got a non-blank line.
 * Keys for NPCs outside `roles` are dropped.
 */
export function parseAmbientLines(content: string, roles: readonly RoleProfile[]): Record<string, string> | null {
  const parsed = AmbientLines.safeParse(extractJsonObject(content));
  if (!parsed.success) {
    return null;
  }

  const lines: Record<string, string> = {};
  for (const role of roles) {
    const line = parsed.data[role.id];
    if (line === undefined) {
      return null;
    }
    lines[role.id] = line;
  }
  return lines;
}

export class AmbientLineGenerator {
  private readonly now: () => Date;

  constructor(
    private readonly llm: LLMAdapter,
    options: AmbientGeneratorOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async generate(request: AmbientRequest, opts: CallOpts): Promise<AmbientBatch> {
    const hour = this.now().getHours();
    const period = dayPeriod(hour);
    const scene = request.scene ?? describeScene(hour);
    const start = Date.now();

    let reason: string;
    try {
      const { content } = await this.llm.chat(
        {
          task: "ambient",
          system: AMBIENT_SYSTEM_PROMPT,
          userMessage: buildAmbientMessage(request.roles, scene),
          json: true,
        },
        opts,
      );

      const lines = parseAmbientLines(content, request.roles);
      if (lines) {
        emit(TelemetryEvents.AmbientGenerated, {
          request_id: opts.requestId,
          npc_count: request.roles.length,
          elapsed_ms: Date.now() - start,
        });
        return { scene, period, source: "llm", lines };
      }
      reason = "reply was not a JSON object with a line for every NPC";
    } catch (error) {
      reason = describeError(error);
    }

    emit(TelemetryEvents.AmbientFallback, { request_id: opts.requestId, period, reason });
    return { scene, period, source: "preset", lines: presetLines(request.roles, period) };
  }
}
