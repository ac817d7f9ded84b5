/**
 * Context Registry
 *
 * In-memory Map of live turn contexts keyed by `${npc}_${player}_${createdAtMs}`.
 * An entry is removed once it has been idle (no `get`/`touch`) for longer than
 * the idle timeout: lazily on lookup, or eagerly by `cleanup()`.
 *
 * At capacity, expired entries are evicted first, then the least recently
 * created one.
 */

import { log } from "../../utils/telemetry.js";
import { ConversationContext, type ContextInput } from "./conversation-context.js";

export interface ContextRegistryOptions {
  idleTimeoutMs: number;
  maxEntries: number;
  /** Clock override for tests. */
  now?: () => number;
}

interface RegistryEntry {
  context: ConversationContext;
  lastActivity: number;
}

export class ContextRegistry {
  private readonly entries = new Map<string, RegistryEntry>();
  private readonly now: () => number;

  constructor(private readonly options: ContextRegistryOptions) {
    this.now = options.now ?? Date.now;
  }

  create(input: ContextInput): { id: string; context: ConversationContext } {
    const createdAt = this.now();
    let id = `${input.npcId}_${input.playerId}_${createdAt}`;
    // Two turns for the same pair within one millisecond
    for (let suffix = 1; this.entries.has(id); suffix++) {
      id = `${input.npcId}_${input.playerId}_${createdAt}.${suffix}`;
    }

    if (this.entries.size >= this.options.maxEntries) {
      this.evict();
    }

    const context = new ConversationContext(input, new Date(createdAt));
    this.entries.set(id, { context, lastActivity: createdAt });
    return { id, context };
  }

  get(id: string): ConversationContext | undefined {
    const entry = this.entries.get(id);
    if (!entry) {
      return undefined;
    }
    if (this.isIdle(entry)) {
      this.entries.delete(id);
      return undefined;
    }
    entry.lastActivity = this.now();
    return entry.context;
  }

  /** Mark activity on an entry. Returns false if it is gone or expired. */
  touch(id: string): boolean {
    return this.get(id) !== undefined;
  }

  release(id: string): boolean {
    return this.entries.delete(id);
  }

  /** Remove every idle entry; returns how many were removed. */
  cleanup(): number {
    let removed = 0;
    for (const [id, entry] of this.entries) {
      if (this.isIdle(entry)) {
        this.entries.delete(id);
        removed++;
      }
    }
    if (removed > 0) {
      log.debug({ removed, remaining: this.entries.size }, "Context registry: removed idle contexts");
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }

  private isIdle(entry: RegistryEntry): boolean {
    return this.now() - entry.lastActivity > this.options.idleTimeoutMs;
  }

  private evict(): void {
    this.cleanup();
    if (this.entries.size < this.options.maxEntries) {
      return;
    }
    // Map iteration order = insertion order
    const oldest = this.entries.keys().next();
    if (!oldest.done) {
      this.entries.delete(oldest.value);
      log.warn({ context_id: oldest.value }, "Context registry at capacity: evicted oldest context");
    }
  }
}
