// Lv.2 — Per-conversation TTL snapshot shared by every conversation view

import type { DisplayMessage } from "./types.js";

export type CacheEntry = {
  messages: readonly DisplayMessage[];
  hasMore: boolean;
  loadedAt: number;
};

export class MessageCache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(
    readonly ttlMs: number = 10_000,
    private readonly now: () => number = Date.now,
  ) {}

  /** Fresh entry only; a stale one is evicted. */
  get(conversationId: string): CacheEntry | undefined {
    const entry = this.entries.get(conversationId);
    if (!entry) return undefined;
    if (this.now() - entry.loadedAt >= this.ttlMs) {
      this.entries.delete(conversationId);
      return undefined;
    }
    return entry;
  }

  set(conversationId: string, data: { messages: readonly DisplayMessage[]; hasMore: boolean }): void {
    this.entries.set(conversationId, {
      messages: [...data.messages],
      hasMore: data.hasMore,
      loadedAt: this.now(),
    });
  }

  delete(conversationId: string): void {
    this.entries.delete(conversationId);
  }

  clear(): void {
    this.entries.clear();
  }
}
