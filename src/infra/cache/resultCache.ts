import { createHash } from "node:crypto";
import type { CachePort, ClockPort } from "../../core/ports/outboundPorts";

type CacheEntry<V> = Readonly<{
  key: string;
  value: V;
  storedAt: number;
  ttlMs: number;
}>;

/**
 * Builds a deterministic key from a data kind and its semantic arguments.
 */
export const cacheKey = (kind: string, ...parts: unknown[]): string =>
  `${kind}:${createHash("sha256").update(JSON.stringify(parts)).digest("hex").slice(0, 24)}`;

/**
 * Bounded time-to-live cache. Expired entries are dropped lazily on lookup and replaced, never
 * patched. Concurrent cold lookups of one key may each run `fetch`; the last write wins.
 */
export class ResultCache<V> implements CachePort<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();

  constructor(
    private readonly clock: ClockPort,
    private readonly maxEntries = 500,
  ) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new Error("ResultCache requires maxEntries to be a positive integer.");
    }
  }

  get size(): number {
    return this.entries.size;
  }

  async getOrFetch(
    key: string,
    ttlMs: number,
    fetch: () => Promise<V>,
  ): Promise<V> {
    const now = this.clock.now().getTime();
    const existing = this.entries.get(key);

    if (existing) {
      if (now - existing.storedAt < existing.ttlMs) {
        return existing.value;
      }

      this.entries.delete(key);
    }

    const value = await fetch();
    this.store(key, value, ttlMs);
    return value;
  }

  private store(key: string, value: V, ttlMs: number): void {
    this.entries.delete(key);

    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }

    this.entries.set(
      key,
      Object.freeze({
        key,
        value,
        storedAt: this.clock.now().getTime(),
        ttlMs,
      }),
    );
  }
}
