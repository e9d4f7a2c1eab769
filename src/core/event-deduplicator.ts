/**
 * EventDeduplicator: bounded-recency set of event fingerprints.
 *
 * Webhook transports redeliver on timeout, so the same event may arrive more
 * than once. `checkAndInsert` is synchronous: membership test and insert
 * happen without yielding to the event loop, so two concurrent deliveries of
 * one event cannot both pass.
 *
 * Not durable. A restart forgets everything it held.
 */

export interface EventDeduplicatorOptions {
  /** Retention window. Default: 10 minutes. */
  windowMs?: number;
  /** Safety backstop on memory. Default: 10 000 entries. */
  maxEntries?: number;
  now?: () => number;
}

export const DEFAULT_DEDUP_WINDOW_MS = 10 * 60_000;
export const DEFAULT_DEDUP_MAX_ENTRIES = 10_000;

export class EventDeduplicator {
  // Map iteration order is insertion order, so the first key is the oldest.
  private seen = new Map<string, number>();
  private readonly windowMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: EventDeduplicatorOptions = {}) {
    this.windowMs = options.windowMs ?? DEFAULT_DEDUP_WINDOW_MS;
    this.maxEntries = options.maxEntries ?? DEFAULT_DEDUP_MAX_ENTRIES;
    this.now = options.now ?? Date.now;
    if (!Number.isInteger(this.maxEntries) || this.maxEntries < 1) {
      throw new RangeError("EventDeduplicator maxEntries must be a positive integer");
    }
  }

  /**
   * Record a fingerprint.
   * Returns `true` if it was not seen within the window (the caller should
   * process the event), `false` for a replay.
   */
  checkAndInsert(fingerprint: string): boolean {
    const now = this.now();
    this.evictExpired(now);

    if (this.seen.has(fingerprint)) return false;

    if (this.seen.size >= this.maxEntries) {
      const oldest = this.seen.keys().next().value;
      if (oldest !== undefined) this.seen.delete(oldest);
    }

    this.seen.set(fingerprint, now);
    return true;
  }

  /** Membership test without inserting. */
  has(fingerprint: string): boolean {
    this.evictExpired(this.now());
    return this.seen.has(fingerprint);
  }

  get size(): number {
    return this.seen.size;
  }

  get retentionMs(): number {
    return this.windowMs;
  }

  private evictExpired(now: number): void {
    const cutoff = now - this.windowMs;
    for (const [key, seenAt] of this.seen) {
      if (seenAt > cutoff) break;
      this.seen.delete(key);
    }
  }
}
