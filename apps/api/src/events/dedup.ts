import { LRUCache } from 'lru-cache';
import { DEDUP_CONFIG } from '../config/constants.js';

/**
 * Consumer-side event deduplication.
 *
 * An event id is remembered only after its handler succeeds, so a failed
 * attempt can be redelivered. While a handler runs, concurrent copies of
 * the same event are rejected.
 */
export class EventDeduplicator {
  private processed: LRUCache<string, number>;
  private inFlight = new Set<string>();

  private stats = {
    duplicates: 0,
    totalChecks: 0,
  };

  constructor(
    maxEntries: number = DEDUP_CONFIG.MEMORY_MAX_ENTRIES,
    ttlMs: number = DEDUP_CONFIG.MEMORY_TTL_MS
  ) {
    this.processed = new LRUCache<string, number>({
      max: maxEntries,
      ttl: ttlMs,
    });
  }

  private getKey(topic: string, eventId: string): string {
    return `${topic}:${eventId}`;
  }

  /**
   * Returns false if the event was already handled or is being handled
   */
  begin(topic: string, eventId: string): boolean {
    this.stats.totalChecks++;
    const key = this.getKey(topic, eventId);

    if (this.processed.has(key) || this.inFlight.has(key)) {
      this.stats.duplicates++;
      return false;
    }

    this.inFlight.add(key);
    return true;
  }

  complete(topic: string, eventId: string): void {
    const key = this.getKey(topic, eventId);
    this.inFlight.delete(key);
    this.processed.set(key, Date.now());
  }

  /**
   * Handler failed: forget the attempt so a redelivery runs again
   */
  release(topic: string, eventId: string): void {
    this.inFlight.delete(this.getKey(topic, eventId));
  }

  getStats(): { size: number; duplicates: number; totalChecks: number } {
    return {
      size: this.processed.size,
      duplicates: this.stats.duplicates,
      totalChecks: this.stats.totalChecks,
    };
  }
}
