import { TtlCache } from './ttl-cache';
import { debugLogger } from './debug-logger';

export interface FeedRateLimiterOptions {
  windowMs: number;
  maxEntries?: number;
  now?: () => number;
}

/**
 * Per-user feed fetch gate. A feed URL may be fetched at most once per window
 * for the same user key; records expire with the window, so the map never
 * outgrows the set of (user, feed) pairs seen in the last window.
 *
 * Check-and-record is synchronous, which keeps it atomic on the event loop.
 */
export class FeedRateLimiter {
  private readonly lastFetch: TtlCache<string, number>;
  private readonly now: () => number;

  constructor(options: FeedRateLimiterOptions) {
    this.now = options.now ?? Date.now;
    this.lastFetch = new TtlCache<string, number>({
      ttlMs: options.windowMs,
      maxEntries: options.maxEntries ?? 50_000,
      now: this.now,
    });
  }

  /**
   * Returns true and records the fetch when the feed may be fetched now;
   * false when it was already fetched for this user inside the window.
   */
  tryAcquire(userKey: string, feedUrl: string): boolean {
    const key = recordKey(userKey, feedUrl);
    const last = this.lastFetch.get(key);

    if (last !== undefined) {
      debugLogger.info('RATE_LIMIT', 'Feed fetched recently for this user, skipping', {
        userKey,
        feedUrl,
        ageMs: this.now() - last,
      });
      return false;
    }

    this.lastFetch.set(key, this.now());
    return true;
  }
}

function recordKey(userKey: string, feedUrl: string): string {
  return `${userKey}\u0000${feedUrl}`;
}
