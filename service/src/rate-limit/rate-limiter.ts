import type { BucketUsage, RateLimitRule } from "@refdata/shared";
import { createLogger } from "../utils/logger.js";

const log = createLogger("rate-limiter");

export type AcquireResult =
  | { granted: true }
  | { granted: false; retryAfterMs: number; reason: "exhausted" | "over-capacity" };

export type RateLimiterOptions = {
  now?: () => number;
};

type LimitWindow = {
  intervalMs: number;
  limit: number;
};

type Consumption = {
  at: number;
  weight: number;
};

type Bucket = {
  windows: LimitWindow[];
  /** Granted consumptions, oldest first, shared by every window of the bucket. */
  history: Consumption[];
};

/**
 * Sliding-window weight limiter. A bucket may carry several windows (e.g. a
 * 10s and a 1d order limit); a request passes only when all of them have room.
 * `tryAcquire` is synchronous, so check and commit cannot interleave with
 * another caller on the event loop.
 */
export class RateLimiter {
  private buckets = new Map<string, Bucket>();
  private readonly now: () => number;

  constructor(rules: RateLimitRule[] = [], options: RateLimiterOptions = {}) {
    this.now = options.now ?? Date.now;
    this.configure(rules);
  }

  /** Replace the windows of every bucket named in `rules`. Consumption history is kept. */
  configure(rules: RateLimitRule[]): void {
    const grouped = new Map<string, Map<number, number>>();
    for (const rule of rules) {
      if (rule.limit <= 0 || rule.intervalMs <= 0) {
        throw new RangeError(
          `Invalid rate limit for ${rule.bucket}: limit=${rule.limit} intervalMs=${rule.intervalMs}`,
        );
      }
      const windows = grouped.get(rule.bucket) ?? new Map<number, number>();
      windows.set(rule.intervalMs, rule.limit);
      grouped.set(rule.bucket, windows);
    }

    for (const [name, windows] of grouped) {
      const bucket = this.buckets.get(name) ?? { windows: [], history: [] };
      bucket.windows = [...windows.entries()]
        .map(([intervalMs, limit]) => ({ intervalMs, limit }))
        .sort((a, b) => a.intervalMs - b.intervalMs);
      this.buckets.set(name, bucket);
    }

    if (grouped.size > 0) {
      log.debug("Rate limits configured", { buckets: [...grouped.keys()] });
    }
  }

  tryAcquire(bucketName: string, weight: number): AcquireResult {
    if (!Number.isInteger(weight) || weight <= 0) {
      throw new RangeError(`Weight must be a positive integer, got ${weight}`);
    }

    const bucket = this.buckets.get(bucketName);
    if (!bucket) return { granted: true };

    const now = this.now();
    this.prune(bucket, now);

    let retryAfterMs = 0;
    let overCapacity = false;

    for (const window of bucket.windows) {
      if (weight > window.limit) {
        overCapacity = true;
        retryAfterMs = Math.max(retryAfterMs, window.intervalMs);
        continue;
      }
      retryAfterMs = Math.max(retryAfterMs, waitFor(bucket.history, window, weight, now));
    }

    if (retryAfterMs > 0) {
      return {
        granted: false,
        retryAfterMs,
        reason: overCapacity ? "over-capacity" : "exhausted",
      };
    }

    bucket.history.push({ at: now, weight });
    return { granted: true };
  }

  usage(): BucketUsage[] {
    const now = this.now();
    const result: BucketUsage[] = [];

    for (const [name, bucket] of this.buckets) {
      this.prune(bucket, now);
      for (const window of bucket.windows) {
        result.push({
          bucket: name,
          intervalMs: window.intervalMs,
          limit: window.limit,
          used: usedIn(bucket.history, window, now),
        });
      }
    }

    return result;
  }

  private prune(bucket: Bucket, now: number): void {
    const longest = bucket.windows.reduce((max, w) => Math.max(max, w.intervalMs), 0);
    const cutoff = now - longest;
    const keepFrom = bucket.history.findIndex((c) => c.at > cutoff);
    if (keepFrom === -1) {
      bucket.history.length = 0;
    } else if (keepFrom > 0) {
      bucket.history.splice(0, keepFrom);
    }
  }
}

function usedIn(history: Consumption[], window: LimitWindow, now: number): number {
  const start = now - window.intervalMs;
  let used = 0;
  for (const c of history) {
    if (c.at > start) used += c.weight;
  }
  return used;
}

/**
 * Milliseconds until `weight` fits in `window`: walk the window's consumptions
 * oldest first until enough weight has aged out.
 */
function waitFor(history: Consumption[], window: LimitWindow, weight: number, now: number): number {
  const start = now - window.intervalMs;
  const excess = usedIn(history, window, now) + weight - window.limit;
  if (excess <= 0) return 0;

  let freed = 0;
  for (const c of history) {
    if (c.at <= start) continue;
    freed += c.weight;
    if (freed >= excess) return c.at + window.intervalMs - now;
  }
  return window.intervalMs;
}
