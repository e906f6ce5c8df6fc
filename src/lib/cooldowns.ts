/**
 * http-interactions — src/lib/cooldowns.ts
 * WHAT: Token-bucket cooldowns for commands, bucketed per user/member/guild/channel.
 * WHY: Lets a command declare "3 uses per 10s per user" and have the dispatcher enforce it.
 * FLOWS:
 *   - CooldownCache.getBucket(source) → Cooldown for that key (pruning expired buckets)
 *   - Cooldown.updateRateLimit() → null when allowed, ms until refill when exhausted
 *   - formatCooldown(ms) → "12 seconds"
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/** What a bucket key can be derived from. Context satisfies this. */
export interface BucketSource {
  readonly user: { id: string };
  readonly guildId: string | null;
  readonly channelId: string | null;
  readonly parentChannelId: string | null;
}

export const BucketType = {
  /** one bucket shared by everyone */
  Default: "default",
  User: "user",
  /** per user, per guild */
  Member: "member",
  Guild: "guild",
  /** channel's parent category, falling back to the channel */
  Category: "category",
  Channel: "channel",
} as const;

export type BucketType = (typeof BucketType)[keyof typeof BucketType];

/**
 * Bucket key for a source. Guild-scoped buckets fall back to the user in DMs
 * so a DM invocation never shares a bucket with other users.
 */
export function bucketKey(type: BucketType, source: BucketSource): string {
  switch (type) {
    case BucketType.User:
      return source.user.id;
    case BucketType.Member:
      return `${source.guildId ?? "dm"}:${source.user.id}`;
    case BucketType.Guild:
      return source.guildId ?? source.user.id;
    case BucketType.Category:
      return source.parentChannelId ?? source.channelId ?? source.user.id;
    case BucketType.Channel:
      return source.channelId ?? source.user.id;
    default:
      return "0";
  }
}

/**
 * `rate` uses per `perMs` window. The window opens on the first use after a
 * full refill; once it has elapsed the bucket is full again.
 */
export class Cooldown {
  readonly rate: number;
  readonly perMs: number;
  private window = 0;
  private tokens: number;
  private last = 0;

  constructor(rate: number, perMs: number) {
    if (!Number.isInteger(rate) || rate < 1) {
      throw new RangeError(`Cooldown rate must be a positive integer, got ${rate}`);
    }
    if (!(perMs > 0)) {
      throw new RangeError(`Cooldown window must be positive, got ${perMs}`);
    }
    this.rate = rate;
    this.perMs = perMs;
    this.tokens = rate;
  }

  /** Timestamp (ms) of the last updateRateLimit call. */
  get lastUsed(): number {
    return this.last;
  }

  getTokens(current: number = Date.now()): number {
    let tokens = Math.max(this.tokens, 0);
    if (current > this.window + this.perMs) {
      tokens = this.rate;
    }
    return tokens;
  }

  /** ms until the bucket refills, 0 when tokens are left. */
  getRetryAfter(current: number = Date.now()): number {
    const tokens = this.getTokens(current);
    return tokens === 0 ? this.perMs - (current - this.window) : 0;
  }

  /**
   * Consume tokens. Returns null when the use is allowed, otherwise the ms
   * left before the window resets.
   */
  updateRateLimit(current: number = Date.now(), tokens = 1): number | null {
    this.last = current;
    this.tokens = this.getTokens(current);

    if (this.tokens === this.rate) {
      this.window = current;
    }

    this.tokens -= tokens;

    if (this.tokens < 0) {
      return this.perMs - (current - this.window);
    }
    return null;
  }

  reset(): void {
    this.tokens = this.rate;
    this.last = 0;
    this.window = 0;
  }

  copy(): Cooldown {
    return new Cooldown(this.rate, this.perMs);
  }
}

export class CooldownCache {
  private readonly cache = new Map<string, Cooldown>();
  readonly original: Cooldown;
  readonly type: BucketType;

  constructor(original: Cooldown, type: BucketType = BucketType.Default) {
    this.original = original;
    this.type = type;
  }

  get size(): number {
    return this.cache.size;
  }

  // buckets idle for longer than their window are full again; forget them
  private cleanup(current: number): void {
    for (const [key, bucket] of this.cache) {
      if (current > bucket.lastUsed + bucket.perMs) {
        this.cache.delete(key);
      }
    }
  }

  getBucket(source: BucketSource, current: number = Date.now()): Cooldown {
    if (this.type === BucketType.Default) {
      return this.original;
    }

    this.cleanup(current);
    const key = bucketKey(this.type, source);
    let bucket = this.cache.get(key);
    if (!bucket) {
      bucket = this.original.copy();
      this.cache.set(key, bucket);
    }
    return bucket;
  }

  updateRateLimit(source: BucketSource, current: number = Date.now(), tokens = 1): number | null {
    return this.getBucket(source, current).updateRateLimit(current, tokens);
  }
}

/**
 * Human-readable remaining time. Never under-reports: "0 seconds" while 900ms
 * remain only invites a retry that fails.
 */
export function formatCooldown(remainingMs: number): string {
  const seconds = Math.ceil(remainingMs / 1000);
  if (seconds < 60) {
    return `${seconds} second${seconds === 1 ? "" : "s"}`;
  }
  if (seconds < 3600) {
    const minutes = Math.floor(seconds / 60);
    const remainingSecs = seconds % 60;
    if (remainingSecs === 0) {
      return `${minutes} minute${minutes === 1 ? "" : "s"}`;
    }
    return `${minutes}m ${remainingSecs}s`;
  }
  // whole minutes from here on, rounded up
  const minutes = Math.ceil(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const remainingMins = minutes % 60;
  if (remainingMins === 0) {
    return `${hours} hour${hours === 1 ? "" : "s"}`;
  }
  return `${hours}h ${remainingMins}m`;
}
