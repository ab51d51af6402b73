export const ADMISSION_KINDS = ["connection", "message"] as const;
export type AdmissionKind = (typeof ADMISSION_KINDS)[number];

export interface BucketConfig {
  capacity: number;
  refillPerSecond: number;
}

export type RateLimiterConfig = Record<AdmissionKind, BucketConfig>;

interface Bucket {
  tokens: number;
  updatedAt: number;
}

/**
 * Token-bucket admission control.
 *
 * Connection attempts and signaling messages draw from separate bucket sets,
 * so a message flood never eats into connection admission and vice versa.
 * Keys are opaque; callers namespace them (`addr:` before auth, `id:` after).
 */
export class RateLimiter {
  private readonly buckets: Record<AdmissionKind, Map<string, Bucket>> = {
    connection: new Map(),
    message: new Map(),
  };

  constructor(
    private readonly config: RateLimiterConfig,
    private readonly now: () => number = Date.now
  ) {}

  admit(key: string, kind: AdmissionKind): boolean {
    const bucket = this.refill(key, kind);
    if (bucket.tokens < 1) {
      return false;
    }
    bucket.tokens -= 1;
    return true;
  }

  /**
   * Drop buckets that have refilled to capacity; they are indistinguishable
   * from a fresh bucket.
   */
  sweep(): number {
    let removed = 0;
    for (const kind of ADMISSION_KINDS) {
      const { capacity } = this.config[kind];
      for (const key of Array.from(this.buckets[kind].keys())) {
        if (this.refill(key, kind).tokens >= capacity) {
          this.buckets[kind].delete(key);
          removed += 1;
        }
      }
    }
    return removed;
  }

  size(kind: AdmissionKind): number {
    return this.buckets[kind].size;
  }

  private refill(key: string, kind: AdmissionKind): Bucket {
    const { capacity, refillPerSecond } = this.config[kind];
    const now = this.now();
    const buckets = this.buckets[kind];

    let bucket = buckets.get(key);
    if (!bucket) {
      bucket = { tokens: capacity, updatedAt: now };
      buckets.set(key, bucket);
      return bucket;
    }

    const elapsedSeconds = Math.max(0, now - bucket.updatedAt) / 1000;
    bucket.tokens = Math.min(capacity, bucket.tokens + elapsedSeconds * refillPerSecond);
    bucket.updatedAt = now;
    return bucket;
  }
}
