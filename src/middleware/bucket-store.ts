// Leaky bucket mirroring Canvas's own quota accounting.
// Refill happens lazily on access, so no timer is ever running.

export interface BucketState {
  remaining: number;
  cost: number; // last amount charged
  timestamp: number; // last refill, Unix ms
}

export interface BucketSettings {
  bucketSize: number;
  leakRate: number; // units per second
}

/**
 * Storage for bucket state, keyed by bucket key.
 * Read-modify-write is not atomic; approximate accounting is acceptable.
 */
export interface BucketStore {
  get(key: string): BucketState | undefined;
  set(key: string, state: BucketState): void;
  delete(key: string): void;
  clear(): void;
  keys(): string[];
}

export class MemoryBucketStore implements BucketStore {
  private readonly buckets = new Map<string, BucketState>();

  get(key: string): BucketState | undefined {
    const state = this.buckets.get(key);
    return state ? { ...state } : undefined;
  }

  set(key: string, state: BucketState): void {
    this.buckets.set(key, { ...state });
  }

  delete(key: string): void {
    this.buckets.delete(key);
  }

  clear(): void {
    this.buckets.clear();
  }

  keys(): string[] {
    return [...this.buckets.keys()];
  }

  get size(): number {
    return this.buckets.size;
  }
}

// Process-wide store so separate clients on the same account share one quota
export const sharedBucketStore: BucketStore = new MemoryBucketStore();

/**
 * Operations on a single bucket in a store. Every read leaks first.
 */
export class LeakyBucket {
  constructor(
    private readonly store: BucketStore,
    private readonly key: string,
    private readonly settings: BucketSettings,
  ) {}

  private clamp(value: number): number {
    return Math.min(this.settings.bucketSize, Math.max(0, value));
  }

  /**
   * Current state after applying the refill since the last access.
   * Creates a full bucket on first use.
   */
  read(): BucketState {
    const now = Date.now();
    const existing = this.store.get(this.key);

    if (!existing) {
      const fresh: BucketState = { remaining: this.settings.bucketSize, cost: 0, timestamp: now };
      this.store.set(this.key, fresh);
      return fresh;
    }

    const elapsedSeconds = Math.max(0, now - existing.timestamp) / 1000;
    const leaked = elapsedSeconds * this.settings.leakRate;
    const refilled: BucketState = {
      remaining: this.clamp(existing.remaining + leaked),
      cost: existing.cost,
      timestamp: now,
    };
    this.store.set(this.key, refilled);
    return refilled;
  }

  get remaining(): number {
    return this.read().remaining;
  }

  consume(cost: number): void {
    const state = this.read();
    this.store.set(this.key, { ...state, remaining: this.clamp(state.remaining - cost), cost });
  }

  refund(amount: number): void {
    const state = this.read();
    this.store.set(this.key, { ...state, remaining: this.clamp(state.remaining + amount) });
  }

  // Server-reported value replaces local accounting
  overwrite(remaining: number): void {
    const state = this.read();
    this.store.set(this.key, { ...state, remaining: this.clamp(remaining) });
  }

  /**
   * Whole seconds to wait until `needed` units are available, 0 if they already are.
   */
  secondsUntil(needed: number): number {
    const { remaining } = this.read();
    if (remaining >= needed) return 0;
    return Math.ceil((needed - remaining) / this.settings.leakRate);
  }
}
