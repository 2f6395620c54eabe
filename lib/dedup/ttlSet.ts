/**
 * Small time-bounded set used to dedupe line-mode hits.
 *
 * Insertion order is kept so expiry and capacity eviction both drop from
 * the front. Expired keys are removed lazily on lookup.
 */

type TtlEntry = {
  key: string;
  expiresAt: number;
};

export type TtlSetOptions = {
  ttlSeconds?: number;
  maxSize?: number;
  now?: () => number;
};

export class TtlSet {
  private readonly ttlMs: number;
  private readonly maxSize: number;
  private readonly now: () => number;
  private entries: TtlEntry[] = [];

  constructor({ ttlSeconds = 60, maxSize = 512, now = Date.now }: TtlSetOptions = {}) {
    this.ttlMs = ttlSeconds * 1000;
    this.maxSize = maxSize;
    this.now = now;
  }

  add(key: string): void {
    this.entries.push({ key, expiresAt: this.now() + this.ttlMs });
    if (this.entries.length > this.maxSize) {
      this.entries = this.entries.slice(this.entries.length - this.maxSize);
    }
  }

  has(key: string): boolean {
    const now = this.now();
    let firstLive = 0;
    while (firstLive < this.entries.length && this.entries[firstLive].expiresAt < now) {
      firstLive++;
    }
    if (firstLive > 0) this.entries = this.entries.slice(firstLive);

    return this.entries.some((entry) => entry.key === key && entry.expiresAt >= now);
  }

  get size(): number {
    return this.entries.length;
  }
}
