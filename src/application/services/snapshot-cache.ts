export type Clock = () => number;

export interface Snapshot<T> {
  value: T;
  storedAt: number;
}

/**
 * Single-slot cache holding the last value and when it was stored.
 *
 * A TTL of zero or less disables it: every read is a miss. Writes replace the
 * snapshot wholesale. There is no single-flight guard, so concurrent misses may
 * each load and the last writer wins.
 */
export class SnapshotCache<T> {
  private snapshot: Snapshot<T> | null = null;

  constructor(
    private readonly ttlSeconds: number,
    private readonly now: Clock = Date.now,
  ) {}

  get enabled(): boolean {
    return this.ttlSeconds > 0;
  }

  get(): Snapshot<T> | undefined {
    if (!this.snapshot || !this.enabled) return undefined;
    const ageMs = this.now() - this.snapshot.storedAt;
    return ageMs < this.ttlSeconds * 1000 ? this.snapshot : undefined;
  }

  set(value: T): Snapshot<T> {
    this.snapshot = { value, storedAt: this.now() };
    return this.snapshot;
  }
}
