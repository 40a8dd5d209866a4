import { SnapshotCache } from './snapshot-cache';

describe('SnapshotCache', () => {
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    now = 1_000_000;
  });

  it('misses before anything is stored', () => {
    expect(new SnapshotCache<string>(10, clock).get()).toBeUndefined();
  });

  it('serves the stored value until the TTL elapses', () => {
    const cache = new SnapshotCache<string>(10, clock);
    cache.set('jobs');

    now += 9_999;
    expect(cache.get()).toEqual({ value: 'jobs', storedAt: 1_000_000 });

    now += 1;
    expect(cache.get()).toBeUndefined();
  });

  it('replaces the snapshot on every write', () => {
    const cache = new SnapshotCache<string>(10, clock);
    cache.set('first');
    now += 5_000;
    expect(cache.set('second')).toEqual({ value: 'second', storedAt: 1_005_000 });

    now += 9_000;
    expect(cache.get()?.value).toBe('second');
  });

  it.each([0, -5])('is disabled with a TTL of %i', (ttl) => {
    const cache = new SnapshotCache<string>(ttl, clock);
    cache.set('jobs');

    expect(cache.enabled).toBe(false);
    expect(cache.get()).toBeUndefined();
  });
});
