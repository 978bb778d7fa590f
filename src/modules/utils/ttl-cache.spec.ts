import { TtlCache } from './ttl-cache';

describe('TtlCache', () => {
  let now: number;
  let cache: TtlCache<string>;

  beforeEach(() => {
    now = 1_000_000;
    cache = new TtlCache<string>(
      { namespace: 'test', ttlMs: 60_000, maxSize: 3 },
      () => now,
    );
  });

  it('returns a value put immediately before', () => {
    cache.put('k', 'v');
    expect(cache.get('k')).toBe('v');
  });

  it('misses once the TTL has elapsed', () => {
    cache.put('k', 'v');

    now += 59_999;
    expect(cache.get('k')).toBe('v');

    now += 1;
    expect(cache.get('k')).toBeNull();
    expect(cache.size()).toBe(0);
  });

  it('restarts the TTL when a key is overwritten', () => {
    cache.put('k', 'old');
    now += 50_000;
    cache.put('k', 'new');
    now += 50_000;
    expect(cache.get('k')).toBe('new');
  });

  it('evicts the least recently used key beyond max size', () => {
    cache.put('a', '1');
    cache.put('b', '2');
    cache.put('c', '3');

    // touching "a" makes "b" the oldest
    expect(cache.get('a')).toBe('1');
    cache.put('d', '4');

    expect(cache.size()).toBe(3);
    expect(cache.get('b')).toBeNull();
    expect(cache.get('a')).toBe('1');
    expect(cache.get('c')).toBe('3');
    expect(cache.get('d')).toBe('4');
    expect(cache.getStats().evictions).toBe(1);
  });

  it('invalidates single keys and everything', () => {
    cache.put('a', '1');
    cache.put('b', '2');

    expect(cache.invalidate('a')).toBe(true);
    expect(cache.invalidate('a')).toBe(false);
    expect(cache.get('a')).toBeNull();

    cache.invalidateAll();
    expect(cache.size()).toBe(0);
  });

  it('sweeps only expired entries', () => {
    cache.put('old', '1');
    now += 30_000;
    cache.put('fresh', '2');
    now += 30_000;

    expect(cache.sweepExpired()).toBe(1);
    expect(cache.get('fresh')).toBe('2');
  });

  it('tracks hits and misses', () => {
    cache.put('a', '1');
    cache.get('a');
    cache.get('a');
    cache.get('missing');

    expect(cache.getStats()).toEqual({
      namespace: 'test',
      hits: 2,
      misses: 1,
      hitRate: 2 / 3,
      entries: 1,
      maxSize: 3,
      evictions: 0,
    });
  });

  it('rejects a non-positive TTL', () => {
    expect(
      () => new TtlCache({ namespace: 'bad', ttlMs: 0, maxSize: 1 }),
    ).toThrow('Cache TTL must be positive, got 0');
  });

  describe('getOrLoad', () => {
    it('calls the loader on a miss and caches the result', async () => {
      const loader = jest.fn().mockResolvedValue('loaded');

      expect(await cache.getOrLoad('k', loader)).toBe('loaded');
      expect(await cache.getOrLoad('k', loader)).toBe('loaded');
      expect(loader).toHaveBeenCalledTimes(1);
      expect(loader).toHaveBeenCalledWith('k');
    });

    it('does not cache a null result', async () => {
      const loader = jest
        .fn<Promise<string | null>, [string]>()
        .mockResolvedValueOnce(null)
        .mockResolvedValueOnce('second');

      expect(await cache.getOrLoad('k', loader)).toBeNull();
      expect(cache.size()).toBe(0);
      expect(await cache.getOrLoad('k', loader)).toBe('second');
      expect(loader).toHaveBeenCalledTimes(2);
    });

    it('does not cache a failed load', async () => {
      const loader = jest
        .fn<Promise<string | null>, [string]>()
        .mockRejectedValueOnce(new Error('upstream down'))
        .mockResolvedValueOnce('recovered');

      await expect(cache.getOrLoad('k', loader)).rejects.toThrow(
        'upstream down',
      );
      expect(await cache.getOrLoad('k', loader)).toBe('recovered');
      expect(loader).toHaveBeenCalledTimes(2);
    });

    it('clears the in-flight slot when the loader throws synchronously', async () => {
      const loader = jest
        .fn<Promise<string | null>, [string]>()
        .mockImplementationOnce(() => {
          throw new Error('boom');
        })
        .mockResolvedValueOnce('ok');

      await expect(cache.getOrLoad('k', loader)).rejects.toThrow('boom');
      expect(await cache.getOrLoad('k', loader)).toBe('ok');
    });

    it('shares one loader call between concurrent misses', async () => {
      let resolveLoad: (value: string) => void = () => undefined;
      const loader = jest.fn(
        () =>
          new Promise<string>((resolve) => {
            resolveLoad = resolve;
          }),
      );

      const first = cache.getOrLoad('k', loader);
      const second = cache.getOrLoad('k', loader);
      await Promise.resolve();
      resolveLoad('shared');

      expect(await Promise.all([first, second])).toEqual(['shared', 'shared']);
      expect(loader).toHaveBeenCalledTimes(1);
    });

    it('does not store a load that finishes after invalidateAll', async () => {
      let resolveLoad: (value: string) => void = () => undefined;
      const loader = jest.fn(
        () =>
          new Promise<string>((resolve) => {
            resolveLoad = resolve;
          }),
      );

      const running = cache.getOrLoad('k', loader);
      await Promise.resolve();
      cache.invalidateAll();
      resolveLoad('stale');

      expect(await running).toBe('stale');
      expect(cache.get('k')).toBeNull();
      expect(cache.size()).toBe(0);
    });

    it('starts a fresh load after the key is invalidated mid-load', async () => {
      const resolvers: Array<(value: string) => void> = [];
      const loader = jest.fn(
        () =>
          new Promise<string>((resolve) => {
            resolvers.push(resolve);
          }),
      );

      const stale = cache.getOrLoad('k', loader);
      await Promise.resolve();
      expect(cache.invalidate('k')).toBe(true);

      const fresh = cache.getOrLoad('k', loader);
      await Promise.resolve();
      expect(loader).toHaveBeenCalledTimes(2);

      resolvers[0]('stale');
      expect(await stale).toBe('stale');
      expect(cache.get('k')).toBeNull();

      resolvers[1]('fresh');
      expect(await fresh).toBe('fresh');
      expect(cache.get('k')).toBe('fresh');
    });
  });
});
