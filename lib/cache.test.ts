import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  MemoizedCache,
  MemoryCacheStore,
  RedisCacheStore,
  createCacheStore,
  redisClientOptions,
  type RedisConnection,
} from './cache';

function setup() {
  let now = 1_000;
  const store = new MemoryCacheStore();
  const cache = new MemoizedCache(store, { now: () => now });
  return {
    store,
    cache,
    advance(ms: number) {
      now += ms;
    },
  };
}

class FakeRedis implements RedisConnection {
  isOpen = true;
  readonly data = new Map<string, string>();
  readonly setCalls: Array<{ key: string; value: string; px: number }> = [];

  async get(key: string): Promise<string | null> {
    return this.data.get(key) ?? null;
  }

  async set(key: string, value: string, options: { PX: number }): Promise<string> {
    this.setCalls.push({ key, value, px: options.PX });
    this.data.set(key, value);
    return 'OK';
  }

  async del(key: string): Promise<number> {
    return this.data.delete(key) ? 1 : 0;
  }

  async quit(): Promise<string> {
    this.isOpen = false;
    return 'OK';
  }
}

function silenceWarnings() {
  return vi.spyOn(console, 'warn').mockImplementation(() => undefined);
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('MemoizedCache', () => {
  it('returns the stored value until the TTL passes', async () => {
    const { cache, advance } = setup();
    const compute = vi.fn(async () => ['Rice']);

    expect(await cache.getOrCompute('k', 300, compute)).toEqual(['Rice']);
    advance(299_999);
    expect(await cache.getOrCompute('k', 300, compute)).toEqual(['Rice']);
    expect(compute).toHaveBeenCalledTimes(1);

    advance(1);
    await cache.getOrCompute('k', 300, compute);
    expect(compute).toHaveBeenCalledTimes(2);
  });

  it('stores the expiry time', async () => {
    const { cache, store } = setup();
    await cache.getOrCompute('k', 60, () => 42);
    expect(await store.get('k')).toEqual({ key: 'k', value: 42, expiresAt: 61_000 });
  });

  it('keeps keys separate', async () => {
    const { cache } = setup();
    await cache.getOrCompute('a', 60, () => 1);
    expect(await cache.getOrCompute('b', 60, () => 2)).toBe(2);
    expect(await cache.getOrCompute('a', 60, () => 3)).toBe(1);
  });

  it('evicts an expired entry on read even if the recompute fails', async () => {
    const { cache, store, advance } = setup();
    await cache.getOrCompute('k', 1, () => 'old');
    advance(1_000);

    await expect(
      cache.getOrCompute('k', 1, () => Promise.reject(new Error('source down')))
    ).rejects.toThrow('source down');
    expect(store.size).toBe(0);
  });

  it('recomputes after invalidate', async () => {
    const { cache } = setup();
    await cache.getOrCompute('k', 60, () => 'first');
    await cache.invalidate('k');
    expect(await cache.getOrCompute('k', 60, () => 'second')).toBe('second');
  });
});

describe('createCacheStore', () => {
  it('uses memory when no Redis URL is configured', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(createCacheStore(undefined)).toBeInstanceOf(MemoryCacheStore);
    expect(warn).toHaveBeenCalledWith('REDIS_URL is not set; using the in-memory cache.');
  });

  it('uses Redis when a URL is configured', () => {
    expect(createCacheStore('redis://localhost:6379')).toBeInstanceOf(RedisCacheStore);
  });
});

describe('RedisCacheStore', () => {
  it('creates the client without reconnecting and with a connect timeout', () => {
    expect(redisClientOptions('redis://127.0.0.1:1', 500)).toEqual({
      url: 'redis://127.0.0.1:1',
      socket: { connectTimeout: 500, reconnectStrategy: false },
    });
  });

  it('writes JSON entries under the prefix with a PX expiry', async () => {
    const redis = new FakeRedis();
    const store = new RedisCacheStore('redis://cache', {
      prefix: 'test:',
      connect: async () => redis,
      now: () => 1_000,
    });

    await store.set({ key: 'k', value: ['Rice'], expiresAt: 61_000 });

    expect(redis.setCalls).toEqual([
      { key: 'test:k', value: '{"key":"k","value":["Rice"],"expiresAt":61000}', px: 60_000 },
    ]);
    expect(await store.get('k')).toEqual({ key: 'k', value: ['Rice'], expiresAt: 61_000 });
  });

  it('ignores a stored value that is not a cache entry', async () => {
    const redis = new FakeRedis();
    redis.data.set('test:k', '{"value":1}');
    const store = new RedisCacheStore('redis://cache', { prefix: 'test:', connect: async () => redis });

    expect(await store.get('k')).toBeUndefined();
  });

  it('falls back to memory when Redis cannot be reached', async () => {
    const warn = silenceWarnings();
    const connect = vi.fn(() => Promise.reject(new Error('ECONNREFUSED')));
    const cache = new MemoizedCache(new RedisCacheStore('redis://127.0.0.1:1', { connect }), {
      now: () => 1_000,
    });
    const compute = vi.fn(() => 'computed');

    expect(await cache.getOrCompute('k', 60, compute)).toBe('computed');
    expect(await cache.getOrCompute('k', 60, compute)).toBe('computed');
    expect(compute).toHaveBeenCalledTimes(1);
    // 呼び出しごとに接続をやり直す
    expect(connect).toHaveBeenCalledTimes(3);
    expect(warn).toHaveBeenCalledWith('Redis read failed, falling back to memory:', expect.any(Error));
  });

  it('clears the memory fallback on delete', async () => {
    silenceWarnings();
    const store = new RedisCacheStore('redis://cache', {
      connect: () => Promise.reject(new Error('ECONNREFUSED')),
    });

    await store.set({ key: 'k', value: 1, expiresAt: Number.MAX_SAFE_INTEGER });
    expect(await store.get('k')).toEqual({ key: 'k', value: 1, expiresAt: Number.MAX_SAFE_INTEGER });

    await store.delete('k');
    expect(await store.get('k')).toBeUndefined();
  });

  it('reconnects after the connection closes', async () => {
    silenceWarnings();
    const first = new FakeRedis();
    const second = new FakeRedis();
    second.data.set('commodity-dashboard:k', '{"key":"k","value":2,"expiresAt":5}');
    const connect = vi.fn().mockResolvedValueOnce(first).mockResolvedValueOnce(second);
    const store = new RedisCacheStore('redis://cache', { connect });

    expect(await store.get('k')).toBeUndefined();
    first.isOpen = false;

    expect(await store.get('k')).toBeUndefined();
    expect(await store.get('k')).toEqual({ key: 'k', value: 2, expiresAt: 5 });
    expect(connect).toHaveBeenCalledTimes(2);
  });

  it('quits an open connection on disconnect', async () => {
    const redis = new FakeRedis();
    const store = new RedisCacheStore('redis://cache', { connect: async () => redis });
    await store.get('k');

    await store.disconnect();
    expect(redis.isOpen).toBe(false);
  });

  it('disconnects cleanly after a failed connect', async () => {
    silenceWarnings();
    const store = new RedisCacheStore('redis://cache', {
      connect: () => Promise.reject(new Error('ECONNREFUSED')),
    });
    await store.get('k');

    await expect(store.disconnect()).resolves.toBeUndefined();
  });
});
