// lib/cache.ts

import { createClient } from 'redis';

export type CacheEntry<V = unknown> = {
  key: string;
  value: V;
  expiresAt: number; // エポックミリ秒
};

export interface CacheStore {
  get(key: string): Promise<CacheEntry | undefined>;
  set(entry: CacheEntry): Promise<void>;
  delete(key: string): Promise<void>;
}

// 開発用・テスト用
export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, CacheEntry>();

  async get(key: string): Promise<CacheEntry | undefined> {
    return this.entries.get(key);
  }

  async set(entry: CacheEntry): Promise<void> {
    this.entries.set(entry.key, entry);
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }
}

// RedisCacheStore が使うコマンドだけ
export interface RedisConnection {
  readonly isOpen: boolean;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, options: { PX: number }): Promise<unknown>;
  del(key: string): Promise<unknown>;
  quit(): Promise<unknown>;
}

export const REDIS_CONNECT_TIMEOUT_MS = 2000;

// 再接続はしない。接続できなければ connect() が reject してメモリに落ちる
export function redisClientOptions(url: string, connectTimeoutMs = REDIS_CONNECT_TIMEOUT_MS) {
  return {
    url,
    socket: { connectTimeout: connectTimeoutMs, reconnectStrategy: false as const },
  };
}

async function connectRedis(url: string): Promise<RedisConnection> {
  const client = createClient(redisClientOptions(url));
  client.on('error', (error) => console.warn('Redis client error:', error));
  await client.connect();
  return client;
}

function isCacheEntry(value: unknown): value is CacheEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'key' in value &&
    typeof value.key === 'string' &&
    'expiresAt' in value &&
    typeof value.expiresAt === 'number' &&
    'value' in value
  );
}

export type RedisCacheStoreOptions = {
  prefix?: string;
  connect?: (url: string) => Promise<RedisConnection>;
  now?: () => number;
};

// 本番用。Redis のエラー時はメモリにフォールバックする
export class RedisCacheStore implements CacheStore {
  private client: Promise<RedisConnection> | null = null;
  private readonly fallback = new MemoryCacheStore();
  private readonly prefix: string;
  private readonly connectClient: (url: string) => Promise<RedisConnection>;
  private readonly now: () => number;

  constructor(
    private readonly url: string,
    options: RedisCacheStoreOptions = {}
  ) {
    this.prefix = options.prefix ?? 'commodity-dashboard:';
    this.connectClient = options.connect ?? connectRedis;
    this.now = options.now ?? Date.now;
  }

  private async connect(): Promise<RedisConnection> {
    if (!this.client) {
      this.client = this.connectClient(this.url).catch((error: unknown) => {
        this.client = null;
        throw error;
      });
    }
    const client = await this.client;
    // 切断済みなら次の呼び出しで繋ぎ直す
    if (!client.isOpen) {
      this.client = null;
      throw new Error('Redis connection is closed');
    }
    return client;
  }

  async get(key: string): Promise<CacheEntry | undefined> {
    try {
      const client = await this.connect();
      const raw = await client.get(this.prefix + key);
      if (!raw) return undefined;
      const parsed: unknown = JSON.parse(raw);
      return isCacheEntry(parsed) ? parsed : undefined;
    } catch (error) {
      console.warn('Redis read failed, falling back to memory:', error);
      return this.fallback.get(key);
    }
  }

  async set(entry: CacheEntry): Promise<void> {
    try {
      const client = await this.connect();
      const ttlMs = Math.max(1, entry.expiresAt - this.now());
      await client.set(this.prefix + entry.key, JSON.stringify(entry), { PX: ttlMs });
    } catch (error) {
      console.warn('Redis write failed, falling back to memory:', error);
      await this.fallback.set(entry);
    }
  }

  async delete(key: string): Promise<void> {
    try {
      const client = await this.connect();
      await client.del(this.prefix + key);
    } catch (error) {
      console.warn('Redis delete failed, falling back to memory:', error);
    }
    await this.fallback.delete(key);
  }

  async disconnect(): Promise<void> {
    if (!this.client) return;
    const pending = this.client;
    this.client = null;
    // 接続の失敗は get/set 側で警告済み
    const client = await pending.then(
      (c) => c,
      () => null
    );
    if (client?.isOpen) await client.quit();
  }
}

export function createCacheStore(redisUrl: string | undefined): CacheStore {
  if (redisUrl) return new RedisCacheStore(redisUrl);
  console.warn('REDIS_URL is not set; using the in-memory cache.');
  return new MemoryCacheStore();
}

export type MemoizedCacheOptions = {
  now?: () => number;
};

// 同じキーの同時計算は二重に走りうる（結果は同じなので許容）
export class MemoizedCache {
  private readonly now: () => number;

  constructor(
    private readonly store: CacheStore,
    options: MemoizedCacheOptions = {}
  ) {
    this.now = options.now ?? Date.now;
  }

  async getOrCompute<V>(key: string, ttlSeconds: number, compute: () => V | Promise<V>): Promise<V> {
    const entry = await this.store.get(key);
    if (entry) {
      if (entry.expiresAt > this.now()) {
        return entry.value as V;
      }
      await this.store.delete(key);
    }

    const value = await compute();
    await this.store.set({ key, value, expiresAt: this.now() + ttlSeconds * 1000 });
    return value;
  }

  async invalidate(key: string): Promise<void> {
    await this.store.delete(key);
  }
}
