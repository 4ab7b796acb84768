import { LRUCache } from 'lru-cache';
import { CONFIG } from './config';

export type CacheKey = string;

export interface CacheAdapter<K = CacheKey, V = unknown> {
  get(key: K): Promise<V | undefined>;
  set(key: K, value: V, ttlMillis?: number): Promise<void>;
}

/**
 * In-memory LRU adapter using `lru-cache` v10+.
 */
export class InMemoryLRUAdapter<V extends {}> implements CacheAdapter<string, V> {
  private cache: LRUCache<string, V>;

  constructor(opts?: { max?: number; ttl?: number }) {
    this.cache = new LRUCache<string, V>({
      max: opts?.max ?? 5000,
      ttl: opts?.ttl ?? CONFIG.TTL.LOOKUP_MS,
    });
  }

  async get(key: string): Promise<V | undefined> {
    return this.cache.get(key);
  }

  async set(key: string, value: V, ttlMillis?: number): Promise<void> {
    if (typeof ttlMillis === 'number') {
      this.cache.set(key, value, { ttl: ttlMillis });
    } else {
      this.cache.set(key, value);
    }
  }
}

export function createDefaultCache<V extends {}>(): CacheAdapter<string, V> {
  return new InMemoryLRUAdapter<V>();
}
