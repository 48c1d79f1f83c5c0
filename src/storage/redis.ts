// ═══════════════════════════════════════════════════════════════════════════════
// REDIS STORE — ioredis-backed KeyValueStore
// ═══════════════════════════════════════════════════════════════════════════════

import { Redis } from 'ioredis';
import type { KeyValueStore } from './types.js';
import { getLogger } from '../logging/index.js';

const logger = getLogger({ component: 'redis-store' });

export class RedisStore implements KeyValueStore {
  private readonly client: Redis;

  constructor(client: Redis | string) {
    this.client = typeof client === 'string'
      ? new Redis(client, { maxRetriesPerRequest: 3, lazyConnect: false })
      : client;

    this.client.on('error', (error: Error) => {
      logger.error('Redis connection error', error);
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // STRINGS
  // ─────────────────────────────────────────────────────────────────────────────

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async mget(keys: readonly string[]): Promise<(string | null)[]> {
    if (keys.length === 0) return [];
    return this.client.mget([...keys]);
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds) {
      await this.client.set(key, value, 'EX', ttlSeconds);
    } else {
      await this.client.set(key, value);
    }
  }

  async mset(entries: ReadonlyArray<readonly [string, string]>, ttlSeconds?: number): Promise<void> {
    if (entries.length === 0) return;

    const pipeline = this.client.multi();
    for (const [key, value] of entries) {
      if (ttlSeconds) {
        pipeline.set(key, value, 'EX', ttlSeconds);
      } else {
        pipeline.set(key, value);
      }
    }
    await pipeline.exec();
  }

  async setIfAbsent(key: string, value: string, ttlSeconds?: number): Promise<boolean> {
    const result = ttlSeconds
      ? await this.client.set(key, value, 'EX', ttlSeconds, 'NX')
      : await this.client.set(key, value, 'NX');
    return result === 'OK';
  }

  async delete(key: string): Promise<boolean> {
    return (await this.client.del(key)) > 0;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // LISTS
  // ─────────────────────────────────────────────────────────────────────────────

  async lpush(key: string, ...values: string[]): Promise<number> {
    return this.client.lpush(key, ...values);
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    return this.client.lrange(key, start, stop);
  }

  async llen(key: string): Promise<number> {
    return this.client.llen(key);
  }

  async lrem(key: string, count: number, value: string): Promise<number> {
    return this.client.lrem(key, count, value);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // SETS
  // ─────────────────────────────────────────────────────────────────────────────

  async sadd(key: string, ...members: string[]): Promise<number> {
    return this.client.sadd(key, ...members);
  }

  async srem(key: string, ...members: string[]): Promise<number> {
    return this.client.srem(key, ...members);
  }

  async smembers(key: string): Promise<string[]> {
    return this.client.smembers(key);
  }

  async scard(key: string): Promise<number> {
    return this.client.scard(key);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // UTILITY
  // ─────────────────────────────────────────────────────────────────────────────

  async ping(): Promise<string> {
    return this.client.ping();
  }

  async flushall(): Promise<void> {
    await this.client.flushall();
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
