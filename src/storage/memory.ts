// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY STORE — In-Process KeyValueStore for Tests and Single-Node Development
// ═══════════════════════════════════════════════════════════════════════════════

import type { KeyValueStore } from './types.js';

interface Entry {
  value: string;
  expiresAt?: number;
}

export class MemoryStore implements KeyValueStore {
  private data: Map<string, Entry> = new Map();
  private lists: Map<string, string[]> = new Map();
  private sets: Map<string, Set<string>> = new Map();

  // ═══════════════════════════════════════════════════════════════════════════════
  // STRING OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  private live(key: string): Entry | null {
    const entry = this.data.get(key);
    if (!entry) return null;

    if (entry.expiresAt !== undefined && Date.now() >= entry.expiresAt) {
      this.data.delete(key);
      return null;
    }

    return entry;
  }

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async mget(keys: readonly string[]): Promise<(string | null)[]> {
    return keys.map(key => this.live(key)?.value ?? null);
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    const expiresAt = ttlSeconds ? Date.now() + ttlSeconds * 1000 : undefined;
    this.data.set(key, { value, expiresAt });
  }

  async mset(entries: ReadonlyArray<readonly [string, string]>, ttlSeconds?: number): Promise<void> {
    for (const [key, value] of entries) {
      await this.set(key, value, ttlSeconds);
    }
  }

  async setIfAbsent(key: string, value: string, ttlSeconds?: number): Promise<boolean> {
    if (this.live(key)) return false;
    await this.set(key, value, ttlSeconds);
    return true;
  }

  async delete(key: string): Promise<boolean> {
    const existed = this.live(key) !== null || this.lists.has(key) || this.sets.has(key);
    this.data.delete(key);
    this.lists.delete(key);
    this.sets.delete(key);
    return existed;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // LIST OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  async lpush(key: string, ...values: string[]): Promise<number> {
    let list = this.lists.get(key);
    if (!list) {
      list = [];
      this.lists.set(key, list);
    }
    // Redis pushes one value at a time, so the last argument ends up at the head
    for (const value of values) {
      list.unshift(value);
    }
    return list.length;
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    const list = this.lists.get(key);
    if (!list) return [];

    // Negative indices count from the tail, as in Redis
    const len = list.length;
    const startIdx = start < 0 ? Math.max(0, len + start) : start;
    const stopIdx = stop < 0 ? len + stop : Math.min(stop, len - 1);

    if (startIdx > stopIdx || startIdx >= len) return [];

    return list.slice(startIdx, stopIdx + 1);
  }

  async llen(key: string): Promise<number> {
    return this.lists.get(key)?.length ?? 0;
  }

  async lrem(key: string, count: number, value: string): Promise<number> {
    const list = this.lists.get(key);
    if (!list) return 0;

    let removed = 0;
    const kept: string[] = [];

    for (const item of list) {
      if (item === value && (count === 0 || removed < Math.abs(count))) {
        removed++;
      } else {
        kept.push(item);
      }
    }

    if (kept.length === 0) {
      this.lists.delete(key);
    } else {
      this.lists.set(key, kept);
    }
    return removed;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // SET OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  async sadd(key: string, ...members: string[]): Promise<number> {
    let set = this.sets.get(key);
    if (!set) {
      set = new Set();
      this.sets.set(key, set);
    }

    let added = 0;
    for (const member of members) {
      if (!set.has(member)) {
        set.add(member);
        added++;
      }
    }
    return added;
  }

  async srem(key: string, ...members: string[]): Promise<number> {
    const set = this.sets.get(key);
    if (!set) return 0;

    let removed = 0;
    for (const member of members) {
      if (set.delete(member)) {
        removed++;
      }
    }
    if (set.size === 0) this.sets.delete(key);
    return removed;
  }

  async smembers(key: string): Promise<string[]> {
    const set = this.sets.get(key);
    return set ? Array.from(set) : [];
  }

  async scard(key: string): Promise<number> {
    return this.sets.get(key)?.size ?? 0;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // UTILITY
  // ═══════════════════════════════════════════════════════════════════════════════

  async ping(): Promise<string> {
    return 'PONG';
  }

  async flushall(): Promise<void> {
    this.clear();
  }

  async close(): Promise<void> {
    // nothing to release
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════════════

  clear(): void {
    this.data.clear();
    this.lists.clear();
    this.sets.clear();
  }

  size(): number {
    return this.data.size + this.lists.size + this.sets.size;
  }
}
