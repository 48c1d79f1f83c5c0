// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE MODULE — Store Selection and Singleton Access
// ═══════════════════════════════════════════════════════════════════════════════

import type { KeyValueStore } from './types.js';
import { MemoryStore } from './memory.js';
import { RedisStore } from './redis.js';
import { loadConfig } from '../config/index.js';
import { getLogger } from '../logging/index.js';

export type { KeyValueStore } from './types.js';
export { MemoryStore } from './memory.js';
export { RedisStore } from './redis.js';

const logger = getLogger({ component: 'storage' });

let store: KeyValueStore | null = null;

/**
 * Process-wide store. Redis when REDIS_URL is configured, memory otherwise.
 */
export function getStore(): KeyValueStore {
  if (store) return store;

  const { storage } = loadConfig();
  if (storage.redisUrl) {
    store = new RedisStore(storage.redisUrl);
    logger.info('Using Redis store');
  } else {
    store = new MemoryStore();
    logger.warn('REDIS_URL not set, using in-memory store');
  }
  return store;
}

export function setStore(next: KeyValueStore): void {
  store = next;
}

export async function closeStore(): Promise<void> {
  if (!store) return;
  const current = store;
  store = null;
  await current.close();
}
