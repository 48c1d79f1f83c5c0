// ═══════════════════════════════════════════════════════════════════════════════
// TEST SETUP — Fresh Store and Config per Test
// ═══════════════════════════════════════════════════════════════════════════════

import { afterEach, beforeEach } from 'vitest';
import { reloadConfig } from '../config/index.js';
import { MemoryStore, setStore } from '../storage/index.js';

beforeEach(() => {
  setStore(new MemoryStore());
});

afterEach(() => {
  reloadConfig();
});
