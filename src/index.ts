// ═══════════════════════════════════════════════════════════════════════════════
// HERALD — Notification Dispatch and Delivery Engine
// ═══════════════════════════════════════════════════════════════════════════════

export * from './notifications/index.js';
export { createApp, type AppOptions } from './api/app.js';
export { headerAuthenticate, type Authenticate } from './api/middleware/request-context.js';
export { loadConfig, reloadConfig, isProduction, ConfigValidationError } from './config/index.js';
export type { AppConfig } from './config/schema.js';
export { getStore, setStore, closeStore, MemoryStore, RedisStore, type KeyValueStore } from './storage/index.js';
export { UserStore, type UserRepository } from './users/store.js';
export type { NotificationUser } from './users/types.js';
export { getLogger } from './logging/index.js';
