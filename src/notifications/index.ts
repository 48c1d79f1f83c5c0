// ═══════════════════════════════════════════════════════════════════════════════
// NOTIFICATIONS MODULE — Dispatch, Delivery, Digests
// ═══════════════════════════════════════════════════════════════════════════════

// Types
export type {
  NotificationType,
  DeliveryChannel,
  DeliveryStatus,
  DigestFrequency,
  Notification,
  NotificationContext,
  NotificationListOptions,
  DeliveryRecord,
  NotificationPreference,
  NotificationTypeSettings,
  NotificationTypeSettingsMap,
  PreferenceUpdate,
  EmailLog,
} from './types.js';

export {
  NOTIFICATION_TYPES,
  DELIVERY_CHANNELS,
  DELIVERY_STATUSES,
  DIGEST_FREQUENCIES,
  isNotificationType,
  isDeliveryChannel,
} from './types.js';

// Validation
export { CONTEXT_SCHEMAS, validateContext, type ContextSchemaError, type ValidatedContext } from './context-schemas.js';

// Errors
export {
  NotificationValidationError,
  TemplateLookupError,
  DeliveryError,
  TransientDeliveryError,
  PermanentDeliveryError,
  type PermanentFailureReason,
} from './errors.js';

// Stores
export { NotificationStore, DeliveryStore, EmailLogStore } from './store.js';

// Preferences
export {
  PreferenceService,
  PreferenceStore,
  PreferenceUpdateSchema,
  GUEST_DISABLED_TYPES,
  getChannelsForNotificationType,
  isChannelEnabled,
  isNotificationTypeEnabled,
} from './preferences.js';

// Delivery
export {
  NotificationDispatcher,
  type ChannelOutcome,
  type DispatchResult,
  type BatchDispatchResult,
  type NotificationEntry,
} from './dispatcher.js';
export { DigestBatcher, getLookback, shouldSendDigestNow, type DigestScanResult } from './digest.js';
export { JobQueue, type Job, type JobKind } from './queue.js';
export { NotificationWorker } from './worker.js';
export { Notifier, type Recipient, type RecipientResolver } from './notify.js';
export { UnsubscribeTokens, confirmUnsubscribe, type UnsubscribeError } from './unsubscribe.js';

// Wiring
export { createNotificationEngine, type NotificationEngine, type EngineOverrides } from './engine.js';
