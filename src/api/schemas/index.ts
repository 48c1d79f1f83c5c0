// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMAS INDEX — API Request Validation Schemas
// ═══════════════════════════════════════════════════════════════════════════════

export {
  ListNotificationsQuerySchema,
  NotificationIdParamSchema,
  ChannelParamSchema,
  PreferenceUpdateSchema,
  UnsubscribeRequestSchema,
  type ListNotificationsQuery,
  type UnsubscribeRequest,
} from './notifications.js';
