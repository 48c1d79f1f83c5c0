// ═══════════════════════════════════════════════════════════════════════════════
// CHANNEL TYPES — Driver Contract
// ═══════════════════════════════════════════════════════════════════════════════

import type { NotificationUser } from '../../users/types.js';
import type {
  DeliveryChannel,
  DeliveryRecord,
  Notification,
  NotificationPreference,
} from '../types.js';

/**
 * Everything a driver needs to decide on and perform one delivery.
 */
export interface DeliveryTarget {
  notification: Notification;
  recipient: NotificationUser;
  preference: NotificationPreference;
}

export interface ChannelDriver<C extends DeliveryChannel = DeliveryChannel> {
  getChannelName(): C;

  /** Pure predicate: opt-outs and channel prerequisites */
  canDeliver(target: DeliveryTarget): boolean;

  /**
   * Performs one attempt and persists its outcome on the record. Resolves true
   * once the transport accepted the message; rethrows transport errors after
   * the record is marked failed.
   */
  deliver(target: DeliveryTarget, record: DeliveryRecord): Promise<boolean>;

  /** Transient errors are worth another attempt; permanent ones never are */
  shouldRetry(error: unknown): boolean;
}

/**
 * One driver per channel. Adding a channel to DELIVERY_CHANNELS breaks every
 * place that builds this map until a driver exists for it.
 */
export type ChannelDrivers = { readonly [C in DeliveryChannel]: ChannelDriver<C> };
