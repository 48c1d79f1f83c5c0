// ═══════════════════════════════════════════════════════════════════════════════
// IN-APP CHANNEL
// ═══════════════════════════════════════════════════════════════════════════════
//
// The inbox row already exists once the notification is created; delivering
// only records that the in-app channel was honoured for it.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { isChannelEnabled, isNotificationTypeEnabled } from '../preferences.js';
import { BaseChannelDriver, type SendOutcome } from './base.js';
import type { DeliveryTarget } from './types.js';

export class InAppChannelDriver extends BaseChannelDriver<'in_app'> {
  protected readonly channel = 'in_app';

  canDeliver({ notification, preference }: DeliveryTarget): boolean {
    return isChannelEnabled(preference, 'in_app') && isNotificationTypeEnabled(preference, notification.type);
  }

  protected async send(): Promise<SendOutcome> {
    return {};
  }
}
