// ═══════════════════════════════════════════════════════════════════════════════
// BASE CHANNEL DRIVER — Attempt Bookkeeping Shared by Every Channel
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../logging/index.js';
import { PermanentDeliveryError, errorMessage, isTransientError } from '../errors.js';
import type { DeliveryStore } from '../store.js';
import type { DeliveryChannel, DeliveryRecord } from '../types.js';
import type { ChannelDriver, DeliveryTarget } from './types.js';

const logger = getLogger({ component: 'channel' });

/**
 * Result of a successful transport send.
 */
export interface SendOutcome {
  /** Merged into the delivery record's metadata */
  metadata?: Record<string, unknown>;
  /** Runs after the record is marked sent; its failure is logged only */
  afterSend?: () => Promise<void>;
}

export interface ChannelDriverDeps {
  deliveries: DeliveryStore;
  clock?: () => Date;
}

export abstract class BaseChannelDriver<C extends DeliveryChannel> implements ChannelDriver<C> {
  protected abstract readonly channel: C;
  protected readonly deliveries: DeliveryStore;
  protected readonly clock: () => Date;

  constructor(deps: ChannelDriverDeps) {
    this.deliveries = deps.deliveries;
    this.clock = deps.clock ?? (() => new Date());
  }

  getChannelName(): C {
    return this.channel;
  }

  abstract canDeliver(target: DeliveryTarget): boolean;

  /** Renders and hands the message to the transport */
  protected abstract send(target: DeliveryTarget): Promise<SendOutcome>;

  shouldRetry(error: unknown): boolean {
    return isTransientError(error);
  }

  /**
   * Channel-specific reaction to a permanent failure, e.g. flagging the
   * recipient as unreachable.
   */
  protected async onPermanentFailure(_target: DeliveryTarget, _error: PermanentDeliveryError): Promise<void> {
    // no-op unless a channel overrides it
  }

  async deliver(target: DeliveryTarget, record: DeliveryRecord): Promise<boolean> {
    const attemptedAt = this.clock().toISOString();
    const attempt: DeliveryRecord = {
      ...record,
      retryCount: record.retryCount + 1,
      attemptedAt,
      updatedAt: attemptedAt,
    };

    let outcome: SendOutcome;
    try {
      outcome = await this.send(target);
    } catch (error) {
      await this.deliveries.update({
        ...attempt,
        status: 'failed',
        errorMessage: errorMessage(error),
        retryable: this.shouldRetry(error),
      });

      logger.warn('Delivery attempt failed', {
        channel: this.channel,
        notificationId: record.notificationId,
        deliveryId: record.id,
        attempt: attempt.retryCount,
        error: errorMessage(error),
      });

      if (error instanceof PermanentDeliveryError) {
        await this.onPermanentFailure(target, error);
      }
      throw error;
    }

    const { errorMessage: _previousError, retryable: _retryable, ...rest } = attempt;
    const deliveredAt = this.clock().toISOString();
    await this.deliveries.update({
      ...rest,
      status: 'sent',
      deliveredAt,
      updatedAt: deliveredAt,
      metadata: { ...record.metadata, ...outcome.metadata },
    });

    logger.info('Notification delivered', {
      channel: this.channel,
      notificationId: record.notificationId,
      deliveryId: record.id,
      attempt: attempt.retryCount,
    });

    if (outcome.afterSend) {
      try {
        await outcome.afterSend();
      } catch (error) {
        logger.error('Post-send bookkeeping failed', error, {
          channel: this.channel,
          notificationId: record.notificationId,
        });
      }
    }

    return true;
  }
}
