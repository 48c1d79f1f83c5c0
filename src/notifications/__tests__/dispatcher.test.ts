// ═══════════════════════════════════════════════════════════════════════════════
// DISPATCHER TESTS — Creation, Channel Selection, Delivery, Retry
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  NotificationValidationError,
  PermanentDeliveryError,
  TemplateLookupError,
  TransientDeliveryError,
} from '../errors.js';
import { TemplateRegistry } from '../templates/registry.js';
import {
  createTestEngine,
  createTestUser,
  membershipContext,
  type TestEngine,
} from '../../tests/fixtures.js';

const ticketContext = {
  ticketId: 'ticket-1',
  ticketReference: 'TCK-001',
  eventId: 'evt-1',
  eventName: 'Spring Gala',
  eventStart: '2025-04-01T18:00:00.000Z',
  eventLocation: 'Main Hall',
  organizationId: 'org-1',
  organizationName: 'Chess Club',
  tierName: 'General',
  tierPrice: '10.00',
  quantity: 2,
  totalPrice: '20.00',
};

const DAY_MS = 24 * 60 * 60 * 1000;

describe('NotificationDispatcher', () => {
  let engine: TestEngine;
  const user = createTestUser();

  beforeEach(async () => {
    engine = createTestEngine();
    await engine.users.saveUser(user);
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // CREATION
  // ─────────────────────────────────────────────────────────────────────────────

  describe('createNotification', () => {
    it('should persist with empty title and body', async () => {
      const notification = await engine.dispatcher.createNotification('ticket_created', user.id, ticketContext);

      const stored = await engine.notifications.get(notification.id);
      expect(stored?.title).toBe('');
      expect(stored?.body).toBe('');
      expect(stored?.createdAt).toBe('2025-03-10T09:00:00.000Z');
    });

    it('should reject an invalid context without persisting', async () => {
      const { eventName: _eventName, ...incomplete } = ticketContext;

      await expect(
        engine.dispatcher.createNotification('ticket_created', user.id, incomplete)
      ).rejects.toBeInstanceOf(NotificationValidationError);

      expect(await engine.notifications.listForUser(user.id)).toEqual([]);
    });

    it('should reject an unknown type', async () => {
      await expect(
        engine.dispatcher.createNotification('foo', user.id, {})
      ).rejects.toMatchObject({ schemaError: { code: 'unknown_type' } });
    });
  });

  describe('bulkCreateNotifications', () => {
    it('should persist nothing when one entry is invalid', async () => {
      const error = await engine.dispatcher
        .bulkCreateNotifications([
          { type: 'membership_granted', userId: user.id, context: membershipContext },
          { type: 'membership_granted', userId: user.id, context: { organizationId: 'org-1' } },
        ])
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NotificationValidationError);
      expect(error).toMatchObject({ index: 1 });
      expect(await engine.notifications.listForUser(user.id)).toEqual([]);
    });

    it('should persist every entry when all are valid', async () => {
      const created = await engine.dispatcher.bulkCreateNotifications([
        { type: 'membership_granted', userId: user.id, context: membershipContext },
        { type: 'membership_promoted', userId: user.id, context: { ...membershipContext, role: 'admin' } },
      ]);

      expect(created).toHaveLength(2);
      expect(await engine.notifications.listForUser(user.id)).toHaveLength(2);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // CHANNEL SELECTION
  // ─────────────────────────────────────────────────────────────────────────────

  describe('determineDeliveryChannels', () => {
    it('should return the default channels for immediate users', async () => {
      expect(await engine.dispatcher.determineDeliveryChannels(user, 'ticket_created'))
        .toEqual(['in_app', 'email']);
    });

    it('should return only in-app for digest users', async () => {
      await engine.preferences.updatePreferences(user, { digestFrequency: 'daily' });

      expect(await engine.dispatcher.determineDeliveryChannels(user, 'ticket_created')).toEqual(['in_app']);
    });

    it('should respect per-type overrides', async () => {
      await engine.preferences.updatePreferences(user, {
        typeSettings: {
          ticket_created: { enabled: true, channels: ['email'] },
          org_announcement: { enabled: false },
        },
      });

      expect(await engine.dispatcher.determineDeliveryChannels(user, 'ticket_created')).toEqual(['email']);
      expect(await engine.dispatcher.determineDeliveryChannels(user, 'org_announcement')).toEqual([]);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // DISPATCH
  // ─────────────────────────────────────────────────────────────────────────────

  describe('dispatch', () => {
    it('should deliver to in-app and email and mark both sent', async () => {
      const notification = await engine.dispatcher.createNotification('ticket_created', user.id, ticketContext);

      const result = await engine.dispatcher.dispatch(notification.id);

      expect(result.channels).toEqual(['in_app', 'email']);
      expect(result.outcomes.map(o => o.status)).toEqual(['sent', 'sent']);

      const records = await engine.deliveries.listForNotification(notification.id);
      expect(records).toHaveLength(2);
      expect(records.every(r => r.status === 'sent' && r.retryCount === 1)).toBe(true);

      expect(engine.email.sent).toHaveLength(1);
      const [message] = engine.email.sent;
      expect(message?.to).toBe('ada@example.test');
      expect(message?.subject).toBe('Your ticket for Spring Gala');
      expect(Object.keys(message?.attachments ?? {})).toEqual(['event.ics']);
    });

    it('should store the rendered in-app title', async () => {
      const notification = await engine.dispatcher.createNotification('ticket_created', user.id, ticketContext);
      await engine.dispatcher.dispatch(notification);

      const stored = await engine.notifications.get(notification.id);
      expect(stored?.title).toBe('Ticket confirmation for Spring Gala');
      expect(stored?.body).toContain('Reference: `TCK-001`');
    });

    it('should not resend an already sent channel', async () => {
      const notification = await engine.dispatcher.createNotification('ticket_created', user.id, ticketContext);
      await engine.dispatcher.dispatch(notification.id);
      const before = await engine.deliveries.get(notification.id, 'email');

      engine.clock.advance(60_000);
      await engine.dispatcher.dispatch(notification.id);

      expect(engine.email.calls).toBe(1);
      expect(await engine.deliveries.get(notification.id, 'email')).toEqual(before);
    });

    it('should create no delivery records when the channel set is empty', async () => {
      await engine.preferences.updatePreferences(user, { silenceAll: true });
      const notification = await engine.dispatcher.createNotification('ticket_created', user.id, ticketContext);

      const result = await engine.dispatcher.dispatch(notification.id);

      expect(result.channels).toEqual([]);
      expect(await engine.deliveries.listForNotification(notification.id)).toEqual([]);
    });

    it('should skip email when the address is unverified', async () => {
      await engine.users.saveUser({ ...user, emailVerified: false });
      const notification = await engine.dispatcher.createNotification('ticket_created', user.id, ticketContext);

      const result = await engine.dispatcher.dispatch(notification.id);

      expect(result.outcomes.map(o => [o.channel, o.status])).toEqual([
        ['in_app', 'sent'],
        ['email', 'skipped'],
      ]);
      expect(engine.email.calls).toBe(0);
    });

    it('should raise TemplateLookupError when the type has no template', async () => {
      const bare = createTestEngine({ registry: new TemplateRegistry() });
      await bare.users.saveUser(user);

      const notification = await bare.dispatcher.createNotification('membership_granted', user.id, membershipContext);

      await expect(bare.dispatcher.dispatch(notification.id)).rejects.toBeInstanceOf(TemplateLookupError);
      expect(await bare.deliveries.listForNotification(notification.id)).toEqual([]);
    });

    it('should report per-id failures from a batch', async () => {
      const notification = await engine.dispatcher.createNotification('membership_granted', user.id, membershipContext);

      const result = await engine.dispatcher.dispatchBatch([notification.id, 'missing-id']);

      expect(result.dispatched.map(d => d.notificationId)).toEqual([notification.id]);
      expect(result.failed).toEqual([{ notificationId: 'missing-id', error: 'Notification not found: missing-id' }]);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // RETRY
  // ─────────────────────────────────────────────────────────────────────────────

  describe('retry', () => {
    it('should retry a transient failure and succeed on the second attempt', async () => {
      engine.email.failNext(new TransientDeliveryError('Connection reset'));
      const notification = await engine.dispatcher.createNotification('ticket_created', user.id, ticketContext);

      const result = await engine.dispatcher.dispatch(notification.id);
      const emailOutcome = result.outcomes.find(o => o.channel === 'email');
      expect(emailOutcome).toMatchObject({ status: 'failed', retryInMs: 60_000, error: 'Connection reset' });

      const failed = await engine.deliveries.get(notification.id, 'email');
      expect(failed).toMatchObject({ status: 'failed', retryCount: 1, retryable: true });

      engine.clock.advance(60_000);
      await engine.worker.tick();

      const sent = await engine.deliveries.get(notification.id, 'email');
      expect(sent?.status).toBe('sent');
      expect(sent?.retryCount).toBe(2);
      expect(sent?.deliveredAt).toBe('2025-03-10T09:01:00.000Z');
      expect(sent?.errorMessage).toBeUndefined();
    });

    it('should stop at the retry ceiling', async () => {
      engine.email.failNext(new TransientDeliveryError('Service unavailable'), 10);
      const notification = await engine.dispatcher.createNotification('ticket_created', user.id, ticketContext);

      await engine.dispatcher.dispatch(notification.id);
      engine.clock.advance(60_000);
      await engine.worker.tick();
      engine.clock.advance(120_000);
      await engine.worker.tick();
      engine.clock.advance(DAY_MS);
      await engine.worker.tick();

      const record = await engine.deliveries.get(notification.id, 'email');
      expect(record).toMatchObject({ status: 'failed', retryCount: 3 });
      expect(engine.email.calls).toBe(3);
      expect(await engine.queue.size()).toBe(0);
    });

    it('should use the server-provided retry delay', async () => {
      engine.email.failNext(new TransientDeliveryError('Slow down', 5_000));
      const notification = await engine.dispatcher.createNotification('ticket_created', user.id, ticketContext);

      const result = await engine.dispatcher.dispatch(notification.id);

      expect(result.outcomes.find(o => o.channel === 'email')?.retryInMs).toBe(5_000);
    });

    it('should never retry a permanent failure', async () => {
      engine.email.failNext(new PermanentDeliveryError('Mailbox does not exist', 'invalid_address'));
      const notification = await engine.dispatcher.createNotification('ticket_created', user.id, ticketContext);

      await engine.dispatcher.dispatch(notification.id);

      expect(await engine.deliveries.get(notification.id, 'email')).toMatchObject({
        status: 'failed',
        retryCount: 1,
        retryable: false,
      });
      expect(await engine.queue.size()).toBe(0);

      await engine.dispatcher.dispatch(notification.id);
      expect(engine.email.calls).toBe(1);
    });

    it('should leave a pending retry to its scheduled job on re-dispatch', async () => {
      engine.email.failNext(new TransientDeliveryError('Slow down', 600_000), 5);
      const notification = await engine.dispatcher.createNotification('ticket_created', user.id, ticketContext);

      await engine.dispatcher.dispatch(notification.id);
      await engine.dispatcher.dispatch(notification.id);
      const third = await engine.dispatcher.dispatch(notification.id);

      expect(third.outcomes.find(o => o.channel === 'email')).toMatchObject({ status: 'failed', error: 'Slow down' });
      expect(await engine.deliveries.get(notification.id, 'email')).toMatchObject({
        status: 'failed',
        retryCount: 1,
        retryable: true,
      });
      expect(engine.email.calls).toBe(1);
      expect(await engine.queue.size()).toBe(1);
    });

    it('should count a send as delivered when the email log write fails', async () => {
      vi.spyOn(engine.emailLogs, 'record').mockRejectedValue(new Error('Log store unavailable'));
      const notification = await engine.dispatcher.createNotification('ticket_created', user.id, ticketContext);

      const result = await engine.dispatcher.dispatch(notification.id);

      expect(result.outcomes.find(o => o.channel === 'email')?.status).toBe('sent');
      expect((await engine.deliveries.get(notification.id, 'email'))?.status).toBe('sent');
      expect(engine.email.calls).toBe(1);
      expect(await engine.queue.size()).toBe(0);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // MAINTENANCE
  // ─────────────────────────────────────────────────────────────────────────────

  describe('retryFailedDeliveries', () => {
    it('should re-attempt recent transient failures', async () => {
      engine.email.failNext(new TransientDeliveryError('Connection reset'));
      const notification = await engine.dispatcher.createNotification('ticket_created', user.id, ticketContext);
      await engine.dispatcher.dispatch(notification.id);

      engine.clock.advance(10 * 60_000);
      const result = await engine.dispatcher.retryFailedDeliveries();

      expect(result).toEqual({ attempted: 1, sent: 1 });
      expect((await engine.deliveries.get(notification.id, 'email'))?.status).toBe('sent');
    });

    it('should leave failures older than the sweep window alone', async () => {
      engine.email.failNext(new TransientDeliveryError('Connection reset'));
      const notification = await engine.dispatcher.createNotification('ticket_created', user.id, ticketContext);
      await engine.dispatcher.dispatch(notification.id);

      engine.clock.advance(25 * 60 * 60_000);
      const result = await engine.dispatcher.retryFailedDeliveries();

      expect(result).toEqual({ attempted: 0, sent: 0 });
      expect(engine.email.calls).toBe(1);
    });
  });

  describe('cleanupOldNotifications', () => {
    it('should delete notifications past retention with their delivery records', async () => {
      const old = await engine.dispatcher.createNotification('membership_granted', user.id, membershipContext);
      await engine.dispatcher.dispatch(old.id);

      engine.clock.advance(91 * DAY_MS);
      const recent = await engine.dispatcher.createNotification('membership_granted', user.id, membershipContext);

      const result = await engine.dispatcher.cleanupOldNotifications();

      expect(result).toEqual({ notifications: 1, deliveries: 2 });
      expect(await engine.notifications.get(old.id)).toBeNull();
      expect(await engine.deliveries.listForNotification(old.id)).toEqual([]);
      expect(await engine.notifications.get(recent.id)).not.toBeNull();
    });
  });
});
