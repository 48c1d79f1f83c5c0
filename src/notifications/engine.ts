// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE — Wiring Stores, Drivers and Services From Configuration
// ═══════════════════════════════════════════════════════════════════════════════

import type { AppConfig } from '../config/schema.js';
import { loadConfig } from '../config/index.js';
import { exponentialBackoff } from '../infrastructure/retry/backoff.js';
import { getLogger } from '../logging/index.js';
import { getStore, type KeyValueStore } from '../storage/index.js';
import { UserStore } from '../users/store.js';
import {
  BotApiTelegramTransport,
  EmailChannelDriver,
  InAppChannelDriver,
  SmtpEmailTransport,
  TelegramChannelDriver,
  TokenBucket,
  type ChannelDrivers,
  type EmailTransport,
  type TelegramSendResult,
  type TelegramTransport,
} from './channels/index.js';
import { DigestBatcher } from './digest.js';
import { NotificationDispatcher } from './dispatcher.js';
import { PermanentDeliveryError } from './errors.js';
import { Notifier } from './notify.js';
import { PreferenceService, PreferenceStore } from './preferences.js';
import { JobQueue } from './queue.js';
import { DeliveryStore, EmailLogStore, NotificationStore } from './store.js';
import { loadTemplateCatalog, type TemplateCatalog } from './templates/catalog.js';
import { TemplateRegistry, createDefaultTemplateRegistry } from './templates/registry.js';
import { TemplateRenderer } from './templates/renderer.js';
import { UnsubscribeTokens } from './unsubscribe.js';
import { NotificationWorker } from './worker.js';

const logger = getLogger({ component: 'engine' });

export interface NotificationEngine {
  config: AppConfig;
  store: KeyValueStore;
  notifications: NotificationStore;
  deliveries: DeliveryStore;
  emailLogs: EmailLogStore;
  users: UserStore;
  preferences: PreferenceService;
  unsubscribeTokens: UnsubscribeTokens;
  catalog: TemplateCatalog;
  registry: TemplateRegistry;
  renderer: TemplateRenderer;
  drivers: ChannelDrivers;
  queue: JobQueue;
  dispatcher: NotificationDispatcher;
  digest: DigestBatcher;
  worker: NotificationWorker;
  notifier: Notifier;
}

export interface EngineOverrides {
  store?: KeyValueStore;
  emailTransport?: EmailTransport;
  telegramTransport?: TelegramTransport;
  registry?: TemplateRegistry;
  clock?: () => Date;
}

/**
 * Stands in for the Bot API when no bot token is configured.
 */
class UnconfiguredTelegramTransport implements TelegramTransport {
  async sendMessage(): Promise<TelegramSendResult> {
    throw new PermanentDeliveryError('Telegram bot token is not configured', 'rejected');
  }
}

function createTelegramTransport(config: AppConfig['telegram']): TelegramTransport {
  if (!config.botToken) {
    logger.warn('TELEGRAM_BOT_TOKEN not set, Telegram delivery disabled');
    return new UnconfiguredTelegramTransport();
  }
  return new BotApiTelegramTransport({
    botToken: config.botToken,
    apiBaseUrl: config.apiBaseUrl,
    requestTimeoutMs: config.requestTimeoutMs,
  });
}

export function createNotificationEngine(
  config: AppConfig = loadConfig(),
  overrides: EngineOverrides = {}
): NotificationEngine {
  const clock = overrides.clock ?? (() => new Date());
  const store = overrides.store ?? getStore();

  const notifications = new NotificationStore(store);
  const deliveries = new DeliveryStore(store);
  const emailLogs = new EmailLogStore(store);
  const users = new UserStore(store);
  const preferences = new PreferenceService(new PreferenceStore(store), { clock });

  const unsubscribeTokens = new UnsubscribeTokens({
    secret: config.unsubscribe.secret,
    lifetimeSeconds: config.unsubscribe.tokenLifetimeSeconds,
    frontendBaseUrl: config.links.frontendBaseUrl,
    clock,
  });

  const catalog = loadTemplateCatalog();
  const registry = overrides.registry ?? createDefaultTemplateRegistry(catalog);
  const renderer = new TemplateRenderer(registry, {
    frontendBaseUrl: config.links.frontendBaseUrl,
    unsubscribeLink: recipient => unsubscribeTokens.buildLink(recipient),
  });

  // Redirecting mail is a non-production safeguard only
  const catchAllAddress = config.environment === 'production' ? undefined : config.email.catchAllAddress;
  const emailTransport = overrides.emailTransport ?? new SmtpEmailTransport({
    from: config.email.from,
    host: config.email.smtpHost,
    port: config.email.smtpPort,
    secure: config.email.smtpSecure,
    ...(config.email.smtpUser !== undefined && { user: config.email.smtpUser }),
    ...(config.email.smtpPassword !== undefined && { password: config.email.smtpPassword }),
  });

  const drivers: ChannelDrivers = {
    in_app: new InAppChannelDriver({ deliveries, clock }),
    email: new EmailChannelDriver({
      deliveries,
      clock,
      transport: emailTransport,
      renderer,
      emailLogs,
      ...(catchAllAddress !== undefined && { catchAllAddress }),
    }),
    telegram: new TelegramChannelDriver({
      deliveries,
      clock,
      transport: overrides.telegramTransport ?? createTelegramTransport(config.telegram),
      renderer,
      users,
      rateLimiter: new TokenBucket(
        {
          capacity: config.telegram.messagesPerSecond,
          refillRate: config.telegram.messagesPerSecond,
        },
        () => clock().getTime()
      ),
    }),
  };

  const queue = new JobQueue(store, { leaseSeconds: config.worker.leaseSeconds, clock });

  const dispatcher = new NotificationDispatcher(
    { notifications, deliveries, preferences, users, renderer, drivers, scheduler: queue },
    {
      maxRetries: config.delivery.maxRetries,
      retryBackoff: exponentialBackoff({
        initialDelayMs: config.delivery.retryBaseDelayMs,
        maxDelayMs: config.delivery.retryMaxDelayMs,
      }),
      sweepMaxRetries: config.delivery.sweepMaxRetries,
      sweepWindowHours: config.delivery.sweepWindowHours,
      retentionDays: config.retention.notificationRetentionDays,
      clock,
    }
  );

  const digest = new DigestBatcher(
    { notifications, deliveries, emailLogs, preferences, users, renderer, catalog, transport: emailTransport, store },
    {
      windowMinutes: config.digest.windowMinutes,
      ...(catchAllAddress !== undefined && { catchAllAddress }),
      clock,
    }
  );

  const worker = new NotificationWorker(
    { queue, dispatcher, digest },
    {
      pollIntervalMs: config.worker.pollIntervalMs,
      batchSize: config.worker.batchSize,
      maxJobAttempts: config.worker.maxJobAttempts,
      jobRetryDelayMs: config.worker.jobRetryDelayMs,
      digestScanIntervalMs: config.digest.scanIntervalMs,
      cleanupIntervalMs: config.worker.cleanupIntervalMs,
      retrySweepIntervalMs: config.worker.retrySweepIntervalMs,
    }
  );

  return {
    config,
    store,
    notifications,
    deliveries,
    emailLogs,
    users,
    preferences,
    unsubscribeTokens,
    catalog,
    registry,
    renderer,
    drivers,
    queue,
    dispatcher,
    digest,
    worker,
    notifier: new Notifier(dispatcher, queue),
  };
}
