// ═══════════════════════════════════════════════════════════════════════════════
// TEST FIXTURES — Users, Fake Transports, Engine Builder
// ═══════════════════════════════════════════════════════════════════════════════

import { AppConfigSchema, type AppConfig, type AppConfigInput } from '../config/index.js';
import type { EmailMessage, EmailSendResult, EmailTransport } from '../notifications/channels/email.js';
import type { TelegramSendResult, TelegramTransport } from '../notifications/channels/telegram.js';
import { createNotificationEngine, type NotificationEngine } from '../notifications/engine.js';
import type { TemplateRegistry } from '../notifications/templates/registry.js';
import { MemoryStore } from '../storage/index.js';
import type { NotificationUser } from '../users/types.js';

export const FRONTEND = 'https://app.example.test';

// ─────────────────────────────────────────────────────────────────────────────────
// USERS
// ─────────────────────────────────────────────────────────────────────────────────

export function createTestUser(overrides: Partial<NotificationUser> = {}): NotificationUser {
  return {
    id: 'user-1',
    displayName: 'Ada Tester',
    email: 'ada@example.test',
    emailVerified: true,
    language: 'en',
    timezone: 'UTC',
    isGuest: false,
    telegramBlocked: false,
    ...overrides,
  };
}

export const membershipContext = {
  organizationId: 'org-1',
  organizationName: 'Chess Club',
  role: 'member',
};

// ─────────────────────────────────────────────────────────────────────────────────
// CLOCK
// ─────────────────────────────────────────────────────────────────────────────────

export class TestClock {
  private current: Date;

  constructor(start: string | Date = '2025-03-10T09:00:00.000Z') {
    this.current = new Date(start);
  }

  readonly now = (): Date => new Date(this.current.getTime());

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }

  set(at: string | Date): void {
    this.current = new Date(at);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// FAKE TRANSPORTS
// ─────────────────────────────────────────────────────────────────────────────────

export class FakeEmailTransport implements EmailTransport {
  readonly sent: EmailMessage[] = [];
  private readonly failures: unknown[] = [];
  calls = 0;

  /** The next call throws this instead of sending */
  failNext(error: unknown, times = 1): void {
    for (let i = 0; i < times; i++) this.failures.push(error);
  }

  async send(message: EmailMessage): Promise<EmailSendResult> {
    this.calls++;
    const failure = this.failures.shift();
    if (failure !== undefined) throw failure;

    this.sent.push(message);
    return { messageId: `<msg-${this.sent.length}@example.test>` };
  }
}

export class FakeTelegramTransport implements TelegramTransport {
  readonly messages: Array<{ chatId: string; html: string }> = [];
  private readonly failures: unknown[] = [];
  calls = 0;

  failNext(error: unknown, times = 1): void {
    for (let i = 0; i < times; i++) this.failures.push(error);
  }

  async sendMessage(chatId: string, html: string): Promise<TelegramSendResult> {
    this.calls++;
    const failure = this.failures.shift();
    if (failure !== undefined) throw failure;

    this.messages.push({ chatId, html });
    return { messageId: this.messages.length };
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENGINE
// ─────────────────────────────────────────────────────────────────────────────────

export function createTestConfig(overrides: AppConfigInput = {}): AppConfig {
  return AppConfigSchema.parse({
    environment: 'test',
    logging: { level: 'silent' },
    links: { frontendBaseUrl: FRONTEND },
    unsubscribe: { secret: 'test-secret' },
    ...overrides,
  });
}

export interface TestEngine extends NotificationEngine {
  email: FakeEmailTransport;
  telegram: FakeTelegramTransport;
  clock: TestClock;
}

export interface TestEngineOptions {
  config?: AppConfigInput;
  registry?: TemplateRegistry;
  clock?: TestClock;
}

export function createTestEngine(options: TestEngineOptions = {}): TestEngine {
  const email = new FakeEmailTransport();
  const telegram = new FakeTelegramTransport();
  const clock = options.clock ?? new TestClock();

  const engine = createNotificationEngine(createTestConfig(options.config), {
    store: new MemoryStore(),
    emailTransport: email,
    telegramTransport: telegram,
    clock: clock.now,
    ...(options.registry !== undefined && { registry: options.registry }),
  });

  return { ...engine, email, telegram, clock };
}
