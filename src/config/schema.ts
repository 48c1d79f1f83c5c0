// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG SCHEMA — Zod Validation for Application Configuration
// ═══════════════════════════════════════════════════════════════════════════════

import { z, type ZodError } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────────
// PRIMITIVES
// ─────────────────────────────────────────────────────────────────────────────────

export const EnvironmentSchema = z.enum(['development', 'test', 'staging', 'production']);
export type Environment = z.infer<typeof EnvironmentSchema>;

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

const PositiveInt = z.number().int().positive();
const NonNegativeInt = z.number().int().nonnegative();

// ─────────────────────────────────────────────────────────────────────────────────
// SECTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export const ServerConfigSchema = z.object({
  port: PositiveInt.max(65535).default(3000),
  host: z.string().default('0.0.0.0'),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  pretty: z.boolean().default(false),
  redactPII: z.boolean().default(true),
});

export const StorageConfigSchema = z.object({
  /** Unset selects the in-memory store */
  redisUrl: z.string().url().optional(),
});

export const DeliveryConfigSchema = z.object({
  /** Attempts per (notification, channel) before FAILED is terminal */
  maxRetries: PositiveInt.default(3),
  retryBaseDelayMs: PositiveInt.default(60_000),
  retryMaxDelayMs: PositiveInt.default(60 * 60_000),
  /** The failed-delivery sweep gives records up to this many attempts */
  sweepMaxRetries: PositiveInt.default(5),
  sweepWindowHours: PositiveInt.default(24),
});

export const DigestConfigSchema = z.object({
  windowMinutes: PositiveInt.max(720).default(30),
  scanIntervalMs: PositiveInt.default(60 * 60_000),
});

export const EmailConfigSchema = z.object({
  from: z.string().default('Notifications <notifications@localhost>'),
  smtpHost: z.string().default('localhost'),
  smtpPort: PositiveInt.max(65535).default(587),
  smtpSecure: z.boolean().default(false),
  smtpUser: z.string().optional(),
  smtpPassword: z.string().optional(),
  /** Outside production every message is redirected here when set */
  catchAllAddress: z.string().email().optional(),
});

export const TelegramConfigSchema = z.object({
  botToken: z.string().optional(),
  apiBaseUrl: z.string().url().default('https://api.telegram.org'),
  messagesPerSecond: PositiveInt.default(20),
  requestTimeoutMs: PositiveInt.default(10_000),
});

export const LinksConfigSchema = z.object({
  frontendBaseUrl: z.string().url().default('http://localhost:5173'),
});

export const UnsubscribeConfigSchema = z.object({
  secret: z.string().min(8).default('development-unsubscribe-secret'),
  tokenLifetimeSeconds: PositiveInt.default(7 * 24 * 60 * 60),
});

export const RetentionConfigSchema = z.object({
  notificationRetentionDays: PositiveInt.default(90),
});

export const WorkerConfigSchema = z.object({
  pollIntervalMs: PositiveInt.default(1000),
  batchSize: PositiveInt.default(20),
  leaseSeconds: PositiveInt.default(300),
  maxJobAttempts: PositiveInt.default(5),
  jobRetryDelayMs: NonNegativeInt.default(30_000),
  cleanupIntervalMs: PositiveInt.default(24 * 60 * 60_000),
  retrySweepIntervalMs: PositiveInt.default(60 * 60_000),
});

// ─────────────────────────────────────────────────────────────────────────────────
// APP CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

export const AppConfigSchema = z.object({
  environment: EnvironmentSchema.default('development'),
  server: ServerConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  storage: StorageConfigSchema.default({}),
  delivery: DeliveryConfigSchema.default({}),
  digest: DigestConfigSchema.default({}),
  email: EmailConfigSchema.default({}),
  telegram: TelegramConfigSchema.default({}),
  links: LinksConfigSchema.default({}),
  unsubscribe: UnsubscribeConfigSchema.default({}),
  retention: RetentionConfigSchema.default({}),
  worker: WorkerConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

export function validateConfig(input: unknown): AppConfig {
  return AppConfigSchema.parse(input);
}

export function safeValidateConfig(input: unknown) {
  return AppConfigSchema.safeParse(input);
}

export function formatConfigErrors(error: ZodError): string[] {
  return error.errors.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

export function getDefaultConfig(environment: Environment = 'development'): AppConfig {
  return AppConfigSchema.parse({ environment });
}
