// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Environment Loading, Validation, Caching
// ═══════════════════════════════════════════════════════════════════════════════

import {
  AppConfigSchema,
  EnvironmentSchema,
  LogLevelSchema,
  formatConfigErrors,
  type AppConfig,
  type AppConfigInput,
  type Environment,
} from './schema.js';

export {
  AppConfigSchema,
  validateConfig,
  safeValidateConfig,
  formatConfigErrors,
  getDefaultConfig,
  type AppConfig,
  type AppConfigInput,
  type Environment,
} from './schema.js';

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────
// Unset variables come back undefined so the schema defaults apply.

function envBool(key: string): boolean | undefined {
  const value = process.env[key]?.toLowerCase();
  if (value === undefined || value === '') return undefined;
  return value === 'true' || value === '1' || value === 'yes';
}

function envNumber(key: string): number | undefined {
  const value = process.env[key];
  if (value === undefined || value === '') return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

function envString(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === '' ? undefined : value;
}

function envEnvironment(): Environment {
  const parsed = EnvironmentSchema.safeParse(process.env.NODE_ENV ?? 'development');
  return parsed.success ? parsed.data : 'development';
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOADING
// ─────────────────────────────────────────────────────────────────────────────────

export function readEnvironment(): AppConfigInput {
  const environment = envEnvironment();

  return {
    environment,
    server: {
      port: envNumber('PORT'),
      host: envString('HOST'),
    },
    logging: {
      level: parseLogLevel(envString('LOG_LEVEL')),
      pretty: envBool('LOG_PRETTY') ?? environment === 'development',
      redactPII: envBool('REDACT_PII'),
    },
    storage: {
      redisUrl: envString('REDIS_URL'),
    },
    delivery: {
      maxRetries: envNumber('DELIVERY_MAX_RETRIES'),
      retryBaseDelayMs: envNumber('DELIVERY_RETRY_BASE_DELAY_MS'),
      retryMaxDelayMs: envNumber('DELIVERY_RETRY_MAX_DELAY_MS'),
      sweepMaxRetries: envNumber('DELIVERY_SWEEP_MAX_RETRIES'),
      sweepWindowHours: envNumber('DELIVERY_SWEEP_WINDOW_HOURS'),
    },
    digest: {
      windowMinutes: envNumber('DIGEST_WINDOW_MINUTES'),
      scanIntervalMs: envNumber('DIGEST_SCAN_INTERVAL_MS'),
    },
    email: {
      from: envString('EMAIL_FROM'),
      smtpHost: envString('SMTP_HOST'),
      smtpPort: envNumber('SMTP_PORT'),
      smtpSecure: envBool('SMTP_SECURE'),
      smtpUser: envString('SMTP_USER'),
      smtpPassword: envString('SMTP_PASSWORD'),
      catchAllAddress: envString('EMAIL_CATCH_ALL'),
    },
    telegram: {
      botToken: envString('TELEGRAM_BOT_TOKEN'),
      apiBaseUrl: envString('TELEGRAM_API_BASE_URL'),
      messagesPerSecond: envNumber('TELEGRAM_MESSAGES_PER_SECOND'),
      requestTimeoutMs: envNumber('TELEGRAM_REQUEST_TIMEOUT_MS'),
    },
    links: {
      frontendBaseUrl: envString('FRONTEND_BASE_URL'),
    },
    unsubscribe: {
      secret: envString('UNSUBSCRIBE_SECRET'),
      tokenLifetimeSeconds: envNumber('UNSUBSCRIBE_TOKEN_LIFETIME_SECONDS'),
    },
    retention: {
      notificationRetentionDays: envNumber('NOTIFICATION_RETENTION_DAYS'),
    },
    worker: {
      pollIntervalMs: envNumber('WORKER_POLL_INTERVAL_MS'),
      batchSize: envNumber('WORKER_BATCH_SIZE'),
      leaseSeconds: envNumber('WORKER_LEASE_SECONDS'),
      maxJobAttempts: envNumber('WORKER_MAX_JOB_ATTEMPTS'),
      jobRetryDelayMs: envNumber('WORKER_JOB_RETRY_DELAY_MS'),
      cleanupIntervalMs: envNumber('WORKER_CLEANUP_INTERVAL_MS'),
      retrySweepIntervalMs: envNumber('WORKER_RETRY_SWEEP_INTERVAL_MS'),
    },
  };
}

function parseLogLevel(value: string | undefined) {
  if (value === undefined) return undefined;
  const parsed = LogLevelSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

export class ConfigValidationError extends Error {
  readonly name = 'ConfigValidationError';

  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
  }
}

let cachedConfig: AppConfig | null = null;

export function loadConfig(): AppConfig {
  if (cachedConfig) return cachedConfig;

  const result = AppConfigSchema.safeParse(readEnvironment());
  if (!result.success) {
    throw new ConfigValidationError(formatConfigErrors(result.error));
  }

  const config = result.data;
  if (config.environment === 'production' && config.unsubscribe.secret === 'development-unsubscribe-secret') {
    throw new ConfigValidationError(['unsubscribe.secret: UNSUBSCRIBE_SECRET must be set in production']);
  }

  cachedConfig = config;
  return cachedConfig;
}

export function reloadConfig(): AppConfig {
  cachedConfig = null;
  return loadConfig();
}

export function isProduction(): boolean {
  return loadConfig().environment === 'production';
}
