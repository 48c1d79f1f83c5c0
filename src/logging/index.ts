// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING MODULE — Pino-Backed Structured Logs with Component Context
// ═══════════════════════════════════════════════════════════════════════════════
//
// Usage:
//   const logger = getLogger({ component: 'dispatcher' });
//   logger.info('Dispatched notification', { notificationId });
//   logger.error('Delivery failed', error, { deliveryId });
//
// ═══════════════════════════════════════════════════════════════════════════════

import pino from 'pino';
import { loadConfig } from '../config/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  component?: string;
  requestId?: string;
  userId?: string;
  jobId?: string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// PII REDACTION
// ─────────────────────────────────────────────────────────────────────────────────

const PII_PATTERNS = [
  // Email
  { pattern: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, replacement: '[EMAIL]' },
  // Phone (various formats)
  { pattern: /(\+?1[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}/g, replacement: '[PHONE]' },
];

const SENSITIVE_KEY_FRAGMENTS = ['password', 'secret', 'token', 'authorization', 'apikey'];

export function redactPII(text: string): string {
  let result = text;
  for (const { pattern, replacement } of PII_PATTERNS) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

export function redactObject(obj: unknown, depth = 0): unknown {
  if (depth > 5) return '[MAX_DEPTH]';

  if (typeof obj === 'string') {
    return redactPII(obj);
  }

  if (Array.isArray(obj)) {
    return obj.map(item => redactObject(item, depth + 1));
  }

  if (obj && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const lowerKey = key.toLowerCase();
      if (SENSITIVE_KEY_FRAGMENTS.some(fragment => lowerKey.includes(fragment))) {
        result[key] = '[REDACTED]';
      } else {
        result[key] = redactObject(value, depth + 1);
      }
    }
    return result;
  }

  return obj;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ROOT PINO INSTANCE
// ─────────────────────────────────────────────────────────────────────────────────

let root: pino.Logger | null = null;

function createRoot(): pino.Logger {
  const { logging, environment } = loadConfig();

  const options: pino.LoggerOptions = {
    level: logging.level,
    base: { service: 'herald', env: environment },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (logging.pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
    };
  }

  return pino(options);
}

function getRoot(): pino.Logger {
  if (!root) {
    root = createRoot();
  }
  return root;
}

export function formatError(error: unknown): { name: string; message: string; stack?: string } {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'UnknownError', message: String(error) };
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGER CLASS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Thin wrapper over pino that keeps the `(message, metadata)` call shape
 * and applies PII redaction before anything reaches the sink.
 *
 * The pino child is created on first use so that importing a module never
 * forces configuration to load.
 */
export class Logger {
  private readonly context: LogContext;
  private instance: pino.Logger | null = null;

  constructor(context: LogContext = {}) {
    this.context = context;
  }

  private get sink(): pino.Logger {
    if (!this.instance) {
      this.instance = getRoot().child({ ...this.context });
    }
    return this.instance;
  }

  private shouldRedact(): boolean {
    return loadConfig().logging.redactPII;
  }

  private write(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    error?: unknown
  ): void {
    const redact = this.shouldRedact();
    const payload: Record<string, unknown> = {};

    if (metadata && Object.keys(metadata).length > 0) {
      const cleaned = redact ? redactObject(metadata) : metadata;
      if (cleaned && typeof cleaned === 'object') {
        Object.assign(payload, cleaned);
      }
    }

    if (error !== undefined) {
      const formatted = formatError(error);
      payload.err = redact
        ? { name: formatted.name, message: redactPII(formatted.message) }
        : formatted;
    }

    this.sink[level](payload, redact ? redactPII(message) : message);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // PUBLIC API
  // ─────────────────────────────────────────────────────────────────────────────

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.write('warn', message, metadata);
  }

  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    this.write('error', message, metadata, error);
  }

  fatal(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    this.write('fatal', message, metadata, error);
  }

  child(context: Partial<LogContext>): Logger {
    return new Logger({ ...this.context, ...context });
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// ACCESSORS
// ─────────────────────────────────────────────────────────────────────────────────

export function getLogger(context: LogContext = {}): Logger {
  return new Logger(context);
}
