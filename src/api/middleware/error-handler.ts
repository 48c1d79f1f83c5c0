// ═══════════════════════════════════════════════════════════════════════════════
// ERROR HANDLER — API Errors and the Express Error Middleware
// ═══════════════════════════════════════════════════════════════════════════════

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import { getLogger } from '../../logging/index.js';

const logger = getLogger({ component: 'api-error' });

// ─────────────────────────────────────────────────────────────────────────────────
// ERROR CLASSES
// ─────────────────────────────────────────────────────────────────────────────────

export class ApiError extends Error {
  readonly isOperational: boolean = true;

  constructor(
    message: string,
    readonly statusCode: number = 400,
    readonly code: string = 'BAD_REQUEST',
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export class NotFoundError extends ApiError {
  constructor(resource: string, id?: string) {
    super(id ? `${resource} not found: ${id}` : `${resource} not found`, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class UnauthorizedError extends ApiError {
  constructor(message = 'Authentication required') {
    super(message, 401, 'UNAUTHORIZED');
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends ApiError {
  constructor(message = 'Access denied') {
    super(message, 403, 'FORBIDDEN');
    this.name = 'ForbiddenError';
  }
}

export class ConflictError extends ApiError {
  constructor(message: string) {
    super(message, 409, 'CONFLICT');
    this.name = 'ConflictError';
  }
}

export class RateLimitError extends ApiError {
  constructor(readonly retryAfter: number) {
    super('Too many requests', 429, 'RATE_LIMITED', { retryAfter });
    this.name = 'RateLimitError';
  }
}

export class InternalError extends ApiError {
  override readonly isOperational = false;

  constructor(message = 'Internal server error') {
    super(message, 500, 'INTERNAL_ERROR');
    this.name = 'InternalError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// CODE MAPPING
// ─────────────────────────────────────────────────────────────────────────────────

/** Status codes for coded errors thrown outside the API layer */
const CODE_STATUS: Record<string, number> = {
  BAD_REQUEST: 400,
  VALIDATION_ERROR: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  RATE_LIMITED: 429,
  PROVIDER_ERROR: 502,
};

interface CodedError {
  code: string;
  message: string;
}

function isCodedError(error: unknown): error is CodedError {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string' &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

function isJsonSyntaxError(error: unknown): boolean {
  return error instanceof SyntaxError && 'body' in error;
}

// ─────────────────────────────────────────────────────────────────────────────────
// MIDDLEWARE
// ─────────────────────────────────────────────────────────────────────────────────

interface ErrorBody {
  error: string;
  code: string;
  details?: Record<string, unknown>;
  requestId?: string;
  timestamp: string;
}

function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) return error;

  if (error instanceof ZodError) {
    return new ValidationError(
      error.issues.map(issue => issue.message).join(', '),
      { fields: error.flatten().fieldErrors }
    );
  }

  if (isJsonSyntaxError(error)) {
    return new ApiError('Invalid JSON in request body', 400, 'INVALID_JSON');
  }

  if (isCodedError(error)) {
    return new ApiError(error.message, CODE_STATUS[error.code] ?? 500, error.code);
  }

  return new InternalError(error instanceof Error ? error.message : String(error));
}

export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  const apiError = toApiError(error);
  const production = process.env.NODE_ENV === 'production';

  if (apiError.statusCode >= 500) {
    logger.error('Request failed', error, {
      path: req.path,
      method: req.method,
      requestId: req.requestId,
    });
  } else {
    logger.debug('Request rejected', {
      path: req.path,
      code: apiError.code,
      requestId: req.requestId,
    });
  }

  if (apiError instanceof RateLimitError) {
    res.setHeader('Retry-After', String(apiError.retryAfter));
  }

  const sanitize = production && apiError.statusCode >= 500;
  const body: ErrorBody = {
    error: sanitize ? 'An unexpected error occurred' : apiError.message,
    code: apiError.code,
    ...(!sanitize && apiError.details !== undefined && { details: apiError.details }),
    ...(req.requestId !== undefined && { requestId: req.requestId }),
    timestamp: new Date().toISOString(),
  };

  res.status(apiError.statusCode).json(body);
}

/**
 * Forwards rejections from an async route handler to the error middleware.
 */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => Promise.resolve(handler(req, res, next)).then(() => undefined, next);
}
