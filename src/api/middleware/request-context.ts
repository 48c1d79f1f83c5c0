// ═══════════════════════════════════════════════════════════════════════════════
// REQUEST CONTEXT — Request IDs and Authenticated User
// ═══════════════════════════════════════════════════════════════════════════════

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { UnauthorizedError } from './error-handler.js';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      userId?: string;
    }
  }
}

const REQUEST_ID_HEADER = 'X-Request-Id';

export function requestId(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const incoming = req.get(REQUEST_ID_HEADER);
    req.requestId = incoming && incoming.length <= 128 ? incoming : `req_${uuidv4()}`;
    res.setHeader(REQUEST_ID_HEADER, req.requestId);
    next();
  };
}

/**
 * Resolves the caller's user id, or null for an anonymous request. Session
 * handling belongs to the host application; this engine only consumes the id.
 */
export type Authenticate = (req: Request) => Promise<string | null> | string | null;

/**
 * Trusts an upstream gateway that has already authenticated the caller.
 */
export const headerAuthenticate: Authenticate = req => req.get('X-User-Id') ?? null;

export function requireUser(authenticate: Authenticate): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    Promise.resolve(authenticate(req))
      .then(userId => {
        if (!userId) {
          next(new UnauthorizedError());
          return;
        }
        req.userId = userId;
        next();
      })
      .catch(next);
  };
}

export function getUserId(req: Request): string {
  if (!req.userId) {
    throw new UnauthorizedError();
  }
  return req.userId;
}
