// ═══════════════════════════════════════════════════════════════════════════════
// API APP — Express Application Assembly
// ═══════════════════════════════════════════════════════════════════════════════

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { NotificationEngine } from '../notifications/engine.js';
import { errorHandler, NotFoundError } from './middleware/error-handler.js';
import { headerAuthenticate, requestId, type Authenticate } from './middleware/request-context.js';
import { createHealthRouter } from './routes/health.js';
import { createNotificationsRouter } from './routes/notifications.js';
import { createPreferencesRouter } from './routes/preferences.js';

export interface AppOptions {
  /** Defaults to trusting the X-User-Id header set by the gateway */
  authenticate?: Authenticate;
}

export function createApp(engine: NotificationEngine, options: AppOptions = {}): Express {
  const app = express();
  const authenticate = options.authenticate ?? headerAuthenticate;

  app.disable('x-powered-by');
  app.use(requestId());
  app.use(express.json({ limit: '100kb' }));

  app.use(createHealthRouter({ store: engine.store, queue: engine.queue, worker: engine.worker }));
  app.use('/notifications', createNotificationsRouter({ notifications: engine.notifications, authenticate }));
  app.use('/notification-preferences', createPreferencesRouter({
    preferences: engine.preferences,
    users: engine.users,
    unsubscribeTokens: engine.unsubscribeTokens,
    catalog: engine.catalog,
    authenticate,
  }));

  app.use((req: Request, _res: Response, next: NextFunction) => {
    next(new NotFoundError('Route', `${req.method} ${req.path}`));
  });
  app.use(errorHandler);

  return app;
}
