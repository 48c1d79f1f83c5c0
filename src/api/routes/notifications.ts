// ═══════════════════════════════════════════════════════════════════════════════
// NOTIFICATION ROUTES — In-App Inbox
// ═══════════════════════════════════════════════════════════════════════════════
//
// Endpoints:
//   GET    /notifications                 List the caller's notifications
//   GET    /notifications/unread-count    Count unread notifications
//   POST   /notifications/read-all        Mark everything read
//   POST   /notifications/:id/read        Mark one read
//   POST   /notifications/:id/unread      Mark one unread
//   POST   /notifications/:id/archive     Archive one
//   POST   /notifications/:id/unarchive   Restore one from the archive
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import { getLogger } from '../../logging/index.js';
import type { NotificationStore } from '../../notifications/store.js';
import type { Notification } from '../../notifications/types.js';
import { asyncHandler, NotFoundError, ValidationError } from '../middleware/error-handler.js';
import { getUserId, requireUser, type Authenticate } from '../middleware/request-context.js';
import { ListNotificationsQuerySchema, NotificationIdParamSchema } from '../schemas/index.js';

const logger = getLogger({ component: 'notification-routes' });

export interface NotificationsRouterDeps {
  notifications: NotificationStore;
  authenticate: Authenticate;
}

type InboxAction = 'markRead' | 'markUnread' | 'archive' | 'unarchive';

function notificationId(req: Request): string {
  const parsed = NotificationIdParamSchema.safeParse(req.params);
  if (!parsed.success) {
    throw new ValidationError('Invalid notification id');
  }
  return parsed.data.id;
}

export function createNotificationsRouter(deps: NotificationsRouterDeps): Router {
  const router = Router();
  const { notifications } = deps;

  router.use(requireUser(deps.authenticate));

  // ═══════════════════════════════════════════════════════════════════════════════
  // LIST
  // ═══════════════════════════════════════════════════════════════════════════════

  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const userId = getUserId(req);

      const parseResult = ListNotificationsQuerySchema.safeParse(req.query);
      if (!parseResult.success) {
        throw new ValidationError(
          parseResult.error.issues.map(i => i.message).join(', '),
          { fields: parseResult.error.flatten().fieldErrors }
        );
      }
      const query = parseResult.data;

      const items = await notifications.listForUser(userId, query);
      res.json({
        notifications: items,
        count: items.length,
        offset: query.offset,
        limit: query.limit,
      });
    })
  );

  router.get(
    '/unread-count',
    asyncHandler(async (req: Request, res: Response) => {
      const count = await notifications.getUnreadCount(getUserId(req));
      res.json({ count });
    })
  );

  // ═══════════════════════════════════════════════════════════════════════════════
  // READ STATE
  // ═══════════════════════════════════════════════════════════════════════════════

  router.post(
    '/read-all',
    asyncHandler(async (req: Request, res: Response) => {
      const userId = getUserId(req);
      const updated = await notifications.markAllRead(userId);

      logger.info('Marked all notifications read', { userId, updated, requestId: req.requestId });
      res.json({ updated });
    })
  );

  const inboxActions: ReadonlyArray<readonly [string, InboxAction]> = [
    ['read', 'markRead'],
    ['unread', 'markUnread'],
    ['archive', 'archive'],
    ['unarchive', 'unarchive'],
  ];

  for (const [path, action] of inboxActions) {
    router.post(
      `/:id/${path}`,
      asyncHandler(async (req: Request, res: Response) => {
        const userId = getUserId(req);
        const id = notificationId(req);

        const notification: Notification | null = await notifications[action](userId, id);
        if (!notification) {
          throw new NotFoundError('Notification', id);
        }
        res.json({ notification });
      })
    );
  }

  return router;
}
