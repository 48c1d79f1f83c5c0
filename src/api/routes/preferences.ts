// ═══════════════════════════════════════════════════════════════════════════════
// PREFERENCE ROUTES — Channel, Type and Digest Settings
// ═══════════════════════════════════════════════════════════════════════════════
//
// Endpoints:
//   GET    /notification-preferences                          Current preferences
//   PATCH  /notification-preferences                          Partial update
//   POST   /notification-preferences/channels/:channel/enable
//   POST   /notification-preferences/channels/:channel/disable
//   GET    /notification-preferences/types                    Configurable types
//   POST   /notification-preferences/unsubscribe              Token-based, no session
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import { getLogger } from '../../logging/index.js';
import type { PreferenceService } from '../../notifications/preferences.js';
import type { TemplateCatalog } from '../../notifications/templates/catalog.js';
import { NOTIFICATION_TYPES, type DeliveryChannel } from '../../notifications/types.js';
import { confirmUnsubscribe, type UnsubscribeError, type UnsubscribeTokens } from '../../notifications/unsubscribe.js';
import type { UserRepository } from '../../users/store.js';
import type { NotificationUser } from '../../users/types.js';
import { ApiError, asyncHandler, NotFoundError, ValidationError } from '../middleware/error-handler.js';
import { getUserId, requireUser, type Authenticate } from '../middleware/request-context.js';
import { ChannelParamSchema, PreferenceUpdateSchema, UnsubscribeRequestSchema } from '../schemas/index.js';

const logger = getLogger({ component: 'preference-routes' });

export interface PreferencesRouterDeps {
  preferences: PreferenceService;
  users: UserRepository;
  unsubscribeTokens: UnsubscribeTokens;
  catalog: TemplateCatalog;
  authenticate: Authenticate;
}

const UNSUBSCRIBE_ERRORS: Record<UnsubscribeError, string> = {
  malformed: 'Invalid unsubscribe token',
  invalid_signature: 'Invalid unsubscribe token',
  expired: 'Unsubscribe link has expired',
  user_not_found: 'Invalid unsubscribe token',
  email_changed: 'Unsubscribe link is no longer valid for this account',
};

export function createPreferencesRouter(deps: PreferencesRouterDeps): Router {
  const router = Router();
  const { preferences, users } = deps;
  const authenticated = requireUser(deps.authenticate);

  async function currentUser(req: Request): Promise<NotificationUser> {
    const userId = getUserId(req);
    const user = await users.getUser(userId);
    if (!user) {
      throw new NotFoundError('User', userId);
    }
    return user;
  }

  function channelParam(req: Request): DeliveryChannel {
    const parsed = ChannelParamSchema.safeParse(req.params);
    if (!parsed.success) {
      throw new ValidationError(`Unknown channel: ${String(req.params['channel'])}`);
    }
    return parsed.data.channel;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // UNSUBSCRIBE
  // POST /notification-preferences/unsubscribe
  // ═══════════════════════════════════════════════════════════════════════════════

  router.post(
    '/unsubscribe',
    asyncHandler(async (req: Request, res: Response) => {
      const parseResult = UnsubscribeRequestSchema.safeParse(req.body);
      if (!parseResult.success) {
        throw new ValidationError(
          parseResult.error.issues.map(i => i.message).join(', '),
          { fields: parseResult.error.flatten().fieldErrors }
        );
      }

      const result = await confirmUnsubscribe(
        { tokens: deps.unsubscribeTokens, users, preferences },
        parseResult.data.token,
        parseResult.data.preferences
      );
      if (!result.ok) {
        throw new ApiError(UNSUBSCRIBE_ERRORS[result.error], 400, 'INVALID_TOKEN', { reason: result.error });
      }

      res.json({ message: 'Your notification preferences have been updated.' });
    })
  );

  // ═══════════════════════════════════════════════════════════════════════════════
  // PREFERENCES
  // ═══════════════════════════════════════════════════════════════════════════════

  router.get(
    '/',
    authenticated,
    asyncHandler(async (req: Request, res: Response) => {
      const user = await currentUser(req);
      res.json({ preferences: await preferences.getPreferences(user) });
    })
  );

  router.patch(
    '/',
    authenticated,
    asyncHandler(async (req: Request, res: Response) => {
      const user = await currentUser(req);

      const parseResult = PreferenceUpdateSchema.safeParse(req.body);
      if (!parseResult.success) {
        throw new ValidationError(
          parseResult.error.issues.map(i => i.message).join(', '),
          { fields: parseResult.error.flatten().fieldErrors }
        );
      }

      const updated = await preferences.updatePreferences(user, parseResult.data);
      logger.debug('Preferences updated via API', { userId: user.id, requestId: req.requestId });
      res.json({ preferences: updated, updated: true });
    })
  );

  router.post(
    '/channels/:channel/enable',
    authenticated,
    asyncHandler(async (req: Request, res: Response) => {
      const user = await currentUser(req);
      res.json({ preferences: await preferences.enableChannel(user, channelParam(req)) });
    })
  );

  router.post(
    '/channels/:channel/disable',
    authenticated,
    asyncHandler(async (req: Request, res: Response) => {
      const user = await currentUser(req);
      res.json({ preferences: await preferences.disableChannel(user, channelParam(req)) });
    })
  );

  router.get(
    '/types',
    authenticated,
    (_req: Request, res: Response) => {
      res.json({
        types: NOTIFICATION_TYPES.map(type => ({ type, label: deps.catalog.label(type) })),
      });
    }
  );

  return router;
}
