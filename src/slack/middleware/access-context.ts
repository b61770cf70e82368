import type { Middleware, SlackEventMiddlewareArgs } from '@slack/bolt';
import * as userService from '../../services/user-service.js';
import type { AccessChecker } from '../../services/access-store.js';
import { logger } from '../../utils/logger.js';

/**
 * Registers the sender on first contact. Bot messages, edits and people
 * outside the allow-list stop here.
 */
export function accessContext(access: AccessChecker): Middleware<SlackEventMiddlewareArgs<'message'>> {
  return async ({ message, next }) => {
    if (message.subtype !== undefined) return;

    if (!access.isEmployee(message.user)) {
      logger.debug({ user: message.user }, 'Ignoring message from user outside the allow-list');
      return;
    }

    await userService.ensureUser(message.user);
    logger.debug({ user: message.user, isAdmin: access.isAdmin(message.user) }, 'Message sender resolved');

    await next();
  };
}
