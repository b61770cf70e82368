import type { App } from '@slack/bolt';
import { accessContext } from '../middleware/access-context.js';
import { parseCommand } from '../commands.js';
import { executeCommand } from '../command-handler.js';
import type { AccessChecker } from '../../services/access-store.js';
import { handleError } from '../../utils/error-handler.js';
import { logger } from '../../utils/logger.js';

export function registerMessageListeners(app: App, access: AccessChecker): void {
  // Direct messages only; channel chatter is not a command
  app.message(accessContext(access), async ({ message, say }) => {
    if (message.subtype !== undefined || message.channel_type !== 'im' || !message.text) return;

    const command = parseCommand(message.text);
    logger.info({ user: message.user, command: command.kind }, 'Processing command');

    try {
      const reply = await executeCommand(command, { userId: message.user, access });
      await say({ text: reply.text, blocks: reply.blocks });
    } catch (err) {
      await say({ text: handleError(err, `command:${command.kind}`) });
    }
  });
}
