import type { App } from '@slack/bolt';
import * as workflow from '../../services/task-workflow.js';
import * as settingsService from '../../services/settings-service.js';
import * as taskService from '../../services/task-service.js';
import type { AccessChecker } from '../../services/access-store.js';
import { COMPLETE_ACTION_ID } from '../blocks/task-blocks.js';
import { SETTINGS_TOGGLE_ACTION_ID, buildSettingsBlocks } from '../blocks/menu-blocks.js';
import { handleError } from '../../utils/error-handler.js';
import { logger } from '../../utils/logger.js';

export function registerActionListeners(app: App, access: AccessChecker): void {
  // Complete button on task cards
  app.action({ action_id: COMPLETE_ACTION_ID, type: 'block_actions' }, async ({ ack, action, body, respond }) => {
    await ack();
    if (action.type !== 'button' || !action.value) return;

    const taskId = Number(action.value);
    try {
      const { changed } = await workflow.completeTask(taskId, body.user.id, access);
      await respond({
        text: changed ? `:white_check_mark: Task #${taskId} marked as completed` : `Task #${taskId} was already completed`,
        replace_original: false,
      });
      logger.info({ taskId, user: body.user.id, changed }, 'Task completed from button');
    } catch (err) {
      await respond({ text: handleError(err, 'task-complete-action'), replace_original: false });
    }
  });

  // Notification toggles on the settings card
  app.action({ action_id: new RegExp(`^${SETTINGS_TOGGLE_ACTION_ID}:`), type: 'block_actions' }, async ({ ack, action, body, respond }) => {
    await ack();
    if (action.type !== 'button' || !action.value) return;

    if (!access.isAdmin(body.user.id)) {
      await respond({ text: 'Only admins can do that.', replace_original: false });
      return;
    }

    const event = action.value;
    if (!settingsService.isNotificationEvent(event)) {
      logger.warn({ event }, 'Unknown notification toggle');
      return;
    }

    try {
      const enabled = await settingsService.toggleSetting(event);
      const [settings, stats] = await Promise.all([settingsService.getSettings(), taskService.getStats()]);
      await respond({ text: 'Notification settings', blocks: buildSettingsBlocks(settings, stats), replace_original: true });
      logger.info({ event, enabled, user: body.user.id }, 'Notification toggle changed');
    } catch (err) {
      await respond({ text: handleError(err, 'settings-toggle-action'), replace_original: false });
    }
  });
}
