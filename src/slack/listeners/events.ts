import type { App } from '@slack/bolt';
import * as groupService from '../../services/group-service.js';
import { logger } from '../../utils/logger.js';

export function registerEventListeners(app: App): void {
  // When the bot joins a channel, register it as a notification group
  app.event('member_joined_channel', async ({ event, client }) => {
    try {
      const botInfo = await client.auth.test();
      if (event.user !== botInfo.user_id) return;

      const channelInfo = await client.conversations.info({ channel: event.channel });
      const channelName = channelInfo.channel?.name || event.channel;

      await groupService.upsertGroup({ id: event.channel, name: channelName });
      logger.info({ channelId: event.channel, channelName }, 'Registered channel as group');
    } catch (err) {
      logger.error({ err }, 'Error handling member_joined_channel');
    }
  });

  app.event('channel_rename', async ({ event }) => {
    try {
      const existing = await groupService.getGroup(event.channel.id);
      if (!existing) return;
      await groupService.upsertGroup({ id: event.channel.id, name: event.channel.name });
      logger.info({ channelId: event.channel.id }, 'Group renamed');
    } catch (err) {
      logger.error({ err }, 'Error handling channel_rename');
    }
  });
}
