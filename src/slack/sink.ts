import type { App } from '@slack/bolt';
import { config } from '../config/index.js';
import type { MessageSink } from '../notifications/dispatcher.js';

/** Delivers notifications through chat.postMessage; a user id as channel opens a DM. */
export function createSlackSink(app: App): MessageSink {
  return {
    async postMessage({ channel, text, blocks }) {
      await app.client.chat.postMessage({
        token: config.SLACK_BOT_TOKEN,
        channel,
        text,
        blocks,
      });
    },
  };
}
