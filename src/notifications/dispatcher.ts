import type { KnownBlock } from '@slack/types';
import { NOTIFICATION_EVENTS } from '../config/constants.js';
import type { NotificationEventName, TaskGroup, TaskView } from '../types/task.js';
import {
  ComposedMessage,
  buildCompletedMessage,
  buildCreatedDirectMessage,
  buildCreatedGroupMessage,
  buildDeletedMessage,
  buildOverdueMessage,
} from '../slack/blocks/notification-blocks.js';
import { logger } from '../utils/logger.js';

export type TaskEvent =
  | { type: 'task_created'; taskGroup: TaskGroup; tasks: TaskView[] }
  | { type: 'task_completed'; task: TaskView }
  | { type: 'task_deleted'; taskGroup: TaskGroup; tasks: TaskView[] }
  | { type: 'overdue'; task: TaskView };

export interface OutboundMessage {
  channel: string;
  text: string;
  blocks: KnownBlock[];
}

export interface MessageSink {
  postMessage(message: OutboundMessage): Promise<void>;
}

export interface DispatcherOptions {
  sink: MessageSink;
  /** Reads the toggle for an event; consulted on every dispatch. */
  isEnabled: (event: NotificationEventName) => Promise<boolean>;
  /** Also message affected people directly, not only the owning group. */
  directMessages: boolean;
  now?: () => Date;
}

const SETTING_FOR_EVENT: Record<TaskEvent['type'], NotificationEventName> = {
  task_created: NOTIFICATION_EVENTS.TASK_CREATED,
  task_completed: NOTIFICATION_EVENTS.TASK_COMPLETED,
  task_deleted: NOTIFICATION_EVENTS.TASK_DELETED,
  overdue: NOTIFICATION_EVENTS.OVERDUE_REMINDER,
};

function addressed(channel: string, message: ComposedMessage): OutboundMessage {
  return { channel, ...message };
}

/** Group message first, then direct messages; later duplicates of a destination are dropped. */
export function resolveMessages(event: TaskEvent, directMessages: boolean, now: Date = new Date()): OutboundMessage[] {
  const messages: OutboundMessage[] = [];

  switch (event.type) {
    case 'task_created':
      messages.push(addressed(event.taskGroup.group_id, buildCreatedGroupMessage(event.taskGroup, event.tasks)));
      if (directMessages) {
        for (const task of event.tasks) {
          messages.push(addressed(task.assigned_to, buildCreatedDirectMessage(task)));
        }
      }
      break;
    case 'task_completed': {
      const message = buildCompletedMessage(event.task);
      messages.push(addressed(event.task.group_id, message));
      if (directMessages && event.task.assigned_by !== event.task.assigned_to) {
        messages.push(addressed(event.task.assigned_by, message));
      }
      break;
    }
    case 'task_deleted': {
      const message = buildDeletedMessage(event.taskGroup, event.tasks);
      messages.push(addressed(event.taskGroup.group_id, message));
      if (directMessages) {
        for (const task of event.tasks) {
          messages.push(addressed(task.assigned_to, message));
        }
      }
      break;
    }
    case 'overdue': {
      const message = buildOverdueMessage(event.task, now);
      messages.push(addressed(event.task.group_id, message));
      if (directMessages) {
        messages.push(addressed(event.task.assigned_to, message));
      }
      break;
    }
  }

  const seen = new Set<string>();
  return messages.filter((message) => {
    if (!message.channel || seen.has(message.channel)) return false;
    seen.add(message.channel);
    return true;
  });
}

export interface NotificationDispatcher {
  /** Sends the event's messages when its toggle is on; returns the channels delivered to. */
  dispatch(event: TaskEvent): Promise<string[]>;
}

export function createNotificationDispatcher(options: DispatcherOptions): NotificationDispatcher {
  const clock = options.now ?? (() => new Date());

  return {
    async dispatch(event) {
      const setting = SETTING_FOR_EVENT[event.type];
      if (!(await options.isEnabled(setting))) {
        logger.debug({ event: event.type }, 'Notification disabled, skipping');
        return [];
      }

      const delivered: string[] = [];
      for (const message of resolveMessages(event, options.directMessages, clock())) {
        try {
          await options.sink.postMessage(message);
          delivered.push(message.channel);
        } catch (err) {
          logger.error({ err, event: event.type, channel: message.channel }, 'Failed to deliver notification');
        }
      }

      logger.info({ event: event.type, delivered: delivered.length }, 'Notification dispatched');
      return delivered;
    },
  };
}
