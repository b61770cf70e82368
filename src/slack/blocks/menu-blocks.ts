import type { KnownBlock } from '@slack/types';
import type { NotificationEventName, NotificationSettings, TaskStats } from '../../types/task.js';

export const SETTINGS_TOGGLE_ACTION_ID = 'settings_toggle';

const EVENT_LABELS: Record<NotificationEventName, string> = {
  task_created: 'Task created',
  task_completed: 'Task completed',
  task_deleted: 'Task deleted',
  overdue_reminder: 'Overdue reminders',
};

export function buildHelpText(isAdmin: boolean): string {
  const lines = [
    '*Commands*',
    '`tasks` your open tasks, `tasks done` your completed ones',
    '`done <id>` mark a task completed',
  ];
  if (isAdmin) {
    lines.push(
      '',
      '*Admin*',
      '`new @a @b in #channel by 2025-01-10: text` create a task',
      '`all [open|completed|overdue|today|tomorrow|week|month] [page]` browse tasks',
      '`overdue` list overdue tasks',
      '`by-user` / `by-group` task counts per person or per group',
      '`delete <group id>` delete a task group',
      '`settings` notification toggles, `notify <event> on|off`'
    );
  }
  return lines.join('\n');
}

export function buildSettingsBlocks(settings: NotificationSettings, stats?: TaskStats): KnownBlock[] {
  const events = Object.keys(EVENT_LABELS).filter((key): key is NotificationEventName => key in settings);

  const blocks: KnownBlock[] = [
    {
      type: 'header',
      text: { type: 'plain_text', text: ':gear: Notification Settings', emoji: true },
    },
  ];

  for (const event of events) {
    const enabled = settings[event];
    blocks.push({
      type: 'section',
      text: { type: 'mrkdwn', text: `${enabled ? ':bell:' : ':no_bell:'} *${EVENT_LABELS[event]}* is ${enabled ? 'on' : 'off'}` },
      accessory: {
        type: 'button',
        action_id: `${SETTINGS_TOGGLE_ACTION_ID}:${event}`,
        value: event,
        text: { type: 'plain_text', text: enabled ? 'Turn off' : 'Turn on' },
      },
    });
  }

  if (stats) {
    blocks.push(
      { type: 'divider' },
      {
        type: 'context',
        elements: [{
          type: 'mrkdwn',
          text: `${stats.open_tasks} open | ${stats.completed_tasks} completed | ${stats.overdue_tasks} overdue | ${stats.users_count} users | ${stats.groups_count} groups`,
        }],
      }
    );
  }

  return blocks;
}
