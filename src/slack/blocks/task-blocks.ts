import type { KnownBlock, SectionBlock } from '@slack/types';
import { MAX_BLOCK_TASKS } from '../../config/constants.js';
import type { TaskView } from '../../types/task.js';
import { formatDateTime, formatDeadline, timeUntilDeadline } from '../../utils/date-helpers.js';

export const COMPLETE_ACTION_ID = 'task_complete';

function statusEmoji(task: TaskView): string {
  if (task.status === 'completed') return ':white_check_mark:';
  return task.overdue ? ':red_circle:' : ':large_yellow_circle:';
}

export function buildTaskLine(task: TaskView, now: Date = new Date()): string {
  const due = task.status === 'completed' && task.completed_at
    ? `done ${formatDateTime(task.completed_at)}`
    : `${formatDeadline(task.deadline)} (${timeUntilDeadline(task.deadline, now)})`;
  return `${statusEmoji(task)} *#${task.id}* ${task.task_text}\n<@${task.assigned_to}> | ${due} | group #${task.group_task_id}`;
}

/** One section per task; open tasks get a Complete button when `withActions` is set. */
export function buildTaskListBlocks(
  header: string,
  tasks: TaskView[],
  options: { withActions?: boolean; footer?: string; now?: Date } = {}
): KnownBlock[] {
  const blocks: KnownBlock[] = [
    {
      type: 'header',
      text: { type: 'plain_text', text: header, emoji: true },
    },
    { type: 'divider' },
  ];

  if (tasks.length === 0) {
    blocks.push({ type: 'section', text: { type: 'mrkdwn', text: '_No tasks here._' } });
  }

  for (const task of tasks.slice(0, MAX_BLOCK_TASKS)) {
    const block: SectionBlock = {
      type: 'section',
      text: { type: 'mrkdwn', text: buildTaskLine(task, options.now) },
    };
    if (options.withActions && task.status === 'open') {
      block.accessory = {
        type: 'button',
        action_id: COMPLETE_ACTION_ID,
        value: String(task.id),
        style: 'primary',
        text: { type: 'plain_text', text: 'Complete' },
      };
    }
    blocks.push(block);
  }

  if (tasks.length > MAX_BLOCK_TASKS) {
    blocks.push({
      type: 'context',
      elements: [{ type: 'mrkdwn', text: `_...and ${tasks.length - MAX_BLOCK_TASKS} more tasks_` }],
    });
  }

  if (options.footer) {
    blocks.push({ type: 'context', elements: [{ type: 'mrkdwn', text: options.footer }] });
  }

  return blocks;
}
