import type { KnownBlock } from '@slack/types';
import type { TaskGroup, TaskView } from '../../types/task.js';
import { formatDeadline, timeUntilDeadline } from '../../utils/date-helpers.js';

export interface ComposedMessage {
  text: string;
  blocks: KnownBlock[];
}

function mention(handle: string): string {
  return `<@${handle}>`;
}

function section(text: string): KnownBlock {
  return { type: 'section', text: { type: 'mrkdwn', text } };
}

function context(text: string): KnownBlock {
  return { type: 'context', elements: [{ type: 'mrkdwn', text }] };
}

export function buildCreatedGroupMessage(taskGroup: TaskGroup, tasks: TaskView[]): ComposedMessage {
  const assignees = tasks.map((t) => mention(t.assigned_to)).join(', ');
  const text = `New task: "${taskGroup.task_text}" for ${assignees}, due ${taskGroup.deadline}`;
  return {
    text,
    blocks: [
      section(`:memo: *New task*\n${taskGroup.task_text}`),
      {
        type: 'section',
        fields: [
          { type: 'mrkdwn', text: `*Assigned to:*\n${assignees}` },
          { type: 'mrkdwn', text: `*Deadline:*\n${formatDeadline(taskGroup.deadline)}` },
        ],
      },
      context(`Task group #${taskGroup.id}`),
    ],
  };
}

export function buildCreatedDirectMessage(task: TaskView): ComposedMessage {
  return {
    text: `You have a new task #${task.id}: "${task.task_text}", due ${task.deadline}`,
    blocks: [
      section(`:inbox_tray: *You have a new task* from ${mention(task.assigned_by)}\n${task.task_text}`),
      context(`Task #${task.id} | Due ${formatDeadline(task.deadline)} | Reply \`done ${task.id}\` when finished`),
    ],
  };
}

export function buildCompletedMessage(task: TaskView): ComposedMessage {
  return {
    text: `${mention(task.assigned_to)} completed task #${task.id}: "${task.task_text}"`,
    blocks: [
      section(`:white_check_mark: ${mention(task.assigned_to)} completed *${task.task_text}*`),
      context(`Task #${task.id} | Group #${task.group_task_id}`),
    ],
  };
}

export function buildDeletedMessage(taskGroup: TaskGroup, tasks: TaskView[]): ComposedMessage {
  const assignees = tasks.map((t) => mention(t.assigned_to)).join(', ') || 'nobody';
  return {
    text: `Task "${taskGroup.task_text}" was deleted`,
    blocks: [
      section(`:wastebasket: Task *${taskGroup.task_text}* was deleted`),
      context(`Was assigned to ${assignees} | Group #${taskGroup.id}`),
    ],
  };
}

export function buildOverdueMessage(task: TaskView, now: Date = new Date()): ComposedMessage {
  return {
    text: `Overdue: "${task.task_text}" assigned to ${mention(task.assigned_to)} was due ${task.deadline}`,
    blocks: [
      { type: 'header', text: { type: 'plain_text', text: ':rotating_light: Overdue Task', emoji: true } },
      section(`${mention(task.assigned_to)} | *${task.task_text}*`),
      {
        type: 'section',
        fields: [
          { type: 'mrkdwn', text: `*Deadline:*\n${formatDeadline(task.deadline)}` },
          { type: 'mrkdwn', text: `*Status:*\n${timeUntilDeadline(task.deadline, now)}` },
        ],
      },
      context(`Task #${task.id}`),
    ],
  };
}
