import type { KnownBlock } from '@slack/types';
import type { AssigneeStats, GroupStats } from '../../types/task.js';

function header(text: string): KnownBlock {
  return { type: 'header', text: { type: 'plain_text', text, emoji: true } };
}

function section(text: string): KnownBlock {
  return { type: 'section', text: { type: 'mrkdwn', text } };
}

export function buildAssigneeStatsText(person: AssigneeStats): string {
  const name = person.display_name ? `*${person.display_name}* (<@${person.handle}>)` : `<@${person.handle}>`;
  const lines = [name, `Open: ${person.open} | Completed: ${person.completed} | Overdue: ${person.overdue}`];
  for (const task of person.open_tasks) {
    lines.push(`• #${task.id} ${task.task_text} (${task.deadline})${task.overdue ? ' :red_circle:' : ''}`);
  }
  return lines.join('\n');
}

export function buildAssigneeStatsBlocks(people: AssigneeStats[]): KnownBlock[] {
  if (people.length === 0) return [header(':busts_in_silhouette: Tasks by person'), section('_No users yet._')];
  return [header(':busts_in_silhouette: Tasks by person'), ...people.map((person) => section(buildAssigneeStatsText(person)))];
}

export function buildGroupStatsText(groups: GroupStats[]): string {
  if (groups.length === 0) return '_No tasks yet._';
  return groups
    .map((group) => {
      const label = group.name ? `#${group.name}` : group.group_id;
      return `${label}: :large_yellow_circle: ${group.open} / :white_check_mark: ${group.completed} / :red_circle: ${group.overdue}`;
    })
    .join('\n');
}

export function buildGroupStatsBlocks(groups: GroupStats[]): KnownBlock[] {
  return [header(':bar_chart: Tasks by group'), section(buildGroupStatsText(groups))];
}
