import { LIST_FILTERS, TASKS_PER_PAGE } from '../config/constants.js';
import { isNotificationEvent } from '../services/settings-service.js';
import { normalizeHandle } from '../services/access-store.js';
import type { NotificationEventName, TaskFilter, TaskStatus } from '../types/task.js';

export type ListFilter = (typeof LIST_FILTERS)[number];

export type Command =
  | { kind: 'help' }
  | { kind: 'my_tasks'; status: TaskStatus }
  | { kind: 'done'; taskId: number }
  | { kind: 'new'; assignees: string[]; groupId: string; deadline: string; text: string }
  | { kind: 'all'; filter: ListFilter; page: number }
  | { kind: 'overdue' }
  | { kind: 'by_user' }
  | { kind: 'by_group' }
  | { kind: 'delete'; groupTaskId: number }
  | { kind: 'settings' }
  | { kind: 'notify'; event: NotificationEventName; enabled: boolean }
  | { kind: 'unknown'; text: string };

export const ADMIN_COMMANDS: ReadonlySet<Command['kind']> = new Set<Command['kind']>([
  'new',
  'all',
  'overdue',
  'by_user',
  'by_group',
  'delete',
  'settings',
  'notify',
]);

const NEW_TASK_PATTERN = /^new\s+(.+?)\s+in\s+(\S+)\s+by\s+(.+?):\s*(.+)$/is;

function isListFilter(value: string): value is ListFilter {
  return LIST_FILTERS.some((filter) => filter === value);
}

/** `<#C123|general>`, `<#C123>` or a bare id. */
export function parseChannelRef(raw: string): string {
  const match = raw.match(/^<#([A-Z0-9]+)(?:\|[^>]*)?>$/i);
  return match ? match[1] : raw.replace(/^#/, '');
}

function positiveInt(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) return null;
  const value = parseInt(raw, 10);
  return value > 0 ? value : null;
}

export function parseCommand(input: string): Command {
  const text = input.trim();
  const [head = '', ...rest] = text.split(/\s+/);
  const verb = head.toLowerCase();

  switch (verb) {
    case '':
    case 'help':
    case 'menu':
      return { kind: 'help' };
    case 'tasks':
    case 'mytasks':
      return { kind: 'my_tasks', status: rest[0]?.toLowerCase() === 'done' ? 'completed' : 'open' };
    case 'done': {
      const taskId = positiveInt(rest[0]?.replace(/^#/, ''));
      return taskId ? { kind: 'done', taskId } : { kind: 'unknown', text };
    }
    case 'new': {
      const match = text.match(NEW_TASK_PATTERN);
      if (!match) return { kind: 'unknown', text };
      const assignees = match[1].split(/[\s,]+/).map(normalizeHandle).filter(Boolean);
      return {
        kind: 'new',
        assignees,
        groupId: parseChannelRef(match[2]),
        deadline: match[3].trim(),
        text: match[4].trim(),
      };
    }
    case 'all': {
      let filter: ListFilter = 'all';
      let page = 1;
      for (const arg of rest) {
        const lower = arg.toLowerCase();
        const asPage = positiveInt(lower);
        if (asPage) page = asPage;
        else if (isListFilter(lower)) filter = lower;
      }
      return { kind: 'all', filter, page };
    }
    case 'overdue':
      return { kind: 'overdue' };
    case 'by-user':
    case 'byuser':
      return { kind: 'by_user' };
    case 'by-group':
    case 'bygroup':
      return { kind: 'by_group' };
    case 'delete': {
      const groupTaskId = positiveInt(rest[0]?.replace(/^#/, ''));
      return groupTaskId ? { kind: 'delete', groupTaskId } : { kind: 'unknown', text };
    }
    case 'settings':
      return { kind: 'settings' };
    case 'notify': {
      const event = rest[0]?.toLowerCase() ?? '';
      const state = rest[1]?.toLowerCase();
      if (!isNotificationEvent(event) || (state !== 'on' && state !== 'off')) {
        return { kind: 'unknown', text };
      }
      return { kind: 'notify', event, enabled: state === 'on' };
    }
    default:
      return { kind: 'unknown', text };
  }
}

export function filterToQuery(filter: ListFilter): TaskFilter {
  switch (filter) {
    case 'all':
      return {};
    case 'open':
      return { status: 'open' };
    case 'completed':
      return { status: 'completed' };
    case 'overdue':
      return { overdue: true };
    default:
      return { due: filter };
  }
}

/** 1-based page slicing; out-of-range pages clamp to the last one. */
export function paginate<T>(items: T[], page: number, perPage: number = TASKS_PER_PAGE) {
  const pages = Math.max(1, Math.ceil(items.length / perPage));
  const current = Math.min(Math.max(1, page), pages);
  const start = (current - 1) * perPage;
  return {
    items: items.slice(start, start + perPage),
    page: current,
    pages,
    hasPrev: current > 1,
    hasNext: current < pages,
  };
}
