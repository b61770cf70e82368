import { describe, expect, it } from 'vitest';
import { filterToQuery, paginate, parseChannelRef, parseCommand } from './commands.js';

describe('parseCommand', () => {
  it('maps greetings and unknown words', () => {
    expect(parseCommand('')).toEqual({ kind: 'help' });
    expect(parseCommand('Menu')).toEqual({ kind: 'help' });
    expect(parseCommand('dance')).toEqual({ kind: 'unknown', text: 'dance' });
  });

  it('reads personal task commands', () => {
    expect(parseCommand('tasks')).toEqual({ kind: 'my_tasks', status: 'open' });
    expect(parseCommand('mytasks done')).toEqual({ kind: 'my_tasks', status: 'completed' });
    expect(parseCommand('done #12')).toEqual({ kind: 'done', taskId: 12 });
    expect(parseCommand('done twelve')).toEqual({ kind: 'unknown', text: 'done twelve' });
  });

  it('reads a task creation line', () => {
    expect(parseCommand('new <@U0000000001> <@U0000000002|bob> in <#C0000000001|general> by 2025-01-10: Write report')).toEqual({
      kind: 'new',
      assignees: ['U0000000001', 'U0000000002'],
      groupId: 'C0000000001',
      deadline: '2025-01-10',
      text: 'Write report',
    });
    expect(parseCommand('new @alice in #general')).toEqual({ kind: 'unknown', text: 'new @alice in #general' });
  });

  it('reads list filters and pages in any order', () => {
    expect(parseCommand('all')).toEqual({ kind: 'all', filter: 'all', page: 1 });
    expect(parseCommand('all 2 overdue')).toEqual({ kind: 'all', filter: 'overdue', page: 2 });
  });

  it('reads admin maintenance commands', () => {
    expect(parseCommand('by-user')).toEqual({ kind: 'by_user' });
    expect(parseCommand('ByGroup')).toEqual({ kind: 'by_group' });
    expect(parseCommand('delete 4')).toEqual({ kind: 'delete', groupTaskId: 4 });
    expect(parseCommand('notify task_deleted off')).toEqual({ kind: 'notify', event: 'task_deleted', enabled: false });
    expect(parseCommand('notify everything on')).toEqual({ kind: 'unknown', text: 'notify everything on' });
  });
});

describe('parseChannelRef', () => {
  it('accepts links, names and ids', () => {
    expect(parseChannelRef('<#C0000000001|general>')).toBe('C0000000001');
    expect(parseChannelRef('<#C0000000001>')).toBe('C0000000001');
    expect(parseChannelRef('#general')).toBe('general');
  });
});

describe('filterToQuery', () => {
  it('translates list filters into task filters', () => {
    expect(filterToQuery('all')).toEqual({});
    expect(filterToQuery('completed')).toEqual({ status: 'completed' });
    expect(filterToQuery('overdue')).toEqual({ overdue: true });
    expect(filterToQuery('week')).toEqual({ due: 'week' });
  });
});

describe('paginate', () => {
  const items = Array.from({ length: 12 }, (_, i) => i + 1);

  it('slices the requested page', () => {
    expect(paginate(items, 2)).toEqual({ items: [6, 7, 8, 9, 10], page: 2, pages: 3, hasPrev: true, hasNext: true });
  });

  it('clamps out-of-range pages', () => {
    expect(paginate(items, 9)).toEqual({ items: [11, 12], page: 3, pages: 3, hasPrev: true, hasNext: false });
    expect(paginate([], 1)).toEqual({ items: [], page: 1, pages: 1, hasPrev: false, hasNext: false });
  });
});
