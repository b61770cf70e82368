import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { useTestDatabase } from '../../__testUtils__/database.js';
import { processOverdueScan, setDispatcher } from './overdue-checker.js';
import { createNotificationDispatcher, MessageSink, OutboundMessage } from '../../notifications/dispatcher.js';
import * as taskService from '../../services/task-service.js';
import * as settingsService from '../../services/settings-service.js';
import * as auditService from '../../services/audit-service.js';

const created = new Date('2025-01-01T09:00:00Z');
const dayOne = new Date('2025-01-05T08:00:00Z');
const dayOneLater = new Date('2025-01-05T20:00:00Z');
const dayTwo = new Date('2025-01-06T08:00:00Z');

describe('processOverdueScan', () => {
  let sent: OutboundMessage[];

  beforeEach(async () => {
    await useTestDatabase();
    sent = [];
    const sink: MessageSink = {
      postMessage: vi.fn(async (message: OutboundMessage) => {
        sent.push(message);
      }),
    };
    setDispatcher(
      createNotificationDispatcher({ sink, isEnabled: settingsService.isEnabled, directMessages: false, now: () => dayOne })
    );
  });

  afterEach(() => {
    setDispatcher(null);
  });

  it('reminds each overdue task at most once per day', async () => {
    const { tasks } = await taskService.createTaskGroup(
      { taskText: 'Write report', deadline: '2025-01-03', groupId: 'C-general', assignees: ['alice', 'bob'], assignedBy: 'admin' },
      created
    );
    await taskService.completeTask(tasks[1].id, created);

    expect(await processOverdueScan(dayOne)).toEqual([tasks[0].id]);
    expect(await processOverdueScan(dayOneLater)).toEqual([]);
    expect(sent).toHaveLength(1);
    expect(sent[0].text).toBe('Overdue: "Write report" assigned to <@alice> was due 2025-01-03');

    expect(await processOverdueScan(dayTwo)).toEqual([tasks[0].id]);
    expect(sent).toHaveLength(2);

    const audit = await auditService.getRecentAudit(1);
    expect(audit[0].action).toBe('overdue_reminders_sent');
  });

  it('retries a reminder that could not be delivered', async () => {
    const { tasks } = await taskService.createTaskGroup(
      { taskText: 'Write report', deadline: '2025-01-03', groupId: 'C-general', assignees: ['alice'], assignedBy: 'admin' },
      created
    );
    const failing: MessageSink = {
      postMessage: vi.fn(async () => {
        throw new Error('ratelimited');
      }),
    };
    setDispatcher(
      createNotificationDispatcher({ sink: failing, isEnabled: settingsService.isEnabled, directMessages: true, now: () => dayOne })
    );

    expect(await processOverdueScan(dayOne)).toEqual([]);
    expect(failing.postMessage).toHaveBeenCalledTimes(2);
    const [pending] = await taskService.getOverdueTasks(dayOne);
    expect(pending.last_overdue_reminder_on).toBeNull();
    expect(await auditService.getRecentAudit()).toEqual([]);

    const working: MessageSink = {
      postMessage: vi.fn(async (message: OutboundMessage) => {
        sent.push(message);
      }),
    };
    setDispatcher(
      createNotificationDispatcher({ sink: working, isEnabled: settingsService.isEnabled, directMessages: false, now: () => dayOne })
    );

    expect(await processOverdueScan(dayOneLater)).toEqual([tasks[0].id]);
    expect(sent).toHaveLength(1);
    const [reminded] = await taskService.getOverdueTasks(dayOneLater);
    expect(reminded.last_overdue_reminder_on).toBe('2025-01-05');
  });

  it('ignores tasks that are not yet past their deadline', async () => {
    await taskService.createTaskGroup(
      { taskText: 'Plan sprint', deadline: '2025-01-05', groupId: 'C-dev', assignees: ['carol'], assignedBy: 'admin' },
      created
    );
    expect(await processOverdueScan(dayOne)).toEqual([]);
    expect(sent).toEqual([]);
  });

  it('does nothing while overdue reminders are switched off', async () => {
    await taskService.createTaskGroup(
      { taskText: 'Write report', deadline: '2025-01-03', groupId: 'C-general', assignees: ['alice'], assignedBy: 'admin' },
      created
    );
    await settingsService.setSetting('overdue_reminder', false);

    expect(await processOverdueScan(dayOne)).toEqual([]);
    const [task] = await taskService.getOverdueTasks(dayOne);
    expect(task.last_overdue_reminder_on).toBeNull();
  });
});
