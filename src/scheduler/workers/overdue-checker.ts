import * as taskService from '../../services/task-service.js';
import * as settingsService from '../../services/settings-service.js';
import * as auditService from '../../services/audit-service.js';
import type { NotificationDispatcher } from '../../notifications/dispatcher.js';
import { todayInTimezone } from '../../utils/date-helpers.js';
import { logger } from '../../utils/logger.js';

let dispatcher: NotificationDispatcher | null = null;

export function setDispatcher(next: NotificationDispatcher | null): void {
  dispatcher = next;
}

/**
 * One scan cycle: every open task past its deadline gets at most one reminder
 * per calendar day. Returns the ids of tasks reminded in this cycle.
 */
export async function processOverdueScan(now: Date = new Date()): Promise<number[]> {
  if (!(await settingsService.isEnabled('overdue_reminder'))) {
    logger.debug('Overdue reminders disabled, skipping scan');
    return [];
  }

  if (!dispatcher) {
    logger.error('Notification dispatcher not initialized for overdue checker');
    return [];
  }

  const overdueTasks = await taskService.getOverdueTasks(now);
  if (overdueTasks.length === 0) {
    logger.debug('No overdue tasks found');
    return [];
  }

  const today = todayInTimezone(now);
  const reminded: number[] = [];

  for (const task of overdueTasks) {
    // The claim is a conditional update, so a task completed mid-scan is skipped
    const claimed = await taskService.claimOverdueReminder(task.id, today);
    if (!claimed) continue;

    let delivered: string[] = [];
    try {
      delivered = await dispatcher.dispatch({ type: 'overdue', task });
    } catch (err) {
      logger.error({ err, taskId: task.id }, 'Overdue reminder dispatch failed');
    }

    if (delivered.length === 0) {
      await taskService.releaseOverdueReminder(task.id, today, task.last_overdue_reminder_on);
      logger.warn({ taskId: task.id }, 'Overdue reminder not delivered, will retry next scan');
      continue;
    }
    reminded.push(task.id);
  }

  if (reminded.length > 0) {
    await auditService.logAudit({ action: 'overdue_reminders_sent', details: { taskIds: reminded, day: today } });
  }

  logger.info({ overdue: overdueTasks.length, reminded: reminded.length }, 'Overdue scan finished');
  return reminded;
}
