import * as taskService from './task-service.js';
import * as auditService from './audit-service.js';
import type { AccessChecker } from './access-store.js';
import type { NotificationDispatcher, TaskEvent } from '../notifications/dispatcher.js';
import type { TaskGroup, TaskView } from '../types/task.js';
import { AuthorizationError, NotFoundError } from '../utils/error-handler.js';
import { logger } from '../utils/logger.js';

// Lifecycle operations shared by the HTTP API and the Slack listeners:
// each runs the task service call, records an audit entry and notifies.

let dispatcher: NotificationDispatcher | null = null;

export function setDispatcher(next: NotificationDispatcher | null): void {
  dispatcher = next;
}

async function notify(event: TaskEvent): Promise<string[]> {
  if (!dispatcher) {
    logger.warn({ event: event.type }, 'Notification dispatcher not initialized, skipping');
    return [];
  }
  try {
    return await dispatcher.dispatch(event);
  } catch (err) {
    logger.error({ err, event: event.type }, 'Notification dispatch failed');
    return [];
  }
}

export async function createTaskGroup(
  input: { taskText: string; deadline: string; groupId: string; assignees: string[] },
  actor: string,
  now: Date = new Date()
): Promise<{ taskGroup: TaskGroup; tasks: TaskView[] }> {
  const created = await taskService.createTaskGroup({ ...input, assignedBy: actor }, now);

  await auditService.logAudit({
    action: 'task_group_created',
    actor,
    details: { groupTaskId: created.taskGroup.id, assignees: created.tasks.map((t) => t.assigned_to) },
  });
  logger.info({ groupTaskId: created.taskGroup.id, count: created.tasks.length }, 'Task group created');

  await notify({ type: 'task_created', ...created });
  return created;
}

export async function addAssignees(
  groupTaskId: number,
  assignees: string[],
  actor: string,
  now: Date = new Date()
): Promise<TaskView[]> {
  const tasks = await taskService.addAssignees(groupTaskId, assignees, actor, now);
  if (tasks.length === 0) return tasks;

  const taskGroup = await taskService.getTaskGroupById(groupTaskId);
  if (!taskGroup) throw new NotFoundError('Task group', groupTaskId);

  await auditService.logAudit({
    action: 'assignees_added',
    actor,
    details: { groupTaskId, assignees: tasks.map((t) => t.assigned_to) },
  });

  await notify({ type: 'task_created', taskGroup, tasks });
  return tasks;
}

export async function updateTaskGroup(
  groupTaskId: number,
  patch: { taskText?: string; deadline?: string; groupId?: string },
  actor: string,
  now: Date = new Date()
): Promise<TaskGroup> {
  const updated = await taskService.updateTaskGroup(groupTaskId, patch, now);
  await auditService.logAudit({ action: 'task_group_updated', actor, details: { groupTaskId, ...patch } });
  return updated;
}

/**
 * Completes a task on behalf of its assignee or an admin. Only the first
 * completion notifies.
 */
export async function completeTask(
  taskId: number,
  actor: string,
  access: AccessChecker,
  now: Date = new Date()
): Promise<{ task: TaskView; changed: boolean }> {
  const existing = await taskService.getTaskById(taskId, now);
  if (!existing) throw new NotFoundError('Task', taskId);
  if (existing.assigned_to !== actor && !access.isAdmin(actor)) {
    throw new AuthorizationError(actor, `complete task #${taskId}`);
  }

  const result = await taskService.completeTask(taskId, now);
  if (!result.changed) {
    logger.debug({ taskId }, 'Task already completed');
    return result;
  }

  await auditService.logAudit({ action: 'task_completed', actor, details: { taskId } });
  await notify({ type: 'task_completed', task: result.task });
  return result;
}

export async function deleteTaskGroup(
  groupTaskId: number,
  actor: string,
  now: Date = new Date()
): Promise<{ taskGroup: TaskGroup; tasks: TaskView[] }> {
  const deleted = await taskService.deleteTaskGroup(groupTaskId, now);

  await auditService.logAudit({
    action: 'task_group_deleted',
    actor,
    details: { groupTaskId, taskIds: deleted.tasks.map((t) => t.id) },
  });

  await notify({ type: 'task_deleted', ...deleted });
  return deleted;
}

export async function deleteTask(
  taskId: number,
  actor: string,
  now: Date = new Date()
): Promise<{ task: TaskView; remaining: number }> {
  const existing = await taskService.getTaskById(taskId, now);
  if (!existing) throw new NotFoundError('Task', taskId);
  const taskGroup = await taskService.getTaskGroupById(existing.group_task_id);
  if (!taskGroup) throw new NotFoundError('Task group', existing.group_task_id);

  const result = await taskService.deleteTask(taskId, now);
  await auditService.logAudit({ action: 'task_deleted', actor, details: { taskId, remaining: result.remaining } });

  await notify({ type: 'task_deleted', taskGroup, tasks: [result.task] });
  return result;
}
