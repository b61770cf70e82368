import { query, withTransaction, Queryable } from '../database/connection.js';
import type {
  AssigneeStats,
  GroupStats,
  StatusCounts,
  Task,
  TaskFilter,
  TaskGroup,
  TaskStats,
  TaskView,
} from '../types/task.js';
import { dueRange, isOverdue, parseDeadline, todayInTimezone } from '../utils/date-helpers.js';
import { NotFoundError, ValidationError, fromDatabaseError } from '../utils/error-handler.js';

type TaskRow = Omit<TaskView, 'overdue'>;

const TASK_VIEW_SELECT = `
  SELECT t.id, t.group_task_id, t.assigned_to, t.assigned_by, t.status, t.created_at,
         t.completed_at, t.last_overdue_reminder_on, tg.task_text, tg.deadline, tg.group_id
  FROM tasks t
  JOIN task_groups tg ON tg.id = t.group_task_id`;

function toView(row: TaskRow, now: Date): TaskView {
  return { ...row, overdue: isOverdue(row, now) };
}

function normalizeAssignees(assignees: string[]): string[] {
  const unique = [...new Set(assignees.map((a) => a.trim()).filter(Boolean))];
  if (unique.length === 0) {
    throw new ValidationError('At least one assignee is required');
  }
  return unique;
}

async function insertTasks(
  db: Queryable,
  groupTaskId: number,
  assignees: string[],
  assignedBy: string,
  now: Date
): Promise<Task[]> {
  const tasks: Task[] = [];
  for (const assignee of assignees) {
    const result = await db.query<Task>(
      `INSERT INTO tasks (group_task_id, assigned_to, assigned_by, status, created_at)
       VALUES ($1, $2, $3, 'open', $4)
       RETURNING *`,
      [groupTaskId, assignee, assignedBy, now]
    );
    tasks.push(result.rows[0]);
  }
  return tasks;
}

async function selectViews(db: Queryable, where: string, params: unknown[], now: Date): Promise<TaskView[]> {
  const result = await db.query<TaskRow>(`${TASK_VIEW_SELECT} ${where} ORDER BY tg.deadline ASC, t.id ASC`, params);
  return result.rows.map((row) => toView(row, now));
}

export async function createTaskGroup(
  input: {
    taskText: string;
    deadline: string;
    groupId: string;
    assignees: string[];
    assignedBy: string;
  },
  now: Date = new Date()
): Promise<{ taskGroup: TaskGroup; tasks: TaskView[] }> {
  const taskText = input.taskText.trim();
  if (!taskText) throw new ValidationError('Task text is required');
  if (!input.groupId.trim()) throw new ValidationError('Group is required');
  const deadline = parseDeadline(input.deadline, now);
  const assignees = normalizeAssignees(input.assignees);

  try {
    return await withTransaction(async (db) => {
      const groupResult = await db.query<TaskGroup>(
        `INSERT INTO task_groups (task_text, deadline, group_id, created_at)
         VALUES ($1, $2, $3, $4)
         RETURNING *`,
        [taskText, deadline, input.groupId, now]
      );
      const taskGroup = groupResult.rows[0];
      await insertTasks(db, taskGroup.id, assignees, input.assignedBy, now);
      const tasks = await selectViews(db, 'WHERE t.group_task_id = $1', [taskGroup.id], now);
      return { taskGroup, tasks };
    });
  } catch (err) {
    throw fromDatabaseError(err);
  }
}

export async function getTaskGroupById(id: number): Promise<TaskGroup | null> {
  const result = await query<TaskGroup>('SELECT * FROM task_groups WHERE id = $1', [id]);
  return result.rows[0] || null;
}

export async function getTasksByGroupTask(groupTaskId: number, now: Date = new Date()): Promise<TaskView[]> {
  return selectViews({ query }, 'WHERE t.group_task_id = $1', [groupTaskId], now);
}

export async function getTaskById(id: number, now: Date = new Date()): Promise<TaskView | null> {
  const rows = await selectViews({ query }, 'WHERE t.id = $1', [id], now);
  return rows[0] || null;
}

/** Assigns an existing task group to more people; already-assigned handles are skipped. */
export async function addAssignees(
  groupTaskId: number,
  assignees: string[],
  assignedBy: string,
  now: Date = new Date()
): Promise<TaskView[]> {
  const requested = normalizeAssignees(assignees);

  return withTransaction(async (db) => {
    const group = await db.query<TaskGroup>('SELECT * FROM task_groups WHERE id = $1', [groupTaskId]);
    if (group.rows.length === 0) throw new NotFoundError('Task group', groupTaskId);

    const existing = await db.query<{ assigned_to: string }>(
      'SELECT assigned_to FROM tasks WHERE group_task_id = $1',
      [groupTaskId]
    );
    const assigned = new Set(existing.rows.map((row) => row.assigned_to));
    const fresh = requested.filter((handle) => !assigned.has(handle));

    const inserted = await insertTasks(db, groupTaskId, fresh, assignedBy, now);
    const ids = new Set(inserted.map((task) => task.id));
    const views = await selectViews(db, 'WHERE t.group_task_id = $1', [groupTaskId], now);
    return views.filter((view) => ids.has(view.id));
  });
}

export async function updateTaskGroup(
  groupTaskId: number,
  patch: { taskText?: string; deadline?: string; groupId?: string },
  now: Date = new Date()
): Promise<TaskGroup> {
  const fields: string[] = [];
  const values: unknown[] = [];

  if (patch.taskText !== undefined) {
    const text = patch.taskText.trim();
    if (!text) throw new ValidationError('Task text is required');
    values.push(text);
    fields.push(`task_text = $${values.length}`);
  }
  if (patch.deadline !== undefined) {
    values.push(parseDeadline(patch.deadline, now));
    fields.push(`deadline = $${values.length}`);
  }
  if (patch.groupId !== undefined) {
    values.push(patch.groupId);
    fields.push(`group_id = $${values.length}`);
  }

  if (fields.length === 0) {
    const existing = await getTaskGroupById(groupTaskId);
    if (!existing) throw new NotFoundError('Task group', groupTaskId);
    return existing;
  }

  values.push(groupTaskId);
  const result = await query<TaskGroup>(
    `UPDATE task_groups SET ${fields.join(', ')} WHERE id = $${values.length} RETURNING *`,
    values
  );
  if (result.rows.length === 0) throw new NotFoundError('Task group', groupTaskId);
  return result.rows[0];
}

export async function listTasks(filter: TaskFilter = {}, now: Date = new Date()): Promise<TaskView[]> {
  const conditions: string[] = [];
  const values: unknown[] = [];
  const param = (value: unknown): string => {
    values.push(value);
    return `$${values.length}`;
  };

  if (filter.assignee) conditions.push(`t.assigned_to = ${param(filter.assignee)}`);
  if (filter.status) conditions.push(`t.status = ${param(filter.status)}`);
  if (filter.groupId) conditions.push(`tg.group_id = ${param(filter.groupId)}`);
  if (filter.groupTaskId !== undefined) conditions.push(`t.group_task_id = ${param(filter.groupTaskId)}`);

  if (filter.overdue !== undefined) {
    const today = param(todayInTimezone(now));
    conditions.push(
      filter.overdue
        ? `t.status = 'open' AND tg.deadline < ${today}`
        : `(t.status <> 'open' OR tg.deadline >= ${today})`
    );
  }

  if (filter.due) {
    const { from, to } = dueRange(filter.due, now);
    conditions.push(`tg.deadline >= ${param(from)} AND tg.deadline <= ${param(to)}`);
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  return selectViews({ query }, where, values, now);
}

export async function getOverdueTasks(now: Date = new Date()): Promise<TaskView[]> {
  return listTasks({ overdue: true }, now);
}

/**
 * Marks a task completed. Completing an already-completed task changes nothing
 * and reports `changed: false`.
 */
export async function completeTask(
  taskId: number,
  now: Date = new Date()
): Promise<{ task: TaskView; changed: boolean }> {
  const result = await query<{ id: number }>(
    `UPDATE tasks SET status = 'completed', completed_at = $2
     WHERE id = $1 AND status = 'open'
     RETURNING id`,
    [taskId, now]
  );

  const task = await getTaskById(taskId, now);
  if (!task) throw new NotFoundError('Task', taskId);
  return { task, changed: result.rows.length > 0 };
}

export async function deleteTaskGroup(
  groupTaskId: number,
  now: Date = new Date()
): Promise<{ taskGroup: TaskGroup; tasks: TaskView[] }> {
  return withTransaction(async (db) => {
    const group = await db.query<TaskGroup>('SELECT * FROM task_groups WHERE id = $1', [groupTaskId]);
    if (group.rows.length === 0) throw new NotFoundError('Task group', groupTaskId);

    const tasks = await selectViews(db, 'WHERE t.group_task_id = $1', [groupTaskId], now);
    await db.query('DELETE FROM tasks WHERE group_task_id = $1', [groupTaskId]);
    await db.query('DELETE FROM task_groups WHERE id = $1', [groupTaskId]);
    return { taskGroup: group.rows[0], tasks };
  });
}

/** Removes one assignee's task and reports how many remain in its group. */
export async function deleteTask(
  taskId: number,
  now: Date = new Date()
): Promise<{ task: TaskView; remaining: number }> {
  return withTransaction(async (db) => {
    const found = await selectViews(db, 'WHERE t.id = $1', [taskId], now);
    const task = found[0];
    if (!task) throw new NotFoundError('Task', taskId);

    await db.query('DELETE FROM tasks WHERE id = $1', [taskId]);
    const left = await db.query<{ total: string }>(
      'SELECT COUNT(*) AS total FROM tasks WHERE group_task_id = $1',
      [task.group_task_id]
    );
    return { task, remaining: Number(left.rows[0].total) };
  });
}

/**
 * Stamps today's overdue reminder on an open task. Returns false when the task
 * was already reminded today or is no longer open.
 */
export async function claimOverdueReminder(taskId: number, today: string): Promise<boolean> {
  const result = await query<{ id: number }>(
    `UPDATE tasks SET last_overdue_reminder_on = $2
     WHERE id = $1 AND status = 'open'
       AND (last_overdue_reminder_on IS NULL OR last_overdue_reminder_on <> $2)
     RETURNING id`,
    [taskId, today]
  );
  return result.rows.length > 0;
}

/**
 * Gives back a claim taken by `claimOverdueReminder` when nothing was delivered,
 * restoring the previous stamp so a later scan the same day can retry.
 */
export async function releaseOverdueReminder(taskId: number, today: string, previous: string | null): Promise<boolean> {
  const result = await query<{ id: number }>(
    `UPDATE tasks SET last_overdue_reminder_on = $3
     WHERE id = $1 AND last_overdue_reminder_on = $2
     RETURNING id`,
    [taskId, today, previous]
  );
  return result.rows.length > 0;
}

async function count(sql: string, params?: unknown[]): Promise<number> {
  const result = await query<{ total: string }>(sql, params);
  return Number(result.rows[0].total);
}

export async function getStats(now: Date = new Date()): Promise<TaskStats> {
  const today = todayInTimezone(now);
  return {
    total_tasks: await count('SELECT COUNT(*) AS total FROM tasks'),
    open_tasks: await count(`SELECT COUNT(*) AS total FROM tasks WHERE status = 'open'`),
    completed_tasks: await count(`SELECT COUNT(*) AS total FROM tasks WHERE status = 'completed'`),
    overdue_tasks: await count(
      `SELECT COUNT(*) AS total FROM tasks t
       JOIN task_groups tg ON tg.id = t.group_task_id
       WHERE t.status = 'open' AND tg.deadline < $1`,
      [today]
    ),
    users_count: await count('SELECT COUNT(*) AS total FROM users'),
    groups_count: await count('SELECT COUNT(*) AS total FROM chat_groups'),
  };
}

type StatsBucket = 't.assigned_to' | 'tg.group_id';

/** Open, completed and overdue counts keyed by assignee or by owning group. */
async function countsBy(bucket: StatsBucket, today: string): Promise<Map<string, StatusCounts>> {
  const counts = new Map<string, StatusCounts>();
  const entry = (key: string): StatusCounts => {
    let found = counts.get(key);
    if (!found) {
      found = { open: 0, completed: 0, overdue: 0 };
      counts.set(key, found);
    }
    return found;
  };

  const byStatus = await query<{ bucket: string; status: string; total: string }>(
    `SELECT ${bucket} AS bucket, t.status, COUNT(*) AS total
     FROM tasks t
     JOIN task_groups tg ON tg.id = t.group_task_id
     GROUP BY ${bucket}, t.status`
  );
  for (const row of byStatus.rows) {
    if (row.status === 'open') entry(row.bucket).open = Number(row.total);
    else if (row.status === 'completed') entry(row.bucket).completed = Number(row.total);
  }

  const overdue = await query<{ bucket: string; total: string }>(
    `SELECT ${bucket} AS bucket, COUNT(*) AS total
     FROM tasks t
     JOIN task_groups tg ON tg.id = t.group_task_id
     WHERE t.status = 'open' AND tg.deadline < $1
     GROUP BY ${bucket}`,
    [today]
  );
  for (const row of overdue.rows) {
    entry(row.bucket).overdue = Number(row.total);
  }

  return counts;
}

/** Per-person breakdown: every registered user plus anyone holding a task, by handle. */
export async function getStatsByAssignee(now: Date = new Date()): Promise<AssigneeStats[]> {
  const counts = await countsBy('t.assigned_to', todayInTimezone(now));
  const users = await query<{ handle: string; display_name: string | null }>('SELECT handle, display_name FROM users');
  const names = new Map(users.rows.map((user) => [user.handle, user.display_name]));
  const openTasks = await listTasks({ status: 'open' }, now);

  const handles = [...new Set([...names.keys(), ...counts.keys()])].sort();
  return handles.map((handle) => ({
    handle,
    display_name: names.get(handle) ?? null,
    ...(counts.get(handle) ?? { open: 0, completed: 0, overdue: 0 }),
    open_tasks: openTasks.filter((task) => task.assigned_to === handle),
  }));
}

/** Per-group breakdown for every group that owns at least one task. */
export async function getStatsByGroup(now: Date = new Date()): Promise<GroupStats[]> {
  const counts = await countsBy('tg.group_id', todayInTimezone(now));
  const groups = await query<{ id: string; name: string }>('SELECT id, name FROM chat_groups');
  const names = new Map(groups.rows.map((group) => [group.id, group.name]));

  return [...counts.keys()].sort().map((groupId) => ({
    group_id: groupId,
    name: names.get(groupId) ?? null,
    ...(counts.get(groupId) ?? { open: 0, completed: 0, overdue: 0 }),
  }));
}
