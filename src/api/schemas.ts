import { z } from 'zod';
import { ACCESS_ROLES, DUE_WINDOWS, NOTIFICATION_EVENTS, TASK_STATUSES } from '../config/constants.js';

const handles = z.array(z.string().min(1)).min(1);

export const createTaskGroupSchema = z.object({
  task_text: z.string().min(1),
  deadline: z.string().min(1),
  group_id: z.string().min(1),
  assigned_to: handles,
});

export const addAssigneesSchema = z.object({
  assigned_to: handles,
});

export const updateTaskGroupSchema = z.object({
  task_text: z.string().min(1).optional(),
  deadline: z.string().min(1).optional(),
  group_id: z.string().min(1).optional(),
});

const booleanQuery = z.enum(['true', 'false']).transform((value) => value === 'true');

export const listTasksQuerySchema = z.object({
  assignee: z.string().min(1).optional(),
  status: z.enum([TASK_STATUSES.OPEN, TASK_STATUSES.COMPLETED]).optional(),
  groupId: z.string().min(1).optional(),
  groupTaskId: z.coerce.number().int().positive().optional(),
  overdue: booleanQuery.optional(),
  due: z.enum(DUE_WINDOWS).optional(),
});

export const settingsSchema = z
  .object({
    [NOTIFICATION_EVENTS.TASK_CREATED]: z.boolean(),
    [NOTIFICATION_EVENTS.TASK_COMPLETED]: z.boolean(),
    [NOTIFICATION_EVENTS.TASK_DELETED]: z.boolean(),
    [NOTIFICATION_EVENTS.OVERDUE_REMINDER]: z.boolean(),
  })
  .partial()
  .strict();

export const userSchema = z.object({
  display_name: z.string().nullable().optional(),
  groups: z.array(z.string().min(1)).optional(),
});

export const groupSchema = z.object({
  name: z.string().min(1),
});

export const accessRoleSchema = z.enum(ACCESS_ROLES);
