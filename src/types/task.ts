import { DUE_WINDOWS, NOTIFICATION_EVENTS, TASK_STATUSES } from '../config/constants.js';

export type TaskStatus = (typeof TASK_STATUSES)[keyof typeof TASK_STATUSES];
export type DueWindow = (typeof DUE_WINDOWS)[number];

export interface TaskGroup {
  id: number;
  task_text: string;
  /** Calendar date, `yyyy-MM-dd` */
  deadline: string;
  group_id: string;
  created_at: Date;
}

export interface Task {
  id: number;
  group_task_id: number;
  assigned_to: string;
  assigned_by: string;
  status: TaskStatus;
  created_at: Date;
  completed_at: Date | null;
  last_overdue_reminder_on: string | null;
}

/** A task joined with its group definition, plus the derived overdue flag. */
export interface TaskView extends Task {
  task_text: string;
  deadline: string;
  group_id: string;
  overdue: boolean;
}

export interface TaskFilter {
  assignee?: string;
  status?: TaskStatus;
  groupId?: string;
  groupTaskId?: number;
  overdue?: boolean;
  due?: DueWindow;
}

export interface TaskStats {
  total_tasks: number;
  open_tasks: number;
  completed_tasks: number;
  overdue_tasks: number;
  users_count: number;
  groups_count: number;
}

export interface StatusCounts {
  open: number;
  completed: number;
  overdue: number;
}

export interface AssigneeStats extends StatusCounts {
  handle: string;
  display_name: string | null;
  /** Open tasks, each carrying its overdue flag */
  open_tasks: TaskView[];
}

export interface GroupStats extends StatusCounts {
  group_id: string;
  name: string | null;
}

export type NotificationEventName = (typeof NOTIFICATION_EVENTS)[keyof typeof NOTIFICATION_EVENTS];

export type NotificationSettings = Record<NotificationEventName, boolean>;
