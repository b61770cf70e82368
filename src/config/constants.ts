export const TASK_STATUSES = {
  OPEN: 'open',
  COMPLETED: 'completed',
} as const;

export const NOTIFICATION_EVENTS = {
  TASK_CREATED: 'task_created',
  TASK_COMPLETED: 'task_completed',
  TASK_DELETED: 'task_deleted',
  OVERDUE_REMINDER: 'overdue_reminder',
} as const;

export const DUE_WINDOWS = ['today', 'tomorrow', 'week', 'month'] as const;

export const LIST_FILTERS = ['all', 'open', 'completed', 'overdue', ...DUE_WINDOWS] as const;

export const ACCESS_ROLES = ['admin', 'employee'] as const;

// Stored deadline format; compared lexicographically in SQL
export const DEADLINE_FORMAT = 'yyyy-MM-dd';

// Upper bound for relative deadlines ("in N days")
export const MAX_DEADLINE_DAYS = 3650;

export const TASKS_PER_PAGE = 5;
export const MAX_BLOCK_TASKS = 15;
export const OVERDUE_SCAN_JOB = 'scan-overdue';
