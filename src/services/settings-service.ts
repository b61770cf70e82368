import { query } from '../database/connection.js';
import { NOTIFICATION_EVENTS } from '../config/constants.js';
import type { NotificationEventName, NotificationSettings } from '../types/task.js';

const EVENT_NAMES: NotificationEventName[] = Object.values(NOTIFICATION_EVENTS);

export function isNotificationEvent(value: string): value is NotificationEventName {
  return EVENT_NAMES.some((name) => name === value);
}

function defaults(): NotificationSettings {
  return {
    task_created: true,
    task_completed: true,
    task_deleted: true,
    overdue_reminder: true,
  };
}

/** Current toggles; events without a stored row read as enabled. */
export async function getSettings(): Promise<NotificationSettings> {
  const result = await query<{ event: string; enabled: boolean }>(
    'SELECT event, enabled FROM notification_settings'
  );
  const settings = defaults();
  for (const row of result.rows) {
    if (isNotificationEvent(row.event)) {
      settings[row.event] = row.enabled;
    }
  }
  return settings;
}

export async function isEnabled(event: NotificationEventName): Promise<boolean> {
  const settings = await getSettings();
  return settings[event];
}

export async function setSetting(event: NotificationEventName, enabled: boolean): Promise<void> {
  await query(
    `INSERT INTO notification_settings (event, enabled)
     VALUES ($1, $2)
     ON CONFLICT (event) DO UPDATE SET enabled = EXCLUDED.enabled`,
    [event, enabled]
  );
}

export async function updateSettings(patch: Partial<NotificationSettings>): Promise<NotificationSettings> {
  for (const event of EVENT_NAMES) {
    const value = patch[event];
    if (value !== undefined) {
      await setSetting(event, value);
    }
  }
  return getSettings();
}

export async function toggleSetting(event: NotificationEventName): Promise<boolean> {
  const current = await isEnabled(event);
  await setSetting(event, !current);
  return !current;
}
