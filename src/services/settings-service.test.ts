import { beforeEach, describe, expect, it } from 'vitest';
import { useTestDatabase } from '../__testUtils__/database.js';
import * as settingsService from './settings-service.js';

describe('settings service', () => {
  beforeEach(async () => {
    await useTestDatabase();
  });

  it('starts with every notification enabled', async () => {
    expect(await settingsService.getSettings()).toEqual({
      task_created: true,
      task_completed: true,
      task_deleted: true,
      overdue_reminder: true,
    });
  });

  it('updates only the events in the patch', async () => {
    const settings = await settingsService.updateSettings({ task_deleted: false });
    expect(settings.task_deleted).toBe(false);
    expect(settings.task_created).toBe(true);
    expect(await settingsService.isEnabled('task_deleted')).toBe(false);
  });

  it('toggles a setting back and forth', async () => {
    expect(await settingsService.toggleSetting('overdue_reminder')).toBe(false);
    expect(await settingsService.toggleSetting('overdue_reminder')).toBe(true);
  });

  it('recognizes event names', () => {
    expect(settingsService.isNotificationEvent('task_completed')).toBe(true);
    expect(settingsService.isNotificationEvent('task_archived')).toBe(false);
  });
});
