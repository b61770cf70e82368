import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { useTestDatabase } from '../__testUtils__/database.js';
import { createApiApp } from './server.js';
import { ACTOR_HEADER } from './middleware.js';
import { AccessStore } from '../services/access-store.js';

describe('HTTP API', () => {
  let dir: string;
  let server: Server;
  let baseUrl: string;

  async function call(method: string, route: string, options: { actor?: string; body?: unknown; raw?: string } = {}) {
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (options.actor) headers[ACTOR_HEADER] = options.actor;
    const response = await fetch(`${baseUrl}${route}`, {
      method,
      headers,
      body: options.raw ?? (options.body === undefined ? undefined : JSON.stringify(options.body)),
    });
    return { status: response.status, body: await response.json() };
  }

  beforeEach(async () => {
    await useTestDatabase();
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'api-'));
    const access = new AccessStore(path.join(dir, 'access.json'), { admins: ['boss'], employees: ['alice', 'bob'] });
    await access.load();

    server = createApiApp(access).listen(0);
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('Server has no TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reports health', async () => {
    expect(await call('GET', '/health')).toEqual({ status: 200, body: { status: 'ok' } });
  });

  it('creates a task group for admins only', async () => {
    const body = { task_text: 'Write report', deadline: '2030-01-10', group_id: 'C-general', assigned_to: ['alice', 'bob'] };

    const denied = await call('POST', '/api/task-groups', { actor: 'alice', body });
    expect(denied.status).toBe(403);
    expect(denied.body.error.code).toBe('unauthorized');

    const created = await call('POST', '/api/task-groups', { actor: 'boss', body });
    expect(created.status).toBe(201);
    expect(created.body.task_group.deadline).toBe('2030-01-10');
    expect(created.body.tasks.map((t: { assigned_to: string }) => t.assigned_to)).toEqual(['alice', 'bob']);

    const listed = await call('GET', '/api/tasks?assignee=bob&status=open');
    expect(listed.body.tasks).toHaveLength(1);
  });

  it('completes a task for its assignee', async () => {
    await call('POST', '/api/task-groups', {
      actor: 'boss',
      body: { task_text: 'Write report', deadline: '2030-01-10', group_id: 'C-general', assigned_to: ['alice'] },
    });

    expect((await call('POST', '/api/tasks/1/complete', { actor: 'bob' })).status).toBe(403);

    const first = await call('POST', '/api/tasks/1/complete', { actor: 'alice' });
    expect(first.status).toBe(200);
    expect(first.body.changed).toBe(true);
    expect(first.body.task.status).toBe('completed');

    const second = await call('POST', '/api/tasks/1/complete', { actor: 'alice' });
    expect(second.body.changed).toBe(false);
  });

  it('maps bad input and missing records to client errors', async () => {
    const invalid = await call('POST', '/api/task-groups', { actor: 'boss', body: { task_text: 'x' } });
    expect(invalid.status).toBe(400);
    expect(invalid.body.error.code).toBe('validation');

    const badDeadline = await call('POST', '/api/task-groups', {
      actor: 'boss',
      body: { task_text: 'x', deadline: 'someday', group_id: 'C-general', assigned_to: ['alice'] },
    });
    expect(badDeadline.status).toBe(400);

    const farDeadline = await call('POST', '/api/task-groups', {
      actor: 'boss',
      body: { task_text: 'x', deadline: '99999999999 days', group_id: 'C-general', assigned_to: ['alice'] },
    });
    expect(farDeadline.status).toBe(400);
    expect(farDeadline.body.error.code).toBe('validation');

    expect((await call('POST', '/api/task-groups', { actor: 'boss', raw: '{oops' })).status).toBe(400);
    expect((await call('GET', '/api/tasks/abc')).status).toBe(400);
    expect(await call('GET', '/api/tasks/99')).toEqual({
      status: 404,
      body: { error: { code: 'not_found', message: 'Task 99 does not exist' } },
    });
    expect((await call('GET', '/api/nowhere')).status).toBe(404);
  });

  it('edits, extends and deletes task groups', async () => {
    await call('POST', '/api/task-groups', {
      actor: 'boss',
      body: { task_text: 'Write report', deadline: '2030-01-10', group_id: 'C-general', assigned_to: ['alice'] },
    });

    const patched = await call('PATCH', '/api/task-groups/1', { actor: 'boss', body: { task_text: 'Final report' } });
    expect(patched.body.task_group.task_text).toBe('Final report');

    const added = await call('POST', '/api/task-groups/1/assignees', { actor: 'boss', body: { assigned_to: ['alice', 'bob'] } });
    expect(added.body.tasks.map((t: { assigned_to: string }) => t.assigned_to)).toEqual(['bob']);

    expect((await call('DELETE', '/api/tasks/1', { actor: 'boss' })).body).toEqual({ success: true, remaining_in_group: 1 });
    expect((await call('DELETE', '/api/task-groups/1', { actor: 'boss' })).body).toEqual({ success: true, deleted_tasks: 1 });
    expect((await call('GET', '/api/task-groups/1')).status).toBe(404);
  });

  it('manages settings, users, groups and the allow-list', async () => {
    const settings = await call('PUT', '/api/settings', { actor: 'boss', body: { task_deleted: false } });
    expect(settings.body.settings.task_deleted).toBe(false);
    expect((await call('PUT', '/api/settings', { actor: 'boss', body: { sound: true } })).status).toBe(400);

    await call('PUT', '/api/groups/C-dev', { actor: 'boss', body: { name: 'dev' } });
    await call('PUT', '/api/users/alice', { actor: 'boss', body: { display_name: 'Alice', groups: ['C-dev'] } });
    expect((await call('GET', '/api/groups/C-dev')).body).toEqual({
      group: { id: 'C-dev', name: 'dev' },
      members: [{ handle: 'alice', display_name: 'Alice' }],
    });

    expect((await call('POST', '/api/access/admin/carol', { actor: 'boss' })).body.admins).toEqual(['boss', 'carol']);
    expect((await call('POST', '/api/access/owner/carol', { actor: 'boss' })).status).toBe(400);
    expect((await call('GET', '/api/access', { actor: 'alice' })).status).toBe(403);

    const stats = await call('GET', '/api/stats');
    expect(stats.body.stats.users_count).toBe(1);
    expect(stats.body.stats.groups_count).toBe(1);
  });

  it('breaks task counts down by person and by group for admins', async () => {
    await call('POST', '/api/task-groups', {
      actor: 'boss',
      body: { task_text: 'Write report', deadline: '2030-01-10', group_id: 'C-general', assigned_to: ['alice', 'bob'] },
    });
    await call('POST', '/api/tasks/1/complete', { actor: 'alice' });

    expect((await call('GET', '/api/stats/by-user', { actor: 'alice' })).status).toBe(403);

    const byUser = await call('GET', '/api/stats/by-user', { actor: 'boss' });
    expect(
      byUser.body.users.map((u: { handle: string; open: number; completed: number }) => [u.handle, u.open, u.completed])
    ).toEqual([
      ['alice', 0, 1],
      ['bob', 1, 0],
    ]);

    const byGroup = await call('GET', '/api/stats/by-group', { actor: 'boss' });
    expect(byGroup.body).toEqual({
      groups: [{ group_id: 'C-general', name: null, open: 1, completed: 1, overdue: 0 }],
    });
  });
});
