import { beforeEach, describe, expect, it } from 'vitest';
import { useTestDatabase } from '../__testUtils__/database.js';
import * as userService from './user-service.js';
import * as groupService from './group-service.js';
import { NotFoundError } from '../utils/error-handler.js';

describe('user and group services', () => {
  beforeEach(async () => {
    await useTestDatabase();
    await groupService.upsertGroup({ id: 'C-dev', name: 'dev' });
    await groupService.upsertGroup({ id: 'C-ops', name: 'ops' });
  });

  it('creates users with memberships and lists them', async () => {
    await userService.upsertUser({ handle: 'alice', display_name: 'Alice', groups: ['C-dev', 'C-ops'] });
    await userService.upsertUser({ handle: 'bob' });

    expect(await userService.listUsers()).toEqual([
      { handle: 'alice', display_name: 'Alice', groups: ['C-dev', 'C-ops'] },
      { handle: 'bob', display_name: null, groups: [] },
    ]);
    expect((await groupService.listGroupMembers('C-dev')).map((u) => u.handle)).toEqual(['alice']);
  });

  it('replaces memberships on update', async () => {
    await userService.upsertUser({ handle: 'alice', groups: ['C-dev'] });
    const updated = await userService.updateUser('alice', { display_name: 'Alice A.', groups: ['C-ops'] });

    expect(updated).toEqual({ handle: 'alice', display_name: 'Alice A.', groups: ['C-ops'] });
    await expect(userService.updateUser('nobody', { display_name: 'x' })).rejects.toBeInstanceOf(NotFoundError);
  });

  it('keeps the display name of an existing user on ensure', async () => {
    await userService.upsertUser({ handle: 'alice', display_name: 'Alice' });
    const user = await userService.ensureUser('alice', 'Someone else');
    expect(user.display_name).toBe('Alice');

    const fresh = await userService.ensureUser('carol');
    expect(fresh).toEqual({ handle: 'carol', display_name: null });
  });

  it('rejects memberships in unknown groups before writing anything', async () => {
    await expect(userService.upsertUser({ handle: 'alice', groups: ['C-dev', 'C-missing'] })).rejects.toThrow(
      'Group C-missing does not exist'
    );
    expect(await userService.getUser('alice')).toBeNull();

    await userService.upsertUser({ handle: 'bob', groups: ['C-dev'] });
    await expect(userService.updateUser('bob', { display_name: 'Bob', groups: ['C-missing'] })).rejects.toBeInstanceOf(
      NotFoundError
    );
    expect(await userService.getUser('bob')).toEqual({ handle: 'bob', display_name: null, groups: ['C-dev'] });
  });

  it('deletes users and their memberships', async () => {
    await userService.upsertUser({ handle: 'alice', groups: ['C-dev'] });
    await userService.deleteUser('alice');

    expect(await userService.getUser('alice')).toBeNull();
    expect(await groupService.listGroupMembers('C-dev')).toEqual([]);
    await expect(userService.deleteUser('alice')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('manages group membership directly', async () => {
    await userService.upsertUser({ handle: 'bob' });
    await groupService.addMember('C-ops', 'bob');
    await groupService.addMember('C-ops', 'bob');
    expect((await groupService.listGroupMembers('C-ops')).map((u) => u.handle)).toEqual(['bob']);

    await groupService.removeMember('C-ops', 'bob');
    await expect(groupService.removeMember('C-ops', 'bob')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('renames and deletes groups', async () => {
    const renamed = await groupService.upsertGroup({ id: 'C-dev', name: 'engineering' });
    expect(renamed).toEqual({ id: 'C-dev', name: 'engineering' });
    expect((await groupService.listGroups()).map((g) => g.name)).toEqual(['engineering', 'ops']);

    await groupService.deleteGroup('C-ops');
    expect(await groupService.getGroup('C-ops')).toBeNull();
    await expect(groupService.deleteGroup('C-ops')).rejects.toBeInstanceOf(NotFoundError);
  });
});
