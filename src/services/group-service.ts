import { query, withTransaction } from '../database/connection.js';
import type { Group, User } from '../types/team.js';
import { NotFoundError, ValidationError, fromDatabaseError } from '../utils/error-handler.js';

export async function getGroup(id: string): Promise<Group | null> {
  const result = await query<Group>('SELECT * FROM chat_groups WHERE id = $1', [id]);
  return result.rows[0] || null;
}

export async function listGroups(): Promise<Group[]> {
  const result = await query<Group>('SELECT * FROM chat_groups ORDER BY name');
  return result.rows;
}

export async function upsertGroup(group: { id: string; name: string }): Promise<Group> {
  if (!group.id.trim() || !group.name.trim()) {
    throw new ValidationError('Group id and name are required');
  }
  const result = await query<Group>(
    `INSERT INTO chat_groups (id, name)
     VALUES ($1, $2)
     ON CONFLICT (id) DO UPDATE SET name = EXCLUDED.name
     RETURNING *`,
    [group.id, group.name]
  );
  return result.rows[0];
}

/** Removing a group drops its memberships; task groups pointing at it are left alone. */
export async function deleteGroup(id: string): Promise<void> {
  await withTransaction(async (db) => {
    await db.query('DELETE FROM user_groups WHERE group_id = $1', [id]);
    const result = await db.query('DELETE FROM chat_groups WHERE id = $1 RETURNING id', [id]);
    if (result.rows.length === 0) throw new NotFoundError('Group', id);
  });
}

export async function addMember(groupId: string, handle: string): Promise<void> {
  try {
    await query(
      `INSERT INTO user_groups (handle, group_id)
       VALUES ($1, $2)
       ON CONFLICT (handle, group_id) DO NOTHING`,
      [handle, groupId]
    );
  } catch (err) {
    throw fromDatabaseError(err);
  }
}

export async function removeMember(groupId: string, handle: string): Promise<void> {
  const result = await query(
    'DELETE FROM user_groups WHERE handle = $1 AND group_id = $2 RETURNING handle',
    [handle, groupId]
  );
  if (result.rows.length === 0) throw new NotFoundError('Membership', `${handle}@${groupId}`);
}

export async function listGroupMembers(groupId: string): Promise<User[]> {
  const result = await query<User>(
    `SELECT u.handle, u.display_name
     FROM users u
     JOIN user_groups ug ON ug.handle = u.handle
     WHERE ug.group_id = $1
     ORDER BY u.handle`,
    [groupId]
  );
  return result.rows;
}
