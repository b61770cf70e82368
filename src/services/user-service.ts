import { query, withTransaction, Queryable } from '../database/connection.js';
import type { User, UserWithGroups } from '../types/team.js';
import { NotFoundError, ValidationError, fromDatabaseError } from '../utils/error-handler.js';

async function assertGroupsExist(db: Queryable, groups: string[]): Promise<void> {
  for (const groupId of new Set(groups)) {
    const found = await db.query('SELECT id FROM chat_groups WHERE id = $1', [groupId]);
    if (found.rows.length === 0) throw new NotFoundError('Group', groupId);
  }
}

async function replaceMemberships(db: Queryable, handle: string, groups: string[]): Promise<string[]> {
  const unique = [...new Set(groups)];
  await db.query('DELETE FROM user_groups WHERE handle = $1', [handle]);
  for (const groupId of unique) {
    await db.query('INSERT INTO user_groups (handle, group_id) VALUES ($1, $2)', [handle, groupId]);
  }
  return unique;
}

export async function getUser(handle: string): Promise<UserWithGroups | null> {
  const result = await query<User>('SELECT * FROM users WHERE handle = $1', [handle]);
  const user = result.rows[0];
  if (!user) return null;

  const memberships = await query<{ group_id: string }>(
    'SELECT group_id FROM user_groups WHERE handle = $1 ORDER BY group_id',
    [handle]
  );
  return { ...user, groups: memberships.rows.map((row) => row.group_id) };
}

export async function listUsers(): Promise<UserWithGroups[]> {
  const result = await query<User & { group_id: string | null }>(
    `SELECT u.handle, u.display_name, ug.group_id
     FROM users u
     LEFT JOIN user_groups ug ON ug.handle = u.handle
     ORDER BY u.handle, ug.group_id`
  );

  const users = new Map<string, UserWithGroups>();
  for (const row of result.rows) {
    let user = users.get(row.handle);
    if (!user) {
      user = { handle: row.handle, display_name: row.display_name, groups: [] };
      users.set(row.handle, user);
    }
    if (row.group_id) user.groups.push(row.group_id);
  }
  return [...users.values()];
}

/** Registers a user on first interaction; an existing user keeps their display name. */
export async function ensureUser(handle: string, displayName?: string): Promise<User> {
  const result = await query<User>(
    `INSERT INTO users (handle, display_name)
     VALUES ($1, $2)
     ON CONFLICT (handle) DO NOTHING
     RETURNING *`,
    [handle, displayName || null]
  );
  if (result.rows[0]) return result.rows[0];

  const existing = await query<User>('SELECT * FROM users WHERE handle = $1', [handle]);
  return existing.rows[0];
}

export async function upsertUser(user: {
  handle: string;
  display_name?: string | null;
  groups?: string[];
}): Promise<UserWithGroups> {
  if (!user.handle.trim()) throw new ValidationError('User handle is required');

  try {
    return await withTransaction(async (db) => {
      await assertGroupsExist(db, user.groups || []);
      const result = await db.query<User>(
        `INSERT INTO users (handle, display_name)
         VALUES ($1, $2)
         ON CONFLICT (handle) DO UPDATE SET display_name = EXCLUDED.display_name
         RETURNING *`,
        [user.handle, user.display_name || null]
      );
      const groups = await replaceMemberships(db, user.handle, user.groups || []);
      return { ...result.rows[0], groups };
    });
  } catch (err) {
    throw fromDatabaseError(err);
  }
}

export async function updateUser(
  handle: string,
  update: { display_name?: string | null; groups?: string[] }
): Promise<UserWithGroups> {
  try {
    await withTransaction(async (db) => {
      const found = await db.query<User>('SELECT * FROM users WHERE handle = $1', [handle]);
      if (found.rows.length === 0) throw new NotFoundError('User', handle);
      if (update.groups !== undefined) await assertGroupsExist(db, update.groups);

      if (update.display_name !== undefined) {
        await db.query('UPDATE users SET display_name = $1 WHERE handle = $2', [update.display_name, handle]);
      }
      if (update.groups !== undefined) {
        await replaceMemberships(db, handle, update.groups);
      }
    });
  } catch (err) {
    throw fromDatabaseError(err);
  }

  const user = await getUser(handle);
  if (!user) throw new NotFoundError('User', handle);
  return user;
}

export async function deleteUser(handle: string): Promise<void> {
  await withTransaction(async (db) => {
    await db.query('DELETE FROM user_groups WHERE handle = $1', [handle]);
    const result = await db.query('DELETE FROM users WHERE handle = $1 RETURNING handle', [handle]);
    if (result.rows.length === 0) throw new NotFoundError('User', handle);
  });
}
