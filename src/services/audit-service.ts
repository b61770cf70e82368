import { query } from '../database/connection.js';

export async function logAudit(entry: {
  action: string;
  actor?: string;
  details?: Record<string, unknown>;
}): Promise<void> {
  await query(
    `INSERT INTO audit_log (action, actor, details)
     VALUES ($1, $2, $3)`,
    [
      entry.action,
      entry.actor || null,
      entry.details ? JSON.stringify(entry.details) : null,
    ]
  );
}

export async function getRecentAudit(limit = 20): Promise<Array<{ action: string; actor: string | null; details: unknown; created_at: Date }>> {
  const result = await query<{ action: string; actor: string | null; details: unknown; created_at: Date }>(
    'SELECT action, actor, details, created_at FROM audit_log ORDER BY id DESC LIMIT $1',
    [limit]
  );
  return result.rows;
}
