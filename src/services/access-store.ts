import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { ACCESS_ROLES } from '../config/constants.js';
import type { AccessList } from '../types/team.js';
import { ValidationError } from '../utils/error-handler.js';
import { logger } from '../utils/logger.js';

export type AccessRole = (typeof ACCESS_ROLES)[number];

const accessFileSchema = z.object({
  admins: z.array(z.string()).default([]),
  employees: z.array(z.string()).default([]),
});

/** Strips Slack mention markup (`<@U123>` or `<@U123|name>`) and a leading `@`. */
export function normalizeHandle(raw: string): string {
  const trimmed = raw.trim();
  const mention = trimmed.match(/^<@([A-Z0-9]+)(?:\|[^>]*)?>$/i);
  if (mention) return mention[1];
  return trimmed.replace(/^@/, '');
}

export interface AccessChecker {
  isAdmin(handle: string | undefined): boolean;
  isEmployee(handle: string | undefined): boolean;
}

/**
 * Admin/employee allow-list persisted as a JSON file outside the database.
 * Loaded once at startup and re-read after every mutation it performs.
 */
export class AccessStore implements AccessChecker {
  private lists: AccessList = { admins: [], employees: [] };

  constructor(
    private readonly filePath: string,
    private readonly seed: AccessList = { admins: [], employees: [] }
  ) {}

  async load(): Promise<AccessList> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        logger.info({ file: this.filePath }, 'Access file missing, seeding from environment');
        await this.write({
          admins: this.seed.admins.map(normalizeHandle),
          employees: this.seed.employees.map(normalizeHandle),
        });
        return this.load();
      }
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new ValidationError(`Access file ${this.filePath} is malformed`, {
        issues: [err instanceof Error ? err.message : String(err)],
      });
    }

    const parsed = accessFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new ValidationError(`Access file ${this.filePath} is malformed`, {
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }
    this.lists = parsed.data;
    logger.debug({ admins: this.lists.admins.length, employees: this.lists.employees.length }, 'Access list loaded');
    return this.list();
  }

  list(): AccessList {
    return { admins: [...this.lists.admins], employees: [...this.lists.employees] };
  }

  isAdmin(handle: string | undefined): boolean {
    return handle !== undefined && this.lists.admins.includes(normalizeHandle(handle));
  }

  /** Admins count as employees. */
  isEmployee(handle: string | undefined): boolean {
    return handle !== undefined && (this.lists.employees.includes(normalizeHandle(handle)) || this.isAdmin(handle));
  }

  async add(role: AccessRole, handle: string): Promise<AccessList> {
    const normalized = normalizeHandle(handle);
    if (!normalized) throw new ValidationError('Handle is required');

    const next = this.list();
    const key = role === 'admin' ? 'admins' : 'employees';
    if (!next[key].includes(normalized)) next[key].push(normalized);
    await this.write(next);
    return this.load();
  }

  async remove(role: AccessRole, handle: string): Promise<AccessList> {
    const normalized = normalizeHandle(handle);
    const next = this.list();
    const key = role === 'admin' ? 'admins' : 'employees';
    next[key] = next[key].filter((entry) => entry !== normalized);
    await this.write(next);
    return this.load();
  }

  private async write(lists: AccessList): Promise<void> {
    await fs.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(lists, null, 2) + '\n', 'utf-8');
  }
}
