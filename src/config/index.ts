import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const handleList = z
  .string()
  .default('')
  .transform((raw) => raw.split(',').map((item) => item.trim()).filter(Boolean));

const flag = z
  .enum(['true', 'false'])
  .default('true')
  .transform((value) => value === 'true');

const envSchema = z.object({
  SLACK_BOT_TOKEN: z.string().startsWith('xoxb-'),
  SLACK_APP_TOKEN: z.string().startsWith('xapp-'),
  SLACK_SIGNING_SECRET: z.string().min(1),
  DATABASE_URL: z.string().startsWith('postgresql://'),
  REDIS_URL: z.string().default('redis://localhost:6379'),
  API_PORT: z.coerce.number().int().positive().default(8000),
  ACCESS_FILE: z.string().default('access.json'),
  ADMIN_HANDLES: handleList,
  EMPLOYEE_HANDLES: handleList,
  NOTIFY_ASSIGNEES: flag,
  OVERDUE_SCAN_INTERVAL_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  BOT_NAME: z.string().default('Task Tracker'),
  TIMEZONE: z.string().default('UTC'),
  LOG_LEVEL: z.string().default('info'),
});

function loadConfig() {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    console.error('Missing or invalid environment variables:');
    for (const issue of result.error.issues) {
      console.error(`  ${issue.path.join('.')}: ${issue.message}`);
    }
    console.error('\nCopy .env.example to .env and fill in your values.');
    process.exit(1);
  }
  return result.data;
}

export const config = loadConfig();
export type Config = z.infer<typeof envSchema>;
