import dotenv from 'dotenv';
dotenv.config();

import { upsertUser } from '../src/services/user-service.js';
import { upsertGroup } from '../src/services/group-service.js';
import { closePool, testConnection } from '../src/database/connection.js';
import { runMigrations } from '../src/database/migrate.js';

/*
 * Sample data for a local workspace. Replace the ids with real ones:
 * a member id from a Slack profile (three dots → Copy member ID) and a
 * channel id from the channel details panel.
 */

const GROUPS = [
  { id: 'C0000000001', name: 'team-general' },
  { id: 'C0000000002', name: 'team-ops' },
];

const USERS = [
  { handle: 'U0000000001', display_name: 'Admin', groups: ['C0000000001', 'C0000000002'] },
  { handle: 'U0000000002', display_name: 'Alice', groups: ['C0000000001'] },
  { handle: 'U0000000003', display_name: 'Bob', groups: ['C0000000002'] },
];

async function main() {
  console.log('Seeding groups and users...\n');

  const connected = await testConnection();
  if (!connected) {
    console.error('Could not connect to database.');
    process.exit(1);
  }

  await runMigrations();

  for (const group of GROUPS) {
    const result = await upsertGroup(group);
    console.log(`  Group: #${result.name} (${result.id})`);
  }

  for (const user of USERS) {
    const result = await upsertUser(user);
    console.log(`  User: ${result.display_name} (${result.handle}) in ${result.groups.join(', ')}`);
  }

  await closePool();
  console.log('\nSeeding complete!');
  process.exit(0);
}

main().catch((err) => {
  console.error('Seeding failed:', err);
  process.exit(1);
});
