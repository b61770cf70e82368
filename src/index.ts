import { App, LogLevel } from '@slack/bolt';
import { config } from './config/index.js';
import { closePool, testConnection } from './database/connection.js';
import { runMigrations } from './database/migrate.js';
import { registerMessageListeners } from './slack/listeners/messages.js';
import { registerActionListeners } from './slack/listeners/actions.js';
import { registerEventListeners } from './slack/listeners/events.js';
import { createSlackSink } from './slack/sink.js';
import { createNotificationDispatcher } from './notifications/dispatcher.js';
import * as settingsService from './services/settings-service.js';
import { AccessStore } from './services/access-store.js';
import { setDispatcher as setWorkflowDispatcher } from './services/task-workflow.js';
import { processOverdueScan, setDispatcher as setOverdueDispatcher } from './scheduler/workers/overdue-checker.js';
import { createOverdueWorker, startOverdueScanner } from './scheduler/queue.js';
import { startApiServer } from './api/server.js';
import { logger } from './utils/logger.js';

async function main() {
  logger.info(`Starting ${config.BOT_NAME}...`);

  // 1. Test database connection and run migrations
  const dbConnected = await testConnection();
  if (!dbConnected) {
    logger.error('Failed to connect to database. Make sure PostgreSQL is running.');
    process.exit(1);
  }
  await runMigrations();

  // 2. Load the admin/employee allow-list
  const access = new AccessStore(config.ACCESS_FILE, {
    admins: config.ADMIN_HANDLES,
    employees: config.EMPLOYEE_HANDLES,
  });
  await access.load();

  // 3. Initialize Slack Bolt app with Socket Mode
  const app = new App({
    token: config.SLACK_BOT_TOKEN,
    appToken: config.SLACK_APP_TOKEN,
    socketMode: true,
    logLevel: config.LOG_LEVEL === 'debug' ? LogLevel.DEBUG : LogLevel.INFO,
  });

  registerMessageListeners(app, access);
  registerActionListeners(app, access);
  registerEventListeners(app);

  // 4. Notifications go out through the Slack client
  const dispatcher = createNotificationDispatcher({
    sink: createSlackSink(app),
    isEnabled: settingsService.isEnabled,
    directMessages: config.NOTIFY_ASSIGNEES,
  });
  setWorkflowDispatcher(dispatcher);
  setOverdueDispatcher(dispatcher);

  // 5. Overdue scanner
  const overdueWorker = createOverdueWorker(async () => {
    await processOverdueScan();
  });
  const overdueQueue = await startOverdueScanner();

  // 6. Start the HTTP API and the Slack app
  const server = await startApiServer(access, config.API_PORT);
  await app.start();

  logger.info('=================================');
  logger.info(`${config.BOT_NAME} is running!`);
  logger.info(`API port: ${config.API_PORT}`);
  logger.info(`Timezone: ${config.TIMEZONE}`);
  logger.info('=================================');

  const shutdown = async () => {
    logger.info('Shutting down...');
    await overdueWorker.close();
    await overdueQueue.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await app.stop();
    await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((err) => {
  logger.error({ err }, 'Fatal error during startup');
  process.exit(1);
});
