import express from 'express';
import type { Server } from 'http';
import { AccessStore } from '../services/access-store.js';
import { createTasksRouter } from './routes/tasks.js';
import { createAdminRouter } from './routes/admin.js';
import { errorHandler } from './middleware.js';
import { logger } from '../utils/logger.js';

export function createApiApp(access: AccessStore): express.Express {
  const app = express();
  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/api', createTasksRouter(access));
  app.use('/api', createAdminRouter(access));

  app.use((_req, res) => {
    res.status(404).json({ error: { code: 'not_found', message: 'Route not found' } });
  });
  app.use(errorHandler);

  return app;
}

export function startApiServer(access: AccessStore, port: number): Promise<Server> {
  const app = createApiApp(access);
  return new Promise((resolve) => {
    const server = app.listen(port, () => {
      logger.info({ port }, 'HTTP API listening');
      resolve(server);
    });
  });
}
