import pino from 'pino';
import { config } from '../config/index.js';

export const logger = pino({
  name: 'task-tracker',
  level: config.LOG_LEVEL,
});
