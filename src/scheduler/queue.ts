import { Queue, Worker, Job } from 'bullmq';
import { config } from '../config/index.js';
import { OVERDUE_SCAN_JOB } from '../config/constants.js';
import { logger } from '../utils/logger.js';

const OVERDUE_QUEUE = 'overdue-scans';

function redisConnection() {
  const url = new URL(config.REDIS_URL);
  return {
    host: url.hostname || 'localhost',
    port: parseInt(url.port || '6379', 10),
  };
}

// Concurrency 1 keeps scans from overlapping each other
export function createOverdueWorker(processor: (job: Job) => Promise<void>): Worker {
  const worker = new Worker(OVERDUE_QUEUE, processor, {
    connection: redisConnection(),
    concurrency: 1,
  });

  worker.on('completed', (job) => {
    logger.debug({ jobId: job.id }, 'Overdue scan completed');
  });

  worker.on('failed', (job, err) => {
    logger.error({ jobId: job?.id, err }, 'Overdue scan failed');
  });

  return worker;
}

export async function startOverdueScanner(): Promise<Queue> {
  const queue = new Queue(OVERDUE_QUEUE, { connection: redisConnection() });
  await queue.add(
    OVERDUE_SCAN_JOB,
    {},
    {
      repeat: { every: config.OVERDUE_SCAN_INTERVAL_MS },
      removeOnComplete: true,
      removeOnFail: 50,
    }
  );
  logger.info({ everyMs: config.OVERDUE_SCAN_INTERVAL_MS }, 'Overdue scanner scheduled');
  return queue;
}
