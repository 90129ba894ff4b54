/**
 * Worker entry point. Consumes inbound chat events and drives the
 * conversation state machine. Open sessions live in this process, so run a
 * single worker process and scale with WORKER_CONCURRENCY.
 */

import { Worker, Job } from 'bullmq';
import { redis, closeRedis, INBOUND_QUEUE_NAME } from '../infra/queue/client';
import { createJobProcessor } from './processor';
import { config } from '../config';
import { logger } from '../infra/logging/logger';
import { db } from '../infra/db/client';
import { createContext } from '../context';
import type { InboundJobData, JobResult } from '../shared/types';

const context = createContext();

const worker = new Worker<InboundJobData, JobResult>(INBOUND_QUEUE_NAME, createJobProcessor({ ...context, logger }), {
  connection: redis,
  concurrency: config.workerConcurrency,
  maxStalledCount: 2,
  stalledInterval: 30000,
  lockDuration: config.jobTimeoutMs,
});

// ============================================================================
// Event Handlers
// ============================================================================

worker.on('ready', () => {
  logger.info({ queue: INBOUND_QUEUE_NAME, concurrency: config.workerConcurrency }, 'Worker ready');
});

worker.on('completed', (job: Job<InboundJobData, JobResult>) => {
  logger.info({
    jobId: job.id,
    correlationId: job.data.correlationId,
    duration: Date.now() - job.timestamp,
  }, 'Job completed');
});

worker.on('failed', (job: Job<InboundJobData, JobResult> | undefined, err: Error) => {
  logger.error({
    jobId: job?.id,
    correlationId: job?.data.correlationId,
    error: err.message,
    stack: err.stack,
  }, 'Job failed');
});

worker.on('error', (err: Error) => {
  logger.error({ error: err.message }, 'Worker error');
});

worker.on('stalled', (jobId: string) => {
  logger.warn({ jobId }, 'Job stalled');
});

// ============================================================================
// Graceful Shutdown
// ============================================================================

let isShuttingDown = false;

const shutdown = async (signal: string) => {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info({ signal }, 'Worker received shutdown signal');

  try {
    await worker.pause();
    logger.info('Worker paused, waiting for active jobs...');

    const timeout = setTimeout(() => {
      logger.warn('Shutdown timeout, forcing close');
      process.exit(1);
    }, 30000);

    await worker.close();
    clearTimeout(timeout);

    const closed = await context.sessions.closeAll();
    logger.info({ sessions: closed, pendingFlushes: context.sessions.pendingFlushes }, 'Open sessions closed');

    await db.end();
    await closeRedis();

    logger.info('Worker shut down gracefully');
    process.exit(0);
  } catch (err) {
    logger.error({ err }, 'Error during worker shutdown');
    process.exit(1);
  }
};

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

logger.info({ queue: INBOUND_QUEUE_NAME }, 'Worker starting...');
