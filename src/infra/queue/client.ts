import { Queue } from 'bullmq';
import Redis from 'ioredis';
import { config } from '../../config';
import { logger } from '../logging/logger';
import type { InboundJobData, QueueStats } from '../../shared/types';

export const INBOUND_QUEUE_NAME = 'mindline-inbound';

export const redis = new Redis(config.redisUrl, {
  maxRetriesPerRequest: null, // Required for BullMQ
  enableReadyCheck: false,
  retryStrategy: (times: number) => {
    if (times > 20) {
      logger.error('Redis connection failed after 20 retries');
      return null;
    }
    return Math.min(times * 100, 3000);
  },
});

redis.on('error', (err) => {
  logger.error({ error: err.message }, 'Redis error');
});

// A replayed event would append the same interaction twice, so jobs run once
export const inboundQueue = new Queue<InboundJobData>(INBOUND_QUEUE_NAME, {
  connection: redis,
  defaultJobOptions: {
    attempts: 1,
    removeOnComplete: { count: 1000, age: 3600 },
    removeOnFail: { count: 5000, age: 86400 },
  },
});

export async function addInboundJob(data: InboundJobData): Promise<string> {
  // The correlation id doubles as the job id, so a redelivered webhook is queued once
  const job = await inboundQueue.add(data.type, data, { jobId: data.correlationId });

  logger.info({
    jobId: job.id,
    correlationId: data.correlationId,
    userId: data.userId,
    event: data.event.kind,
  }, 'Inbound event queued');

  return job.id ?? data.correlationId;
}

export async function getQueueStats(): Promise<QueueStats> {
  const [waiting, active, failed, paused] = await Promise.all([
    inboundQueue.getWaitingCount(),
    inboundQueue.getActiveCount(),
    inboundQueue.getFailedCount(),
    inboundQueue.isPaused(),
  ]);
  return { waiting, active, failed, paused };
}

export async function checkRedisHealth(): Promise<{ healthy: boolean; latencyMs: number }> {
  const start = Date.now();
  try {
    await redis.ping();
    return { healthy: true, latencyMs: Date.now() - start };
  } catch (error) {
    logger.warn({ error: error instanceof Error ? error.message : String(error) }, 'Redis health check failed');
    return { healthy: false, latencyMs: Date.now() - start };
  }
}

export async function closeRedis(): Promise<void> {
  await inboundQueue.close();
  await redis.quit();
  logger.info('Redis connections closed');
}
