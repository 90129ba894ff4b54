import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import type { QueueStats } from '../../shared/types';

const VERSION = process.env.npm_package_version || '0.1.0';

export interface DependencyHealth {
  healthy: boolean;
  latencyMs: number;
}

export interface HealthChecks {
  database: () => Promise<DependencyHealth & { connections?: { total: number; idle: number; waiting: number } }>;
  redis: () => Promise<DependencyHealth>;
  queueStats: () => Promise<QueueStats>;
}

export interface HealthRoutesOptions {
  checks: HealthChecks;
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (
  app: FastifyInstance,
  { checks }
) => {
  // Liveness: 200 whenever the process is serving
  app.get('/live', async () => {
    return { status: 'ok' };
  });

  // Readiness: 200 only if all dependencies are healthy
  app.get('/ready', async (_request, reply) => {
    const [dbHealth, redisHealth] = await Promise.all([
      checks.database(),
      checks.redis(),
    ]);

    const isReady = dbHealth.healthy && redisHealth.healthy;

    if (!isReady) {
      reply.status(503);
    }

    return {
      status: isReady ? 'ready' : 'not_ready',
      checks: {
        database: dbHealth.healthy ? 'ok' : 'fail',
        redis: redisHealth.healthy ? 'ok' : 'fail',
      },
    };
  });

  app.get('/health', async (_request, reply) => {
    const [dbHealth, redisHealth, queueStats] = await Promise.all([
      checks.database(),
      checks.redis(),
      checks.queueStats(),
    ]);

    const isHealthy = dbHealth.healthy && redisHealth.healthy;
    const queueHealthy = queueStats.waiting < 10000 && !queueStats.paused;

    if (!isHealthy) {
      reply.status(503);
    }

    return {
      status: isHealthy ? 'healthy' : 'degraded',
      version: VERSION,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      checks: {
        database: {
          status: dbHealth.healthy ? 'ok' : 'fail',
          latencyMs: dbHealth.latencyMs,
          connections: dbHealth.connections,
        },
        redis: {
          status: redisHealth.healthy ? 'ok' : 'fail',
          latencyMs: redisHealth.latencyMs,
        },
        queue: {
          status: queueHealthy ? 'ok' : 'degraded',
          ...queueStats,
        },
      },
      memory: {
        heapUsed: Math.round(process.memoryUsage().heapUsed / 1024 / 1024),
        heapTotal: Math.round(process.memoryUsage().heapTotal / 1024 / 1024),
        rss: Math.round(process.memoryUsage().rss / 1024 / 1024),
      },
    };
  });
};
