import { config } from './config';
import { buildServer } from './api/server';
import { createContext } from './context';
import { logger } from './infra/logging/logger';
import { db, checkDatabaseHealth } from './infra/db/client';
import { addInboundJob, checkRedisHealth, closeRedis, getQueueStats } from './infra/queue/client';

async function bootstrap() {
  logger.info('Starting Mindline Core API bootstrap...');

  const context = createContext();

  const app = await buildServer({
    logger,
    apiSecretKey: config.apiSecretKey,
    corsOrigins: config.corsOrigins,
    checks: {
      database: checkDatabaseHealth,
      redis: checkRedisHealth,
      queueStats: getQueueStats,
    },
    enqueue: addInboundJob,
    patients: context.patients,
    reports: context.reports,
    sessions: context.sessions,
  });

  let isShuttingDown = false;

  const shutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    logger.info({ signal }, 'Received shutdown signal, closing server...');

    try {
      await app.close();
      await db.end();
      await closeRedis();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  try {
    await app.listen({ port: config.port, host: '0.0.0.0' });
    logger.info({ port: config.port, env: config.nodeEnv }, 'Server started');
  } catch (err) {
    logger.error({ err }, 'Failed to start server');
    process.exit(1);
  }
}

void bootstrap();
