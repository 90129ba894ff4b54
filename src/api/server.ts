import { randomUUID } from 'crypto';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import type { Logger } from 'pino';
import { isAppError } from '../shared/errors';
import { correlationMiddleware } from './middleware/correlation';
import { createAuthMiddleware, rateLimit } from './middleware/auth';
import { healthRoutes, type HealthChecks } from './routes/health';
import { ingestRoutes, type IngestRoutesOptions } from './routes/ingest';
import { reportRoutes } from './routes/reports';
import type { PatientService } from '../domain/patient/service';
import type { ReportCompiler } from '../domain/report/compiler';
import type { SessionController } from '../domain/session/controller';

export interface ServerOptions {
  logger: Logger;
  apiSecretKey: string;
  corsOrigins: string[];
  checks: HealthChecks;
  enqueue: IngestRoutesOptions['enqueue'];
  patients: PatientService;
  reports: ReportCompiler;
  sessions: SessionController;
}

export async function buildServer(options: ServerOptions) {
  const app = Fastify({
    logger: options.logger,
    requestIdHeader: 'x-correlation-id',
    genReqId: () => randomUUID(),
  });

  await app.register(cors, {
    origin: options.corsOrigins,
    credentials: true,
  });

  await app.register(correlationMiddleware);

  await app.register(healthRoutes, { checks: options.checks });
  await app.register(ingestRoutes, { enqueue: options.enqueue });
  await app.register(reportRoutes, {
    prefix: '/api',
    patients: options.patients,
    reports: options.reports,
    sessions: options.sessions,
    authenticate: createAuthMiddleware(options.apiSecretKey),
    generateLimiter: rateLimit({ windowMs: 60_000, maxRequests: 10 }),
  });

  app.setErrorHandler((error, request, reply) => {
    const statusCode = isAppError(error) ? error.statusCode : (error.statusCode ?? 500);

    request.log.error({
      correlationId: request.correlationId,
      error: error.message,
      stack: error.stack,
      statusCode,
    }, 'Request error');

    // Internal errors are not exposed
    const message = statusCode >= 500 ? 'Internal server error' : error.message;

    void reply.status(statusCode).send({
      success: false,
      error: message,
      ...(isAppError(error) && { code: error.code }),
      correlationId: request.correlationId,
    });
  });

  return app;
}
