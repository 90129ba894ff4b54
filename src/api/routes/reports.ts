import type { FastifyInstance, FastifyPluginAsync, preHandlerAsyncHookHandler } from 'fastify';
import { z } from 'zod';
import { REPORT_TYPES } from '../../shared/types';
import { BadRequestError } from '../../shared/errors';
import type { PatientService } from '../../domain/patient/service';
import type { ReportCompiler } from '../../domain/report/compiler';
import type { SessionController } from '../../domain/session/controller';

const patientParamsSchema = z.object({ patientId: z.string().min(1) });
const sessionParamsSchema = z.object({ sessionId: z.string().min(1) });

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

const generateBodySchema = z.object({
  type: z.enum(REPORT_TYPES),
  limit: z.number().int().min(1).max(100).optional(),
});

export interface ReportRoutesOptions {
  patients: PatientService;
  reports: ReportCompiler;
  sessions: SessionController;
  authenticate: preHandlerAsyncHookHandler;
  generateLimiter?: preHandlerAsyncHookHandler;
}

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new BadRequestError(`Invalid ${what}: ${result.error.message}`);
  }
  return result.data;
}

export const reportRoutes: FastifyPluginAsync<ReportRoutesOptions> = async (
  app: FastifyInstance,
  options
) => {
  app.addHook('preHandler', options.authenticate);

  app.get('/patients/:patientId/reports', async (request) => {
    const { patientId } = parse(patientParamsSchema, request.params, 'path');
    const { limit } = parse(listQuerySchema, request.query, 'query');

    await options.patients.getById(patientId);
    const reports = await options.reports.listReports(patientId, limit);

    return { success: true, reports };
  });

  app.post('/patients/:patientId/reports', {
    ...(options.generateLimiter && { preHandler: options.generateLimiter }),
  }, async (request, reply) => {
    const { patientId } = parse(patientParamsSchema, request.params, 'path');
    const body = parse(generateBodySchema, request.body ?? {}, 'body');

    const report = body.type === 'progress'
      ? await options.reports.generateProgressReport(patientId, { limit: body.limit })
      : await options.reports.generateAssessmentReport(patientId);

    request.log.info({ patientId, reportId: report.reportId, type: body.type }, 'Report generated via API');

    reply.status(201);
    return { success: true, report };
  });

  app.get('/sessions/:sessionId/report', async (request) => {
    const { sessionId } = parse(sessionParamsSchema, request.params, 'path');
    const report = await options.sessions.buildSessionReport(sessionId);
    return { success: true, report };
  });
};
