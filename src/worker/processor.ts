import type { Job } from 'bullmq';
import type { Logger } from 'pino';
import type { InboundJobData, JobResult } from '../shared/types';
import type { KeyedSerialExecutor } from '../shared/keyed-executor';
import { handleInboundEvent, type InboundHandlerDeps } from './handlers/inbound';

export interface ProcessorDeps extends InboundHandlerDeps {
  executor: KeyedSerialExecutor;
  logger: Logger;
}

/**
 * Jobs for the same user run one after another in arrival order; jobs for
 * different users run concurrently up to the worker's concurrency.
 *
 * The handler reports failures in its result and has already answered the
 * user, so jobs run once and are never retried.
 */
export function createJobProcessor(deps: ProcessorDeps) {
  return async function processJob(job: Pick<Job<InboundJobData>, 'id' | 'data'>): Promise<JobResult> {
    const startTime = Date.now();
    const { correlationId, type, userId } = job.data;

    const jobLogger = deps.logger.child({ jobId: job.id, correlationId, type, userId });
    jobLogger.info('Processing job');

    const result = await deps.executor.run(userId, () => handleInboundEvent(job.data, deps, jobLogger));

    const duration = Date.now() - startTime;
    if (result.status === 'failed') {
      jobLogger.error({ duration, error: result.error }, 'Job processing failed');
    } else {
      jobLogger.info({ duration, result: result.status }, 'Job processed');
    }
    return result;
  };
}
