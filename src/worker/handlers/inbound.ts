import type { Logger } from 'pino';
import type {
  InboundJobData,
  JobResult,
  LocalizationProvider,
  MessagingGateway,
} from '../../shared/types';
import { toError } from '../../shared/errors';
import { detectLanguage } from '../../shared/language';
import { logExecution } from '../../infra/logging/logger';
import type { PatientService } from '../../domain/patient/service';
import type { ConversationStateMachine } from '../../domain/conversation/state-machine';

export interface InboundHandlerDeps {
  conversation: ConversationStateMachine;
  gateway: MessagingGateway;
  patients: PatientService;
  localization: LocalizationProvider;
}

export async function handleInboundEvent(
  data: InboundJobData,
  deps: InboundHandlerDeps,
  logger: Logger
): Promise<JobResult> {
  const { correlationId, userId } = data;
  let responseSent = false;

  try {
    const result = await logExecution(
      correlationId,
      'conversation_transition',
      () => deps.conversation.handle(userId, data.event, { logger, displayName: data.displayName }),
      logger
    );

    for (const reply of result.replies) {
      await deps.gateway.send(userId, reply);
      responseSent = true;
    }

    return {
      status: 'completed',
      correlationId,
      action: data.event.kind,
      state: result.state,
    };
  } catch (error) {
    const err = toError(error);
    logger.error({
      correlationId,
      userId,
      error: err.message,
      stack: err.stack,
    }, 'Unhandled error in event processing, sending fallback response');

    // The user should never be left without an answer
    if (!responseSent) {
      await sendFallback(data, deps, logger);
    }

    // Returned rather than thrown: a retry would repeat the fallback
    return {
      status: 'failed',
      correlationId,
      error: err.message,
    };
  }
}

async function sendFallback(data: InboundJobData, deps: InboundHandlerDeps, logger: Logger): Promise<void> {
  try {
    const patient = await deps.patients.findById(data.userId).catch(() => null);
    const language = patient?.language
      ?? (data.event.kind === 'text' ? detectLanguage(data.event.text) : null)
      ?? 'en';

    await deps.gateway.send(data.userId, { text: deps.localization.getText(language, 'error_processing') });
    logger.info({ correlationId: data.correlationId }, 'Fallback error message sent to user');
  } catch (sendErr) {
    logger.error({
      correlationId: data.correlationId,
      error: toError(sendErr).message,
    }, 'Failed to send fallback message, user received no response');
  }
}
