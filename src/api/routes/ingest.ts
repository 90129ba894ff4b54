import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { Command, InboundEvent, InboundJobData } from '../../shared/types';
import { BadRequestError } from '../../shared/errors';
import { sanitizeInput } from '../../shared/validation';

const gatewayWebhookSchema = z.object({
  userId: z.string().min(1).max(128),
  text: z.string().optional(),
  choice: z.string().min(1).max(200).optional(),
  displayName: z.string().max(200).optional(),
  messageId: z.string().min(1).max(128).optional(),
});

export type GatewayWebhookPayload = z.infer<typeof gatewayWebhookSchema>;

const COMMANDS: Record<string, Command> = {
  '/start': 'start',
  '/end': 'end',
  '/help': 'help',
};

export interface IngestRoutesOptions {
  enqueue: (data: InboundJobData) => Promise<string>;
  now?: () => Date;
}

/** Maps a webhook payload onto an inbound event; null when there is nothing to process. */
export function toInboundEvent(payload: GatewayWebhookPayload): InboundEvent | null {
  if (payload.choice) {
    return { kind: 'choice', value: payload.choice };
  }

  const text = payload.text?.trim();
  if (!text) {
    return null;
  }

  // "/start@bot_name" is how some transports address commands in groups
  const command = COMMANDS[text.split(/[\s@]/)[0]?.toLowerCase() ?? ''];
  if (command) {
    return { kind: 'command', command };
  }

  return { kind: 'text', text };
}

/** BullMQ rejects custom job ids containing ':'. */
function jobIdFor(userId: string, messageId: string): string {
  return `${userId}-${messageId}`.replace(/:/g, '_');
}

export const ingestRoutes: FastifyPluginAsync<IngestRoutesOptions> = async (
  app: FastifyInstance,
  options
) => {
  const now = options.now ?? (() => new Date());

  app.post('/ingest/gateway', async (request, reply) => {
    const parseResult = gatewayWebhookSchema.safeParse(request.body);
    if (!parseResult.success) {
      throw new BadRequestError(`Invalid webhook payload: ${parseResult.error.message}`);
    }

    const payload = parseResult.data;
    const event = toInboundEvent(payload);

    if (!event) {
      request.log.debug({ userId: payload.userId }, 'Ignoring empty message');
      return {
        success: true,
        correlationId: request.correlationId,
        action: 'ignored',
        reason: 'Empty message',
      };
    }

    // A redelivered message maps onto the same job id and is dropped by the queue
    const correlationId = payload.messageId
      ? jobIdFor(payload.userId, payload.messageId)
      : request.correlationId;

    const jobData: InboundJobData = {
      type: 'inbound_event',
      correlationId,
      userId: payload.userId,
      event,
      ...(payload.displayName && { displayName: sanitizeInput(payload.displayName, 100) }),
      receivedAt: now().toISOString(),
    };

    const jobId = await options.enqueue(jobData);

    request.log.info({ jobId, userId: payload.userId, event: event.kind }, 'Event queued');

    reply.status(202);
    return { success: true, correlationId, jobId };
  });
};
