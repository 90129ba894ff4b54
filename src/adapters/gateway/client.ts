import type { Logger } from 'pino';
import type { MessagingGateway, OutboundReply } from '../../shared/types';
import { GatewayError, withRetry } from '../../shared/errors';

export interface GatewayClientOptions {
  baseUrl: string;
  apiKey: string;
  logger: Logger;
  maxRetries?: number;
  initialDelayMs?: number;
  fetchImpl?: typeof fetch;
}

class GatewayHttpError extends GatewayError {
  constructor(public readonly status: number, body: string) {
    super(`Failed to send message: ${status} ${body}`);
  }
}

/**
 * Sends replies to the chat transport. Choices become buttons on the
 * transport side; their `value` comes back as a choice event.
 */
export class GatewayClient implements MessagingGateway {
  private baseUrl: string;
  private apiKey: string;
  private logger: Logger;
  private maxRetries: number;
  private initialDelayMs: number;
  private fetchImpl: typeof fetch;

  constructor(options: GatewayClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.logger = options.logger;
    this.maxRetries = options.maxRetries ?? 2;
    this.initialDelayMs = options.initialDelayMs ?? 500;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async send(userId: string, reply: OutboundReply): Promise<void> {
    await withRetry(() => this.post(userId, reply), {
      maxRetries: this.maxRetries,
      initialDelayMs: this.initialDelayMs,
      // Client errors will not succeed on retry
      shouldRetry: (error) => !(error instanceof GatewayHttpError) || error.status >= 500 || error.status === 429,
    });

    this.logger.debug({ userId, contentLength: reply.text.length, choices: reply.choices?.length ?? 0 }, 'Message sent via gateway');
  }

  private async post(userId: string, reply: OutboundReply): Promise<void> {
    const body = {
      userId,
      text: reply.text,
      ...(reply.choices && reply.choices.length > 0 && { choices: reply.choices }),
    };

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/messages`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(body),
      });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      throw new GatewayError(`Network error: ${err.message}`, err);
    }

    if (!response.ok) {
      throw new GatewayHttpError(response.status, await response.text());
    }
  }
}
