import type { FastifyRequest, FastifyReply } from 'fastify';
import { TooManyRequestsError, UnauthorizedError } from '../../shared/errors';

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/** API key check for the `/api` routes: `X-API-Key` or `Authorization: Bearer`. */
export function createAuthMiddleware(apiSecretKey: string) {
  return async function authMiddleware(request: FastifyRequest, _reply: FastifyReply): Promise<void> {
    const apiKey = headerValue(request.headers['x-api-key']);
    const authHeader = request.headers.authorization;

    let token: string | undefined;

    if (apiKey) {
      token = apiKey;
    } else if (authHeader?.startsWith('Bearer ')) {
      token = authHeader.substring(7);
    }

    if (!token) {
      throw new UnauthorizedError('Missing API key or authorization token');
    }

    if (token !== apiSecretKey) {
      request.log.warn({ providedKey: token.substring(0, 4) + '...' }, 'Invalid API key attempt');
      throw new UnauthorizedError('Invalid API key');
    }

    request.log.debug('API key validated');
  };
}

/** Fixed-window limit per client IP. */
export function rateLimit(options: {
  windowMs: number;
  maxRequests: number;
  now?: () => number;
}) {
  const requests = new Map<string, { count: number; resetAt: number }>();
  const now = options.now ?? Date.now;

  return async function rateLimitMiddleware(
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<void> {
    const key = request.ip;
    const current = now();

    if (requests.size > 10000) {
      for (const [k, v] of requests.entries()) {
        if (v.resetAt < current) {
          requests.delete(k);
        }
      }
    }

    let record = requests.get(key);
    if (!record || record.resetAt < current) {
      record = { count: 0, resetAt: current + options.windowMs };
      requests.set(key, record);
    }

    record.count++;

    reply.header('X-RateLimit-Limit', options.maxRequests);
    reply.header('X-RateLimit-Remaining', Math.max(0, options.maxRequests - record.count));
    reply.header('X-RateLimit-Reset', Math.ceil(record.resetAt / 1000));

    if (record.count > options.maxRequests) {
      throw new TooManyRequestsError('Too many requests', record.resetAt - current);
    }
  };
}
