import pino, { Logger } from 'pino';
import { config } from '../../config';

export const logger = pino({
  level: config.logLevel,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'mindline-core',
    env: config.nodeEnv,
  },
  // Pretty print in development
  ...(config.nodeEnv === 'development' && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  }),
});

// ============================================================================
// Execution Logging
// ============================================================================

export async function logExecution<T>(
  correlationId: string,
  action: string,
  fn: () => Promise<T>,
  parentLogger: Logger = logger
): Promise<T> {
  const startTime = Date.now();

  parentLogger.debug({ correlationId, action }, `Starting ${action}`);

  try {
    const result = await fn();
    const durationMs = Date.now() - startTime;

    parentLogger.info({ correlationId, action, durationMs }, `Completed ${action}`);

    return result;
  } catch (error) {
    const durationMs = Date.now() - startTime;
    const err = error instanceof Error ? error : new Error(String(error));

    parentLogger.error({
      correlationId,
      action,
      durationMs,
      error: err.message,
      stack: err.stack,
    }, `Failed ${action}`);

    throw error;
  }
}

// ============================================================================
// AI Usage Logging
// ============================================================================

export interface AIUsageLog {
  operation: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  latencyMs: number;
}

// USD per million tokens
const MODEL_PRICING: Record<string, { input: number; output: number }> = {
  'claude-sonnet-4-5-20250929': { input: 3.0, output: 15.0 },
  'claude-haiku-4-5-20251001': { input: 0.8, output: 4.0 },
};

export function estimateCostUsd(model: string, inputTokens: number, outputTokens: number): number {
  const pricing = MODEL_PRICING[model]
    ?? (model.includes('haiku') ? { input: 0.8, output: 4.0 } : { input: 3.0, output: 15.0 });

  return (inputTokens * pricing.input + outputTokens * pricing.output) / 1_000_000;
}

export function logAIUsage(usage: AIUsageLog, parentLogger: Logger = logger): void {
  parentLogger.info({
    ...usage,
    costUsd: estimateCostUsd(usage.model, usage.inputTokens, usage.outputTokens),
  }, 'AI usage');
}
