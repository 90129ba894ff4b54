import { z } from 'zod';

const configSchema = z.object({
  // Environment
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

  // Server
  port: z.coerce.number().default(3000),
  apiSecretKey: z.string().min(16),
  corsOrigins: z.string().default('*').transform((s) => s.split(',')),
  publicBaseUrl: z.string().url().default('http://localhost:3000'),

  // Database
  databaseUrl: z.string().url(),

  // Redis
  redisUrl: z.string().default('redis://localhost:6379'),

  // Language service
  anthropicApiKey: z.string(),
  anthropicModel: z.string().default('claude-sonnet-4-5-20250929'),
  anthropicFastModel: z.string().default('claude-haiku-4-5-20251001'),
  languageServiceTimeoutMs: z.coerce.number().int().positive().default(15000),

  // Messaging gateway
  gatewayUrl: z.string().url(),
  gatewayApiKey: z.string(),

  // Conversation
  defaultLanguage: z.enum(['en', 'ar']).default('en'),

  // Session policy
  checkpointEvery: z.coerce.number().int().positive().default(5),
  classificationEvery: z.coerce.number().int().positive().default(5),
  classificationMinInteractions: z.coerce.number().int().positive().default(3),
  classificationWindow: z.coerce.number().int().positive().default(5),
  lettingGoOfferEvery: z.coerce.number().int().positive().default(3),

  // Worker
  workerConcurrency: z.coerce.number().default(20),
  jobTimeoutMs: z.coerce.number().default(120000),

  // Logging
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Rate limiting
  claudeRpmLimit: z.coerce.number().default(50),
});

export type Config = z.infer<typeof configSchema>;

export function parseConfig(env: NodeJS.ProcessEnv) {
  return configSchema.safeParse({
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    apiSecretKey: env.API_SECRET_KEY,
    corsOrigins: env.CORS_ORIGINS,
    publicBaseUrl: env.PUBLIC_BASE_URL,
    databaseUrl: env.DATABASE_URL,
    redisUrl: env.REDIS_URL,
    anthropicApiKey: env.ANTHROPIC_API_KEY,
    anthropicModel: env.ANTHROPIC_MODEL,
    anthropicFastModel: env.ANTHROPIC_FAST_MODEL,
    languageServiceTimeoutMs: env.LANGUAGE_SERVICE_TIMEOUT_MS,
    gatewayUrl: env.GATEWAY_URL,
    gatewayApiKey: env.GATEWAY_API_KEY,
    defaultLanguage: env.DEFAULT_LANGUAGE,
    checkpointEvery: env.CHECKPOINT_EVERY,
    classificationEvery: env.CLASSIFICATION_EVERY,
    classificationMinInteractions: env.CLASSIFICATION_MIN_INTERACTIONS,
    classificationWindow: env.CLASSIFICATION_WINDOW,
    lettingGoOfferEvery: env.LETTING_GO_OFFER_EVERY,
    workerConcurrency: env.WORKER_CONCURRENCY,
    jobTimeoutMs: env.JOB_TIMEOUT_MS,
    logLevel: env.LOG_LEVEL,
    claudeRpmLimit: env.CLAUDE_RPM_LIMIT,
  });
}

function loadConfig(): Config {
  const result = parseConfig(process.env);

  if (!result.success) {
    console.error('Configuration validation failed:');
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

export const config = loadConfig();
