import { z } from 'zod';

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const configSchema = z.object({
  // Environment
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

  // Server
  port: z.coerce.number().default(3000),
  apiSecretKey: z.string().min(16),
  corsOrigins: z
    .string()
    .default('*')
    .transform((s) => (s === '*' ? true : s.split(',').map((o) => o.trim()))),

  // Database
  databaseUrl: z.string().url(),

  // Redis
  redisUrl: z.string().default('redis://localhost:6379'),

  // AI Services (claim extraction falls back to keywords without a key)
  anthropicApiKey: z.string().min(1).optional(),
  llmModel: z.string().default('claude-3-5-haiku-20241022'),
  llmTimeoutMs: z.coerce.number().default(8000),
  claudeRpmLimit: z.coerce.number().default(50),

  // Validation
  knowledgeTimeoutMs: z.coerce.number().default(3000),
  semanticValidationEnabled: booleanFromEnv.default('true'),

  // Chatwoot
  chatwootUrl: z.string().url(),
  chatwootApiKey: z.string(),
  chatwootAccountId: z.coerce.number(),

  // Worker
  workerConcurrency: z.coerce.number().default(10),

  // Logging
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

function loadConfig() {
  const result = configSchema.safeParse({
    nodeEnv: process.env.NODE_ENV,
    port: process.env.PORT,
    apiSecretKey: process.env.API_SECRET_KEY,
    corsOrigins: process.env.CORS_ORIGINS,
    databaseUrl: process.env.DATABASE_URL,
    redisUrl: process.env.REDIS_URL,
    anthropicApiKey: process.env.ANTHROPIC_API_KEY || undefined,
    llmModel: process.env.LLM_MODEL,
    llmTimeoutMs: process.env.LLM_TIMEOUT_MS,
    claudeRpmLimit: process.env.CLAUDE_RPM_LIMIT,
    knowledgeTimeoutMs: process.env.KNOWLEDGE_TIMEOUT_MS,
    semanticValidationEnabled: process.env.SEMANTIC_VALIDATION_ENABLED,
    chatwootUrl: process.env.CHATWOOT_URL,
    chatwootApiKey: process.env.CHATWOOT_API_KEY,
    chatwootAccountId: process.env.CHATWOOT_ACCOUNT_ID,
    workerConcurrency: process.env.WORKER_CONCURRENCY,
    logLevel: process.env.LOG_LEVEL,
  });

  if (!result.success) {
    console.error('Configuration validation failed:');
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

export const config = loadConfig();
export type Config = z.infer<typeof configSchema>;
