import { config } from './config';
import { buildApp } from './app';
import { logger } from './infra/logging/logger';
import { db, checkDatabaseHealth, runMigrations } from './infra/db/client';
import { notificationQueue, checkRedisHealth, getQueueStats, closeRedis } from './infra/queue/client';
import { AnthropicLlmClient } from './domain/ai/service';
import { PgKnowledgeRepository } from './domain/knowledge/repository';
import { KnowledgeStore } from './domain/knowledge/service';
import { seedKnowledge } from './domain/knowledge/loader';
import { loadKeywordTables } from './domain/validation/keywords';
import { ClaimExtractor } from './domain/validation/claim-extractor';
import { FactChecker } from './domain/validation/fact-checker';
import { SemanticValidator } from './domain/validation/semantic-validator';
import { ValidationOrchestrator } from './domain/validation/orchestrator';
import { PgEscalationRepository } from './domain/escalation/repository';
import { EscalationManager } from './domain/escalation/service';
import { QueueExpertNotifier } from './domain/escalation/notifier';
import { PgDisclaimerRepository } from './domain/disclaimer/repository';
import { DisclaimerSelector } from './domain/disclaimer/service';
import { PgValidationAuditRepository } from './domain/audit/repository';
import { ResponseSafetyService } from './domain/safety/service';

async function bootstrap() {
  logger.info('Starting response safety API bootstrap...');

  const applied = await runMigrations(db);
  logger.info({ applied }, 'Migrations checked');

  const knowledgeRepository = new PgKnowledgeRepository(db);
  const seeded = await seedKnowledge(knowledgeRepository);
  logger.info(seeded, 'Medical knowledge seeded');

  const keywords = loadKeywordTables();
  const knowledge = new KnowledgeStore(knowledgeRepository, { timeoutMs: config.knowledgeTimeoutMs });

  // Without an API key claim extraction runs on keywords only
  const llm = config.anthropicApiKey
    ? new AnthropicLlmClient({
        apiKey: config.anthropicApiKey,
        model: config.llmModel,
        timeoutMs: config.llmTimeoutMs,
        maxRequestsPerMinute: config.claudeRpmLimit,
      })
    : null;
  if (!llm) {
    logger.warn('ANTHROPIC_API_KEY not set, claim extraction will use keywords only');
  }

  const extractor = new ClaimExtractor(llm, keywords, { timeoutMs: config.llmTimeoutMs });
  const semantic = new SemanticValidator(extractor, new FactChecker(knowledge), knowledge, keywords);
  const orchestrator = new ValidationOrchestrator(keywords, semantic);

  const audit = new PgValidationAuditRepository(db);
  const escalation = new EscalationManager(
    new PgEscalationRepository(db),
    new QueueExpertNotifier(notificationQueue)
  );
  const disclaimers = new DisclaimerSelector(new PgDisclaimerRepository(db));

  const safety = new ResponseSafetyService(orchestrator, audit, escalation, disclaimers, {
    semanticByDefault: config.semanticValidationEnabled,
  });

  const app = await buildApp({
    safety,
    audit,
    escalation,
    disclaimers,
    knowledge,
    health: {
      database: () => checkDatabaseHealth(db),
      redis: checkRedisHealth,
      queue: getQueueStats,
    },
  });

  // Graceful shutdown handler
  let isShuttingDown = false;

  const shutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    logger.info({ signal }, 'Received shutdown signal, closing server...');

    try {
      await app.close();
      await db.end();
      await closeRedis();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await app.listen({ port: config.port, host: '0.0.0.0' });
  logger.info({ port: config.port, env: config.nodeEnv, semantic: config.semanticValidationEnabled }, 'Server started');
}

bootstrap().catch((err) => {
  logger.error({ err }, 'Failed to start server');
  process.exit(1);
});
