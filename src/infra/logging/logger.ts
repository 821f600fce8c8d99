import pino, { Logger } from 'pino';
import { config } from '../../config';

export const logger = pino({
  level: config.logLevel,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'swasthya-safety-core',
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

/**
 * Time an async step and log its outcome. Errors are logged and rethrown.
 */
export async function logExecution<T>(
  correlationId: string,
  action: string,
  fn: () => Promise<T>,
  parentLogger?: Logger
): Promise<T> {
  const log = parentLogger || logger;
  const startTime = Date.now();

  log.debug({ correlationId, action }, `Starting ${action}`);

  try {
    const result = await fn();
    log.info({ correlationId, action, durationMs: Date.now() - startTime }, `Completed ${action}`);
    return result;
  } catch (error) {
    log.error({
      correlationId,
      action,
      durationMs: Date.now() - startTime,
      error: error instanceof Error ? error.message : String(error),
    }, `Failed ${action}`);

    throw error;
  }
}

// ============================================================================
// AI Usage Logging
// ============================================================================

interface AIUsageLog {
  purpose: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  latencyMs: number;
}

export function logAIUsage(usage: AIUsageLog): void {
  logger.info({ ...usage }, 'LLM usage');
}

// ============================================================================
// Child Logger Factory
// ============================================================================

export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
