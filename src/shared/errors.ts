// ============================================================================
// Base Error Classes
// ============================================================================

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: string;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

// ============================================================================
// HTTP Errors
// ============================================================================

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Unauthorized') {
    super(message, 401, 'UNAUTHORIZED');
  }
}

export class TooManyRequestsError extends AppError {
  public readonly retryAfter?: number;

  constructor(message: string = 'Too many requests', retryAfter?: number) {
    super(message, 429, 'RATE_LIMITED');
    this.retryAfter = retryAfter;
  }
}

// ============================================================================
// Validation Pipeline Errors
// ============================================================================

/**
 * LLM claim extraction failed (unreachable, timed out, or broke the output
 * contract). Always absorbed by the keyword fallback.
 */
export class ExtractionError extends AppError {
  public readonly originalError?: Error;

  constructor(message: string, originalError?: Error) {
    super(`Claim extraction failed: ${message}`, 502, 'EXTRACTION_FAILED');
    this.originalError = originalError;
  }
}

export class KnowledgeLookupError extends AppError {
  public readonly originalError?: Error;

  constructor(message: string, originalError?: Error) {
    super(`Knowledge lookup failed: ${message}`, 503, 'KNOWLEDGE_LOOKUP_FAILED');
    this.originalError = originalError;
  }
}

export class ValidationCancelledError extends AppError {
  constructor(message: string = 'Validation cancelled by caller') {
    super(message, 499, 'VALIDATION_CANCELLED');
  }
}

// ============================================================================
// Escalation Errors
// ============================================================================

export class CaseNotFoundError extends AppError {
  constructor(caseId: number) {
    super(`Escalated case not found: ${caseId}`, 404, 'CASE_NOT_FOUND');
  }
}

export class InvalidCaseTransitionError extends AppError {
  public readonly from: string;
  public readonly to: string;

  constructor(caseId: number, from: string, to: string) {
    super(
      `Case ${caseId} cannot move from ${from} to ${to}`,
      409,
      'INVALID_CASE_TRANSITION'
    );
    this.from = from;
    this.to = to;
  }
}

// ============================================================================
// External Service Errors
// ============================================================================

export class ExternalServiceError extends AppError {
  public readonly service: string;
  public readonly originalError?: Error;

  constructor(service: string, message: string, originalError?: Error) {
    super(`${service} error: ${message}`, 502, 'EXTERNAL_SERVICE_ERROR');
    this.service = service;
    this.originalError = originalError;
  }
}

export class AIServiceError extends ExternalServiceError {
  constructor(message: string, originalError?: Error) {
    super('AI', message, originalError);
  }
}

export class ChatwootError extends ExternalServiceError {
  constructor(message: string, originalError?: Error) {
    super('Chatwoot', message, originalError);
  }
}

// ============================================================================
// Database Errors
// ============================================================================

export class DatabaseError extends AppError {
  public readonly originalError?: Error;

  constructor(message: string, originalError?: Error) {
    super(`Database error: ${message}`, 500, 'DATABASE_ERROR', false);
    this.originalError = originalError;
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Check if error is retryable (transient)
 */
export function isRetryableError(error: unknown): boolean {
  if (isAppError(error)) {
    if (error.statusCode === 429 || error.statusCode === 503) {
      return true;
    }
    if (error instanceof ExternalServiceError || error instanceof DatabaseError) {
      return true;
    }
    return false;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    const retryablePatterns = [
      'timeout',
      'econnreset',
      'econnrefused',
      'network',
      'temporarily unavailable',
      'rate limit',
      'too many requests',
    ];
    return retryablePatterns.some(pattern => message.includes(pattern));
  }

  return false;
}

/**
 * Retry a function with exponential backoff
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: {
    maxRetries?: number;
    initialDelayMs?: number;
    maxDelayMs?: number;
    shouldRetry?: (error: unknown) => boolean;
  } = {}
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 1000,
    maxDelayMs = 10000,
    shouldRetry = isRetryableError,
  } = options;

  let lastError: unknown;
  let delay = initialDelayMs;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt === maxRetries || !shouldRetry(error)) {
        throw error;
      }

      await new Promise(resolve => setTimeout(resolve, delay));

      // Exponential backoff with jitter
      delay = Math.min(delay * 2 + Math.random() * 1000, maxDelayMs);
    }
  }

  throw lastError;
}

// ============================================================================
// Timeouts and Cancellation
// ============================================================================

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new ValidationCancelledError();
  }
}

/**
 * Race a promise against a deadline and the caller's abort signal.
 * The underlying work is not interrupted; its result is discarded.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  signal?: AbortSignal
): Promise<T> {
  throwIfAborted(signal);

  let timer: NodeJS.Timeout | undefined;
  let abortListener: (() => void) | undefined;

  const guards = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
    if (signal) {
      abortListener = () => reject(new ValidationCancelledError());
      signal.addEventListener('abort', abortListener, { once: true });
    }
  });

  try {
    return await Promise.race([promise, guards]);
  } finally {
    if (timer) clearTimeout(timer);
    if (signal && abortListener) signal.removeEventListener('abort', abortListener);
  }
}
