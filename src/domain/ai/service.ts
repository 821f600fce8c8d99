import Anthropic from '@anthropic-ai/sdk';
import { AIServiceError, ValidationCancelledError } from '../../shared/errors';
import { logAIUsage } from '../../infra/logging/logger';
import { RateLimiter } from '../../shared/rate-limiter';

export interface LlmCompletionOptions {
  signal?: AbortSignal;
  maxTokens?: number;
  /** Label for usage logs. */
  purpose?: string;
}

/**
 * Minimal text-completion seam. The validation pipeline only needs a prompt
 * in and text out; tests substitute a scripted implementation.
 */
export interface LlmClient {
  complete(prompt: string, options?: LlmCompletionOptions): Promise<string>;
}

export interface AnthropicLlmClientOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  maxRequestsPerMinute: number;
}

export class AnthropicLlmClient implements LlmClient {
  private client: Anthropic;
  private rateLimiter: RateLimiter;

  constructor(private options: AnthropicLlmClientOptions) {
    this.client = new Anthropic({
      apiKey: options.apiKey,
      maxRetries: 0,
    });

    this.rateLimiter = new RateLimiter({
      maxRequestsPerMinute: options.maxRequestsPerMinute,
      maxWaitMs: options.timeoutMs,
    });
  }

  async complete(prompt: string, options: LlmCompletionOptions = {}): Promise<string> {
    // Wait for rate limit slot
    await this.rateLimiter.acquire();

    const startTime = Date.now();

    try {
      const response = await this.client.messages.create(
        {
          model: this.options.model,
          max_tokens: options.maxTokens ?? 1024,
          temperature: 0,
          messages: [{ role: 'user', content: prompt }],
        },
        {
          signal: options.signal,
          timeout: this.options.timeoutMs,
        }
      );

      const content = response.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('\n');

      logAIUsage({
        purpose: options.purpose ?? 'completion',
        model: response.model,
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        latencyMs: Date.now() - startTime,
      });

      return content;
    } catch (error) {
      if (options.signal?.aborted) {
        throw new ValidationCancelledError();
      }

      const err = error instanceof Error ? error : new Error(String(error));

      // Handle rate limiting
      if (err.message.includes('429') || err.message.includes('rate_limit')) {
        throw new AIServiceError('Rate limit exceeded, please try again later', err);
      }

      throw new AIServiceError(err.message, err);
    }
  }
}
