import { z } from 'zod';
import { CLAIM_TYPES } from '../../shared/types';
import type { ClaimType, ExtractedClaim } from '../../shared/types';
import {
  ExtractionError,
  ValidationCancelledError,
  errorMessage,
  throwIfAborted,
  withTimeout,
} from '../../shared/errors';
import { containsKeyword, splitClauses } from '../../shared/matching';
import { createChildLogger } from '../../infra/logging/logger';
import type { LlmClient } from '../ai/service';
import type { ClaimKeywordBucket, KeywordTables } from './keywords';

const log = createChildLogger({ component: 'claim-extractor' });

const MIN_TEXT_LENGTH = 10;
const FALLBACK_CONFIDENCE = 0.7;
const FALLBACK_BUCKETS: readonly ClaimKeywordBucket[] = ['treatment', 'symptom', 'prevention', 'warning'];

const llmClaimsSchema = z.array(
  z.object({
    text: z.string().trim().min(1),
    type: z.enum(CLAIM_TYPES),
    testable: z.boolean(),
    confidence: z.number().min(0).max(1),
  })
);

export function buildExtractionPrompt(text: string): string {
  return [
    'Extract the medical claims made in the health advice below.',
    'Return ONLY a JSON array. Each element must be an object with:',
    `  "text": the claim as a short phrase,`,
    `  "type": one of ${CLAIM_TYPES.map((t) => `"${t}"`).join(', ')},`,
    '  "testable": true if the claim can be checked against medical references,',
    '  "confidence": a number between 0 and 1.',
    'Return [] if there are no claims.',
    '',
    'Advice:',
    text,
  ].join('\n');
}

/** Strip a surrounding markdown code fence, if any. */
function unfence(reply: string): string {
  const fenced = reply.trim().match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  return fenced?.[1] ?? reply.trim();
}

export function parseLlmClaims(reply: string): ExtractedClaim[] {
  let raw: unknown;
  try {
    raw = JSON.parse(unfence(reply));
  } catch (error) {
    throw new ExtractionError(`reply is not JSON: ${errorMessage(error)}`);
  }

  const parsed = llmClaimsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ExtractionError(`reply does not match claim contract: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }

  return parsed.data.filter((claim) => claim.testable);
}

export interface ClaimExtractorOptions {
  timeoutMs: number;
}

/**
 * Turns a bot answer into structured claims. Uses the LLM when one is
 * configured and falls back to keyword scanning on any LLM failure.
 */
export class ClaimExtractor {
  constructor(
    private llm: LlmClient | null,
    private keywords: KeywordTables,
    private options: ClaimExtractorOptions
  ) {}

  async extract(text: string, options: { signal?: AbortSignal } = {}): Promise<ExtractedClaim[]> {
    const trimmed = text.trim();
    if (trimmed.length < MIN_TEXT_LENGTH) return [];

    throwIfAborted(options.signal);

    if (this.llm) {
      try {
        return await this.extractWithLlm(this.llm, trimmed, options.signal);
      } catch (error) {
        if (error instanceof ValidationCancelledError) throw error;
        throwIfAborted(options.signal);
        log.warn({ error: errorMessage(error) }, 'LLM claim extraction failed, using keyword fallback');
      }
    }

    return this.extractWithKeywords(trimmed);
  }

  /**
   * Deterministic extraction: each keyword found yields one claim, the first
   * clause containing it. A keyword listed in several buckets counts once,
   * under the first bucket.
   */
  extractWithKeywords(text: string): ExtractedClaim[] {
    if (text.trim().length < MIN_TEXT_LENGTH) return [];

    const clauses = splitClauses(text);
    const claims: ExtractedClaim[] = [];
    const seen = new Set<string>();

    for (const bucket of FALLBACK_BUCKETS) {
      const type: ClaimType = bucket;

      for (const keyword of this.keywords.claimKeywords[bucket]) {
        if (seen.has(keyword)) continue;

        const clause = clauses.find((c) => containsKeyword(c, keyword));
        if (!clause) continue;

        seen.add(keyword);
        claims.push({ text: clause, type, testable: true, confidence: FALLBACK_CONFIDENCE });
      }
    }

    return claims;
  }

  private async extractWithLlm(llm: LlmClient, text: string, signal?: AbortSignal): Promise<ExtractedClaim[]> {
    const reply = await withTimeout(
      llm.complete(buildExtractionPrompt(text), { signal, purpose: 'claim_extraction' }),
      this.options.timeoutMs,
      () => new ExtractionError(`timed out after ${this.options.timeoutMs}ms`),
      signal
    );
    return parseLlmClaims(reply);
  }
}
