import type { FactType, MedicalCondition, MedicalSource, SourcedFact } from '../../shared/types';
import {
  KnowledgeLookupError,
  ValidationCancelledError,
  errorMessage,
  withTimeout,
} from '../../shared/errors';
import { findKeywords, normalizeText } from '../../shared/matching';
import { createChildLogger } from '../../infra/logging/logger';
import type { KnowledgeRepository } from './repository';

const log = createChildLogger({ component: 'knowledge-store' });

export interface KnowledgeStoreOptions {
  timeoutMs: number;
  cacheTtlMs?: number;
}

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

/**
 * Read side of the medical knowledge base. Sources and conditions are small
 * and cached for cacheTtlMs; fact lookups always hit the repository.
 * Every lookup is bounded by timeoutMs and fails as KnowledgeLookupError.
 */
export class KnowledgeStore {
  private sources: CacheEntry<MedicalSource[]> | null = null;
  private conditions: CacheEntry<MedicalCondition[]> | null = null;
  private readonly cacheTtlMs: number;

  constructor(
    private repository: KnowledgeRepository,
    private options: KnowledgeStoreOptions
  ) {
    this.cacheTtlMs = options.cacheTtlMs ?? 5 * 60 * 1000;
  }

  /** Active sources, most authoritative first. */
  async getSources(signal?: AbortSignal): Promise<MedicalSource[]> {
    if (this.sources && this.sources.expiresAt > Date.now()) {
      return this.sources.value;
    }

    const all = await this.lookup('listSources', () => this.repository.listSources(), signal);
    const active = all
      .filter((s) => s.isActive)
      .sort((a, b) => a.authorityLevel - b.authorityLevel || a.id - b.id);

    this.sources = { value: active, expiresAt: Date.now() + this.cacheTtlMs };
    return active;
  }

  async getConditions(signal?: AbortSignal): Promise<MedicalCondition[]> {
    if (this.conditions && this.conditions.expiresAt > Date.now()) {
      return this.conditions.value;
    }

    const conditions = await this.lookup('listConditions', () => this.repository.listConditions(), signal);
    this.conditions = { value: conditions, expiresAt: Date.now() + this.cacheTtlMs };
    return conditions;
  }

  async getCondition(conditionId: number, signal?: AbortSignal): Promise<MedicalCondition | null> {
    const conditions = await this.getConditions(signal);
    return conditions.find((c) => c.id === conditionId) ?? null;
  }

  /** Conditions whose name or an alias contains the search term. */
  async searchConditions(term: string, signal?: AbortSignal): Promise<MedicalCondition[]> {
    const needle = normalizeText(term);
    const conditions = await this.getConditions(signal);
    if (!needle) return conditions;

    return conditions.filter((c) =>
      [c.name, ...c.aliases].some((name) => normalizeText(name).includes(needle))
    );
  }

  /** Conditions whose name or an alias is mentioned in free text. */
  async findConditionsMentioned(text: string, signal?: AbortSignal): Promise<MedicalCondition[]> {
    const conditions = await this.getConditions(signal);
    return conditions.filter((c) => findKeywords(text, [c.name, ...c.aliases]).length > 0);
  }

  async findFacts(
    factType: FactType,
    text: string,
    conditionId?: number,
    signal?: AbortSignal
  ): Promise<SourcedFact[]> {
    return this.lookup(
      'findMatchingFacts',
      () => this.repository.findMatchingFacts({ factType, text, conditionId }),
      signal
    );
  }

  invalidate(): void {
    this.sources = null;
    this.conditions = null;
  }

  private async lookup<T>(operation: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    try {
      return await withTimeout(
        fn(),
        this.options.timeoutMs,
        () => new KnowledgeLookupError(`${operation} timed out after ${this.options.timeoutMs}ms`),
        signal
      );
    } catch (error) {
      if (error instanceof KnowledgeLookupError || error instanceof ValidationCancelledError) {
        throw error;
      }
      log.warn({ operation, error: errorMessage(error) }, 'Knowledge lookup failed');
      throw new KnowledgeLookupError(errorMessage(error), error instanceof Error ? error : undefined);
    }
  }
}
