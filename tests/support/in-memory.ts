import type {
  KnowledgeRepository,
  SourceSeed,
  ConditionSeed,
  FactSeed,
  FactQuery,
} from "../../src/domain/knowledge/repository";
import type { EscalationRepository, NewCase, CaseTransition } from "../../src/domain/escalation/repository";
import type {
  DisclaimerRepository,
  DisclaimerHistoryEntry,
  NewDisclaimer,
  NewTracking,
} from "../../src/domain/disclaimer/repository";
import type {
  ValidationAuditRepository,
  NewValidationRecord,
  EscalationOutcome,
  ValidationAuditFilter,
} from "../../src/domain/audit/repository";
import type {
  CaseStatus,
  Disclaimer,
  DisclaimerTracking,
  EscalatedCase,
  Expert,
  Language,
  MedicalCondition,
  MedicalFact,
  MedicalSource,
  ResponseValidationRecord,
  RiskLevel,
  SourcedFact,
} from "../../src/shared/types";

// In-process stand-ins for the Postgres repositories. Each mirrors the
// ordering and conflict rules of the SQL it replaces.

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

export class InMemoryKnowledgeRepository implements KnowledgeRepository {
  sources: MedicalSource[] = [];
  conditions: MedicalCondition[] = [];
  facts: MedicalFact[] = [];
  /** When set, every read rejects with this error. */
  failure: Error | null = null;
  calls = { listSources: 0, listConditions: 0, findMatchingFacts: 0 };

  async listSources(): Promise<MedicalSource[]> {
    this.calls.listSources++;
    this.throwIfFailing();
    return [...this.sources].sort((a, b) => a.authorityLevel - b.authorityLevel || a.id - b.id);
  }

  async listConditions(): Promise<MedicalCondition[]> {
    this.calls.listConditions++;
    this.throwIfFailing();
    return [...this.conditions];
  }

  async findMatchingFacts(query: FactQuery): Promise<SourcedFact[]> {
    this.calls.findMatchingFacts++;
    this.throwIfFailing();
    const needle = query.text.toLowerCase();

    const matches: SourcedFact[] = [];
    for (const fact of this.facts) {
      if (fact.factType !== query.factType) continue;
      if (query.conditionId !== undefined && fact.conditionId !== query.conditionId) continue;

      const text = fact.factText.toLowerCase();
      if (!text.includes(needle) && !needle.includes(text)) continue;

      const source = this.sources.find((s) => s.id === fact.sourceId);
      if (!source || !source.isActive) continue;

      matches.push({ ...fact, sourceName: source.name, authorityLevel: source.authorityLevel });
    }

    return matches.sort((a, b) => a.authorityLevel - b.authorityLevel || a.id - b.id);
  }

  async upsertSource(seed: SourceSeed): Promise<number> {
    const existing = this.sources.find((s) => s.name === seed.name);
    if (existing) {
      Object.assign(existing, seed);
      return existing.id;
    }
    const id = this.sources.length + 1;
    this.sources.push({ id, ...seed, isActive: true });
    return id;
  }

  async upsertCondition(seed: ConditionSeed): Promise<number> {
    const existing = this.conditions.find((c) => c.name === seed.name);
    if (existing) {
      Object.assign(existing, seed);
      return existing.id;
    }
    const id = this.conditions.length + 1;
    this.conditions.push({ id, ...seed });
    return id;
  }

  async insertFact(seed: FactSeed): Promise<boolean> {
    const duplicate = this.facts.some(
      (f) =>
        f.conditionId === seed.conditionId &&
        f.sourceId === seed.sourceId &&
        f.factType === seed.factType &&
        f.factText === seed.factText
    );
    if (duplicate) return false;
    this.facts.push({ id: this.facts.length + 1, ...seed });
    return true;
  }

  private throwIfFailing(): void {
    if (this.failure) throw this.failure;
  }
}

export class InMemoryEscalationRepository implements EscalationRepository {
  experts: Expert[] = [];
  cases: EscalatedCase[] = [];
  /** Rejects the next N createCase calls. */
  createFailures = 0;

  addExpert(expert: Partial<Expert> & Pick<Expert, "name">): Expert {
    const created: Expert = {
      id: this.experts.length + 1,
      phone: null,
      specialization: null,
      isActive: true,
      isAvailable: true,
      ...expert,
    };
    this.experts.push(created);
    return created;
  }

  async findAvailableExpert(): Promise<Expert | null> {
    return this.experts.find((e) => e.isActive && e.isAvailable) ?? null;
  }

  async createCase(input: NewCase): Promise<EscalatedCase> {
    if (this.createFailures > 0) {
      this.createFailures--;
      throw new Error("connect ECONNREFUSED 127.0.0.1:5432");
    }
    const now = new Date();
    const created: EscalatedCase = {
      id: this.cases.length + 1,
      ...input,
      status: "open",
      resolutionNotes: null,
      createdAt: now,
      updatedAt: now,
      resolvedAt: null,
    };
    this.cases.push(created);
    return { ...created };
  }

  async getCase(caseId: number): Promise<EscalatedCase | null> {
    const found = this.cases.find((c) => c.id === caseId);
    return found ? { ...found } : null;
  }

  async transitionCase(transition: CaseTransition): Promise<EscalatedCase | null> {
    // Yield first so that concurrent callers interleave like separate connections
    await tick();
    const found = this.cases.find((c) => c.id === transition.caseId);
    if (!found || !transition.from.includes(found.status)) return null;

    const now = new Date();
    found.status = transition.to;
    found.resolutionNotes = transition.notes ?? found.resolutionNotes;
    found.updatedAt = now;
    if (transition.to === "resolved") found.resolvedAt = now;
    return { ...found };
  }

  async listCasesForExpert(expertId: number, statuses: readonly CaseStatus[]): Promise<EscalatedCase[]> {
    return this.cases
      .filter((c) => c.assignedExpertId === expertId && statuses.includes(c.status))
      .map((c) => ({ ...c }));
  }
}

export class InMemoryDisclaimerRepository implements DisclaimerRepository {
  disclaimers: Disclaimer[] = [];
  tracking: DisclaimerTracking[] = [];
  trackFailure: Error | null = null;
  findFailure: Error | null = null;

  async findActive(riskLevel: RiskLevel, language: Language): Promise<Disclaimer | null> {
    await tick();
    if (this.findFailure) throw this.findFailure;
    const active = this.disclaimers
      .filter((d) => d.riskLevel === riskLevel && d.language === language && d.isActive)
      .sort((a, b) => b.priority - a.priority || a.id - b.id);
    return active[0] ?? null;
  }

  async insertDefaultIfAbsent(riskLevel: RiskLevel, language: Language, content: string): Promise<void> {
    await tick();
    const exists = this.disclaimers.some(
      (d) => d.riskLevel === riskLevel && d.language === language && d.isActive && d.isDefault
    );
    if (exists) return;
    this.insert({ riskLevel, language, content, priority: 1 }, true);
  }

  async create(input: NewDisclaimer): Promise<Disclaimer> {
    return this.insert(input, false);
  }

  async track(input: NewTracking): Promise<DisclaimerTracking> {
    if (this.trackFailure) throw this.trackFailure;
    const row: DisclaimerTracking = { id: this.tracking.length + 1, ...input, shownAt: new Date() };
    this.tracking.push(row);
    return row;
  }

  async listHistory(userId: string, limit: number): Promise<DisclaimerHistoryEntry[]> {
    const entries: DisclaimerHistoryEntry[] = [];
    for (const row of [...this.tracking].reverse()) {
      if (row.userId !== userId) continue;
      const disclaimer = this.disclaimers.find((d) => d.id === row.disclaimerId);
      if (!disclaimer) continue;
      entries.push({
        ...row,
        riskLevel: disclaimer.riskLevel,
        language: disclaimer.language,
        content: disclaimer.content,
      });
    }
    return entries.slice(0, limit);
  }

  private insert(input: NewDisclaimer, isDefault: boolean): Disclaimer {
    const row: Disclaimer = {
      id: this.disclaimers.length + 1,
      ...input,
      isActive: true,
      isDefault,
      createdAt: new Date(),
    };
    this.disclaimers.push(row);
    return row;
  }
}

export class InMemoryValidationAuditRepository implements ValidationAuditRepository {
  records: ResponseValidationRecord[] = [];
  recordFailure: Error | null = null;

  async record(input: NewValidationRecord): Promise<ResponseValidationRecord> {
    if (this.recordFailure) throw this.recordFailure;
    const row: ResponseValidationRecord = {
      ...input.result,
      id: this.records.length + 1,
      userId: input.userId,
      messageId: input.messageId,
      userQuery: input.userQuery,
      botResponse: input.botResponse,
      escalationId: null,
      escalationError: null,
      createdAt: new Date(),
    };
    this.records.push(row);
    return row;
  }

  async recordEscalation(validationId: number, outcome: EscalationOutcome): Promise<void> {
    const found = this.records.find((r) => r.id === validationId);
    if (!found) return;
    found.escalationId = outcome.escalationId;
    found.escalationError = outcome.escalationError;
  }

  async list(filter: ValidationAuditFilter): Promise<ResponseValidationRecord[]> {
    return this.records
      .filter((r) => filter.userId === undefined || r.userId === filter.userId)
      .filter((r) => filter.messageId === undefined || r.messageId === filter.messageId)
      .filter((r) => filter.from === undefined || r.createdAt >= filter.from)
      .filter((r) => filter.to === undefined || r.createdAt <= filter.to)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
      .slice(0, filter.limit);
  }
}
