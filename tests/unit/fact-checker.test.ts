import { describe, expect, it } from "vitest";
import { FactChecker } from "../../src/domain/validation/fact-checker";
import { KnowledgeStore } from "../../src/domain/knowledge/service";
import { InMemoryKnowledgeRepository } from "../support/in-memory";
import { createPipeline } from "../support/pipeline";

function conditionId(repository: InMemoryKnowledgeRepository, name: string): number {
  const found = repository.conditions.find((c) => c.name === name);
  if (!found) throw new Error(`condition ${name} not seeded`);
  return found.id;
}

describe("FactChecker", () => {
  it("verifies a treatment against every matching fact, most authoritative first", async () => {
    const { factChecker } = await createPipeline();
    const result = await factChecker.checkTreatment("Paracetamol");

    expect(result.verified).toBe(true);
    expect(result.confidence).toBeCloseTo(0.8);
    expect(result.matches).toHaveLength(8);
    expect(result.matches[0]?.authorityLevel).toBe(1);
    expect(result.matches.at(-1)?.sourceName).toBe("National Institutes of Health");
  });

  it("restricts matches to one condition when asked", async () => {
    const { factChecker, repository } = await createPipeline();
    const result = await factChecker.checkTreatment("paracetamol", conditionId(repository, "Dengue Fever"));

    expect(result.matches.map((m) => m.sourceName)).toEqual([
      "World Health Organization",
      "National Center for Vector Borne Diseases Control",
    ]);
  });

  it("matches when the claim contains the fact", async () => {
    const { factChecker } = await createPipeline();
    const result = await factChecker.checkPrevention("indoor spraying and prophylaxis in endemic areas");

    expect(result.verified).toBe(true);
    expect(new Set(result.matches.map((m) => m.factText))).toEqual(
      new Set(["indoor spraying", "prophylaxis in endemic areas"])
    );
  });

  it("reports no match for unknown or empty claims", async () => {
    const { factChecker } = await createPipeline();

    expect(await factChecker.checkPrevention("dance in the rain")).toEqual({
      verified: false,
      confidence: 0,
      matches: [],
    });
    expect((await factChecker.checkSymptom("   ")).verified).toBe(false);
  });

  it("ignores facts that only appear inside a longer word", async () => {
    const { factChecker } = await createPipeline();

    expect(await factChecker.checkTreatment("Take the herbal powder your neighbors recommend")).toEqual({
      verified: false,
      confidence: 0,
      matches: [],
    });
    expect((await factChecker.checkTreatment("ask about low interest loans")).verified).toBe(false);
  });

  it("averages stored fact confidences", async () => {
    const repository = new InMemoryKnowledgeRepository();
    const sourceId = await repository.upsertSource({
      name: "Test Source",
      sourceType: "test",
      authorityLevel: 1,
      url: null,
      description: null,
    });
    const cid = await repository.upsertCondition({
      name: "Scabies",
      icd10Code: null,
      description: null,
      aliases: [],
      symptoms: [],
      treatments: [],
      contraindications: [],
      warningSigns: [],
    });
    await repository.insertFact({ conditionId: cid, sourceId, factType: "treatment", factText: "permethrin cream", confidenceScore: 0.6 });
    await repository.insertFact({ conditionId: cid, sourceId, factType: "treatment", factText: "permethrin", confidenceScore: 0.9 });

    const checker = new FactChecker(new KnowledgeStore(repository, { timeoutMs: 100 }));
    const result = await checker.checkTreatment("apply permethrin cream");

    expect(result.matches).toHaveLength(2);
    expect(result.confidence).toBeCloseTo(0.75);
  });

  it("flags treatments listed as contraindicated for a condition", async () => {
    const { factChecker, repository } = await createPipeline();
    const dengue = conditionId(repository, "Dengue Fever");

    expect(await factChecker.checkContraindications("aspirin", dengue)).toEqual({
      flagged: true,
      reasons: ["aspirin because of bleeding risk"],
    });
    expect((await factChecker.checkContraindications("paracetamol", dengue)).flagged).toBe(false);
    expect((await factChecker.checkContraindications("aspirin", 999)).flagged).toBe(false);
  });
});
