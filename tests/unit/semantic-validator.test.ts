import { describe, expect, it } from "vitest";
import { createPipeline } from "../support/pipeline";
import { ScriptedLlm } from "../support/fakes";

const TOP_SOURCES = [
  "World Health Organization",
  "Indian Council of Medical Research",
  "Ministry of Health & Family Welfare, India",
  "National Center for Vector Borne Diseases Control",
  "Indian Academy of Pediatrics",
];

describe("SemanticValidator", () => {
  it("returns neutral scores when no claims are found", async () => {
    const { semantic } = await createPipeline();
    const report = await semantic.validate("hello", "Okay.");

    expect(report.metrics.totalClaims).toBe(0);
    expect(report.scores).toEqual({ semanticConfidence: 0.5, completeness: 0.3, accuracy: 0.5, appropriateness: 0.5 });
    expect(report.risk).toBe("low");
    expect(report.requiresEscalation).toBe(false);
    expect(report.sourcesUsed).toEqual([]);
  });

  it("scores a prevention answer with one unverifiable claim", async () => {
    const { semantic } = await createPipeline();
    const report = await semantic.validate(
      "how to prevent malaria",
      "use treated bed nets, indoor spraying, and prophylaxis in endemic areas"
    );

    expect(report.factChecks.map((c) => [c.claimType, c.status])).toEqual([
      ["treatment", "unverifiable"],
      ["prevention", "verified"],
      ["prevention", "verified"],
      ["prevention", "verified"],
    ]);
    expect(report.metrics).toEqual({
      totalClaims: 4,
      verifiedClaims: 3,
      contradictedClaims: 0,
      unverifiableClaims: 1,
      concerningClaims: 0,
    });
    expect(report.scores).toEqual({ semanticConfidence: 0.75, completeness: 0.75, accuracy: 0.75, appropriateness: 0.8 });
    expect(report.factChecks[0]?.confidence).toBe(0.2);
    expect(report.risk).toBe("low");
    expect(report.sourcesUsed).toEqual(TOP_SOURCES);
  });

  it("contradicts a medication that is contraindicated for a condition in the query", async () => {
    const { semantic } = await createPipeline();
    const report = await semantic.validate("my 5 year old has fever", "Take aspirin for the fever");

    expect(report.factChecks.map((c) => [c.claimType, c.status])).toEqual([
      ["treatment", "contradicted"],
      ["treatment", "contradicted"],
      ["symptom", "verified"],
    ]);
    expect(report.factChecks[0]).toMatchObject({
      claim: "Take aspirin for the fever",
      confidence: 1,
      details: "Contraindicated for Fever: aspirin in children under 16",
    });
    expect(report.triggers).toEqual(["contradicted: Take aspirin for the fever"]);
    expect(report.scores.appropriateness).toBeCloseTo(0.367, 3);
    expect(report.risk).toBe("high");
    expect(report.requiresEscalation).toBe(true);
  });

  it("skips a child-only contraindication when the query names no child", async () => {
    const { semantic } = await createPipeline();
    const report = await semantic.validate("I have fever", "Take aspirin for the fever");

    expect(report.factChecks.map((c) => [c.claimType, c.status])).toEqual([
      ["treatment", "unverifiable"],
      ["treatment", "unverifiable"],
      ["symptom", "verified"],
    ]);
    expect(report.metrics.contradictedClaims).toBe(0);
    expect(report.triggers).toEqual([]);
    expect(report.risk).toBe("medium");
  });

  it("applies a contraindication that names no population", async () => {
    const { semantic } = await createPipeline();
    const report = await semantic.validate("I have diarrhea", "Take an antibiotic for the diarrhea");

    expect(report.factChecks[0]).toMatchObject({
      status: "contradicted",
      details: "Contraindicated for Diarrhea: antibiotics without bacterial confirmation",
    });
  });

  it("marks warning claims as concerning", async () => {
    const { semantic } = await createPipeline();
    const report = await semantic.validate(
      "cough for a week",
      "If symptoms persist go to the hospital immediately"
    );

    const concerning = {
      claim: "If symptoms persist go to the hospital immediately",
      claimType: "warning",
      status: "concerning",
      confidence: 0.7,
      matchedFactIds: [],
      sources: [],
      details: "Claim describes a warning sign or emergency and needs expert review",
    };
    expect(report.factChecks).toEqual([concerning, concerning, concerning]);
    expect(report.risk).toBe("high");
    expect(report.requiresEscalation).toBe(true);
    expect(report.triggers).toEqual(["concerning: If symptoms persist go to the hospital immediately"]);
  });

  it("treats claim types outside the knowledge base as unverifiable", async () => {
    const llm = new ScriptedLlm(['[{"text":"This is probably a migraine","type":"diagnosis","testable":true,"confidence":0.6}]']);
    const { semantic } = await createPipeline({ llm });
    const report = await semantic.validate("my head hurts", "This is probably a migraine, rest in a dark room");

    expect(report.factChecks[0]).toMatchObject({
      status: "unverifiable",
      details: "Claim type is not checked against the knowledge base",
    });
    expect(report.scores.accuracy).toBe(0);
    expect(report.risk).toBe("medium");
  });

  it("degrades to unverifiable claims when the knowledge base is down", async () => {
    const { semantic, repository } = await createPipeline();
    repository.failure = new Error("connection terminated");

    const report = await semantic.validate("I have mild headache", "Rest and drink water");

    expect(report.factChecks[0]).toMatchObject({ status: "unverifiable", details: "Knowledge base unavailable" });
    expect(report.sourcesUsed).toEqual([]);
  });
});
