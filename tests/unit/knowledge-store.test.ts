import { describe, expect, it, vi } from "vitest";
import { KnowledgeStore } from "../../src/domain/knowledge/service";
import { readKnowledgeSeed, seedKnowledge } from "../../src/domain/knowledge/loader";
import { KnowledgeLookupError, ValidationCancelledError } from "../../src/shared/errors";
import { InMemoryKnowledgeRepository } from "../support/in-memory";

async function seededStore(timeoutMs = 1000) {
  const repository = new InMemoryKnowledgeRepository();
  await seedKnowledge(repository);
  return { repository, store: new KnowledgeStore(repository, { timeoutMs }) };
}

describe("knowledge seed", () => {
  it("loads every source and condition and is idempotent", async () => {
    const repository = new InMemoryKnowledgeRepository();
    const first = await seedKnowledge(repository);

    expect(first.sources).toBe(6);
    expect(first.conditions).toBe(10);
    expect(first.factsInserted).toBe(repository.facts.length);

    const second = await seedKnowledge(repository);
    expect(second.factsInserted).toBe(0);
    expect(repository.sources).toHaveLength(6);
    expect(repository.conditions).toHaveLength(10);
  });

  it("skips facts cited to an unknown source code", async () => {
    const repository = new InMemoryKnowledgeRepository();
    const seed = readKnowledgeSeed();
    const summary = await seedKnowledge(repository, {
      sources: [],
      conditions: seed.conditions.slice(0, 1),
    });

    expect(summary.factsInserted).toBe(0);
    expect(repository.conditions.map((c) => c.name)).toEqual(["Fever"]);
  });
});

describe("KnowledgeStore", () => {
  it("lists active sources, most authoritative first", async () => {
    const { repository, store } = await seededStore();
    const nih = repository.sources.find((s) => s.name === "National Institutes of Health");
    if (nih) nih.isActive = false;

    const names = (await store.getSources()).map((s) => s.name);
    expect(names).toEqual([
      "World Health Organization",
      "Indian Council of Medical Research",
      "Ministry of Health & Family Welfare, India",
      "National Center for Vector Borne Diseases Control",
      "Indian Academy of Pediatrics",
    ]);
  });

  it("caches conditions until invalidated", async () => {
    const { repository, store } = await seededStore();

    await store.getConditions();
    await store.getConditions();
    expect(repository.calls.listConditions).toBe(1);

    store.invalidate();
    await store.getConditions();
    expect(repository.calls.listConditions).toBe(2);
  });

  it("searches condition names and aliases", async () => {
    const { store } = await seededStore();

    expect((await store.searchConditions("fever")).map((c) => c.name)).toEqual([
      "Fever",
      "Dengue Fever",
      "Typhoid Fever",
    ]);
    expect((await store.searchConditions("BP")).map((c) => c.name)).toEqual(["Hypertension"]);
    expect(await store.searchConditions("")).toHaveLength(10);
  });

  it("finds conditions mentioned in free text through their aliases", async () => {
    const { store } = await seededStore();
    const found = await store.findConditionsMentioned("my mother has sugar disease and high blood pressure");
    expect(found.map((c) => c.name)).toEqual(["Hypertension", "Diabetes"]);
  });

  it("wraps repository failures in KnowledgeLookupError", async () => {
    const { repository, store } = await seededStore();
    repository.failure = new Error("connection terminated");

    await expect(store.getConditions()).rejects.toThrow("Knowledge lookup failed: connection terminated");
    await expect(store.findFacts("treatment", "rest")).rejects.toBeInstanceOf(KnowledgeLookupError);
  });

  it("bounds lookups by the configured timeout", async () => {
    const { repository, store } = await seededStore(20);
    vi.spyOn(repository, "listSources").mockReturnValue(new Promise(() => {}));

    await expect(store.getSources()).rejects.toThrow("Knowledge lookup failed: listSources timed out after 20ms");
  });

  it("lets cancellation through unchanged", async () => {
    const { store } = await seededStore();
    const controller = new AbortController();
    controller.abort();

    await expect(store.findFacts("symptom", "fever", undefined, controller.signal)).rejects.toBeInstanceOf(
      ValidationCancelledError
    );
  });
});
