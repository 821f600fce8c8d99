import { describe, expect, it } from "vitest";
import { EscalationManager } from "../../src/domain/escalation/service";
import type { OpenCaseInput } from "../../src/domain/escalation/service";
import { QueueExpertNotifier, formatExpertAlert } from "../../src/domain/escalation/notifier";
import { CaseNotFoundError, InvalidCaseTransitionError } from "../../src/shared/errors";
import { FakeNotificationQueue, RecordingNotifier } from "../support/fakes";
import { InMemoryEscalationRepository } from "../support/in-memory";

const input: OpenCaseInput = {
  userId: "user-1",
  query: "my 5 year old has fever",
  response: "give aspirin 500mg",
  severity: "high",
  reason: "dangerous_medication_combination",
  keywords: [],
  validationId: 11,
  correlationId: "corr-1",
};

function setup() {
  const repository = new InMemoryEscalationRepository();
  const notifier = new RecordingNotifier();
  return { repository, notifier, manager: new EscalationManager(repository, notifier) };
}

describe("EscalationManager · opening cases", () => {
  it("assigns the first available expert and notifies them", async () => {
    const { repository, notifier, manager } = setup();
    repository.addExpert({ name: "Dr. Away", phone: "+919800000009", isAvailable: false });
    const expert = repository.addExpert({ name: "Dr. Rao", phone: "+919800000001" });

    const created = await manager.openCase(input);

    expect(created).toMatchObject({ id: 1, status: "open", assignedExpertId: expert.id, validationId: 11 });
    expect(notifier.jobs).toEqual([
      {
        type: "expert_notification",
        correlationId: "corr-1",
        caseId: 1,
        expertId: expert.id,
        expertPhone: "+919800000001",
        severity: "high",
        reason: "dangerous_medication_combination",
        originalQuery: "my 5 year old has fever",
      },
    ]);
  });

  it("opens an unassigned case when nobody is available", async () => {
    const { notifier, manager } = setup();
    const created = await manager.openCase(input);

    expect(created.assignedExpertId).toBeNull();
    expect(notifier.jobs).toEqual([]);
  });

  it("skips the alert for an expert without a phone", async () => {
    const { repository, notifier, manager } = setup();
    repository.addExpert({ name: "Dr. Desk" });

    const created = await manager.openCase(input);

    expect(created.assignedExpertId).toBe(1);
    expect(notifier.jobs).toEqual([]);
  });

  it("keeps the case when the alert fails", async () => {
    const { repository, notifier, manager } = setup();
    repository.addExpert({ name: "Dr. Rao", phone: "+919800000001" });
    notifier.failure = new Error("redis down");

    await expect(manager.openCase(input)).resolves.toMatchObject({ id: 1 });
    expect(repository.cases).toHaveLength(1);
  });
});

describe("EscalationManager · status transitions", () => {
  it("moves a case through review to resolution", async () => {
    const { manager } = setup();
    await manager.openCase(input);

    expect((await manager.startCase(1)).status).toBe("in_progress");

    const resolved = await manager.resolveCase(1, "Advised paracetamol instead");
    expect(resolved.status).toBe("resolved");
    expect(resolved.resolutionNotes).toBe("Advised paracetamol instead");
    expect(resolved.resolvedAt).toBeInstanceOf(Date);
  });

  it("rejects transitions out of a terminal status", async () => {
    const { manager } = setup();
    await manager.openCase(input);
    await manager.resolveCase(1, "done");

    await expect(manager.closeCase(1)).rejects.toThrow("Case 1 cannot move from resolved to closed");
    await expect(manager.resolveCase(1, "again")).rejects.toBeInstanceOf(InvalidCaseTransitionError);
  });

  it("does not restart a case already in progress", async () => {
    const { manager } = setup();
    await manager.openCase(input);
    await manager.startCase(1);

    await expect(manager.startCase(1)).rejects.toThrow("Case 1 cannot move from in_progress to in_progress");
  });

  it("lets exactly one of two concurrent resolutions win", async () => {
    const { manager, repository } = setup();
    await manager.openCase(input);

    const outcomes = await Promise.allSettled([manager.resolveCase(1, "first"), manager.resolveCase(1, "second")]);

    expect(outcomes.filter((o) => o.status === "fulfilled")).toHaveLength(1);
    const rejected = outcomes.find((o): o is PromiseRejectedResult => o.status === "rejected");
    expect(rejected?.reason).toBeInstanceOf(InvalidCaseTransitionError);
    expect(repository.cases[0]?.resolutionNotes).toBe("first");
  });

  it("reports unknown cases", async () => {
    const { manager } = setup();

    await expect(manager.getCase(99)).rejects.toBeInstanceOf(CaseNotFoundError);
    await expect(manager.startCase(99)).rejects.toThrow("Escalated case not found: 99");
  });

  it("lists an expert's open and in-progress cases", async () => {
    const { repository, manager } = setup();
    repository.addExpert({ name: "Dr. Rao" });
    await manager.openCase(input);
    await manager.openCase(input);
    await manager.openCase(input);
    await manager.startCase(2);
    await manager.closeCase(3, "duplicate");

    expect((await manager.listPending(1)).map((c) => [c.id, c.status])).toEqual([
      [1, "open"],
      [2, "in_progress"],
    ]);
  });
});

describe("expert notifications", () => {
  it("queues one alert per case assignment", async () => {
    const queue = new FakeNotificationQueue();
    const job = {
      type: "expert_notification" as const,
      correlationId: "corr-7",
      caseId: 7,
      expertId: 2,
      expertPhone: "+919800000002",
      severity: "critical" as const,
      reason: "emergency_keywords",
      originalQuery: "chest pain",
    };

    await new QueueExpertNotifier(queue).notify(job);

    expect(queue.added).toEqual([{ name: "expert_notification", data: job, jobId: "case-7-expert-2" }]);
  });

  it("formats the alert and truncates long questions", () => {
    const text = formatExpertAlert({
      type: "expert_notification",
      correlationId: "c",
      caseId: 3,
      expertId: 1,
      expertPhone: "+919800000001",
      severity: "high",
      reason: "very_low_confidence",
      originalQuery: "a".repeat(301),
    });

    expect(text).toBe(
      ["🚨 New HIGH case #3 needs review", "Reason: very_low_confidence", `User asked: "${"a".repeat(297)}..."`].join("\n")
    );
  });
});
