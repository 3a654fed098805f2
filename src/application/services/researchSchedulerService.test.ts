import { ok, type Result } from "neverthrow";
import { describe, expect, it } from "vitest";
import {
  buildEntity,
  ManualSleeper,
  okStep,
  richFields,
  ScriptedProvider,
} from "../../__tests__/support/fakes";
import { createHarness } from "../../__tests__/support/harness";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { CompanyEntity } from "../../core/entities/company";
import type { ProviderContent, ResearchTask } from "../../core/entities/research";
import {
  applyTaskEvent,
  createTask,
} from "../../core/entities/taskStateMachine";
import type { ResearchProviderPort } from "../../core/ports/inboundPorts";
import { InMemoryTaskStore } from "../../infra/memory/inMemoryStores";
import { countTaskStates } from "./researchSchedulerService";

const nextTick = () => new Promise<void>((resolve) => setImmediate(resolve));

/** Tracks how many calls overlap. */
class ConcurrencyProbe implements ResearchProviderPort {
  readonly name = "probe";
  readonly costClass = "probe";
  readonly estimatedCost = 0.25;
  active = 0;
  maxActive = 0;

  async attempt(): Promise<Result<ProviderContent, AppBoundaryError>> {
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    await nextTick();
    this.active -= 1;
    return ok({ fields: richFields(), rawPayload: null, cost: 0.25 });
  }
}

class BrokenTaskStore extends InMemoryTaskStore {
  override async get(entityId: string): Promise<ResearchTask | null> {
    if (entityId === "broken") {
      throw new Error("connection reset");
    }
    return super.get(entityId);
  }
}

const entities = (...ids: string[]): CompanyEntity[] => ids.map((id) => buildEntity(id));

describe("ResearchSchedulerService", () => {
  it("runs batches with bounded parallelism and one outcome per entity", async () => {
    const probe = new ConcurrencyProbe();
    const harness = createHarness({
      providers: [probe],
      scheduler: { batchSize: 4, parallelism: 2 },
    });

    const report = await harness.scheduler.run(entities("a", "b", "c", "d", "e", "f"));

    expect(probe.maxActive).toBe(2);
    expect(report.batches.map((batch) => batch.entityIds)).toEqual([
      ["a", "b", "c", "d"],
      ["e", "f"],
    ]);
    expect(report.outcomes.map((outcome) => outcome.entityId)).toEqual([
      "a",
      "b",
      "c",
      "d",
      "e",
      "f",
    ]);
    expect(report.totals).toEqual({
      delivered: 6,
      unreachable: 0,
      "delivery-failed": 0,
      cancelled: 0,
    });
    expect(report.totalCost).toBe(1.5);
    expect(report.batches[0]?.cost).toBe(1);
    expect(report.stopped).toBe(false);
  });

  it("skips duplicate entity ids", async () => {
    const alpha = new ScriptedProvider("alpha", [okStep(richFields())], 0.25);
    const harness = createHarness({ providers: [alpha] });

    const report = await harness.scheduler.run(entities("a", "b", "a"));

    expect(report.duplicates).toEqual(["a"]);
    expect(report.outcomes).toHaveLength(2);
    expect(alpha.callCount).toBe(2);
  });

  it("reuses a delivered task instead of researching it again", async () => {
    const alpha = new ScriptedProvider("alpha", [okStep(richFields())], 0.25);
    const harness = createHarness({ providers: [alpha] });
    await harness.scheduler.run(entities("a"));

    const report = await harness.scheduler.run(entities("a", "b"));

    expect(alpha.callCount).toBe(2);
    expect(report.outcomes.map((outcome) => [outcome.entityId, outcome.resumed])).toEqual([
      ["a", true],
      ["b", false],
    ]);
    expect(harness.target.callCount).toBe(2);
  });

  it("retries an entity whose earlier task did not deliver", async () => {
    const alpha = new ScriptedProvider("alpha", [okStep(richFields())], 0.25);
    const taskStore = new InMemoryTaskStore();
    const failed = applyTaskEvent(
      createTask("old-task", buildEntity("a"), new Date("2026-03-01T09:00:00.000Z")),
      { type: "admit", at: new Date("2026-03-01T09:00:00.000Z") },
    ).andThen((task) =>
      applyTaskEvent(task, {
        type: "fail",
        kind: "unreachable",
        failure: { lastProvider: "alpha", failureKind: "terminal-failure" },
        at: new Date("2026-03-01T09:00:01.000Z"),
      }),
    );
    if (failed.isErr()) {
      throw new Error(failed.error.message);
    }
    await taskStore.save(failed.value);
    const harness = createHarness({ providers: [alpha], taskStore });

    const report = await harness.scheduler.run(entities("a"));

    expect(report.outcomes[0]).toMatchObject({ outcome: "delivered", resumed: false });
    expect((await taskStore.get("a"))?.id).toBe("task-2");
  });

  it("cancels every unadmitted entity when the run is already stopped", async () => {
    const alpha = new ScriptedProvider("alpha", [okStep(richFields())], 0.25);
    const harness = createHarness({ providers: [alpha] });
    const stop = new AbortController();
    stop.abort();

    const report = await harness.scheduler.run(entities("a", "b"), stop.signal);

    expect(alpha.callCount).toBe(0);
    expect(report.stopped).toBe(true);
    expect(report.outcomes).toEqual([
      expect.objectContaining({
        entityId: "a",
        state: "cancelled",
        outcome: "cancelled",
        message: "Run stopped before the task was admitted.",
      }),
      expect.objectContaining({ entityId: "b", state: "cancelled" }),
    ]);
  });

  it("abandons in-flight tasks once the grace period elapses", async () => {
    const sleeper = new ManualSleeper();
    const slow = new ScriptedProvider("slow", [{ kind: "hang" }], 0.25);
    const harness = createHarness({
      providers: [slow],
      sleeper,
      scheduler: { parallelism: 2, gracePeriodMs: 5_000 },
    });
    const stop = new AbortController();

    const pending = harness.scheduler.run(entities("a", "b", "c"), stop.signal);
    await nextTick();
    expect(slow.callCount).toBe(2);

    stop.abort();
    await nextTick();
    expect(sleeper.delays).toEqual([5_000]);
    sleeper.elapseAll();

    const report = await pending;
    expect(report.batches[0]?.abandoned).toBe(true);
    expect(report.totals.cancelled).toBe(3);
    expect(report.outcomes.map((outcome) => outcome.message)).toEqual([
      "Abandoned after the stop grace period.",
      "Abandoned after the stop grace period.",
      "Run stopped before the task was admitted.",
    ]);
    expect(slow.callCount).toBe(2);
    expect((await harness.taskStore.get("a"))?.state).toBe("cancelled");
  });

  it("reports a synthetic failure when an entity cannot be processed", async () => {
    const alpha = new ScriptedProvider("alpha", [okStep(richFields())], 0.25);
    const harness = createHarness({ providers: [alpha], taskStore: new BrokenTaskStore() });

    const report = await harness.scheduler.run(entities("broken", "fine"));

    expect(report.outcomes[0]).toEqual({
      entityId: "broken",
      name: "Company broken",
      state: "failed",
      outcome: "unreachable",
      lastProvider: null,
      failureKind: "terminal-failure",
      message: "connection reset",
      attempts: 0,
      cost: 0,
      resumed: false,
      idempotencyKey: expect.stringMatching(/^research-[0-9a-f]{32}$/),
    });
    expect(report.outcomes[1]?.outcome).toBe("delivered");
  });

  it("counts one terminal outcome per reported entity across runs", async () => {
    const alpha = new ScriptedProvider("alpha", [okStep(richFields())], 0.25);
    const harness = createHarness({ providers: [alpha] });

    await harness.scheduler.run(entities("a", "b"));
    const second = await harness.scheduler.run(entities("b", "c"));

    expect(second.outcomes.map((outcome) => outcome.resumed)).toEqual([true, false]);
    expect(harness.scheduler.taskCounts()).toEqual({
      pending: 0,
      "in-flight": 0,
      delivered: 4,
      failed: 0,
      cancelled: 0,
    });
  });

  it("shows queued tasks as pending until they settle", async () => {
    const sleeper = new ManualSleeper();
    const slow = new ScriptedProvider("slow", [{ kind: "hang" }], 0.25);
    const harness = createHarness({
      providers: [slow],
      sleeper,
      scheduler: { batchSize: 2, parallelism: 1 },
    });
    const stop = new AbortController();

    const running = harness.scheduler.run(entities("a", "b", "c"), stop.signal);
    await nextTick();

    expect(harness.scheduler.taskCounts()).toEqual({
      pending: 2,
      "in-flight": 1,
      delivered: 0,
      failed: 0,
      cancelled: 0,
    });

    stop.abort();
    await nextTick();
    sleeper.elapseAll();
    await running;

    expect(harness.scheduler.taskCounts()).toEqual({
      pending: 0,
      "in-flight": 0,
      delivered: 0,
      failed: 0,
      cancelled: 3,
    });
  });
});

describe("countTaskStates", () => {
  it("tallies stored tasks per state", () => {
    expect(
      countTaskStates([{ state: "delivered" }, { state: "failed" }, { state: "delivered" }]),
    ).toEqual({ pending: 0, "in-flight": 0, delivered: 2, failed: 1, cancelled: 0 });
  });
});
