import { describe, expect, it } from "vitest";
import {
  boundaryError,
  buildEntity,
  errorStep,
  okStep,
  RecordingTarget,
  richFields,
  ScriptedProvider,
} from "../../__tests__/support/fakes";
import { createHarness } from "../../__tests__/support/harness";
import { createTask } from "../../core/entities/taskStateMachine";
import type { ResearchTask, TaskState } from "../../core/entities/research";
import { InMemoryTaskStore } from "../../infra/memory/inMemoryStores";
import { ResearchTaskRunner } from "./researchTaskRunner";
import type { RunSignals } from "./retryController";

/** Fails the save that records the first attempt. */
class FlakyTaskStore extends InMemoryTaskStore {
  override async save(task: ResearchTask): Promise<void> {
    if (task.state === "in-flight" && task.attempts.length === 1) {
      throw new Error("disk full");
    }
    await super.save(task);
  }
}

const idleSignals = (): RunSignals => ({
  stop: new AbortController().signal,
  abort: new AbortController().signal,
});

const buildRunner = (
  harness: ReturnType<typeof createHarness>,
  signals: RunSignals = idleSignals(),
  onChange?: (state: TaskState) => void,
) =>
  new ResearchTaskRunner(
    createTask("task-1", buildEntity("acme"), harness.clock.now()),
    "research-acme",
    {
      chain: harness.chain,
      sink: harness.sink,
      taskStore: harness.taskStore,
      clock: harness.clock,
    },
    signals,
    (task) => onChange?.(task.state),
  );

describe("ResearchTaskRunner", () => {
  it("advances one phase per step and persists each transition", async () => {
    const harness = createHarness({
      providers: [new ScriptedProvider("alpha", [okStep(richFields())], 0.25)],
    });
    const runner = buildRunner(harness);

    expect(await runner.step()).toBe("acquire");
    expect((await harness.taskStore.get("acme"))?.state).toBe("in-flight");

    expect(await runner.step()).toBe("aggregate");
    expect((await harness.taskStore.get("acme"))?.attempts).toHaveLength(1);

    expect(await runner.step()).toBe("deliver");
    expect(await runner.step()).toBe("done");

    const stored = await harness.taskStore.get("acme");
    expect(stored).toMatchObject({
      state: "delivered",
      outcome: "delivered",
      record: { contributingProviders: ["alpha"], totalCost: 0.25, partial: false },
      deliveryAck: { idempotencyKey: "research-acme", receipt: "receipt-1" },
    });
    expect(runner.isDone).toBe(true);
  });

  it("reports state changes in order", async () => {
    const harness = createHarness({
      providers: [new ScriptedProvider("alpha", [okStep(richFields())], 0.25)],
    });
    const states: TaskState[] = [];

    await buildRunner(harness, idleSignals(), (state) => states.push(state)).run();

    expect(states).toEqual(["in-flight", "in-flight", "delivered"]);
  });

  it("fails as unreachable when no provider succeeds", async () => {
    const harness = createHarness({
      providers: [
        new ScriptedProvider("alpha", [errorStep("auth_invalid")], 0.25),
        new ScriptedProvider("beta", [errorStep("not_found")], 0.5),
      ],
    });

    const task = await buildRunner(harness).run();

    expect(task).toMatchObject({
      state: "failed",
      outcome: "unreachable",
      failure: {
        lastProvider: "beta",
        failureKind: "terminal-failure",
        message: "not_found from scripted provider",
      },
      record: null,
    });
    expect(task.attempts).toHaveLength(2);
    expect(harness.target.callCount).toBe(0);
  });

  it("keeps the record on a delivery failure", async () => {
    const harness = createHarness({
      providers: [new ScriptedProvider("alpha", [okStep(richFields())], 0.25)],
      target: new RecordingTarget([
        boundaryError("auth_invalid", { source: "delivery", provider: "recording" }),
      ]),
    });

    const task = await buildRunner(harness).run();

    expect(task).toMatchObject({
      state: "failed",
      outcome: "delivery-failed",
      failure: { lastProvider: "recording", failureKind: "delivery-failed" },
      record: { entityId: "acme" },
    });
  });

  it("turns an unexpected error into a terminal failure", async () => {
    const harness = createHarness({
      providers: [new ScriptedProvider("alpha", [okStep(richFields())], 0.25)],
      taskStore: new FlakyTaskStore(),
    });

    const task = await buildRunner(harness).run();

    expect(task).toMatchObject({
      state: "failed",
      outcome: "unreachable",
      failure: {
        lastProvider: "alpha",
        failureKind: "terminal-failure",
        message: "disk full",
      },
    });
  });

  it("rejects late events after being abandoned", async () => {
    const harness = createHarness({
      providers: [new ScriptedProvider("alpha", [okStep(richFields())], 0.25)],
    });
    const runner = buildRunner(harness);
    await runner.step();

    const abandoned = await runner.abandon(harness.clock.now());
    expect(abandoned).toMatchObject({
      state: "cancelled",
      outcome: "cancelled",
      failure: {
        lastProvider: null,
        failureKind: "cancelled",
        message: "Abandoned after the stop grace period.",
      },
    });

    expect(await runner.step()).toBe("done");
    expect((await harness.taskStore.get("acme"))?.state).toBe("cancelled");
  });

  it("cancels without calling providers when stop has already fired", async () => {
    const alpha = new ScriptedProvider("alpha", [okStep(richFields())], 0.25);
    const harness = createHarness({ providers: [alpha] });
    const stop = new AbortController();
    stop.abort();

    const task = await buildRunner(harness, {
      stop: stop.signal,
      abort: new AbortController().signal,
    }).run();

    expect(task.state).toBe("cancelled");
    expect(alpha.callCount).toBe(0);
  });
});
