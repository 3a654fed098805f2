import type {
  CanonicalRecord,
  ProviderAttempt,
  ResearchTask,
  TaskFailureKind,
} from "../../core/entities/research";
import {
  applyTaskEvent,
  isTerminalState,
  lastAttemptedProvider,
  type TaskEvent,
} from "../../core/entities/taskStateMachine";
import type { ClockPort, TaskStorePort } from "../../core/ports/outboundPorts";
import { KeyedMutex } from "../../shared/concurrency/keyedMutex";
import {
  logger as defaultLogger,
  toErrorDetails,
  type Logger,
} from "../../shared/logger/logger";
import type { IdempotentDeliverySink } from "./deliverySink";
import type { ProviderFallbackChain } from "./fallbackChain";
import { aggregateResult } from "./resultAggregator";
import type { RunSignals } from "./retryController";

export type TaskPhase = "admit" | "acquire" | "aggregate" | "deliver" | "done";

export type ResearchTaskRunnerDeps = {
  chain: ProviderFallbackChain;
  sink: IdempotentDeliverySink;
  taskStore: TaskStorePort;
  clock: ClockPort;
  logger?: Logger;
};

type Accepted = { partial: boolean };

/**
 * Drives one task through admit, acquire, aggregate and deliver, one phase per `step()`.
 * Every transition and attempt is persisted before the next phase starts.
 */
export class ResearchTaskRunner {
  private phase: TaskPhase = "admit";
  private task: ResearchTask;
  private accepted: Accepted | null = null;
  private record: CanonicalRecord | null = null;
  private readonly saves = new KeyedMutex();
  private readonly log: Logger;

  constructor(
    task: ResearchTask,
    readonly idempotencyKey: string,
    private readonly deps: ResearchTaskRunnerDeps,
    private readonly signals: RunSignals,
    private readonly onChange: (task: ResearchTask) => void = () => {},
  ) {
    this.task = task;
    this.log = (deps.logger ?? defaultLogger).child({
      taskId: task.id,
      entityId: task.entity.id,
    });
  }

  get current(): ResearchTask {
    return this.task;
  }

  get currentPhase(): TaskPhase {
    return this.phase;
  }

  get isDone(): boolean {
    return this.phase === "done" || isTerminalState(this.task.state);
  }

  async run(): Promise<ResearchTask> {
    while (!this.isDone) {
      try {
        await this.step();
      } catch (error) {
        this.log.error(
          { phase: this.phase, error: toErrorDetails(error) },
          "Task step failed unexpectedly",
        );
        await this.fail(
          this.phase === "deliver" ? "delivery-failed" : "unreachable",
          this.phase === "deliver" ? "delivery-failed" : "terminal-failure",
          error instanceof Error ? error.message : String(error),
        );
      }
    }

    this.phase = "done";
    return this.task;
  }

  async step(): Promise<TaskPhase> {
    if (this.isDone) {
      this.phase = "done";
      return this.phase;
    }

    switch (this.phase) {
      case "admit":
        await this.transition({ type: "admit", at: this.deps.clock.now() });
        this.phase = "acquire";
        break;

      case "acquire":
        await this.acquire();
        break;

      case "aggregate":
        await this.aggregate();
        break;

      case "deliver":
        await this.deliver();
        break;

      case "done":
        break;
    }

    return this.phase;
  }

  /**
   * Forces the task to `cancelled`. Anything the abandoned work reports afterwards is rejected by
   * the state machine.
   */
  async abandon(at: Date, message = "Abandoned after the stop grace period."): Promise<ResearchTask> {
    if (!isTerminalState(this.task.state)) {
      await this.transition({
        type: "cancel",
        at,
        failure: {
          lastProvider: lastAttemptedProvider(this.task),
          failureKind: "cancelled",
          message,
        },
      });
    }
    this.phase = "done";
    return this.task;
  }

  private async acquire(): Promise<void> {
    const outcome = await this.deps.chain.run(
      this.task.entity,
      this.signals,
      (attempt) => this.recordAttempt(attempt),
    );

    switch (outcome.kind) {
      case "success":
        this.accepted = { partial: outcome.partial };
        this.phase = "aggregate";
        return;
      case "unreachable":
        await this.fail("unreachable", outcome.failureKind, outcome.message, outcome.lastProvider);
        return;
      case "cancelled":
        await this.cancel(outcome.message);
        return;
    }
  }

  private async aggregate(): Promise<void> {
    const aggregated = aggregateResult(this.task.entity, this.task.attempts, {
      partial: this.accepted?.partial ?? false,
      generatedAt: this.deps.clock.now(),
    });

    if (aggregated.isErr()) {
      await this.fail("unreachable", "terminal-failure", aggregated.error.message);
      return;
    }

    this.record = aggregated.value;
    this.phase = "deliver";
  }

  private async deliver(): Promise<void> {
    const record = this.record;
    if (!record) {
      this.phase = "aggregate";
      return;
    }

    // Once content is paid for, delivery runs through the grace period; only the hard abort stops it.
    const outcome = await this.deps.sink.deliver(this.idempotencyKey, record, {
      stop: this.signals.abort,
      abort: this.signals.abort,
    });

    switch (outcome.kind) {
      case "acknowledged":
        await this.transition({
          type: "deliver",
          record,
          ack: outcome.ack,
          at: this.deps.clock.now(),
        });
        this.phase = "done";
        return;
      case "delivery-failed":
        await this.fail(
          "delivery-failed",
          "delivery-failed",
          outcome.error.message,
          outcome.error.provider,
          record,
        );
        return;
      case "cancelled":
        await this.cancel(outcome.message);
        return;
    }
  }

  private async recordAttempt(attempt: ProviderAttempt): Promise<void> {
    await this.transition({ type: "record-attempt", attempt });
  }

  private async fail(
    kind: "unreachable" | "delivery-failed",
    failureKind: TaskFailureKind,
    message: string,
    lastProvider: string | null = lastAttemptedProvider(this.task),
    record?: CanonicalRecord,
  ): Promise<void> {
    await this.transition({
      type: "fail",
      kind,
      failure: { lastProvider, failureKind, message },
      record,
      at: this.deps.clock.now(),
    });
    this.phase = "done";
  }

  private async cancel(message: string): Promise<void> {
    await this.transition({
      type: "cancel",
      at: this.deps.clock.now(),
      failure: {
        lastProvider: lastAttemptedProvider(this.task),
        failureKind: "cancelled",
        message,
      },
    });
    this.phase = "done";
  }

  private async transition(event: TaskEvent): Promise<void> {
    const next = applyTaskEvent(this.task, event);
    if (next.isErr()) {
      this.log.debug(
        { event: event.type, state: next.error.from, reason: next.error.message },
        "Ignored task event",
      );
      return;
    }

    this.task = next.value;
    this.onChange(this.task);
    const snapshot = this.task;
    await this.saves.runExclusive(snapshot.id, () =>
      this.deps.taskStore.save(snapshot),
    );
  }
}
