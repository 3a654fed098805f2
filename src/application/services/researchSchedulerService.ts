import type { CompanyEntity } from "../../core/entities/company";
import { deriveIdempotencyKey } from "../../core/entities/delivery";
import type {
  ResearchTask,
  TaskFailureKind,
  TaskState,
  TerminalOutcomeKind,
} from "../../core/entities/research";
import {
  createTask,
  isTerminalState,
  lastAttemptedProvider,
} from "../../core/entities/taskStateMachine";
import type {
  ClockPort,
  IdGeneratorPort,
  SleeperPort,
  TaskStorePort,
} from "../../core/ports/outboundPorts";
import { waitForAbort } from "../../shared/concurrency/signals";
import {
  logger as defaultLogger,
  toErrorDetails,
  type Logger,
} from "../../shared/logger/logger";
import type { IdempotentDeliverySink } from "./deliverySink";
import type { ProviderFallbackChain } from "./fallbackChain";
import { ResearchTaskRunner } from "./researchTaskRunner";
import type { RunSignals } from "./retryController";

export type SchedulerOptions = {
  batchSize: number;
  parallelism: number;
  /** How long in-flight tasks may keep running after a stop before they are abandoned. */
  gracePeriodMs: number;
};

export type ResearchSchedulerDeps = {
  chain: ProviderFallbackChain;
  sink: IdempotentDeliverySink;
  taskStore: TaskStorePort;
  clock: ClockPort;
  ids: IdGeneratorPort;
  sleeper: SleeperPort;
  logger?: Logger;
};

export type EntityOutcome = {
  entityId: string;
  name: string;
  state: TaskState;
  outcome: TerminalOutcomeKind | null;
  lastProvider: string | null;
  failureKind: TaskFailureKind | null;
  message: string | null;
  attempts: number;
  cost: number;
  resumed: boolean;
  idempotencyKey: string;
};

export type BatchReport = {
  index: number;
  entityIds: string[];
  startedAt: Date;
  finishedAt: Date;
  abandoned: boolean;
  cost: number;
};

export type RunReport = {
  runId: string;
  startedAt: Date;
  finishedAt: Date;
  outcomes: EntityOutcome[];
  batches: BatchReport[];
  duplicates: string[];
  totals: Record<TerminalOutcomeKind, number>;
  totalCost: number;
  stopped: boolean;
};

const taskCost = (task: ResearchTask): number =>
  task.attempts.reduce((total, attempt) => total + attempt.cost, 0);

export const toEntityOutcome = (
  task: ResearchTask,
  idempotencyKey: string,
  resumed: boolean,
): EntityOutcome => ({
  entityId: task.entity.id,
  name: task.entity.name,
  state: task.state,
  outcome: task.outcome,
  lastProvider: task.failure?.lastProvider ?? lastAttemptedProvider(task),
  failureKind: task.failure?.failureKind ?? null,
  message: task.failure?.message ?? null,
  attempts: task.attempts.length,
  cost: taskCost(task),
  resumed,
  idempotencyKey,
});

const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const batches: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    batches.push(items.slice(index, index + size));
  }
  return batches;
};

export const emptyStateCounts = (): Record<TaskState, number> => ({
  pending: 0,
  "in-flight": 0,
  delivered: 0,
  failed: 0,
  cancelled: 0,
});

/**
 * Owns fan-out of an entity list into batches of bounded-parallel tasks and collects exactly one
 * terminal outcome per unique entity.
 */
export class ResearchSchedulerService {
  private readonly live = new Map<string, ResearchTaskRunner>();
  /** Non-terminal tasks only; a task leaves this map when it settles into `settled`. */
  private readonly active = new Map<string, TaskState>();
  private readonly settled = emptyStateCounts();
  private readonly log: Logger;

  constructor(
    private readonly deps: ResearchSchedulerDeps,
    private readonly options: SchedulerOptions,
  ) {
    this.log = deps.logger ?? defaultLogger;
  }

  /**
   * Live tasks by current state plus one terminal count per outcome this scheduler has produced.
   */
  taskCounts(): Record<TaskState, number> {
    const counts = { ...this.settled };
    for (const state of this.active.values()) {
      counts[state] += 1;
    }
    return counts;
  }

  private track(entityId: string, state: TaskState): void {
    if (!isTerminalState(state)) {
      this.active.set(entityId, state);
      return;
    }
    if (this.active.delete(entityId)) {
      this.settled[state] += 1;
    }
  }

  async run(
    entities: readonly CompanyEntity[],
    stopSignal?: AbortSignal,
  ): Promise<RunReport> {
    const runId = this.deps.ids.next();
    const startedAt = this.deps.clock.now();
    const hardAbort = new AbortController();
    const signals: RunSignals = {
      stop: stopSignal ?? new AbortController().signal,
      abort: hardAbort.signal,
    };

    const seen = new Set<string>();
    const duplicates: string[] = [];
    const unique: CompanyEntity[] = [];
    for (const entity of entities) {
      if (seen.has(entity.id)) {
        duplicates.push(entity.id);
        continue;
      }
      seen.add(entity.id);
      unique.push(entity);
    }
    if (duplicates.length > 0) {
      this.log.warn({ runId, duplicates }, "Skipping duplicate entities");
    }

    for (const entity of unique) {
      this.track(entity.id, "pending");
    }

    const batchSize = Math.max(1, this.options.batchSize);
    const outcomes: EntityOutcome[] = [];
    const batches: BatchReport[] = [];

    for (const [index, batch] of chunk(unique, batchSize).entries()) {
      const batchStartedAt = this.deps.clock.now();
      const { results, abandoned } = await this.runBatch(batch, signals, hardAbort);
      outcomes.push(...results);

      const cost = results.reduce((total, outcome) => total + outcome.cost, 0);
      batches.push({
        index,
        entityIds: batch.map((entity) => entity.id),
        startedAt: batchStartedAt,
        finishedAt: this.deps.clock.now(),
        abandoned,
        cost,
      });
      this.log.info(
        {
          runId,
          batch: index + 1,
          size: batch.length,
          delivered: results.filter((outcome) => outcome.outcome === "delivered").length,
          cost,
          stopped: signals.stop.aborted,
        },
        "Batch complete",
      );
    }

    const totals: Record<TerminalOutcomeKind, number> = {
      delivered: 0,
      unreachable: 0,
      "delivery-failed": 0,
      cancelled: 0,
    };
    for (const outcome of outcomes) {
      if (outcome.outcome) {
        totals[outcome.outcome] += 1;
      }
    }
    const totalCost = outcomes.reduce((total, outcome) => total + outcome.cost, 0);

    const report: RunReport = {
      runId,
      startedAt,
      finishedAt: this.deps.clock.now(),
      outcomes,
      batches,
      duplicates,
      totals,
      totalCost,
      stopped: signals.stop.aborted,
    };
    this.log.info({ runId, totals, totalCost, duplicates: duplicates.length }, "Run complete");
    return report;
  }

  private async runBatch(
    batch: readonly CompanyEntity[],
    signals: RunSignals,
    hardAbort: AbortController,
  ): Promise<{ results: EntityOutcome[]; abandoned: boolean }> {
    const queue = [...batch];
    const results = new Map<string, EntityOutcome>();

    const worker = async (): Promise<void> => {
      for (let entity = queue.shift(); entity; entity = queue.shift()) {
        results.set(entity.id, await this.processEntity(entity, signals));
      }
    };

    const workerCount = Math.max(1, Math.min(this.options.parallelism, batch.length));
    const workers = Promise.all(Array.from({ length: workerCount }, () => worker()));

    const graceWait = new AbortController();
    let abandoned = false;
    try {
      const graceElapsed = await Promise.race([
        workers.then(() => false),
        this.waitForGrace(signals.stop, graceWait.signal),
      ]);

      if (graceElapsed) {
        abandoned = true;
        hardAbort.abort();
        const now = this.deps.clock.now();
        const live = batch.flatMap((entity) => {
          const runner = this.live.get(entity.id);
          return runner ? [runner] : [];
        });
        this.log.warn(
          { abandoned: live.length, gracePeriodMs: this.options.gracePeriodMs },
          "Grace period elapsed; abandoning in-flight tasks",
        );
        await Promise.all(live.map((runner) => runner.abandon(now)));
        await workers;
      }
    } finally {
      graceWait.abort();
    }

    return {
      results: batch.flatMap((entity) => {
        const outcome = results.get(entity.id);
        return outcome ? [outcome] : [];
      }),
      abandoned,
    };
  }

  private async waitForGrace(stop: AbortSignal, cancel: AbortSignal): Promise<boolean> {
    const stopped = await waitForAbort(stop, cancel);
    if (!stopped) {
      return false;
    }
    return this.deps.sleeper.sleep(this.options.gracePeriodMs, cancel);
  }

  private async processEntity(
    entity: CompanyEntity,
    signals: RunSignals,
  ): Promise<EntityOutcome> {
    const idempotencyKey = deriveIdempotencyKey(entity.id);

    try {
      const stored = await this.deps.taskStore.get(entity.id);
      if (stored?.state === "delivered") {
        this.track(entity.id, "delivered");
        this.log.info({ entityId: entity.id }, "Entity already delivered; skipping");
        return toEntityOutcome(stored, idempotencyKey, true);
      }

      const runner = new ResearchTaskRunner(
        createTask(this.deps.ids.next(), entity, this.deps.clock.now()),
        idempotencyKey,
        {
          chain: this.deps.chain,
          sink: this.deps.sink,
          taskStore: this.deps.taskStore,
          clock: this.deps.clock,
          logger: this.deps.logger,
        },
        signals,
        (task) => this.track(task.entity.id, task.state),
      );

      if (signals.stop.aborted) {
        const task = await runner.abandon(
          this.deps.clock.now(),
          "Run stopped before the task was admitted.",
        );
        return toEntityOutcome(task, idempotencyKey, false);
      }

      this.live.set(entity.id, runner);
      try {
        await runner.run();
      } finally {
        this.live.delete(entity.id);
      }

      const task = runner.current;
      if (!isTerminalState(task.state)) {
        this.log.error({ entityId: entity.id, state: task.state }, "Task ended without a terminal state");
      }
      return toEntityOutcome(task, idempotencyKey, false);
    } catch (error) {
      this.log.error(
        { entityId: entity.id, error: toErrorDetails(error) },
        "Entity processing failed",
      );
      this.track(entity.id, "failed");
      return {
        entityId: entity.id,
        name: entity.name,
        state: "failed",
        outcome: "unreachable",
        lastProvider: null,
        failureKind: "terminal-failure",
        message: error instanceof Error ? error.message : String(error),
        attempts: 0,
        cost: 0,
        resumed: false,
        idempotencyKey,
      };
    }
  }
}

export const countTaskStates = (
  tasks: readonly Pick<ResearchTask, "state">[],
): Record<TaskState, number> => {
  const counts = emptyStateCounts();
  for (const task of tasks) {
    counts[task.state] += 1;
  }
  return counts;
};
