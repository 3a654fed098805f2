import { Command, InvalidArgumentError } from "commander";
import {
  createQueueRuntime,
  createRuntime,
  startOfUtcDay,
  type Runtime,
} from "../application/bootstrap/runtimeFactory";
import { countTaskStates } from "../application/services/researchSchedulerService";
import type { CompanyEntity } from "../core/entities/company";
import { CsvEntitySource } from "../infra/loaders/csvEntitySource";
import { env, researchProviders } from "../shared/config/env";
import { logger } from "../shared/logger/logger";
import { formatCostSummary, formatRunReport } from "./formatters";

const PROGRESS_INTERVAL_MS = 10_000;

const positiveInt = (raw: string): number => {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return value;
};

const loadEntities = async (
  source: CsvEntitySource,
  path: string,
  limit?: number,
): Promise<CompanyEntity[]> => {
  const loaded = await source.load({ path, limit });
  if (loaded.isErr()) {
    throw new Error(`Could not load entities from '${path}': ${loaded.error.message}`);
  }
  return loaded.value;
};

const deliveredToday = async (runtime: Runtime) => {
  const since = startOfUtcDay(runtime.clock.now()).getTime();
  const tasks = await runtime.taskStore.list();
  const delivered = tasks.filter(
    (task) => task.state === "delivered" && task.updatedAt.getTime() >= since,
  );
  return {
    delivered: delivered.length,
    cost: delivered.reduce(
      (total, task) =>
        total + task.attempts.reduce((sum, attempt) => sum + attempt.cost, 0),
      0,
    ),
  };
};

type RunOptions = {
  csv: string;
  limit?: number;
  batchSize?: number;
  parallelism?: number;
  graceMs?: number;
};

/**
 * Defines a single command surface so operational tasks use the same orchestration policies.
 */
export const buildCli = () => {
  const cli = new Command();
  cli.name("company-research").description("Multi-provider company research CLI");

  cli
    .command("run")
    .description("Research every company in a CSV in-process and deliver the results")
    .requiredOption("--csv <path>", "Company list CSV")
    .option("--limit <n>", "Only process the first n companies", positiveInt)
    .option("--batch-size <n>", "Companies per batch", positiveInt)
    .option("--parallelism <n>", "Concurrent tasks per batch", positiveInt)
    .option("--grace-ms <n>", "Grace period after Ctrl-C before abandoning tasks", positiveInt)
    .action(async (opts: RunOptions) => {
      const runtime = await createRuntime({
        batchSize: opts.batchSize,
        parallelism: opts.parallelism,
        gracePeriodMs: opts.graceMs,
      });
      const entities = await loadEntities(runtime.entitySource, opts.csv, opts.limit);

      const stop = new AbortController();
      const onInterrupt = (): void => {
        if (stop.signal.aborted) {
          logger.warn("Second interrupt received; exiting immediately");
          process.exit(130);
        }
        logger.warn(
          { gracePeriodMs: runtime.schedulerOptions.gracePeriodMs },
          "Stop requested; finishing in-flight tasks",
        );
        stop.abort();
      };
      process.on("SIGINT", onInterrupt);

      const progress = setInterval(() => {
        logger.info({ progress: runtime.monitor.snapshot() }, "Progress");
      }, PROGRESS_INTERVAL_MS);

      logger.info(
        { entities: entities.length, ...runtime.schedulerOptions },
        "Research run started",
      );

      try {
        const report = await runtime.scheduler.run(entities, stop.signal);
        console.log(formatRunReport(report));
        console.log("");
        const { delivered, cost } = await deliveredToday(runtime);
        console.log(formatCostSummary(runtime.ledger.snapshot(), { delivered, cost }));
      } finally {
        clearInterval(progress);
        process.off("SIGINT", onInterrupt);
        await runtime.close();
      }
    });

  cli
    .command("enqueue")
    .description("Queue every company in a CSV for the worker process")
    .requiredOption("--csv <path>", "Company list CSV")
    .option("--limit <n>", "Only enqueue the first n companies", positiveInt)
    .action(async (opts: { csv: string; limit?: number }) => {
      const entities = await loadEntities(new CsvEntitySource(), opts.csv, opts.limit);
      const { queue, orchestratorService } = createQueueRuntime();
      try {
        const summary = await orchestratorService.enqueueEntities(entities);
        logger.info(summary, "Enqueued research jobs");
      } finally {
        await queue.close();
      }
    });

  cli
    .command("status")
    .description("Report stored task states, today's spend and configuration")
    .option("--queue", "Include BullMQ job counts (requires Redis)")
    .action(async (opts: { queue?: boolean }) => {
      const runtime = await createRuntime();
      try {
        const tasks = await runtime.taskStore.list();
        const snapshot = runtime.monitor.snapshot();

        let queueCounts: unknown;
        if (opts.queue) {
          const { queue } = createQueueRuntime();
          try {
            queueCounts = await queue.getQueueCounts();
          } finally {
            await queue.close();
          }
        }

        logger.info(
          {
            tasks: countTaskStates(tasks),
            spend: snapshot.spend,
            circuits: snapshot.circuits,
            providers: researchProviders(),
            batchSize: runtime.schedulerOptions.batchSize,
            parallelism: runtime.schedulerOptions.parallelism,
            deliveryTarget: env.DELIVERY_TARGET,
            taskStore: env.TASK_STORE,
            queueCounts,
          },
          "Runtime status",
        );
      } finally {
        await runtime.close();
      }
    });

  cli
    .command("costs")
    .description("Show today's spend per cost class and the average cost per delivered company")
    .action(async () => {
      const runtime = await createRuntime();
      try {
        const { delivered, cost } = await deliveredToday(runtime);
        console.log(formatCostSummary(runtime.ledger.snapshot(), { delivered, cost }));
      } finally {
        await runtime.close();
      }
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
