import { createRuntime } from "../application/bootstrap/runtimeFactory";
import { createResearchWorker } from "../infra/queue/bullMqQueue";
import { redisConfigFromUrl } from "../infra/queue/queues";
import { env, researchProviders } from "../shared/config/env";
import { logger, toErrorDetails } from "../shared/logger/logger";

/**
 * Consumes queued entities. Each job runs a single-entity scheduler pass, so the ledger, breakers
 * and delivery sink are shared across concurrent jobs in this process.
 */
const run = async (): Promise<void> => {
  const runtime = await createRuntime();
  const concurrency = env.QUEUE_CONCURRENCY ?? runtime.schedulerOptions.parallelism;
  const shutdown = new AbortController();
  const startedAtByJobId = new Map<string, number>();

  logger.info(
    {
      providers: researchProviders(),
      concurrency,
      deliveryTarget: env.DELIVERY_TARGET,
      taskStore: env.TASK_STORE,
      redisUrl: env.REDIS_URL,
    },
    "Worker runtime configuration",
  );

  const worker = createResearchWorker(
    redisConfigFromUrl(env.REDIS_URL),
    concurrency,
    async (payload) => {
      const report = await runtime.scheduler.run([payload.entity], shutdown.signal);
      const outcome = report.outcomes[0];
      if (outcome?.outcome === "cancelled") {
        throw new Error(`Entity ${payload.entity.id} was cancelled by shutdown.`);
      }
    },
  );

  worker.on("active", (job) => {
    if (job.id) {
      startedAtByJobId.set(job.id, Date.now());
    }
    logger.info(
      { jobId: job.id, runId: job.data.runId, entityId: job.data.entity.id },
      "Worker job started",
    );
  });

  worker.on("completed", (job) => {
    const startedAt = job.id ? startedAtByJobId.get(job.id) : undefined;
    if (job.id) {
      startedAtByJobId.delete(job.id);
    }
    logger.info(
      {
        jobId: job.id,
        entityId: job.data.entity.id,
        durationMs: startedAt ? Date.now() - startedAt : undefined,
        spend: runtime.monitor.snapshot().spend,
      },
      "Worker job completed",
    );
  });

  worker.on("failed", (job, error) => {
    if (job?.id) {
      startedAtByJobId.delete(job.id);
    }
    logger.error(
      { jobId: job?.id, entityId: job?.data.entity.id, error: toErrorDetails(error) },
      "Worker job failed",
    );
  });

  const stop = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Worker shutting down");
    shutdown.abort();
    await worker.close();
    await runtime.close();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      stop(signal).catch((error: unknown) => {
        logger.error({ error: toErrorDetails(error) }, "Worker shutdown failed");
        process.exit(1);
      });
    });
  }

  logger.info("Worker online");
};

run().catch((error: unknown) => {
  logger.error({ error: toErrorDetails(error) }, "Worker bootstrap failed");
  process.exit(1);
});
