import type { ResearchProviderPort } from "../../core/ports/inboundPorts";
import type {
  DeliveryStorePort,
  DeliveryTargetPort,
  TaskStorePort,
} from "../../core/ports/outboundPorts";
import { createDb } from "../../infra/db/client";
import {
  PostgresDeliveryStore,
  PostgresTaskStore,
} from "../../infra/db/repositories";
import { LogDeliveryTarget } from "../../infra/delivery/logDeliveryTarget";
import { WebhookDeliveryTarget } from "../../infra/delivery/webhookDeliveryTarget";
import { OllamaLlm } from "../../infra/llm/ollamaLlm";
import { CsvEntitySource } from "../../infra/loaders/csvEntitySource";
import {
  InMemoryDeliveryStore,
  InMemoryTaskStore,
} from "../../infra/memory/inMemoryStores";
import { DirectFetchProvider } from "../../infra/providers/directfetch/directFetchProvider";
import { FirecrawlProvider } from "../../infra/providers/firecrawl/firecrawlProvider";
import { MockResearchProvider } from "../../infra/providers/mocks/mockResearchProvider";
import { BullMqQueue } from "../../infra/queue/bullMqQueue";
import { redisConfigFromUrl } from "../../infra/queue/queues";
import {
  SystemClock,
  TimerSleeper,
  UuidIdGenerator,
} from "../../infra/system/systemPorts";
import {
  budgetDailyCaps,
  env,
  qualityRequiredFields,
  researchProviders,
  type AppEnv,
} from "../../shared/config/env";
import { logger } from "../../shared/logger/logger";
import { BudgetLedger } from "../services/budgetLedger";
import { CircuitBreakerRegistry } from "../services/circuitBreaker";
import { IdempotentDeliverySink } from "../services/deliverySink";
import { ProviderFallbackChain } from "../services/fallbackChain";
import { ProgressMonitor } from "../services/progressMonitor";
import { requiredFieldsGate, type QualityGate } from "../services/qualityGate";
import {
  ResearchSchedulerService,
  type SchedulerOptions,
} from "../services/researchSchedulerService";
import { ResearchOrchestratorService } from "../services/researchOrchestratorService";
import { RetryController } from "../services/retryController";

export const startOfUtcDay = (now: Date): Date =>
  new Date(`${now.toISOString().slice(0, 10)}T00:00:00.000Z`);

export const createResearchProviders = (
  appEnv: AppEnv = env,
): ResearchProviderPort[] =>
  researchProviders(appEnv).map((name) => {
    switch (name) {
      case "direct-fetch":
        return new DirectFetchProvider({
          costClass: appEnv.DIRECT_FETCH_COST_CLASS,
          estimatedCost: appEnv.DIRECT_FETCH_ESTIMATED_COST,
          userAgent: appEnv.DIRECT_FETCH_USER_AGENT,
          llm: appEnv.OLLAMA_BASE_URL
            ? new OllamaLlm(
                appEnv.OLLAMA_BASE_URL,
                appEnv.OLLAMA_CHAT_MODEL,
                appEnv.OLLAMA_CHAT_TIMEOUT_MS,
              )
            : undefined,
          llmCostPerMillionTokens: appEnv.DIRECT_FETCH_LLM_COST_PER_MILLION_TOKENS,
        });
      case "firecrawl":
        return new FirecrawlProvider(
          appEnv.FIRECRAWL_BASE_URL,
          appEnv.FIRECRAWL_API_KEY,
          appEnv.FIRECRAWL_COST_CLASS,
          appEnv.FIRECRAWL_ESTIMATED_COST,
        );
      case "mock":
        return new MockResearchProvider(
          appEnv.MOCK_COST_CLASS,
          appEnv.MOCK_ESTIMATED_COST,
        );
    }
  });

const createDeliveryTarget = (appEnv: AppEnv): DeliveryTargetPort =>
  appEnv.DELIVERY_TARGET === "webhook"
    ? new WebhookDeliveryTarget(
        appEnv.DELIVERY_WEBHOOK_URL,
        appEnv.DELIVERY_WEBHOOK_SECRET,
        appEnv.DELIVERY_TIMEOUT_MS,
      )
    : new LogDeliveryTarget();

type Stores = {
  taskStore: TaskStorePort;
  deliveryStore: DeliveryStorePort;
  close: () => Promise<void>;
};

const createStores = (appEnv: AppEnv): Stores => {
  if (appEnv.TASK_STORE === "postgres") {
    const { db, sql } = createDb(appEnv.POSTGRES_URL);
    return {
      taskStore: new PostgresTaskStore(db),
      deliveryStore: new PostgresDeliveryStore(db),
      close: async () => {
        await sql.end();
      },
    };
  }

  return {
    taskStore: new InMemoryTaskStore(),
    deliveryStore: new InMemoryDeliveryStore(),
    close: async () => {},
  };
};

/**
 * Centralizes runtime wiring so CLI and worker entry points share one composition root.
 * The ledger starts from today's spend already recorded in the task store.
 */
export const createRuntime = async (
  overrides: Partial<SchedulerOptions> = {},
  appEnv: AppEnv = env,
) => {
  const clock = new SystemClock();
  const ids = new UuidIdGenerator();
  const sleeper = new TimerSleeper();
  const stores = createStores(appEnv);

  const ledger = new BudgetLedger(budgetDailyCaps(appEnv), clock);
  const spentToday = await stores.taskStore.spendByClassSince(
    startOfUtcDay(clock.now()),
  );
  ledger.seed(spentToday);

  const breakers = new CircuitBreakerRegistry(
    {
      windowSize: appEnv.CIRCUIT_WINDOW_SIZE,
      minimumAttempts: appEnv.CIRCUIT_MIN_ATTEMPTS,
      failureRateThreshold: appEnv.CIRCUIT_FAILURE_RATE_THRESHOLD,
      cooldownMs: appEnv.CIRCUIT_COOLDOWN_MS,
      cooldownMultiplier: appEnv.CIRCUIT_COOLDOWN_MULTIPLIER,
      maxCooldownMs: appEnv.CIRCUIT_MAX_COOLDOWN_MS,
    },
    clock,
  );

  const retryPolicy = {
    maxAttempts: appEnv.RETRY_MAX_ATTEMPTS,
    baseDelayMs: appEnv.RETRY_BASE_DELAY_MS,
    maxDelayMs: appEnv.RETRY_MAX_DELAY_MS,
    jitterRatio: appEnv.RETRY_JITTER_RATIO,
  };
  const providerRetry = new RetryController(
    { ...retryPolicy, attemptTimeoutMs: appEnv.ATTEMPT_TIMEOUT_MS },
    sleeper,
  );
  const deliveryRetry = new RetryController(
    { ...retryPolicy, attemptTimeoutMs: appEnv.DELIVERY_TIMEOUT_MS },
    sleeper,
  );

  const providers = createResearchProviders(appEnv);
  const gate = requiredFieldsGate({
    requiredFields: qualityRequiredFields(appEnv),
    minContentChars: appEnv.QUALITY_MIN_CONTENT_CHARS,
  });
  const qualityGates: Record<string, QualityGate> = Object.fromEntries(
    providers.map((provider) => [provider.name, gate]),
  );

  const chain = new ProviderFallbackChain({
    providers,
    ledger,
    breakers,
    retry: providerRetry,
    clock,
    qualityGates,
    attemptTimeoutMs: appEnv.ATTEMPT_TIMEOUT_MS,
  });

  const deliveryTarget = createDeliveryTarget(appEnv);
  const sink = new IdempotentDeliverySink(
    stores.deliveryStore,
    deliveryTarget,
    deliveryRetry,
    clock,
  );

  const schedulerOptions: SchedulerOptions = {
    batchSize: overrides.batchSize ?? appEnv.RESEARCH_BATCH_SIZE,
    parallelism: overrides.parallelism ?? appEnv.RESEARCH_MAX_PARALLELISM,
    gracePeriodMs: overrides.gracePeriodMs ?? appEnv.RESEARCH_GRACE_PERIOD_MS,
  };
  const scheduler = new ResearchSchedulerService(
    {
      chain,
      sink,
      taskStore: stores.taskStore,
      clock,
      ids,
      sleeper,
    },
    schedulerOptions,
  );
  const monitor = new ProgressMonitor(scheduler, ledger, breakers, clock);

  logger.debug(
    {
      providers: chain.providers.map((provider) => ({
        name: provider.name,
        costClass: provider.costClass,
        estimatedCost: provider.estimatedCost,
      })),
      spentToday,
      deliveryTarget: deliveryTarget.name,
      taskStore: appEnv.TASK_STORE,
      ...schedulerOptions,
    },
    "Runtime created",
  );

  return {
    clock,
    ledger,
    breakers,
    chain,
    sink,
    scheduler,
    monitor,
    schedulerOptions,
    taskStore: stores.taskStore,
    entitySource: new CsvEntitySource(),
    close: stores.close,
  };
};

export type Runtime = Awaited<ReturnType<typeof createRuntime>>;

/**
 * Queue side only; kept apart so `run` never opens a Redis connection.
 */
export const createQueueRuntime = (appEnv: AppEnv = env) => {
  const queue = new BullMqQueue(redisConfigFromUrl(appEnv.REDIS_URL));
  const orchestratorService = new ResearchOrchestratorService(
    queue,
    new SystemClock(),
    new UuidIdGenerator(),
  );
  return { queue, orchestratorService };
};
