import { BudgetLedger } from "../../application/services/budgetLedger";
import {
  CircuitBreakerRegistry,
  defaultCircuitBreakerConfig,
  type CircuitBreakerConfig,
} from "../../application/services/circuitBreaker";
import { IdempotentDeliverySink } from "../../application/services/deliverySink";
import { ProviderFallbackChain } from "../../application/services/fallbackChain";
import { ProgressMonitor } from "../../application/services/progressMonitor";
import { requiredFieldsGate } from "../../application/services/qualityGate";
import {
  ResearchSchedulerService,
  type SchedulerOptions,
} from "../../application/services/researchSchedulerService";
import {
  RetryController,
  type RetryPolicy,
} from "../../application/services/retryController";
import type { ResearchProviderPort } from "../../core/ports/inboundPorts";
import type { SleeperPort } from "../../core/ports/outboundPorts";
import {
  InMemoryDeliveryStore,
  InMemoryTaskStore,
} from "../../infra/memory/inMemoryStores";
import {
  FakeClock,
  InstantSleeper,
  RecordingTarget,
  SequentialIds,
} from "./fakes";

export type HarnessOptions = {
  providers: readonly ResearchProviderPort[];
  caps?: Record<string, number>;
  target?: RecordingTarget;
  breaker?: Partial<CircuitBreakerConfig>;
  retry?: Partial<RetryPolicy>;
  scheduler?: Partial<SchedulerOptions>;
  sleeper?: SleeperPort;
  taskStore?: InMemoryTaskStore;
  deliveryStore?: InMemoryDeliveryStore;
};

/**
 * Wires the orchestration services the way the runtime factory does, over in-process fakes.
 */
export const createHarness = (options: HarnessOptions) => {
  const clock = new FakeClock();
  const ids = new SequentialIds("task");
  const sleeper = options.sleeper ?? new InstantSleeper();
  const target = options.target ?? new RecordingTarget();
  const taskStore = options.taskStore ?? new InMemoryTaskStore();
  const deliveryStore = options.deliveryStore ?? new InMemoryDeliveryStore();

  const ledger = new BudgetLedger(options.caps ?? {}, clock);
  const breakers = new CircuitBreakerRegistry(
    { ...defaultCircuitBreakerConfig, ...options.breaker },
    clock,
  );
  const retryPolicy: RetryPolicy = {
    maxAttempts: 2,
    baseDelayMs: 10,
    maxDelayMs: 100,
    jitterRatio: 0,
    attemptTimeoutMs: 1_000,
    ...options.retry,
  };

  const gate = requiredFieldsGate({
    requiredFields: ["company_description"],
    minContentChars: 200,
  });
  const chain = new ProviderFallbackChain({
    providers: options.providers,
    ledger,
    breakers,
    retry: new RetryController(retryPolicy, sleeper),
    clock,
    qualityGates: Object.fromEntries(
      options.providers.map((provider) => [provider.name, gate]),
    ),
    attemptTimeoutMs: retryPolicy.attemptTimeoutMs,
  });
  const sink = new IdempotentDeliverySink(
    deliveryStore,
    target,
    new RetryController(retryPolicy, sleeper),
    clock,
  );
  const scheduler = new ResearchSchedulerService(
    { chain, sink, taskStore, clock, ids, sleeper },
    { batchSize: 10, parallelism: 5, gracePeriodMs: 1_000, ...options.scheduler },
  );
  const monitor = new ProgressMonitor(scheduler, ledger, breakers, clock);

  return {
    clock,
    ids,
    sleeper,
    target,
    taskStore,
    deliveryStore,
    ledger,
    breakers,
    chain,
    sink,
    scheduler,
    monitor,
  };
};
