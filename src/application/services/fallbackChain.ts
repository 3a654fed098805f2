import type { AppBoundaryError } from "../../core/entities/appError";
import type { CompanyEntity } from "../../core/entities/company";
import type {
  ProviderAttempt,
  ProviderAttemptOutcome,
  ProviderContent,
  TaskFailureKind,
} from "../../core/entities/research";
import type { ResearchProviderPort } from "../../core/ports/inboundPorts";
import type { ClockPort } from "../../core/ports/outboundPorts";
import { logger as defaultLogger, type Logger } from "../../shared/logger/logger";
import type { BudgetLedger } from "./budgetLedger";
import type { CircuitBreakerRegistry } from "./circuitBreaker";
import type { QualityGate } from "./qualityGate";
import { classifyFailure } from "./outcomeClassifier";
import type {
  AttemptContext,
  RetryController,
  RetryStep,
  RunSignals,
} from "./retryController";

export type ChainOutcome =
  | {
      kind: "success";
      provider: string;
      content: ProviderContent;
      partial: boolean;
    }
  | {
      kind: "unreachable";
      lastProvider: string | null;
      failureKind: TaskFailureKind;
      message: string;
    }
  | { kind: "cancelled"; lastProvider: string | null; message: string };

/** Awaited for every attempt, including skipped ones, before the chain moves on. */
export type AttemptListener = (attempt: ProviderAttempt) => Promise<void>;

export type ProviderFallbackChainOptions = {
  providers: readonly ResearchProviderPort[];
  ledger: BudgetLedger;
  breakers: CircuitBreakerRegistry;
  retry: RetryController;
  clock: ClockPort;
  /** Keyed by provider name. Never applied to the last provider in the chain. */
  qualityGates?: Readonly<Record<string, QualityGate>>;
  attemptTimeoutMs: number;
  logger?: Logger;
};

type CallValue = {
  content: ProviderContent;
  rejection: string | null;
};

type LastFailure = {
  provider: string;
  kind: TaskFailureKind;
  message: string;
};

/**
 * Cheapest-first ordering; configured order breaks ties.
 */
export const orderByCost = (
  providers: readonly ResearchProviderPort[],
): ResearchProviderPort[] =>
  providers
    .map((provider, index) => ({ provider, index }))
    .sort(
      (left, right) =>
        left.provider.estimatedCost - right.provider.estimatedCost ||
        left.index - right.index,
    )
    .map(({ provider }) => provider);

const incurredCost = (
  provider: ResearchProviderPort,
  error: AppBoundaryError,
): number => {
  if (error.cost !== undefined) {
    return error.cost;
  }
  return error.code === "timeout" || error.code === "cancelled"
    ? provider.estimatedCost
    : 0;
};

/**
 * Owns escalation across providers: circuit and budget are consulted before each call and every
 * call or skip is reported as a ProviderAttempt.
 */
export class ProviderFallbackChain {
  readonly providers: readonly ResearchProviderPort[];
  private readonly log: Logger;

  constructor(private readonly options: ProviderFallbackChainOptions) {
    this.providers = orderByCost(options.providers);
    this.log = options.logger ?? defaultLogger;
  }

  async run(
    entity: CompanyEntity,
    signals: RunSignals,
    onAttempt: AttemptListener,
  ): Promise<ChainOutcome> {
    let lastFailure: LastFailure | null = null;
    let latestRejected: { provider: string; content: ProviderContent } | null =
      null;

    for (const [index, provider] of this.providers.entries()) {
      if (signals.stop.aborted || signals.abort.aborted) {
        return {
          kind: "cancelled",
          lastProvider: lastFailure?.provider ?? null,
          message: "Stopped before the next provider was tried.",
        };
      }

      const isLast = index === this.providers.length - 1;
      const gate = isLast ? undefined : this.options.qualityGates?.[provider.name];

      const report = await this.options.retry.execute<CallValue>(
        (context) => this.callOnce(entity, provider, gate, context, onAttempt),
        signals,
        { source: "provider", name: provider.name },
      );

      switch (report.kind) {
        case "success":
          if (report.value.rejection === null) {
            return {
              kind: "success",
              provider: provider.name,
              content: report.value.content,
              partial: false,
            };
          }
          latestRejected = { provider: provider.name, content: report.value.content };
          lastFailure = {
            provider: provider.name,
            kind: "quality-rejected",
            message: report.value.rejection,
          };
          break;
        case "terminal-failure":
          lastFailure = {
            provider: provider.name,
            kind: "terminal-failure",
            message: report.error.message,
          };
          break;
        case "retry-exhausted":
          lastFailure = {
            provider: provider.name,
            kind: "retry-exhausted",
            message: `${report.attempts} attempts failed; last: ${report.error.message}`,
          };
          break;
        case "blocked":
          lastFailure = {
            provider: provider.name,
            kind: report.reason,
            message: report.message,
          };
          break;
        case "cancelled":
          return {
            kind: "cancelled",
            lastProvider: provider.name,
            message: report.error?.message ?? "Stopped during provider attempts.",
          };
      }

      const next = this.providers[index + 1];
      if (next) {
        this.log.info(
          {
            entityId: entity.id,
            from: provider.name,
            to: next.name,
            reason: lastFailure?.kind,
            message: lastFailure?.message,
          },
          "Escalating to next provider",
        );
      }
    }

    if (latestRejected) {
      this.log.warn(
        { entityId: entity.id, provider: latestRejected.provider },
        "Chain exhausted; accepting latest quality-rejected result as partial",
      );
      return {
        kind: "success",
        provider: latestRejected.provider,
        content: latestRejected.content,
        partial: true,
      };
    }

    return {
      kind: "unreachable",
      lastProvider: lastFailure?.provider ?? null,
      failureKind: lastFailure?.kind ?? "terminal-failure",
      message: lastFailure?.message ?? "No providers configured.",
    };
  }

  private async callOnce(
    entity: CompanyEntity,
    provider: ResearchProviderPort,
    gate: QualityGate | undefined,
    context: AttemptContext,
    onAttempt: AttemptListener,
  ): Promise<RetryStep<CallValue>> {
    const { ledger, breakers, clock } = this.options;
    const { attemptNumber } = context;
    const startedAt = clock.now();
    const breaker = breakers.get(provider.name);

    const record = async (
      outcome: ProviderAttemptOutcome,
      details: Partial<Pick<ProviderAttempt, "cost" | "errorCode" | "message" | "payload">> = {},
    ): Promise<void> => {
      await onAttempt({
        provider: provider.name,
        costClass: provider.costClass,
        attemptNumber,
        startedAt,
        endedAt: clock.now(),
        outcome,
        cost: details.cost ?? 0,
        errorCode: details.errorCode,
        message: details.message,
        payload: details.payload,
      });
    };

    const check = breaker.canProceed();
    if (!check.allowed) {
      await record("circuit-open", { message: check.reason });
      return { kind: "blocked", reason: "circuit-open", message: check.reason };
    }

    const reservation = ledger.reserve(provider.costClass, provider.estimatedCost);
    if (reservation.isErr()) {
      if (check.probe) {
        breaker.releaseProbe();
      }
      const blocked = reservation.error;
      const message = `Budget for '${blocked.costClass}' cannot cover ${blocked.requested} (committed ${blocked.committed}, reserved ${blocked.reserved}, cap ${blocked.cap}).`;
      this.log.warn(
        { entityId: entity.id, provider: provider.name, ...blocked },
        "Provider attempt blocked by budget",
      );
      await record("budget-blocked", { message });
      return { kind: "blocked", reason: "budget-blocked", message };
    }

    const result = await context.withTimeout((signal) =>
      provider.attempt(entity, {
        attemptNumber,
        timeoutMs: this.options.attemptTimeoutMs,
        signal,
      }),
    );

    if (result.isOk()) {
      const content = result.value;
      ledger.commit(reservation.value, content.cost);
      breaker.recordSuccess();

      const verdict = gate?.(content, entity) ?? { sufficient: true };
      if (!verdict.sufficient) {
        await record("quality-rejected", {
          cost: content.cost,
          message: verdict.reason,
          payload: content,
        });
        return { kind: "success", value: { content, rejection: verdict.reason } };
      }

      await record("success", { cost: content.cost, payload: content });
      return { kind: "success", value: { content, rejection: null } };
    }

    const error = result.error;
    const cost = incurredCost(provider, error);
    ledger.commit(reservation.value, cost);
    if (error.code === "cancelled") {
      if (check.probe) {
        breaker.releaseProbe();
      }
    } else {
      breaker.recordFailure(`${error.code}: ${error.message}`);
    }

    const outcome = classifyFailure(error);
    await record(outcome, { cost, errorCode: error.code, message: error.message });
    return { kind: outcome, error };
  }
}
