import { err, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { SleeperPort } from "../../core/ports/outboundPorts";
import { logger as defaultLogger, type Logger } from "../../shared/logger/logger";
import { classifyFailure } from "./outcomeClassifier";

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Delay is scaled by a uniform factor in [1 - ratio, 1 + ratio]. */
  jitterRatio: number;
  attemptTimeoutMs: number;
};

/**
 * `stop` halts new attempts and interrupts backoff; `abort` abandons calls already in flight.
 * Callers fire `stop` no later than `abort`.
 */
export type RunSignals = {
  stop: AbortSignal;
  abort: AbortSignal;
};

export type AttemptContext = {
  attemptNumber: number;
  signal: AbortSignal;
  /** Races the call against the attempt timeout and the abort signal. */
  withTimeout<T>(
    call: (signal: AbortSignal) => Promise<Result<T, AppBoundaryError>>,
  ): Promise<Result<T, AppBoundaryError>>;
};

/** Who the retried calls go to; used to attribute timeout and cancellation errors. */
export type RetrySubject = {
  source: AppBoundaryError["source"];
  name: string;
};

export type BlockReason = "budget-blocked" | "circuit-open";

export type RetryStep<T> =
  | { kind: "success"; value: T }
  | { kind: "retryable-failure"; error: AppBoundaryError }
  | { kind: "terminal-failure"; error: AppBoundaryError }
  | { kind: "blocked"; reason: BlockReason; message: string };

export type RetryReport<T> =
  | { kind: "success"; value: T; attempts: number }
  | { kind: "terminal-failure"; error: AppBoundaryError; attempts: number }
  | { kind: "retry-exhausted"; error: AppBoundaryError; attempts: number }
  | { kind: "blocked"; reason: BlockReason; message: string; attempts: number }
  | { kind: "cancelled"; attempts: number; error?: AppBoundaryError };

export const computeBackoffDelay = (
  policy: RetryPolicy,
  failedAttempt: number,
  random: () => number,
): number => {
  const exponential = policy.baseDelayMs * 2 ** (failedAttempt - 1);
  const capped = Math.min(policy.maxDelayMs, exponential);
  const jitter = 1 + policy.jitterRatio * (2 * random() - 1);
  return Math.max(0, Math.round(capped * jitter));
};

/**
 * Classifies a call result into a retry step with the shared classifier.
 */
export const stepFromResult = <T>(
  result: Result<T, AppBoundaryError>,
): RetryStep<T> => {
  if (result.isOk()) {
    return { kind: "success", value: result.value };
  }
  return classifyFailure(result.error) === "retryable-failure"
    ? { kind: "retryable-failure", error: result.error }
    : { kind: "terminal-failure", error: result.error };
};

/**
 * Owns bounded retry with exponential backoff so provider and delivery calls share one discipline.
 */
export class RetryController {
  constructor(
    private readonly policy: RetryPolicy,
    private readonly sleeper: SleeperPort,
    private readonly random: () => number = Math.random,
    private readonly log: Logger = defaultLogger,
  ) {}

  get maxAttempts(): number {
    return this.policy.maxAttempts;
  }

  async execute<T>(
    operation: (context: AttemptContext) => Promise<RetryStep<T>>,
    signals: RunSignals,
    subject: RetrySubject = { source: "provider", name: "call" },
  ): Promise<RetryReport<T>> {
    for (let attempt = 1; attempt <= this.policy.maxAttempts; attempt += 1) {
      if (signals.stop.aborted || signals.abort.aborted) {
        return { kind: "cancelled", attempts: attempt - 1 };
      }

      const step = await operation({
        attemptNumber: attempt,
        signal: signals.abort,
        withTimeout: (call) => this.withTimeout(call, signals.abort, subject),
      });

      switch (step.kind) {
        case "success":
          return { kind: "success", value: step.value, attempts: attempt };

        case "blocked":
          return {
            kind: "blocked",
            reason: step.reason,
            message: step.message,
            attempts: attempt,
          };

        case "terminal-failure":
          if (step.error.code === "cancelled" || signals.abort.aborted) {
            return { kind: "cancelled", attempts: attempt, error: step.error };
          }
          return { kind: "terminal-failure", error: step.error, attempts: attempt };

        case "retryable-failure": {
          if (signals.stop.aborted || signals.abort.aborted) {
            return { kind: "cancelled", attempts: attempt, error: step.error };
          }
          if (attempt >= this.policy.maxAttempts) {
            return { kind: "retry-exhausted", error: step.error, attempts: attempt };
          }

          const delayMs = computeBackoffDelay(this.policy, attempt, this.random);
          this.log.debug(
            { subject: subject.name, attempt, delayMs, code: step.error.code },
            "Retrying after retryable failure",
          );
          const slept = await this.sleeper.sleep(delayMs, signals.stop);
          if (!slept) {
            return { kind: "cancelled", attempts: attempt, error: step.error };
          }
          break;
        }
      }
    }

    // maxAttempts below 1 never enters the loop.
    return { kind: "cancelled", attempts: 0 };
  }

  private async withTimeout<T>(
    call: (signal: AbortSignal) => Promise<Result<T, AppBoundaryError>>,
    abort: AbortSignal,
    subject: RetrySubject,
  ): Promise<Result<T, AppBoundaryError>> {
    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort();
    if (abort.aborted) {
      controller.abort();
    } else {
      abort.addEventListener("abort", forwardAbort, { once: true });
    }

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.policy.attemptTimeoutMs);

    const interrupted = new Promise<Result<T, AppBoundaryError>>((resolve) => {
      const settle = (): void => {
        const error: AppBoundaryError = timedOut
          ? {
              source: subject.source,
              code: "timeout",
              provider: subject.name,
              message: `Call to '${subject.name}' timed out after ${this.policy.attemptTimeoutMs}ms.`,
              retryable: true,
            }
          : {
              source: subject.source,
              code: "cancelled",
              provider: subject.name,
              message: `Call to '${subject.name}' abandoned after cancellation.`,
              retryable: false,
            };
        resolve(err(error));
      };

      if (controller.signal.aborted) {
        settle();
        return;
      }
      controller.signal.addEventListener("abort", settle, { once: true });
    });

    try {
      if (controller.signal.aborted) {
        return await interrupted;
      }
      // Synchronous throws from the call land in the same catch as rejections.
      const settled = Promise.resolve()
        .then(() => call(controller.signal))
        .catch(
        (error: unknown): Result<T, AppBoundaryError> =>
          err({
            source: subject.source,
            code: "provider_error",
            provider: subject.name,
            message: error instanceof Error ? error.message : String(error),
            retryable: false,
            cause: error,
          }),
      );
      return await Promise.race([settled, interrupted]);
    } finally {
      clearTimeout(timer);
      abort.removeEventListener("abort", forwardAbort);
    }
  }
}
