import { randomUUID } from "node:crypto";
import type {
  ClockPort,
  IdGeneratorPort,
  SleeperPort,
} from "../../core/ports/outboundPorts";

/**
 * Adapts wall-clock access so time-sensitive logic remains deterministic in tests.
 */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

export class UuidIdGenerator implements IdGeneratorPort {
  next(): string {
    return randomUUID();
  }
}

/**
 * Timer-backed waits for backoff and grace periods. An abort resolves early with `false`.
 */
export class TimerSleeper implements SleeperPort {
  sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve(false);
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve(true);
      }, ms);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
