import type { ClockPort } from "../../core/ports/outboundPorts";
import { logger as defaultLogger, type Logger } from "../../shared/logger/logger";

export type CircuitState = "closed" | "open" | "half-open";

export type CircuitBreakerConfig = {
  /** Number of most recent outcomes the failure rate is computed over. */
  windowSize: number;
  minimumAttempts: number;
  /** Trips when the failure rate is strictly above this ratio. */
  failureRateThreshold: number;
  cooldownMs: number;
  cooldownMultiplier: number;
  maxCooldownMs: number;
};

export const defaultCircuitBreakerConfig: CircuitBreakerConfig = {
  windowSize: 20,
  minimumAttempts: 10,
  failureRateThreshold: 0.5,
  cooldownMs: 60_000,
  cooldownMultiplier: 2,
  maxCooldownMs: 900_000,
};

export type CircuitCheck =
  | { allowed: true; state: CircuitState; probe: boolean }
  | { allowed: false; state: CircuitState; reason: string; retryAt: Date | null };

export type CircuitTransition = {
  provider: string;
  from: CircuitState;
  to: CircuitState;
  reason: string;
  at: Date;
};

export type CircuitBreakerSnapshot = {
  provider: string;
  state: CircuitState;
  failureRate: number;
  observed: number;
  openUntil: Date | null;
  cooldownMs: number;
  probeInFlight: boolean;
  transitions: number;
};

/**
 * Per-provider failure-rate breaker shared by every task that calls the provider.
 * Methods are synchronous so each check or record is one atomic update.
 */
export class CircuitBreaker {
  private state: CircuitState = "closed";
  private window: boolean[] = [];
  private openUntil: Date | null = null;
  private cooldownMs: number;
  private probeInFlight = false;
  private transitions = 0;
  private readonly listeners: Array<(event: CircuitTransition) => void> = [];

  constructor(
    readonly provider: string,
    private readonly config: CircuitBreakerConfig,
    private readonly clock: ClockPort,
    private readonly log: Logger = defaultLogger,
  ) {
    this.cooldownMs = config.cooldownMs;
  }

  get currentState(): CircuitState {
    this.promoteIfCooledDown();
    return this.state;
  }

  /**
   * Admits a call. In half-open exactly one caller is admitted as the probe until it records an
   * outcome or releases the probe.
   */
  canProceed(): CircuitCheck {
    this.promoteIfCooledDown();

    switch (this.state) {
      case "closed":
        return { allowed: true, state: "closed", probe: false };
      case "open":
        return {
          allowed: false,
          state: "open",
          reason: `Circuit for '${this.provider}' is open.`,
          retryAt: this.openUntil,
        };
      case "half-open":
        if (this.probeInFlight) {
          return {
            allowed: false,
            state: "half-open",
            reason: `Circuit for '${this.provider}' is half-open with a probe in flight.`,
            retryAt: null,
          };
        }
        this.probeInFlight = true;
        return { allowed: true, state: "half-open", probe: true };
    }
  }

  /**
   * Returns an admitted probe without an outcome, e.g. when the call was never made.
   */
  releaseProbe(): void {
    this.probeInFlight = false;
  }

  recordSuccess(): void {
    this.promoteIfCooledDown();
    if (this.state === "half-open") {
      this.probeInFlight = false;
      this.cooldownMs = this.config.cooldownMs;
      this.window = [];
      this.transition("closed", "probe succeeded");
      return;
    }

    this.observe(false);
  }

  recordFailure(reason = "provider failure"): void {
    this.promoteIfCooledDown();
    if (this.state === "half-open") {
      this.probeInFlight = false;
      this.cooldownMs = Math.min(
        this.config.maxCooldownMs,
        this.cooldownMs * this.config.cooldownMultiplier,
      );
      this.trip(`probe failed: ${reason}`);
      return;
    }

    this.observe(true);
    if (this.state === "closed" && this.shouldTrip()) {
      this.trip(
        `failure rate ${this.failureRate().toFixed(2)} over ${this.window.length} attempts: ${reason}`,
      );
    }
  }

  onStateChange(listener: (event: CircuitTransition) => void): void {
    this.listeners.push(listener);
  }

  snapshot(): CircuitBreakerSnapshot {
    this.promoteIfCooledDown();
    return {
      provider: this.provider,
      state: this.state,
      failureRate: this.failureRate(),
      observed: this.window.length,
      openUntil: this.openUntil,
      cooldownMs: this.cooldownMs,
      probeInFlight: this.probeInFlight,
      transitions: this.transitions,
    };
  }

  private observe(failed: boolean): void {
    this.window.push(failed);
    if (this.window.length > this.config.windowSize) {
      this.window.splice(0, this.window.length - this.config.windowSize);
    }
  }

  private failureRate(): number {
    if (this.window.length === 0) {
      return 0;
    }
    return this.window.filter(Boolean).length / this.window.length;
  }

  private shouldTrip(): boolean {
    return (
      this.window.length >= this.config.minimumAttempts &&
      this.failureRate() > this.config.failureRateThreshold
    );
  }

  private trip(reason: string): void {
    this.openUntil = new Date(this.clock.now().getTime() + this.cooldownMs);
    this.transition("open", reason);
  }

  private promoteIfCooledDown(): void {
    if (
      this.state === "open" &&
      this.openUntil !== null &&
      this.clock.now().getTime() >= this.openUntil.getTime()
    ) {
      this.openUntil = null;
      this.probeInFlight = false;
      this.transition("half-open", "cooldown elapsed");
    }
  }

  private transition(to: CircuitState, reason: string): void {
    const from = this.state;
    if (from === to) {
      return;
    }

    this.state = to;
    if (to === "closed") {
      this.openUntil = null;
    }
    this.transitions += 1;

    const event: CircuitTransition = {
      provider: this.provider,
      from,
      to,
      reason,
      at: this.clock.now(),
    };
    const level = to === "open" ? "warn" : "info";
    this.log[level](
      { provider: this.provider, from, to, reason, openUntil: this.openUntil },
      "Circuit breaker transition",
    );
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}

/**
 * One breaker per provider name, created lazily and shared across tasks.
 */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();

  constructor(
    private readonly config: CircuitBreakerConfig,
    private readonly clock: ClockPort,
    private readonly log: Logger = defaultLogger,
  ) {}

  get(provider: string): CircuitBreaker {
    let breaker = this.breakers.get(provider);
    if (!breaker) {
      breaker = new CircuitBreaker(provider, this.config, this.clock, this.log);
      this.breakers.set(provider, breaker);
    }
    return breaker;
  }

  snapshots(): CircuitBreakerSnapshot[] {
    return Array.from(this.breakers.values()).map((breaker) => breaker.snapshot());
  }
}
