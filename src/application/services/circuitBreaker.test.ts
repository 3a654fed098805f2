import { describe, expect, it } from "vitest";
import { FakeClock } from "../../__tests__/support/fakes";
import {
  CircuitBreaker,
  CircuitBreakerRegistry,
  type CircuitBreakerConfig,
  type CircuitTransition,
} from "./circuitBreaker";

const config: CircuitBreakerConfig = {
  windowSize: 10,
  minimumAttempts: 4,
  failureRateThreshold: 0.5,
  cooldownMs: 1_000,
  cooldownMultiplier: 2,
  maxCooldownMs: 3_000,
};

const tripped = (clock: FakeClock): CircuitBreaker => {
  const breaker = new CircuitBreaker("alpha", config, clock);
  for (let index = 0; index < 4; index += 1) {
    breaker.recordFailure();
  }
  return breaker;
};

describe("CircuitBreaker", () => {
  it("stays closed until the minimum number of attempts is observed", () => {
    const breaker = new CircuitBreaker("alpha", config, new FakeClock());

    breaker.recordFailure();
    breaker.recordFailure();
    breaker.recordFailure();

    expect(breaker.currentState).toBe("closed");
    expect(breaker.canProceed()).toEqual({ allowed: true, state: "closed", probe: false });
  });

  it("trips only when the failure rate is strictly above the threshold", () => {
    const breaker = new CircuitBreaker("alpha", config, new FakeClock());

    breaker.recordFailure();
    breaker.recordSuccess();
    breaker.recordFailure();
    breaker.recordSuccess();
    expect(breaker.currentState).toBe("closed");

    breaker.recordFailure();
    expect(breaker.currentState).toBe("open");
  });

  it("rejects calls while open and reports when it reopens", () => {
    const clock = new FakeClock();
    const breaker = tripped(clock);

    const check = breaker.canProceed();
    expect(check.allowed).toBe(false);
    if (check.allowed) {
      throw new Error("expected rejection");
    }
    expect(check.state).toBe("open");
    expect(check.retryAt).toEqual(new Date("2026-03-02T09:00:01.000Z"));
  });

  it("admits exactly one probe after the cooldown", () => {
    const clock = new FakeClock();
    const breaker = tripped(clock);
    clock.advance(1_000);

    expect(breaker.canProceed()).toEqual({ allowed: true, state: "half-open", probe: true });
    const second = breaker.canProceed();
    expect(second.allowed).toBe(false);
    expect(second.state).toBe("half-open");
  });

  it("closes and clears its window after a successful probe", () => {
    const clock = new FakeClock();
    const breaker = tripped(clock);
    clock.advance(1_000);
    breaker.canProceed();

    breaker.recordSuccess();

    expect(breaker.snapshot()).toMatchObject({
      state: "closed",
      observed: 0,
      cooldownMs: 1_000,
      probeInFlight: false,
      openUntil: null,
    });
  });

  it("reopens with a longer cooldown after a failed probe, capped at the maximum", () => {
    const clock = new FakeClock();
    const breaker = tripped(clock);

    clock.advance(1_000);
    breaker.canProceed();
    breaker.recordFailure();
    expect(breaker.snapshot().cooldownMs).toBe(2_000);
    expect(breaker.currentState).toBe("open");

    clock.advance(2_000);
    breaker.canProceed();
    breaker.recordFailure();
    expect(breaker.snapshot().cooldownMs).toBe(3_000);

    clock.advance(2_999);
    expect(breaker.currentState).toBe("open");
    clock.advance(1);
    expect(breaker.currentState).toBe("half-open");
  });

  it("lets another caller probe after the admitted probe is released", () => {
    const clock = new FakeClock();
    const breaker = tripped(clock);
    clock.advance(1_000);
    breaker.canProceed();

    breaker.releaseProbe();

    expect(breaker.canProceed()).toEqual({ allowed: true, state: "half-open", probe: true });
  });

  it("only counts the most recent window of outcomes", () => {
    const breaker = new CircuitBreaker(
      "alpha",
      { ...config, windowSize: 4 },
      new FakeClock(),
    );

    breaker.recordFailure();
    breaker.recordFailure();
    breaker.recordSuccess();
    breaker.recordSuccess();
    breaker.recordSuccess();

    expect(breaker.snapshot()).toMatchObject({ observed: 4, failureRate: 0.25 });
  });

  it("notifies listeners on every transition", () => {
    const clock = new FakeClock();
    const transitions: Array<Pick<CircuitTransition, "from" | "to">> = [];
    const breaker = new CircuitBreaker("alpha", config, clock);
    breaker.onStateChange(({ from, to }) => transitions.push({ from, to }));

    for (let index = 0; index < 4; index += 1) {
      breaker.recordFailure();
    }
    clock.advance(1_000);
    breaker.canProceed();
    breaker.recordSuccess();

    expect(transitions).toEqual([
      { from: "closed", to: "open" },
      { from: "open", to: "half-open" },
      { from: "half-open", to: "closed" },
    ]);
    expect(breaker.snapshot().transitions).toBe(3);
  });
});

describe("CircuitBreakerRegistry", () => {
  it("shares one breaker per provider name", () => {
    const registry = new CircuitBreakerRegistry(config, new FakeClock());

    expect(registry.get("alpha")).toBe(registry.get("alpha"));
    registry.get("beta");
    expect(registry.snapshots().map((snapshot) => snapshot.provider)).toEqual([
      "alpha",
      "beta",
    ]);
  });
});
