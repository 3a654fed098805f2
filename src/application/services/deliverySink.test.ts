import { describe, expect, it } from "vitest";
import {
  boundaryError,
  buildRecord,
  FakeClock,
  InstantSleeper,
  RecordingTarget,
} from "../../__tests__/support/fakes";
import { InMemoryDeliveryStore } from "../../infra/memory/inMemoryStores";
import { IdempotentDeliverySink } from "./deliverySink";
import { RetryController, type RunSignals } from "./retryController";

const idleSignals = (): RunSignals => ({
  stop: new AbortController().signal,
  abort: new AbortController().signal,
});

const setup = (target: RecordingTarget) => {
  const clock = new FakeClock();
  const store = new InMemoryDeliveryStore();
  const retry = new RetryController(
    {
      maxAttempts: 3,
      baseDelayMs: 10,
      maxDelayMs: 100,
      jitterRatio: 0,
      attemptTimeoutMs: 1_000,
    },
    new InstantSleeper(),
  );
  const sink = new IdempotentDeliverySink(store, target, retry, clock);
  return { clock, store, sink };
};

const deliveryError = (code: "timeout" | "auth_invalid") =>
  boundaryError(code, { source: "delivery", provider: "recording" });

describe("IdempotentDeliverySink", () => {
  it("forwards once and stores the acknowledgment", async () => {
    const target = new RecordingTarget();
    const { sink, store } = setup(target);

    const outcome = await sink.deliver("research-key", buildRecord("acme"), idleSignals());

    expect(outcome).toEqual({
      kind: "acknowledged",
      cached: false,
      ack: {
        idempotencyKey: "research-key",
        acknowledgedAt: new Date("2026-03-02T09:00:00.000Z"),
        receipt: "receipt-1",
        httpStatus: 200,
      },
    });
    expect(target.deliveries).toHaveLength(1);
    expect(await store.get("research-key")).toMatchObject({
      acknowledged: true,
      forwardAttempts: 0,
      entityId: "acme",
    });
  });

  it("returns the stored acknowledgment on a repeat without forwarding", async () => {
    const target = new RecordingTarget();
    const { sink, clock } = setup(target);
    const first = await sink.deliver("research-key", buildRecord("acme"), idleSignals());
    clock.advance(60_000);

    const second = await sink.deliver("research-key", buildRecord("acme"), idleSignals());

    expect(target.callCount).toBe(1);
    if (first.kind !== "acknowledged" || second.kind !== "acknowledged") {
      throw new Error("expected acknowledgments");
    }
    expect(second.cached).toBe(true);
    expect(second.ack).toEqual(first.ack);
  });

  it("forwards exactly once when the same key is delivered concurrently", async () => {
    const target = new RecordingTarget();
    const { sink } = setup(target);

    const outcomes = await Promise.all(
      Array.from({ length: 5 }, () =>
        sink.deliver("research-key", buildRecord("acme"), idleSignals()),
      ),
    );

    expect(target.callCount).toBe(1);
    expect(outcomes.filter((outcome) => outcome.kind === "acknowledged")).toHaveLength(5);
  });

  it("retries transient delivery failures", async () => {
    const target = new RecordingTarget([deliveryError("timeout"), deliveryError("timeout")]);
    const { sink } = setup(target);

    const outcome = await sink.deliver("research-key", buildRecord("acme"), idleSignals());

    expect(outcome.kind).toBe("acknowledged");
    expect(target.callCount).toBe(3);
  });

  it("reports a permanent rejection and keeps the record pending for a later retry", async () => {
    const target = new RecordingTarget([deliveryError("auth_invalid")]);
    const { sink, store } = setup(target);

    const failed = await sink.deliver("research-key", buildRecord("acme"), idleSignals());

    expect(failed).toMatchObject({
      kind: "delivery-failed",
      attempts: 1,
      error: { code: "auth_invalid" },
    });
    expect(await store.get("research-key")).toMatchObject({
      acknowledged: false,
      forwardAttempts: 1,
    });

    const retried = await sink.deliver("research-key", buildRecord("acme"), idleSignals());
    expect(retried.kind).toBe("acknowledged");
    expect(target.callCount).toBe(2);
  });

  it("gives up after the retry budget and counts every forward", async () => {
    const target = new RecordingTarget([
      deliveryError("timeout"),
      deliveryError("timeout"),
      deliveryError("timeout"),
    ]);
    const { sink, store } = setup(target);

    const outcome = await sink.deliver("research-key", buildRecord("acme"), idleSignals());

    expect(outcome).toMatchObject({ kind: "delivery-failed", attempts: 3 });
    expect((await store.get("research-key"))?.forwardAttempts).toBe(3);
  });

  it("does not forward after the hard abort", async () => {
    const target = new RecordingTarget();
    const { sink } = setup(target);
    const abort = new AbortController();
    abort.abort();

    const outcome = await sink.deliver("research-key", buildRecord("acme"), {
      stop: abort.signal,
      abort: abort.signal,
    });

    expect(outcome).toEqual({
      kind: "cancelled",
      message: "Delivery stopped before forwarding.",
    });
    expect(target.callCount).toBe(0);
  });
});
