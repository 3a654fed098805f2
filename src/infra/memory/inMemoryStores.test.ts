import { describe, expect, it } from "vitest";
import { buildEntity, buildRecord } from "../../__tests__/support/fakes";
import type { ProviderAttempt, ResearchTask } from "../../core/entities/research";
import { InMemoryDeliveryStore, InMemoryTaskStore } from "./inMemoryStores";

const at = (iso: string) => new Date(iso);

const attempt = (costClass: string, cost: number, endedAt: string): ProviderAttempt => ({
  provider: costClass,
  costClass,
  attemptNumber: 1,
  startedAt: at(endedAt),
  endedAt: at(endedAt),
  outcome: "success",
  cost,
});

const task = (id: string, entityId: string, attempts: ProviderAttempt[]): ResearchTask => ({
  id,
  entity: buildEntity(entityId),
  state: "in-flight",
  attempts,
  record: null,
  outcome: null,
  failure: null,
  deliveryAck: null,
  createdAt: at("2026-03-02T08:00:00.000Z"),
  updatedAt: at("2026-03-02T08:00:00.000Z"),
});

describe("InMemoryTaskStore", () => {
  it("keeps one task per entity but counts spend from replaced tasks", async () => {
    const store = new InMemoryTaskStore();
    await store.save(task("t-1", "acme", [attempt("scrape", 0.25, "2026-03-02T08:10:00.000Z")]));
    await store.save(
      task("t-2", "acme", [
        attempt("scrape", 0.5, "2026-03-02T09:10:00.000Z"),
        attempt("premium", 1, "2026-03-01T23:00:00.000Z"),
      ]),
    );

    expect((await store.list()).map((saved) => saved.id)).toEqual(["t-2"]);
    expect(await store.spendByClassSince(at("2026-03-02T00:00:00.000Z"))).toEqual({
      scrape: 0.75,
    });
  });
});

describe("InMemoryDeliveryStore", () => {
  it("leaves an acknowledged record untouched by later pending saves", async () => {
    const store = new InMemoryDeliveryStore();
    const ack = { idempotencyKey: "key-acme", acknowledgedAt: at("2026-03-02T09:01:00.000Z") };
    await store.savePending("key-acme", buildRecord("acme"), 1, at("2026-03-02T09:00:00.000Z"));
    await store.markAcknowledged("key-acme", ack);

    await store.savePending(
      "key-acme",
      buildRecord("acme", { totalCost: 2 }),
      2,
      at("2026-03-02T10:00:00.000Z"),
    );

    expect(await store.get("key-acme")).toMatchObject({
      acknowledged: true,
      ack,
      forwardAttempts: 1,
      record: { totalCost: 0.01 },
      updatedAt: at("2026-03-02T09:01:00.000Z"),
    });
  });

  it("refuses to acknowledge a key it never stored", async () => {
    await expect(
      new InMemoryDeliveryStore().markAcknowledged("missing", {
        idempotencyKey: "missing",
        acknowledgedAt: at("2026-03-02T09:00:00.000Z"),
      }),
    ).rejects.toThrow("No delivery record for key 'missing'.");
  });
});
