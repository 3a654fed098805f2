import { asc, eq, gte, inArray, sql } from "drizzle-orm";
import type { DeliveryRecordEntity } from "../../core/entities/delivery";
import type {
  CanonicalRecord,
  DeliveryAck,
  ProviderAttempt,
  ResearchTask,
} from "../../core/entities/research";
import type {
  DeliveryStorePort,
  TaskStorePort,
} from "../../core/ports/outboundPorts";
import type { Database } from "./client";
import {
  fromStoredAck,
  fromStoredRecord,
  toStoredAck,
  toStoredRecord,
} from "./mappers";
import { deliveriesTable, providerAttemptsTable, tasksTable } from "./schema";

type TaskRow = typeof tasksTable.$inferSelect;
type AttemptRow = typeof providerAttemptsTable.$inferSelect;

const toAttempt = (row: AttemptRow): ProviderAttempt => ({
  provider: row.provider,
  costClass: row.costClass,
  attemptNumber: row.attemptNumber,
  startedAt: row.startedAt,
  endedAt: row.endedAt,
  outcome: row.outcome,
  cost: row.cost,
  errorCode: row.errorCode ?? undefined,
  message: row.message ?? undefined,
  payload: row.payload ?? undefined,
});

const toTask = (row: TaskRow, attempts: AttemptRow[]): ResearchTask => ({
  id: row.taskId,
  entity: row.entity,
  state: row.state,
  attempts: attempts.map(toAttempt),
  record: row.record ? fromStoredRecord(row.record) : null,
  outcome: row.outcome,
  failure: row.failure,
  deliveryAck: row.deliveryAck ? fromStoredAck(row.deliveryAck) : null,
  createdAt: row.createdAt,
  updatedAt: row.updatedAt,
});

/**
 * Keeps one task row per entity and appends its attempts so re-runs never rewrite spend history.
 */
export class PostgresTaskStore implements TaskStorePort {
  constructor(private readonly db: Database) {}

  async get(entityId: string): Promise<ResearchTask | null> {
    const [row] = await this.db
      .select()
      .from(tasksTable)
      .where(eq(tasksTable.entityId, entityId))
      .limit(1);
    if (!row) {
      return null;
    }

    const attempts = await this.db
      .select()
      .from(providerAttemptsTable)
      .where(eq(providerAttemptsTable.taskId, row.taskId))
      .orderBy(asc(providerAttemptsTable.sequence));

    return toTask(row, attempts);
  }

  async save(task: ResearchTask): Promise<void> {
    const row = {
      entityId: task.entity.id,
      taskId: task.id,
      state: task.state,
      outcome: task.outcome,
      entity: task.entity,
      failure: task.failure,
      record: task.record ? toStoredRecord(task.record) : null,
      deliveryAck: task.deliveryAck ? toStoredAck(task.deliveryAck) : null,
      createdAt: task.createdAt,
      updatedAt: task.updatedAt,
    };

    await this.db.transaction(async (tx) => {
      await tx
        .insert(tasksTable)
        .values(row)
        .onConflictDoUpdate({
          target: tasksTable.entityId,
          set: {
            taskId: row.taskId,
            state: row.state,
            outcome: row.outcome,
            entity: row.entity,
            failure: row.failure,
            record: row.record,
            deliveryAck: row.deliveryAck,
            createdAt: row.createdAt,
            updatedAt: row.updatedAt,
          },
        });

      if (task.attempts.length > 0) {
        await tx
          .insert(providerAttemptsTable)
          .values(
            task.attempts.map((attempt, sequence) => ({
              taskId: task.id,
              entityId: task.entity.id,
              sequence,
              provider: attempt.provider,
              costClass: attempt.costClass,
              attemptNumber: attempt.attemptNumber,
              outcome: attempt.outcome,
              cost: attempt.cost,
              errorCode: attempt.errorCode ?? null,
              message: attempt.message ?? null,
              payload: attempt.payload ?? null,
              startedAt: attempt.startedAt,
              endedAt: attempt.endedAt,
            })),
          )
          .onConflictDoNothing();
      }
    });
  }

  async list(): Promise<ResearchTask[]> {
    const rows = await this.db
      .select()
      .from(tasksTable)
      .orderBy(asc(tasksTable.createdAt));
    if (rows.length === 0) {
      return [];
    }

    const attempts = await this.db
      .select()
      .from(providerAttemptsTable)
      .where(
        inArray(
          providerAttemptsTable.taskId,
          rows.map((row) => row.taskId),
        ),
      )
      .orderBy(asc(providerAttemptsTable.sequence));

    const byTask = new Map<string, AttemptRow[]>();
    for (const attempt of attempts) {
      byTask.set(attempt.taskId, [...(byTask.get(attempt.taskId) ?? []), attempt]);
    }

    return rows.map((row) => toTask(row, byTask.get(row.taskId) ?? []));
  }

  async spendByClassSince(since: Date): Promise<Record<string, number>> {
    const rows = await this.db
      .select({
        costClass: providerAttemptsTable.costClass,
        spent: sql<number>`coalesce(sum(${providerAttemptsTable.cost}), 0)`.mapWith(Number),
      })
      .from(providerAttemptsTable)
      .where(gte(providerAttemptsTable.endedAt, since))
      .groupBy(providerAttemptsTable.costClass);

    return Object.fromEntries(rows.map((row) => [row.costClass, row.spent]));
  }
}

/**
 * Upserts guarded by `acknowledged = false`, so a stale writer can never un-acknowledge a key.
 */
export class PostgresDeliveryStore implements DeliveryStorePort {
  constructor(private readonly db: Database) {}

  async get(idempotencyKey: string): Promise<DeliveryRecordEntity | null> {
    const [row] = await this.db
      .select()
      .from(deliveriesTable)
      .where(eq(deliveriesTable.idempotencyKey, idempotencyKey))
      .limit(1);
    if (!row) {
      return null;
    }

    return {
      idempotencyKey: row.idempotencyKey,
      entityId: row.entityId,
      record: fromStoredRecord(row.record),
      acknowledged: row.acknowledged,
      ack: row.ack ? fromStoredAck(row.ack) : null,
      forwardAttempts: row.forwardAttempts,
      updatedAt: row.updatedAt,
    };
  }

  async savePending(
    idempotencyKey: string,
    record: CanonicalRecord,
    forwardAttempts: number,
    now: Date,
  ): Promise<void> {
    const stored = toStoredRecord(record);
    await this.db
      .insert(deliveriesTable)
      .values({
        idempotencyKey,
        entityId: record.entityId,
        record: stored,
        acknowledged: false,
        ack: null,
        forwardAttempts,
        updatedAt: now,
      })
      .onConflictDoUpdate({
        target: deliveriesTable.idempotencyKey,
        set: { record: stored, forwardAttempts, updatedAt: now },
        setWhere: eq(deliveriesTable.acknowledged, false),
      });
  }

  async markAcknowledged(idempotencyKey: string, ack: DeliveryAck): Promise<void> {
    await this.db
      .update(deliveriesTable)
      .set({
        acknowledged: true,
        ack: toStoredAck(ack),
        updatedAt: ack.acknowledgedAt,
      })
      .where(eq(deliveriesTable.idempotencyKey, idempotencyKey));
  }
}
