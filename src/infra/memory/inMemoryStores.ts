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

/**
 * Process-local task store for single runs and tests. Attempts are kept per task id, mirroring
 * the append-only attempt table, so spend from replaced tasks still counts.
 */
export class InMemoryTaskStore implements TaskStorePort {
  private readonly tasks = new Map<string, ResearchTask>();
  private readonly attemptsByTask = new Map<string, ProviderAttempt[]>();

  async get(entityId: string): Promise<ResearchTask | null> {
    return this.tasks.get(entityId) ?? null;
  }

  async save(task: ResearchTask): Promise<void> {
    this.tasks.set(task.entity.id, task);
    this.attemptsByTask.set(task.id, [...task.attempts]);
  }

  async list(): Promise<ResearchTask[]> {
    return Array.from(this.tasks.values());
  }

  async spendByClassSince(since: Date): Promise<Record<string, number>> {
    const spent: Record<string, number> = {};
    for (const attempts of this.attemptsByTask.values()) {
      for (const attempt of attempts) {
        if (attempt.endedAt.getTime() >= since.getTime()) {
          spent[attempt.costClass] = (spent[attempt.costClass] ?? 0) + attempt.cost;
        }
      }
    }
    return spent;
  }
}

export class InMemoryDeliveryStore implements DeliveryStorePort {
  private readonly records = new Map<string, DeliveryRecordEntity>();

  async get(idempotencyKey: string): Promise<DeliveryRecordEntity | null> {
    return this.records.get(idempotencyKey) ?? null;
  }

  async savePending(
    idempotencyKey: string,
    record: CanonicalRecord,
    forwardAttempts: number,
    now: Date,
  ): Promise<void> {
    if (this.records.get(idempotencyKey)?.acknowledged) {
      return;
    }

    this.records.set(idempotencyKey, {
      idempotencyKey,
      entityId: record.entityId,
      record,
      acknowledged: false,
      ack: null,
      forwardAttempts,
      updatedAt: now,
    });
  }

  async markAcknowledged(idempotencyKey: string, ack: DeliveryAck): Promise<void> {
    const existing = this.records.get(idempotencyKey);
    if (!existing) {
      throw new Error(`No delivery record for key '${idempotencyKey}'.`);
    }

    this.records.set(idempotencyKey, {
      ...existing,
      acknowledged: true,
      ack,
      updatedAt: ack.acknowledgedAt,
    });
  }
}
