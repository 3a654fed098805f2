import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { CompanyEntity } from "../entities/company";
import type { DeliveryRecordEntity } from "../entities/delivery";
import type {
  CanonicalRecord,
  DeliveryAck,
  ResearchTask,
} from "../entities/research";

export type EntityJobPayload = {
  runId: string;
  entity: CompanyEntity;
  idempotencyKey: string;
  requestedAt: string;
};

export interface QueuePort {
  enqueue(payload: EntityJobPayload): Promise<void>;
}

export type DeliveryReceipt = {
  receipt?: string;
  httpStatus?: number;
};

/**
 * Downstream endpoint. Implementations must forward the key so the receiver can dedupe too.
 */
export interface DeliveryTargetPort {
  readonly name: string;
  deliver(
    idempotencyKey: string,
    record: CanonicalRecord,
    signal: AbortSignal,
  ): Promise<Result<DeliveryReceipt, AppBoundaryError>>;
}

/**
 * Keyed by entity id. Survives restarts when backed by Postgres.
 */
export interface TaskStorePort {
  get(entityId: string): Promise<ResearchTask | null>;
  save(task: ResearchTask): Promise<void>;
  list(): Promise<ResearchTask[]>;
  spendByClassSince(since: Date): Promise<Record<string, number>>;
}

export interface DeliveryStorePort {
  get(idempotencyKey: string): Promise<DeliveryRecordEntity | null>;
  /** Upserts the pending record; must leave an acknowledged record untouched. */
  savePending(
    idempotencyKey: string,
    record: CanonicalRecord,
    forwardAttempts: number,
    now: Date,
  ): Promise<void>;
  markAcknowledged(idempotencyKey: string, ack: DeliveryAck): Promise<void>;
}

export interface LlmPort {
  complete(
    prompt: string,
    signal?: AbortSignal,
  ): Promise<Result<string, AppBoundaryError>>;
}

export interface ClockPort {
  now(): Date;
}

export interface IdGeneratorPort {
  next(): string;
}

/**
 * Resolves `false` when the signal aborted the wait early.
 */
export interface SleeperPort {
  sleep(ms: number, signal?: AbortSignal): Promise<boolean>;
}
