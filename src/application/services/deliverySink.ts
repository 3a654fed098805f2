import type { AppBoundaryError } from "../../core/entities/appError";
import type { CanonicalRecord, DeliveryAck } from "../../core/entities/research";
import type {
  ClockPort,
  DeliveryStorePort,
  DeliveryTargetPort,
} from "../../core/ports/outboundPorts";
import { KeyedMutex } from "../../shared/concurrency/keyedMutex";
import { logger as defaultLogger, type Logger } from "../../shared/logger/logger";
import {
  stepFromResult,
  type RetryController,
  type RunSignals,
} from "./retryController";

export type DeliveryOutcome =
  | { kind: "acknowledged"; ack: DeliveryAck; cached: boolean }
  | { kind: "delivery-failed"; error: AppBoundaryError; attempts: number }
  | { kind: "cancelled"; message: string };

/**
 * Owns exactly-once forwarding per idempotency key. The store check, forward and acknowledgment
 * run under one per-key lock.
 */
export class IdempotentDeliverySink {
  constructor(
    private readonly store: DeliveryStorePort,
    private readonly target: DeliveryTargetPort,
    private readonly retry: RetryController,
    private readonly clock: ClockPort,
    private readonly mutex: KeyedMutex = new KeyedMutex(),
    private readonly log: Logger = defaultLogger,
  ) {}

  async deliver(
    idempotencyKey: string,
    record: CanonicalRecord,
    signals: RunSignals,
  ): Promise<DeliveryOutcome> {
    return this.mutex.runExclusive(idempotencyKey, () =>
      this.deliverLocked(idempotencyKey, record, signals),
    );
  }

  private async deliverLocked(
    idempotencyKey: string,
    record: CanonicalRecord,
    signals: RunSignals,
  ): Promise<DeliveryOutcome> {
    const existing = await this.store.get(idempotencyKey);
    if (existing?.acknowledged && existing.ack) {
      this.log.info(
        { idempotencyKey, entityId: record.entityId },
        "Delivery already acknowledged; returning cached acknowledgment",
      );
      return { kind: "acknowledged", ack: existing.ack, cached: true };
    }

    const priorAttempts = existing?.forwardAttempts ?? 0;
    await this.store.savePending(
      idempotencyKey,
      record,
      priorAttempts,
      this.clock.now(),
    );

    const report = await this.retry.execute(
      async (context) =>
        stepFromResult(
          await context.withTimeout((signal) =>
            this.target.deliver(idempotencyKey, record, signal),
          ),
        ),
      signals,
      { source: "delivery", name: this.target.name },
    );

    if (report.kind === "success") {
      const ack: DeliveryAck = {
        idempotencyKey,
        acknowledgedAt: this.clock.now(),
        receipt: report.value.receipt,
        httpStatus: report.value.httpStatus,
      };
      await this.store.markAcknowledged(idempotencyKey, ack);
      this.log.info(
        {
          idempotencyKey,
          entityId: record.entityId,
          target: this.target.name,
          attempts: report.attempts,
        },
        "Delivery acknowledged",
      );
      return { kind: "acknowledged", ack, cached: false };
    }

    await this.store.savePending(
      idempotencyKey,
      record,
      priorAttempts + report.attempts,
      this.clock.now(),
    );

    switch (report.kind) {
      case "cancelled":
        return {
          kind: "cancelled",
          message: report.error?.message ?? "Delivery stopped before forwarding.",
        };
      case "blocked":
        return {
          kind: "delivery-failed",
          attempts: report.attempts,
          error: {
            source: "delivery",
            code: "permanent_rejection",
            provider: this.target.name,
            message: report.message,
            retryable: false,
          },
        };
      case "terminal-failure":
      case "retry-exhausted":
        this.log.warn(
          {
            idempotencyKey,
            entityId: record.entityId,
            target: this.target.name,
            code: report.error.code,
            attempts: report.attempts,
          },
          "Delivery failed",
        );
        return {
          kind: "delivery-failed",
          error: report.error,
          attempts: report.attempts,
        };
    }
  }
}
