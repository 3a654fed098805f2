import { ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { CanonicalRecord } from "../../core/entities/research";
import type {
  DeliveryReceipt,
  DeliveryTargetPort,
} from "../../core/ports/outboundPorts";
import { logger as defaultLogger, type Logger } from "../../shared/logger/logger";

/**
 * Local-run sink: writes the record to the structured log instead of a downstream system.
 */
export class LogDeliveryTarget implements DeliveryTargetPort {
  readonly name = "log";

  constructor(private readonly log: Logger = defaultLogger) {}

  async deliver(
    idempotencyKey: string,
    record: CanonicalRecord,
    _signal: AbortSignal,
  ): Promise<Result<DeliveryReceipt, AppBoundaryError>> {
    this.log.info(
      {
        idempotencyKey,
        entityId: record.entityId,
        name: record.name,
        providers: record.contributingProviders,
        partial: record.partial,
        totalCost: record.totalCost,
        fields: record.fields,
      },
      "Research record delivered",
    );
    return ok({ receipt: `logged-${idempotencyKey}` });
  }
}
