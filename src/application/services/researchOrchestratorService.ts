import type { CompanyEntity } from "../../core/entities/company";
import { deriveIdempotencyKey } from "../../core/entities/delivery";
import type {
  ClockPort,
  IdGeneratorPort,
  QueuePort,
} from "../../core/ports/outboundPorts";

export type EnqueueSummary = {
  runId: string;
  enqueued: number;
  duplicates: string[];
};

/**
 * Owns the handoff of entities to the queue so CLI and worker flows share one job identity policy.
 */
export class ResearchOrchestratorService {
  constructor(
    private readonly queue: QueuePort,
    private readonly clock: ClockPort,
    private readonly ids: IdGeneratorPort,
  ) {}

  /**
   * One job per unique entity, keyed by the delivery idempotency key so a repeat enqueue is a no-op.
   */
  async enqueueEntities(entities: readonly CompanyEntity[]): Promise<EnqueueSummary> {
    const runId = this.ids.next();
    const requestedAt = this.clock.now().toISOString();
    const seen = new Set<string>();
    const duplicates: string[] = [];

    for (const entity of entities) {
      if (seen.has(entity.id)) {
        duplicates.push(entity.id);
        continue;
      }
      seen.add(entity.id);

      await this.queue.enqueue({
        runId,
        entity,
        idempotencyKey: deriveIdempotencyKey(entity.id),
        requestedAt,
      });
    }

    return { runId, enqueued: seen.size, duplicates };
  }
}
