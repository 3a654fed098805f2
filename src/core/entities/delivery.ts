import { createHash } from "node:crypto";
import type { CanonicalRecord, DeliveryAck } from "./research";

/**
 * Stored per idempotency key. `acknowledged` flips once and never flips back.
 */
export type DeliveryRecordEntity = {
  idempotencyKey: string;
  entityId: string;
  record: CanonicalRecord;
  acknowledged: boolean;
  ack: DeliveryAck | null;
  forwardAttempts: number;
  updatedAt: Date;
};

/**
 * Hyphen-only keys because the same key doubles as a BullMQ job id, and BullMQ reserves colons.
 */
export const deriveIdempotencyKey = (entityId: string): string =>
  `research-${createHash("sha256").update(entityId).digest("hex").slice(0, 32)}`;
