import type { CanonicalRecord, DeliveryAck } from "../../core/entities/research";
import type { StoredAck, StoredRecord } from "./schema";

export const toStoredRecord = (record: CanonicalRecord): StoredRecord => ({
  ...record,
  generatedAt: record.generatedAt.toISOString(),
});

export const fromStoredRecord = (stored: StoredRecord): CanonicalRecord => ({
  ...stored,
  generatedAt: new Date(stored.generatedAt),
});

export const toStoredAck = (ack: DeliveryAck): StoredAck => ({
  ...ack,
  acknowledgedAt: ack.acknowledgedAt.toISOString(),
});

export const fromStoredAck = (stored: StoredAck): DeliveryAck => ({
  ...stored,
  acknowledgedAt: new Date(stored.acknowledgedAt),
});
