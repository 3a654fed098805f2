import {
  boolean,
  doublePrecision,
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import type { AppBoundaryErrorCode } from "../../core/entities/appError";
import type { CompanyEntity } from "../../core/entities/company";
import type {
  CanonicalRecord,
  DeliveryAck,
  ProviderAttemptOutcome,
  ProviderContent,
  TaskFailureSummary,
  TaskState,
  TerminalOutcomeKind,
} from "../../core/entities/research";

/** JSON columns hold dates as ISO strings. */
export type StoredRecord = Omit<CanonicalRecord, "generatedAt"> & {
  generatedAt: string;
};

export type StoredAck = Omit<DeliveryAck, "acknowledgedAt"> & {
  acknowledgedAt: string;
};

export const tasksTable = pgTable("tasks", {
  entityId: text("entity_id").primaryKey(),
  taskId: text("task_id").notNull(),
  state: text("state").$type<TaskState>().notNull(),
  outcome: text("outcome").$type<TerminalOutcomeKind>(),
  entity: jsonb("entity").$type<CompanyEntity>().notNull(),
  failure: jsonb("failure").$type<TaskFailureSummary>(),
  record: jsonb("record").$type<StoredRecord>(),
  deliveryAck: jsonb("delivery_ack").$type<StoredAck>(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
});

/**
 * Append-only. Rows outlive task re-runs, so daily spend can be rebuilt from this table alone.
 */
export const providerAttemptsTable = pgTable(
  "provider_attempts",
  {
    taskId: text("task_id").notNull(),
    entityId: text("entity_id").notNull(),
    sequence: integer("sequence").notNull(),
    provider: text("provider").notNull(),
    costClass: text("cost_class").notNull(),
    attemptNumber: integer("attempt_number").notNull(),
    outcome: text("outcome").$type<ProviderAttemptOutcome>().notNull(),
    cost: doublePrecision("cost").notNull(),
    errorCode: text("error_code").$type<AppBoundaryErrorCode>(),
    message: text("message"),
    payload: jsonb("payload").$type<ProviderContent>(),
    startedAt: timestamp("started_at", { withTimezone: true }).notNull(),
    endedAt: timestamp("ended_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    taskSequenceIdx: uniqueIndex("provider_attempts_task_sequence_uidx").on(
      table.taskId,
      table.sequence,
    ),
    endedAtIdx: index("provider_attempts_ended_at_idx").on(table.endedAt),
  }),
);

export const deliveriesTable = pgTable("deliveries", {
  idempotencyKey: text("idempotency_key").primaryKey(),
  entityId: text("entity_id").notNull(),
  record: jsonb("record").$type<StoredRecord>().notNull(),
  acknowledged: boolean("acknowledged").notNull().default(false),
  ack: jsonb("ack").$type<StoredAck>(),
  forwardAttempts: integer("forward_attempts").notNull().default(0),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
});
