import type { AppBoundaryErrorCode } from "./appError";
import type { CompanyEntity } from "./company";

export type ResearchFieldValue = string | number | boolean | string[];

export type ResearchFields = Record<string, ResearchFieldValue>;

/**
 * What a provider hands back on a successful call. `cost` is the reconciled spend for the call.
 */
export type ProviderContent = {
  fields: ResearchFields;
  rawPayload: unknown;
  cost: number;
};

export type ProviderAttemptOutcome =
  | "success"
  | "quality-rejected"
  | "retryable-failure"
  | "terminal-failure"
  | "budget-blocked"
  | "circuit-open";

/**
 * One call (or skipped call) against one provider for one task. Append-only.
 * `attemptNumber` counts calls against the same provider within the task, starting at 1.
 */
export type ProviderAttempt = {
  provider: string;
  costClass: string;
  attemptNumber: number;
  startedAt: Date;
  endedAt: Date;
  outcome: ProviderAttemptOutcome;
  cost: number;
  errorCode?: AppBoundaryErrorCode;
  message?: string;
  payload?: ProviderContent;
};

export type TaskState =
  | "pending"
  | "in-flight"
  | "delivered"
  | "failed"
  | "cancelled";

export const taskStates: readonly TaskState[] = [
  "pending",
  "in-flight",
  "delivered",
  "failed",
  "cancelled",
];

export type TerminalOutcomeKind =
  | "delivered"
  | "unreachable"
  | "delivery-failed"
  | "cancelled";

export type TaskFailureKind =
  | ProviderAttemptOutcome
  | "retry-exhausted"
  | "delivery-failed"
  | "cancelled";

/**
 * Enough context to diagnose a failed task without replaying the attempt history.
 */
export type TaskFailureSummary = {
  lastProvider: string | null;
  failureKind: TaskFailureKind;
  message?: string;
};

export type SupersededValue = {
  provider: string;
  attemptNumber: number;
  value: ResearchFieldValue;
};

export type FieldProvenance = {
  provider: string;
  attemptNumber: number;
  superseded: SupersededValue[];
};

export type CanonicalRecord = {
  entityId: string;
  name: string;
  domain: string;
  metadata: Record<string, string>;
  fields: ResearchFields;
  provenance: Record<string, FieldProvenance>;
  contributingProviders: string[];
  partial: boolean;
  totalCost: number;
  generatedAt: Date;
};

export type DeliveryAck = {
  idempotencyKey: string;
  acknowledgedAt: Date;
  receipt?: string;
  httpStatus?: number;
};

export type ResearchTask = {
  id: string;
  entity: CompanyEntity;
  state: TaskState;
  attempts: ProviderAttempt[];
  record: CanonicalRecord | null;
  outcome: TerminalOutcomeKind | null;
  failure: TaskFailureSummary | null;
  deliveryAck: DeliveryAck | null;
  createdAt: Date;
  updatedAt: Date;
};
