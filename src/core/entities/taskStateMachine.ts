import { err, ok, type Result } from "neverthrow";
import type { CompanyEntity } from "./company";
import type {
  CanonicalRecord,
  DeliveryAck,
  ProviderAttempt,
  ResearchTask,
  TaskFailureSummary,
  TaskState,
} from "./research";

export type TaskEvent =
  | { type: "admit"; at: Date }
  | { type: "record-attempt"; attempt: ProviderAttempt }
  | { type: "deliver"; record: CanonicalRecord; ack: DeliveryAck; at: Date }
  | {
      type: "fail";
      kind: "unreachable" | "delivery-failed";
      failure: TaskFailureSummary;
      record?: CanonicalRecord;
      at: Date;
    }
  | { type: "cancel"; failure: TaskFailureSummary; at: Date };

export type TaskTransitionError = {
  taskId: string;
  from: TaskState;
  event: TaskEvent["type"];
  message: string;
};

const terminalStates = new Set<TaskState>(["delivered", "failed", "cancelled"]);

export const isTerminalState = (state: TaskState): boolean =>
  terminalStates.has(state);

export const createTask = (
  id: string,
  entity: CompanyEntity,
  now: Date,
): ResearchTask => ({
  id,
  entity,
  state: "pending",
  attempts: [],
  record: null,
  outcome: null,
  failure: null,
  deliveryAck: null,
  createdAt: now,
  updatedAt: now,
});

const rejected = (
  task: ResearchTask,
  event: TaskEvent,
  message: string,
): Result<ResearchTask, TaskTransitionError> =>
  err({ taskId: task.id, from: task.state, event: event.type, message });

/**
 * Applies one event to a task and returns the next task value.
 * Terminal tasks reject every event, so a late result from an abandoned worker cannot revive them.
 */
export const applyTaskEvent = (
  task: ResearchTask,
  event: TaskEvent,
): Result<ResearchTask, TaskTransitionError> => {
  if (isTerminalState(task.state)) {
    return rejected(task, event, `Task is already terminal (${task.state}).`);
  }

  switch (event.type) {
    case "admit":
      if (task.state !== "pending") {
        return rejected(task, event, "Only pending tasks can be admitted.");
      }
      return ok({ ...task, state: "in-flight", updatedAt: event.at });

    case "record-attempt":
      if (task.state !== "in-flight") {
        return rejected(task, event, "Attempts are recorded only while in-flight.");
      }
      return ok({
        ...task,
        attempts: [...task.attempts, event.attempt],
        updatedAt: event.attempt.endedAt,
      });

    case "deliver":
      if (task.state !== "in-flight") {
        return rejected(task, event, "Only in-flight tasks can be delivered.");
      }
      return ok({
        ...task,
        state: "delivered",
        record: event.record,
        outcome: "delivered",
        deliveryAck: event.ack,
        updatedAt: event.at,
      });

    case "fail":
      if (task.state !== "in-flight") {
        return rejected(task, event, "Only in-flight tasks can fail.");
      }
      return ok({
        ...task,
        state: "failed",
        record: event.record ?? task.record,
        outcome: event.kind,
        failure: event.failure,
        updatedAt: event.at,
      });

    case "cancel":
      return ok({
        ...task,
        state: "cancelled",
        outcome: "cancelled",
        failure: event.failure,
        updatedAt: event.at,
      });
  }
};

/**
 * Last provider that was actually called, skipping budget/circuit skips when a real call exists.
 */
export const lastAttemptedProvider = (task: ResearchTask): string | null => {
  const called = task.attempts.filter(
    (attempt) =>
      attempt.outcome !== "budget-blocked" && attempt.outcome !== "circuit-open",
  );
  return (called.at(-1) ?? task.attempts.at(-1))?.provider ?? null;
};
