import type { TaskState } from "../../core/entities/research";
import type { ClockPort } from "../../core/ports/outboundPorts";
import type { BudgetClassSnapshot, BudgetLedger } from "./budgetLedger";
import type {
  CircuitBreakerRegistry,
  CircuitBreakerSnapshot,
} from "./circuitBreaker";

export interface TaskCountSource {
  taskCounts(): Record<TaskState, number>;
}

export type ProgressSnapshot = {
  takenAt: Date;
  tasks: Record<TaskState, number>;
  spend: BudgetClassSnapshot[];
  circuits: CircuitBreakerSnapshot[];
};

/**
 * Read-only view over scheduler, ledger and breakers. Callers poll `snapshot()`; nothing is pushed.
 */
export class ProgressMonitor {
  constructor(
    private readonly tasks: TaskCountSource,
    private readonly ledger: BudgetLedger,
    private readonly breakers: CircuitBreakerRegistry,
    private readonly clock: ClockPort,
  ) {}

  snapshot(): ProgressSnapshot {
    return {
      takenAt: this.clock.now(),
      tasks: this.tasks.taskCounts(),
      spend: this.ledger.snapshot(),
      circuits: this.breakers.snapshots(),
    };
  }
}
