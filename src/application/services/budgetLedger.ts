import { err, ok, type Result } from "neverthrow";
import type { ClockPort } from "../../core/ports/outboundPorts";
import { logger as defaultLogger, type Logger } from "../../shared/logger/logger";

const EPSILON = 1e-9;

export type BudgetReservation = {
  readonly id: number;
  readonly costClass: string;
  readonly amount: number;
  readonly day: string;
};

export type BudgetBlocked = {
  costClass: string;
  requested: number;
  committed: number;
  reserved: number;
  cap: number;
};

export type BudgetClassSnapshot = {
  costClass: string;
  day: string;
  cap: number | null;
  committed: number;
  reserved: number;
  remaining: number | null;
};

type ClassTotals = { committed: number; reserved: number };

const dayKey = (date: Date): string => date.toISOString().slice(0, 10);

/**
 * Tracks daily spend per provider cost class. Every method is synchronous, so a reservation is
 * one read-modify-write that no concurrent task can interleave with.
 *
 * Reservations hold the estimated (worst-case) cost until they are committed with the actual
 * cost or released. A class with no configured cap is unlimited; a cap of 0 disables the class.
 */
export class BudgetLedger {
  private readonly totals = new Map<string, ClassTotals>();
  private readonly open = new Map<number, BudgetReservation>();
  private nextReservationId = 1;
  private day: string;

  constructor(
    private readonly caps: Readonly<Record<string, number>>,
    private readonly clock: ClockPort,
    private readonly log: Logger = defaultLogger,
  ) {
    this.day = dayKey(clock.now());
  }

  reserve(
    costClass: string,
    amount: number,
  ): Result<BudgetReservation, BudgetBlocked> {
    this.rollDay();
    const totals = this.totalsFor(costClass);
    const cap = this.caps[costClass];

    if (cap !== undefined) {
      const remaining = cap - totals.committed - totals.reserved;
      if (remaining <= EPSILON || amount > remaining + EPSILON) {
        return err({
          costClass,
          requested: amount,
          committed: totals.committed,
          reserved: totals.reserved,
          cap,
        });
      }
    }

    const reservation: BudgetReservation = {
      id: this.nextReservationId,
      costClass,
      amount,
      day: this.day,
    };
    this.nextReservationId += 1;
    totals.reserved += amount;
    this.open.set(reservation.id, reservation);
    return ok(reservation);
  }

  /**
   * Converts a reservation into committed spend. Committing an unknown or already settled
   * reservation is a no-op so a late settle from an abandoned task cannot double count.
   */
  commit(reservation: BudgetReservation, actualCost: number): void {
    if (!this.settle(reservation)) {
      return;
    }

    const cost = Math.max(0, actualCost);
    if (cost > reservation.amount + EPSILON) {
      this.log.warn(
        {
          costClass: reservation.costClass,
          estimated: reservation.amount,
          actual: cost,
        },
        "Provider call cost more than its reserved estimate",
      );
    }

    if (reservation.day === this.day) {
      this.totalsFor(reservation.costClass).committed += cost;
    }
  }

  release(reservation: BudgetReservation): void {
    this.settle(reservation);
  }

  /**
   * Restores spend already committed today, e.g. read back from the task store after a restart.
   */
  seed(spentByClass: Readonly<Record<string, number>>): void {
    this.rollDay();
    for (const [costClass, spent] of Object.entries(spentByClass)) {
      this.totalsFor(costClass).committed += Math.max(0, spent);
    }
  }

  committed(costClass: string): number {
    this.rollDay();
    return this.totals.get(costClass)?.committed ?? 0;
  }

  snapshot(): BudgetClassSnapshot[] {
    this.rollDay();
    const classes = new Set([...Object.keys(this.caps), ...this.totals.keys()]);

    return Array.from(classes)
      .sort()
      .map((costClass) => {
        const totals = this.totals.get(costClass) ?? { committed: 0, reserved: 0 };
        const cap = this.caps[costClass] ?? null;
        return {
          costClass,
          day: this.day,
          cap,
          committed: totals.committed,
          reserved: totals.reserved,
          remaining:
            cap === null
              ? null
              : Math.max(0, cap - totals.committed - totals.reserved),
        };
      });
  }

  private settle(reservation: BudgetReservation): boolean {
    this.rollDay();
    const open = this.open.get(reservation.id);
    if (!open) {
      return false;
    }

    this.open.delete(reservation.id);
    const totals = this.totalsFor(open.costClass);
    totals.reserved = Math.max(0, totals.reserved - open.amount);
    return true;
  }

  private totalsFor(costClass: string): ClassTotals {
    let totals = this.totals.get(costClass);
    if (!totals) {
      totals = { committed: 0, reserved: 0 };
      this.totals.set(costClass, totals);
    }
    return totals;
  }

  /**
   * Daily caps reset at the UTC day boundary. Open reservations carry over as reserved spend.
   */
  private rollDay(): void {
    const today = dayKey(this.clock.now());
    if (today === this.day) {
      return;
    }

    this.log.info({ previousDay: this.day, day: today }, "Budget day rolled over");
    this.day = today;
    for (const totals of this.totals.values()) {
      totals.committed = 0;
    }
  }
}
