import {
  DAYS,
  SHIFT_KINDS,
  MAX_DAYS_PER_WEEK,
  type Day,
  type ShiftKind,
  type ScheduleSnapshot,
  type WorkloadSnapshot,
} from "@shared/schema";

// Fixed 7 x 3 grid: slots[dayIndex][shiftIndex] -> employees in placement order.
// Slots are append-only; nothing is ever removed or moved once placed.
export class Schedule {
  private readonly slots: string[][][] = DAYS.map(() => SHIFT_KINDS.map(() => []));

  private slot(day: Day, shift: ShiftKind): string[] {
    return this.slots[DAYS.indexOf(day)][SHIFT_KINDS.indexOf(shift)];
  }

  place(day: Day, shift: ShiftKind, employee: string): void {
    this.slot(day, shift).push(employee);
  }

  employeesFor(day: Day, shift: ShiftKind): readonly string[] {
    return this.slot(day, shift);
  }

  headcount(day: Day, shift: ShiftKind): number {
    return this.slot(day, shift).length;
  }

  includes(day: Day, shift: ShiftKind, employee: string): boolean {
    return this.slot(day, shift).includes(employee);
  }

  // Any shift that day counts
  isScheduledOn(employee: string, day: Day): boolean {
    return SHIFT_KINDS.some((shift) => this.includes(day, shift, employee));
  }

  shiftOn(employee: string, day: Day): ShiftKind | undefined {
    return SHIFT_KINDS.find((shift) => this.includes(day, shift, employee));
  }

  scheduledDays(employee: string): Set<Day> {
    return new Set(DAYS.filter((day) => this.isScheduledOn(employee, day)));
  }

  snapshot(): ScheduleSnapshot {
    const row = (day: Day): Record<ShiftKind, string[]> => ({
      Morning: [...this.employeesFor(day, "Morning")],
      Afternoon: [...this.employeesFor(day, "Afternoon")],
      Evening: [...this.employeesFor(day, "Evening")],
    });
    return {
      Monday: row("Monday"),
      Tuesday: row("Tuesday"),
      Wednesday: row("Wednesday"),
      Thursday: row("Thursday"),
      Friday: row("Friday"),
      Saturday: row("Saturday"),
      Sunday: row("Sunday"),
    };
  }
}

// Days assigned per employee. Kept in step with Schedule by the assigner:
// one increment per new day an employee is placed on.
export class WorkloadCounter {
  private counts = new Map<string, number>();

  get(employee: string): number {
    return this.counts.get(employee) ?? 0;
  }

  increment(employee: string): number {
    const next = this.get(employee) + 1;
    this.counts.set(employee, next);
    return next;
  }

  hasCapacity(employee: string): boolean {
    return this.get(employee) < MAX_DAYS_PER_WEEK;
  }

  snapshot(employees: readonly string[]): WorkloadSnapshot {
    return Object.fromEntries(employees.map((employee) => [employee, this.get(employee)]));
  }
}

// Query-only views handed out once a run is finished
export type ScheduleView = Pick<
  Schedule,
  "employeesFor" | "headcount" | "includes" | "isScheduledOn" | "shiftOn" | "scheduledDays" | "snapshot"
>;
export type WorkloadView = Pick<WorkloadCounter, "get" | "hasCapacity" | "snapshot">;
