import {
  DAYS,
  SHIFT_KINDS,
  MIN_EMPLOYEES_PER_SHIFT,
  type AssignmentPass,
  type AssignmentReport,
  type Day,
  type Placement,
  type ShiftKind,
  type UnderstaffedSlot,
  type UnmetPreference,
} from "@shared/schema";
import type { PreferenceStore } from "./preference-store";
import { Schedule, WorkloadCounter, type ScheduleView, type WorkloadView } from "./schedule-grid";

export interface AssignmentResult {
  schedule: ScheduleView;
  workload: WorkloadView;
  placements: Placement[];
  understaffed: UnderstaffedSlot[];
  unmetPreferences: UnmetPreference[];
}

// Greedy three-pass assignment over a fixed week grid:
//   1. preference  - each employee gets their 1st choice on every preferred day
//   2. coverage    - understaffed slots are backfilled regardless of preference
//   3. reconcile   - preferred days still missing are filled by rank
// Passes only ever add placements. Employees are always walked in the
// store's registration order, which makes the outcome deterministic.
export class ShiftAssigner {
  private readonly schedule = new Schedule();
  private readonly workload = new WorkloadCounter();
  private readonly placements: Placement[] = [];
  private result: AssignmentResult | null = null;

  constructor(private readonly store: PreferenceStore) {}

  run(): AssignmentResult {
    if (this.result) {
      return this.result;
    }

    const employees = this.store.allEmployees();
    console.log(`[ShiftAssigner] Scheduling ${employees.length} employees`);

    this.assignPreferredShifts(employees);
    this.ensureMinimumCoverage(employees);
    this.resolveConflicts(employees);

    const understaffed = this.findUnderstaffedSlots();
    if (understaffed.length > 0) {
      console.log(`[ShiftAssigner] ${understaffed.length} shifts remain below ${MIN_EMPLOYEES_PER_SHIFT} employees`);
    }

    this.result = {
      schedule: this.schedule,
      workload: this.workload,
      placements: this.placements,
      understaffed,
      unmetPreferences: this.findUnmetPreferences(employees),
    };
    return this.result;
  }

  private assign(employee: string, day: Day, shift: ShiftKind, pass: AssignmentPass): void {
    this.schedule.place(day, shift, employee);
    this.workload.increment(employee);
    this.placements.push({ employee, day, shift, pass });
  }

  private countPlacements(pass: AssignmentPass): number {
    return this.placements.filter((p) => p.pass === pass).length;
  }

  // Pass 1: first choice only, no staffing cap
  private assignPreferredShifts(employees: string[]): void {
    for (const employee of employees) {
      const plan = this.store.getPlan(employee);

      for (const day of DAYS) {
        if (!this.workload.hasCapacity(employee)) break;

        const ranked = plan[day];
        if (!ranked || this.schedule.isScheduledOn(employee, day)) continue;

        // An empty ranking ends placement for this employee's remaining days
        if (ranked.length === 0) break;

        this.assign(employee, day, ranked[0], "preference");
      }
    }
    console.log(`[ShiftAssigner] Preference pass placed ${this.countPlacements("preference")} shifts`);
  }

  // Pass 2: backfill every slot up to the coverage floor, first eligible employee wins
  private ensureMinimumCoverage(employees: string[]): void {
    for (const day of DAYS) {
      for (const shift of SHIFT_KINDS) {
        while (this.schedule.headcount(day, shift) < MIN_EMPLOYEES_PER_SHIFT) {
          const candidate = employees.find(
            (employee) =>
              this.workload.hasCapacity(employee) &&
              !this.schedule.isScheduledOn(employee, day) &&
              !this.schedule.includes(day, shift, employee),
          );
          if (!candidate) break;

          this.assign(candidate, day, shift, "coverage");
        }
      }
    }
    console.log(`[ShiftAssigner] Coverage pass placed ${this.countPlacements("coverage")} shifts`);
  }

  // Pass 3: preferred days that are still unscheduled, tried by rank
  private resolveConflicts(employees: string[]): void {
    for (const employee of employees) {
      const plan = this.store.getPlan(employee);
      const scheduledDays = this.schedule.scheduledDays(employee);
      const missingDays = DAYS.filter((day) => plan[day] !== undefined && !scheduledDays.has(day));

      for (const day of missingDays) {
        if (!this.workload.hasCapacity(employee)) break;

        const ranked: readonly ShiftKind[] = plan[day] ?? SHIFT_KINDS;
        const shift = ranked.find((candidate) => !this.schedule.includes(day, candidate, employee));
        if (shift) {
          this.assign(employee, day, shift, "reconciliation");
        }
      }
    }
    console.log(`[ShiftAssigner] Reconciliation pass placed ${this.countPlacements("reconciliation")} shifts`);
  }

  private findUnderstaffedSlots(): UnderstaffedSlot[] {
    const slots: UnderstaffedSlot[] = [];
    for (const day of DAYS) {
      for (const shift of SHIFT_KINDS) {
        const headcount = this.schedule.headcount(day, shift);
        if (headcount < MIN_EMPLOYEES_PER_SHIFT) {
          slots.push({ day, shift, headcount });
        }
      }
    }
    return slots;
  }

  private findUnmetPreferences(employees: string[]): UnmetPreference[] {
    const unmet: UnmetPreference[] = [];
    for (const employee of employees) {
      const plan = this.store.getPlan(employee);
      const days = DAYS.filter((day) => plan[day] !== undefined && !this.schedule.isScheduledOn(employee, day));
      if (days.length > 0) {
        unmet.push({ employee, days });
      }
    }
    return unmet;
  }
}

export function assignShifts(store: PreferenceStore): AssignmentResult {
  return new ShiftAssigner(store).run();
}

export function toReport(result: AssignmentResult, employees: readonly string[]): AssignmentReport {
  return {
    schedule: result.schedule.snapshot(),
    workload: result.workload.snapshot(employees),
    placements: result.placements,
    understaffed: result.understaffed,
    unmetPreferences: result.unmetPreferences,
  };
}
