import { DAYS, type PreferencePlan, type Roster } from "@shared/schema";

export class UnknownEmployeeError extends Error {
  readonly employee: string;

  constructor(employee: string) {
    super(`Unknown employee: ${employee}`);
    this.name = "UnknownEmployeeError";
    this.employee = employee;
  }
}

// Copy so the caller can't mutate a plan after registration
function copyPlan(plan: PreferencePlan): PreferencePlan {
  const copy: PreferencePlan = {};
  for (const day of DAYS) {
    const shifts = plan[day];
    if (shifts) {
      copy[day] = [...shifts];
    }
  }
  return copy;
}

// Holds each employee's ranked shift preferences.
// Registration order is part of the contract: every assignment pass walks
// employees in this order, so earlier employees win contested slots.
export class PreferenceStore {
  private plans = new Map<string, PreferencePlan>();

  static fromRoster(roster: Roster): PreferenceStore {
    const store = new PreferenceStore();
    for (const entry of roster.employees) {
      store.addEmployee(entry.name, entry.plan);
    }
    return store;
  }

  // Re-registering a name is ignored; the first plan is kept
  addEmployee(name: string, plan: PreferencePlan): boolean {
    if (this.plans.has(name)) {
      return false;
    }
    this.plans.set(name, copyPlan(plan));
    return true;
  }

  hasEmployee(name: string): boolean {
    return this.plans.has(name);
  }

  getPlan(name: string): PreferencePlan {
    const plan = this.plans.get(name);
    if (!plan) {
      throw new UnknownEmployeeError(name);
    }
    return plan;
  }

  allEmployees(): string[] {
    return Array.from(this.plans.keys());
  }

  get size(): number {
    return this.plans.size;
  }
}
