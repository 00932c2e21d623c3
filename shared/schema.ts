import { z } from "zod";

// === WEEK GRID ===

export const DAYS = [
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
  "Sunday",
] as const;

export const SHIFT_KINDS = ["Morning", "Afternoon", "Evening"] as const;

export type Day = (typeof DAYS)[number];
export type ShiftKind = (typeof SHIFT_KINDS)[number];

// Scheduling constraints are fixed for every run
export const MAX_DAYS_PER_WEEK = 5;
export const MIN_EMPLOYEES_PER_SHIFT = 2;
// How many days an employee may list preferences for
export const MAX_PREFERRED_DAYS = 5;

// Day -> shifts in priority order (first entry is the 1st choice).
// A day missing from the plan means no preference that day.
export type PreferencePlan = Partial<Record<Day, ShiftKind[]>>;

// === LABEL SCHEMAS ===

// "monday", " MONDAY " -> "Monday"
export function normalizeLabel(value: unknown): unknown {
  if (typeof value !== "string") return value;
  const trimmed = value.trim();
  if (!trimmed) return trimmed;
  return trimmed.charAt(0).toUpperCase() + trimmed.slice(1).toLowerCase();
}

export const daySchema = z.preprocess(
  normalizeLabel,
  z.enum(DAYS, {
    errorMap: () => ({ message: `Invalid day. Choose from: ${DAYS.join(", ")}` }),
  }),
);

export const shiftKindSchema = z.preprocess(
  normalizeLabel,
  z.enum(SHIFT_KINDS, {
    errorMap: () => ({ message: `Invalid shift. Choose from: ${SHIFT_KINDS.join(", ")}` }),
  }),
);

// === ROSTER SCHEMAS ===

export const dayPreferenceSchema = z.object({
  day: daySchema,
  shifts: z
    .array(shiftKindSchema)
    .min(1, "At least one shift choice is required")
    .max(SHIFT_KINDS.length, `At most ${SHIFT_KINDS.length} shift choices are allowed`)
    .superRefine((shifts, ctx) => {
      const seen = new Set<ShiftKind>();
      shifts.forEach((shift, index) => {
        if (seen.has(shift)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `${shift} already chosen. Pick a different shift.`,
            path: [index],
          });
        }
        seen.add(shift);
      });
    }),
});

export const rosterEntrySchema = z
  .object({
    name: z.string().trim().min(1, "Name cannot be empty."),
    preferences: z
      .array(dayPreferenceSchema)
      .max(MAX_PREFERRED_DAYS, `At most ${MAX_PREFERRED_DAYS} preferred days are allowed`)
      .superRefine((entries, ctx) => {
        const seen = new Set<Day>();
        entries.forEach((entry, index) => {
          if (seen.has(entry.day)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              message: `${entry.day} already entered. Choose a different day.`,
              path: [index, "day"],
            });
          }
          seen.add(entry.day);
        });
      }),
  })
  .transform((entry) => ({
    name: entry.name,
    plan: toPreferencePlan(entry.preferences),
  }));

export const rosterSchema = z.object({
  employees: z.array(rosterEntrySchema),
});

export type DayPreference = z.infer<typeof dayPreferenceSchema>;
export type RosterEntry = z.infer<typeof rosterEntrySchema>;
export type Roster = z.infer<typeof rosterSchema>;

export function toPreferencePlan(entries: DayPreference[]): PreferencePlan {
  const plan: PreferencePlan = {};
  for (const entry of entries) {
    plan[entry.day] = [...entry.shifts];
  }
  return plan;
}

// === ASSIGNMENT RESULT SHAPES ===

export type AssignmentPass = "preference" | "coverage" | "reconciliation";

export interface Placement {
  employee: string;
  day: Day;
  shift: ShiftKind;
  pass: AssignmentPass;
}

export interface UnderstaffedSlot {
  day: Day;
  shift: ShiftKind;
  headcount: number;
}

export interface UnmetPreference {
  employee: string;
  days: Day[];
}

export type ScheduleSnapshot = Record<Day, Record<ShiftKind, string[]>>;
export type WorkloadSnapshot = Record<string, number>;

export interface AssignmentReport {
  schedule: ScheduleSnapshot;
  workload: WorkloadSnapshot;
  placements: Placement[];
  understaffed: UnderstaffedSlot[];
  unmetPreferences: UnmetPreference[];
}
