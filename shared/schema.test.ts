import { describe, expect, it } from "vitest";

import { normalizeLabel, rosterSchema, toPreferencePlan } from "./schema";

function firstIssue(input: unknown) {
  const parsed = rosterSchema.safeParse(input);
  if (parsed.success) {
    throw new Error("expected roster to be rejected");
  }
  const [issue] = parsed.error.issues;
  return { message: issue.message, path: issue.path.join(".") };
}

describe("normalizeLabel", () => {
  it("trims and capitalises labels", () => {
    expect(normalizeLabel(" monday ")).toBe("Monday");
    expect(normalizeLabel("EVENING")).toBe("Evening");
    expect(normalizeLabel("")).toBe("");
    expect(normalizeLabel(3)).toBe(3);
  });
});

describe("rosterSchema", () => {
  it("normalises labels and turns day entries into a preference plan", () => {
    const roster = rosterSchema.parse({
      employees: [
        {
          name: "  Alice ",
          preferences: [
            { day: "tuesday", shifts: ["EVENING", "morning"] },
            { day: "Saturday", shifts: ["Afternoon"] },
          ],
        },
      ],
    });

    expect(roster.employees).toEqual([
      { name: "Alice", plan: { Tuesday: ["Evening", "Morning"], Saturday: ["Afternoon"] } },
    ]);
  });

  it("accepts an empty roster", () => {
    expect(rosterSchema.parse({ employees: [] })).toEqual({ employees: [] });
  });

  it("rejects an empty name", () => {
    expect(firstIssue({ employees: [{ name: "   ", preferences: [] }] })).toEqual({
      message: "Name cannot be empty.",
      path: "employees.0.name",
    });
  });

  it("rejects an unknown day", () => {
    expect(
      firstIssue({ employees: [{ name: "Alice", preferences: [{ day: "Funday", shifts: ["Morning"] }] }] }),
    ).toEqual({
      message: "Invalid day. Choose from: Monday, Tuesday, Wednesday, Thursday, Friday, Saturday, Sunday",
      path: "employees.0.preferences.0.day",
    });
  });

  it("rejects an unknown shift", () => {
    expect(
      firstIssue({ employees: [{ name: "Alice", preferences: [{ day: "Monday", shifts: ["Night"] }] }] }),
    ).toEqual({
      message: "Invalid shift. Choose from: Morning, Afternoon, Evening",
      path: "employees.0.preferences.0.shifts.0",
    });
  });

  it("rejects the same day entered twice", () => {
    expect(
      firstIssue({
        employees: [
          {
            name: "Alice",
            preferences: [
              { day: "Monday", shifts: ["Morning"] },
              { day: "monday", shifts: ["Evening"] },
            ],
          },
        ],
      }),
    ).toEqual({
      message: "Monday already entered. Choose a different day.",
      path: "employees.0.preferences.1.day",
    });
  });

  it("rejects the same shift ranked twice", () => {
    expect(
      firstIssue({
        employees: [{ name: "Alice", preferences: [{ day: "Monday", shifts: ["Morning", "Evening", "morning"] }] }],
      }),
    ).toEqual({
      message: "Morning already chosen. Pick a different shift.",
      path: "employees.0.preferences.0.shifts.2",
    });
  });

  it("rejects a day without shift choices", () => {
    expect(firstIssue({ employees: [{ name: "Alice", preferences: [{ day: "Monday", shifts: [] }] }] })).toEqual({
      message: "At least one shift choice is required",
      path: "employees.0.preferences.0.shifts",
    });
  });

  it("rejects more than five preferred days", () => {
    const preferences = ["Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"].map((day) => ({
      day,
      shifts: ["Morning"],
    }));

    expect(firstIssue({ employees: [{ name: "Alice", preferences }] })).toEqual({
      message: "At most 5 preferred days are allowed",
      path: "employees.0.preferences",
    });
  });
});

describe("toPreferencePlan", () => {
  it("keeps each day's ranking order", () => {
    expect(
      toPreferencePlan([
        { day: "Friday", shifts: ["Afternoon", "Morning"] },
        { day: "Monday", shifts: ["Evening"] },
      ]),
    ).toEqual({ Friday: ["Afternoon", "Morning"], Monday: ["Evening"] });
  });
});
