import { describe, expect, it } from "vitest";

import { rosterSchema, type ShiftKind } from "@shared/schema";
import { PreferenceStore, UnknownEmployeeError } from "./preference-store";

describe("PreferenceStore", () => {
  it("lists employees in registration order", () => {
    const store = new PreferenceStore();
    store.addEmployee("Zoe", { Monday: ["Morning"] });
    store.addEmployee("Adam", {});
    store.addEmployee("Mia", { Friday: ["Evening"] });

    expect(store.allEmployees()).toEqual(["Zoe", "Adam", "Mia"]);
    expect(store.size).toBe(3);
  });

  it("ignores a duplicate name and keeps the first plan", () => {
    const store = new PreferenceStore();
    expect(store.addEmployee("Alice", { Monday: ["Morning"] })).toBe(true);
    expect(store.addEmployee("Alice", { Tuesday: ["Evening"] })).toBe(false);

    expect(store.allEmployees()).toEqual(["Alice"]);
    expect(store.getPlan("Alice")).toEqual({ Monday: ["Morning"] });
  });

  it("throws UnknownEmployeeError for an unregistered name", () => {
    const store = new PreferenceStore();
    store.addEmployee("Alice", {});

    expect(() => store.getPlan("Bob")).toThrow(UnknownEmployeeError);
    expect(() => store.getPlan("Bob")).toThrow("Unknown employee: Bob");
  });

  it("stores a copy of the plan", () => {
    const store = new PreferenceStore();
    const shifts: ShiftKind[] = ["Morning"];
    store.addEmployee("Alice", { Monday: shifts });
    shifts.push("Evening");

    expect(store.getPlan("Alice")).toEqual({ Monday: ["Morning"] });
  });

  it("builds from a validated roster", () => {
    const roster = rosterSchema.parse({
      employees: [
        { name: "Alice", preferences: [{ day: "monday", shifts: ["evening", "morning"] }] },
        { name: "Bob", preferences: [] },
        { name: "Alice", preferences: [{ day: "Sunday", shifts: ["Morning"] }] },
      ],
    });
    const store = PreferenceStore.fromRoster(roster);

    expect(store.allEmployees()).toEqual(["Alice", "Bob"]);
    expect(store.hasEmployee("Bob")).toBe(true);
    expect(store.getPlan("Alice")).toEqual({ Monday: ["Evening", "Morning"] });
    expect(store.getPlan("Bob")).toEqual({});
  });
});
