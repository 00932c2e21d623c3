import * as fs from "fs";
import { rosterSchema, type Roster } from "@shared/schema";
import { PreferenceStore } from "../server/preference-store";
import { assignShifts } from "../server/shift-assigner";
import { formatSchedule } from "../server/schedule-formatter";

export function loadRoster(filePath: string): Roster {
  let contents: string;
  try {
    contents = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new Error(`Roster file not found: ${filePath}`);
    }
    throw new Error(`Could not read roster file: ${err instanceof Error ? err.message : String(err)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (err) {
    throw new Error(`Roster file is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = rosterSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    const field = issue.path.length > 0 ? ` (${issue.path.join(".")})` : "";
    throw new Error(`Invalid roster${field}: ${issue.message}`);
  }
  return parsed.data;
}

export function renderRoster(roster: Roster): string {
  const store = PreferenceStore.fromRoster(roster);
  const result = assignShifts(store);
  return formatSchedule(result, store.allEmployees());
}
