import { loadRoster, renderRoster } from "./roster-file";

// Usage: tsx script/schedule-roster.ts <roster.json>
const filePath = process.argv[2];
if (!filePath) {
  console.error("Usage: schedule-roster <roster.json>");
  process.exit(1);
}

try {
  const roster = loadRoster(filePath);
  console.log(`[Roster] Loaded ${roster.employees.length} employees from ${filePath}`);
  console.log(renderRoster(roster));
} catch (err) {
  console.error(`[Roster] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
