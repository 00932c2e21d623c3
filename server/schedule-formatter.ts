import { DAYS, SHIFT_KINDS } from "@shared/schema";
import type { AssignmentResult } from "./shift-assigner";

const PAGE_WIDTH = 80;
const RULE_WIDTH = 60;

function center(text: string, width: number): string {
  const padding = Math.max(0, width - text.length);
  const left = Math.floor(padding / 2);
  return " ".repeat(left) + text + " ".repeat(padding - left);
}

function banner(title: string): string[] {
  const border = "=".repeat(PAGE_WIDTH);
  return [border, center(title, PAGE_WIDTH), border, ""];
}

// Plain-text week view followed by a days-worked summary sorted by name
export function formatSchedule(result: AssignmentResult, employees: readonly string[]): string {
  const lines: string[] = ["", ...banner("EMPLOYEE SCHEDULE FOR THE WEEK")];

  for (const day of DAYS) {
    lines.push("", day.toUpperCase(), "-".repeat(RULE_WIDTH));
    for (const shift of SHIFT_KINDS) {
      const assigned = result.schedule.employeesFor(day, shift);
      const list = assigned.length > 0 ? assigned.join(", ") : "No employees assigned";
      lines.push(`  ${shift.padEnd(12)} : ${list}`);
    }
  }

  lines.push("", ...banner("EMPLOYEE WORK SUMMARY"));
  for (const employee of [...employees].sort()) {
    lines.push(`  ${employee.padEnd(20)} : ${result.workload.get(employee)} days`);
  }
  lines.push("", "=".repeat(PAGE_WIDTH), "");

  return lines.join("\n");
}
