import type { Express, Response } from "express";
import type { Server } from "http";
import { z } from "zod";
import { api } from "@shared/routes";
import type { Roster } from "@shared/schema";
import { PreferenceStore } from "./preference-store";
import { assignShifts, toReport, type AssignmentResult } from "./shift-assigner";
import { formatSchedule } from "./schedule-formatter";

function sendValidationError(res: Response, err: z.ZodError): void {
  const [issue] = err.errors;
  res.status(400).json({
    message: issue?.message ?? "Invalid roster",
    field: issue && issue.path.length > 0 ? issue.path.join(".") : undefined,
  });
}

function runRoster(roster: Roster): { employees: string[]; result: AssignmentResult } {
  const store = PreferenceStore.fromRoster(roster);
  const employees = store.allEmployees();
  console.log(`[Roster] Registered ${employees.length} of ${roster.employees.length} submitted employees`);
  return { employees, result: assignShifts(store) };
}

export async function registerRoutes(
  httpServer: Server,
  app: Express
): Promise<Server> {

  // === Health ===
  app.get(api.health.path, (_req, res) => {
    res.json({ ok: true });
  });

  // === Schedule ===
  app.post(api.schedule.assign.path, (req, res) => {
    try {
      const roster = api.schedule.assign.input.parse(req.body);
      const { employees, result } = runRoster(roster);
      res.json(toReport(result, employees));
    } catch (err) {
      if (err instanceof z.ZodError) {
        sendValidationError(res, err);
        return;
      }
      throw err;
    }
  });

  app.post(api.schedule.render.path, (req, res) => {
    try {
      const roster = api.schedule.render.input.parse(req.body);
      const { employees, result } = runRoster(roster);
      res.type("text/plain").send(formatSchedule(result, employees));
    } catch (err) {
      if (err instanceof z.ZodError) {
        sendValidationError(res, err);
        return;
      }
      throw err;
    }
  });

  return httpServer;
}
