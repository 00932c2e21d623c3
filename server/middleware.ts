import type { Request, Response, NextFunction } from "express";
import rateLimit from "express-rate-limit";

const RATE_LIMIT_WINDOW_MS = 15 * 60 * 1000; // 15 minutes

export function apiRateLimiter(max: number) {
  return rateLimit({
    windowMs: RATE_LIMIT_WINDOW_MS,
    max, // limit each IP to `max` requests per window
    message: { message: "Too many requests, please try again later" },
  });
}

// Logs "<METHOD> <path> <status> in <ms>ms" for every /api request once the response is sent
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  const path = req.path;

  res.on("finish", () => {
    if (path.startsWith("/api")) {
      const duration = Date.now() - start;
      console.log(`[express] ${req.method} ${path} ${res.statusCode} in ${duration}ms`);
    }
  });

  next();
}

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    const status = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
    if (typeof status === "number") return status;
  }
  return 500;
}

// Keeps all four parameters so Express registers it as error middleware
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  const status = statusOf(err);
  const message = status < 500 && err instanceof Error ? err.message : "Internal Server Error";

  if (status >= 500) {
    console.error("[express] Unhandled error:", err);
  }
  res.status(status).json({ message });
}
