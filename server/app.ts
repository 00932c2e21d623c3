import express, { type Express } from "express";
import { createServer, type Server } from "http";
import { registerRoutes } from "./routes";
import { apiRateLimiter, errorHandler, requestLogger } from "./middleware";

export interface AppOptions {
  rateLimitMax: number;
}

export async function createApp(options: AppOptions): Promise<{ app: Express; httpServer: Server }> {
  const app = express();
  const httpServer = createServer(app);

  app.use(express.json({ limit: "1mb" }));
  app.use(requestLogger);
  app.use("/api", apiRateLimiter(options.rateLimitMax));

  await registerRoutes(httpServer, app);

  app.use(errorHandler);

  return { app, httpServer };
}
