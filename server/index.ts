import { createApp } from "./app";
import { loadServerConfig } from "./config";

const { port, host, rateLimitMax } = loadServerConfig();

createApp({ rateLimitMax })
  .then(({ httpServer }) => {
    httpServer.listen(port, host, () => {
      console.log(`[express] serving on ${host}:${port}`);
    });
  })
  .catch((err: unknown) => {
    console.error("[express] Failed to start server:", err);
    process.exit(1);
  });
