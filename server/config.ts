export interface ServerConfig {
  port: number;
  host: string;
  rateLimitMax: number;
}

// Falls back when the variable is unset or not a positive integer
function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || "", 10);
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: intFromEnv(env.PORT, 5000),
    host: env.HOST || "0.0.0.0",
    rateLimitMax: intFromEnv(env.RATE_LIMIT_MAX, 100),
  };
}
