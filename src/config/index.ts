export interface AppConfig {
  port: number;
  frontendUrl: string;
  maxFileSizeMb: number;
  maxFiles: number;
  maxSessions: number;
  sessionTtlMinutes: number;
  nodeEnv: string;
}

function positiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

// Read lazily so dotenv has populated process.env by the time this runs
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: positiveInt(env.PORT, 3001),
    frontendUrl: env.FRONTEND_URL || "http://localhost:3000",
    maxFileSizeMb: positiveInt(env.MAX_FILE_SIZE_MB, 10),
    maxFiles: positiveInt(env.MAX_FILES, 50),
    maxSessions: positiveInt(env.MAX_SESSIONS, 1000),
    sessionTtlMinutes: positiveInt(env.SESSION_TTL_MINUTES, 60),
    nodeEnv: env.NODE_ENV || "development",
  };
}
