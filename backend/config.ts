import dotenv from "dotenv";

export type Config = {
  port: number;
  nodeEnv: string;
  jwtSecret: string;
  /** Token lifetime in seconds. */
  jwtExpiresIn: number;
  superadminUsername: string;
  superadminPassword: string;
  corsOrigin: string;
  databaseUrl: string;
  databaseSsl: boolean;
  bcryptRounds: number;
  logLevel: LogLevelName;
};

export type LogLevelName = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: readonly LogLevelName[] = ["debug", "info", "warn", "error"];
const DEFAULT_JWT_SECRET = "change-me-please";

function intFrom(value: string | undefined, fallback: number, name: string) {
  if (value === undefined || value === "") return fallback;
  const n = parseInt(value, 10);
  if (!Number.isInteger(n) || n < 0 || String(n) !== value.trim()) {
    throw new Error(`${name} must be a non-negative integer, got "${value}"`);
  }
  return n;
}

function boolFrom(value: string | undefined, fallback: boolean) {
  if (value === undefined || value === "") return fallback;
  return !["0", "false", "no", "off"].includes(value.trim().toLowerCase());
}

function logLevelFrom(value: string | undefined): LogLevelName {
  const lvl = (value || "info").trim().toLowerCase();
  const match = LOG_LEVELS.find(l => l === lvl);
  if (!match) throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}`);
  return match;
}

/**
 * Reads the process configuration. `dotenv` is only applied when reading from
 * the real `process.env`, so tests can pass a plain object.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  if (env === process.env) dotenv.config();

  const nodeEnv = env.NODE_ENV || "development";
  const jwtSecret = env.JWT_SECRET || DEFAULT_JWT_SECRET;

  if (jwtSecret === DEFAULT_JWT_SECRET && nodeEnv !== "development" && nodeEnv !== "test") {
    throw new Error("JWT_SECRET must be set outside development");
  }

  return {
    port: intFrom(env.PORT, 10000, "PORT"),
    nodeEnv,
    jwtSecret,
    jwtExpiresIn: intFrom(env.JWT_EXPIRES_IN, 7 * 24 * 60 * 60, "JWT_EXPIRES_IN"),
    superadminUsername: env.SUPERADMIN_USERNAME || "superadmin",
    superadminPassword: env.SUPERADMIN_PASSWORD || "superadmin",
    corsOrigin: env.CORS_ORIGIN || "*",
    databaseUrl: env.DATABASE_URL || "",
    databaseSsl: boolFrom(env.DATABASE_SSL, true),
    bcryptRounds: intFrom(env.BCRYPT_ROUNDS, 10, "BCRYPT_ROUNDS"),
    logLevel: logLevelFrom(env.LOG_LEVEL),
  };
}
