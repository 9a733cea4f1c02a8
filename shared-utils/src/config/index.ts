/**
 * Shared configuration helpers. Services read `process.env` through these
 * once at start-up and pass plain objects onward.
 */

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  name: string;
}

export interface RedisConfig {
  url: string;
  host?: string;
  port?: number;
}

export interface ServiceConfig {
  mode: string;
  logLevel: string;
}

/**
 * Create database configuration from environment variables
 */
export function createDatabaseConfig(serviceName: string): DatabaseConfig {
  const user = serviceName.replace(/-/g, "_");

  return {
    host: process.env.DB_HOST || "localhost",
    port: parseEnvNumber("DB_PORT", 5432),
    user: process.env.DB_USER || user,
    password: process.env.DB_PASSWORD || user,
    name: process.env.DB_NAME || `${user}_dev`,
  };
}

/**
 * Create Redis configuration from environment variables
 */
export function createRedisConfig(): RedisConfig {
  const redisUrl = process.env.REDIS_URL ?? "redis://localhost:6379";

  try {
    const url = new URL(redisUrl);
    return {
      url: redisUrl,
      host: url.hostname,
      port: url.port ? parseInt(url.port, 10) : 6379,
    };
  } catch {
    // not a URL, e.g. "localhost:6379"
    return {
      url: redisUrl,
      host: process.env.REDIS_HOST ?? "localhost",
      port: parseEnvNumber("REDIS_PORT", 6379),
    };
  }
}

export function createServiceConfig(): ServiceConfig {
  return {
    mode: process.env.MODE ?? process.env.NODE_ENV ?? "dev",
    logLevel: process.env.LOG_LEVEL ?? "info",
  };
}

/**
 * Validate required environment variables
 */
export function validateRequiredEnv(requiredVars: string[]): void {
  const missing = requiredVars.filter((varName) => !process.env[varName]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missing.join(", ")}`
    );
  }
}

/**
 * Parse comma-separated environment variable into array
 */
export function parseEnvArray(
  envVar: string,
  defaultValue: string[] = []
): string[] {
  const value = process.env[envVar];
  if (!value) return defaultValue;

  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * Parse a numeric environment variable, rejecting anything that is not a
 * finite number
 */
export function parseEnvNumber(envVar: string, defaultValue: number): number {
  const value = process.env[envVar];
  if (value === undefined || value.trim() === "") return defaultValue;

  const num = Number(value);
  if (!Number.isFinite(num)) {
    throw new Error(`Invalid number in ${envVar}: ${value}`);
  }
  return num;
}
