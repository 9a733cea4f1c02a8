import * as dotenv from "dotenv";
import { readFileSync } from "fs";
import {
  createDatabaseConfig,
  createRedisConfig,
  createServiceConfig,
  DatabaseConfig,
  isLogLevel,
  LogLevel,
  parseEnvArray,
  parseEnvNumber,
} from "@estate-core/shared-utils";
import { ValidationError } from "../core/errors";
import type { PropertyStateConfig } from "../core/manager";
import {
  DEFAULT_TRUST_POLICY,
  parseTrustPolicy,
  TrustPolicyConfig,
} from "../core/trust";

// Load environment variables
dotenv.config();

export const SERVICE_NAME = "property-state";

export type StoreAdapter = "MEMORY" | "SQL";
export type BusType = "memory" | "redis";

export interface EncryptionConfig {
  currentKey: string | null;
  priorKeys: string[];
}

export interface AppConfig {
  mode: string;
  logLevel: LogLevel;
  storeAdapter: StoreAdapter;
  busType: BusType;
  db: DatabaseConfig;
  redisUrl: string;
  encryption: EncryptionConfig;
  engine: PropertyStateConfig;
  trustPolicy: TrustPolicyConfig;
}

function nonNegative(envVar: string, defaultValue: number): number {
  const value = parseEnvNumber(envVar, defaultValue);
  if (value < 0) {
    throw new ValidationError(`${envVar} must not be negative`, { envVar, value });
  }
  return value;
}

function parseStoreAdapter(mode: string): StoreAdapter {
  const raw = (process.env.STORE_ADAPTER || (mode === "dev" ? "MEMORY" : "SQL")).toUpperCase();
  if (raw !== "MEMORY" && raw !== "SQL") {
    throw new ValidationError(`STORE_ADAPTER must be MEMORY or SQL, got ${raw}`);
  }
  return raw;
}

function parseBusType(): BusType {
  const raw = (process.env.BUS_TYPE || "memory").toLowerCase();
  if (raw !== "memory" && raw !== "redis") {
    throw new ValidationError(`BUS_TYPE must be memory or redis, got ${raw}`);
  }
  return raw;
}

function loadTrustPolicy(): TrustPolicyConfig {
  const path = process.env.TRUST_POLICY_PATH;
  if (!path) return DEFAULT_TRUST_POLICY;

  let document: unknown;
  try {
    document = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new ValidationError(`Cannot read trust policy from ${path}`, {
      path,
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  return parseTrustPolicy(document);
}

/**
 * Read the whole service configuration from the environment once.
 * Outside dev mode an address key is mandatory.
 */
export function loadConfig(): AppConfig {
  const service = createServiceConfig();
  if (!isLogLevel(service.logLevel)) {
    throw new ValidationError(`LOG_LEVEL must be debug, info, warn or error`, {
      value: service.logLevel,
    });
  }

  const currentKey = process.env.ADDRESS_ENCRYPTION_KEY || null;
  if (currentKey === null && service.mode !== "dev") {
    throw new ValidationError("ADDRESS_ENCRYPTION_KEY is required outside dev mode");
  }

  return {
    mode: service.mode,
    logLevel: service.logLevel,
    storeAdapter: parseStoreAdapter(service.mode),
    busType: parseBusType(),
    db: createDatabaseConfig(SERVICE_NAME),
    redisUrl: createRedisConfig().url,
    encryption: {
      currentKey,
      priorKeys: parseEnvArray("ADDRESS_ENCRYPTION_PRIOR_KEYS"),
    },
    engine: {
      maxRetries: nonNegative("RECONCILE_MAX_RETRIES", 3),
      retryBackoffMs: nonNegative("RECONCILE_RETRY_BACKOFF_MS", 25),
      timeoutMs: nonNegative("RECONCILE_TIMEOUT_MS", 5000),
      statsCacheTtlSec: nonNegative("STATS_CACHE_TTL_SEC", 30),
    },
    trustPolicy: loadTrustPolicy(),
  };
}
