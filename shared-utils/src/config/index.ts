/**
 * Shared configuration helpers for listing-tracker jobs
 */

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  name: string;
  /** Full connection string; takes precedence over the discrete fields */
  url?: string;
}

export interface RedisConfig {
  url: string;
  host?: string;
  port?: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Create database configuration from environment variables
 */
export function createDatabaseConfig(serviceName: string): DatabaseConfig {
  return {
    host: process.env.DB_HOST ?? "localhost",
    port: parseEnvNumber("DB_PORT", 5432),
    user: process.env.DB_USER ?? serviceName,
    password: process.env.DB_PASSWORD ?? serviceName,
    name: process.env.DB_NAME ?? `${serviceName}_dev`,
    url: process.env.DATABASE_URL || undefined,
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
    // Not a URL; fall back to discrete host/port variables
    return {
      url: redisUrl,
      host: process.env.REDIS_HOST ?? "localhost",
      port: parseEnvNumber("REDIS_PORT", 6379),
    };
  }
}

/**
 * Read a numeric environment variable, rejecting non-numeric values
 */
export function parseEnvNumber(envVar: string, defaultValue: number): number {
  const value = process.env[envVar];
  if (value === undefined || value.trim() === "") return defaultValue;

  const num = Number(value);
  if (isNaN(num)) {
    throw new ConfigError(`Invalid number in ${envVar}: ${value}`);
  }
  return num;
}

/**
 * Read an optional numeric environment variable
 */
export function parseEnvOptionalNumber(envVar: string): number | undefined {
  const value = process.env[envVar];
  if (value === undefined || value.trim() === "") return undefined;
  return parseEnvNumber(envVar, 0);
}
