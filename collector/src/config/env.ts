import * as dotenv from "dotenv";
import * as path from "path";
import {
  ConfigError,
  createDatabaseConfig,
  createRedisConfig,
  parseEnvNumber,
  parseEnvOptionalNumber,
} from "@listing-tracker/shared-utils";

// Load environment variables from .env file
dotenv.config();

export const cfg = {
  serviceName: "collector",
  jobType: process.env.JOB_TYPE ?? "daily_new_listings",
  mode: process.env.MODE ?? "dev",
  pageSize: parseEnvNumber("PAGE_SIZE", 50),
  maxPages: parseEnvOptionalNumber("MAX_PAGES"),
  sourceAdapter: process.env.SOURCE_ADAPTER ?? "MOCK", // MOCK|HTTP
  storeAdapter: process.env.STORE_ADAPTER ?? "MEMORY", // MEMORY|SQL
  archiveAdapter: process.env.ARCHIVE_ADAPTER ?? "LOCAL", // LOCAL|S3|MEMORY
  reporter: process.env.REPORTER ?? "LOG", // LOG|BUS
  migrate: process.env.DB_MIGRATE === "true",
};

export const dbCfg = createDatabaseConfig(cfg.serviceName);

export const apiCfg = {
  baseUrl: process.env.API_BASE_URL ?? "https://api.idealista.com/3.5",
  tokenUrl: process.env.API_TOKEN_URL ?? "https://api.idealista.com/oauth/token",
  apiKey: process.env.API_KEY ?? "",
  apiSecret: process.env.API_SECRET ?? "",
  country: process.env.API_COUNTRY ?? "es",
  locationId: process.env.LOCATION_ID ?? "0-EU-ES-28",
  minIntervalMs: parseEnvNumber("API_MIN_INTERVAL_MS", 1000),
  maxAttempts: parseEnvNumber("API_MAX_ATTEMPTS", 3),
  timeoutMs: parseEnvNumber("API_TIMEOUT_MS", 30000),
};

export const archiveCfg = {
  localDir:
    process.env.ARCHIVE_DIR ?? path.join(process.cwd(), "data", "archive"),
  s3: {
    bucket: process.env.S3_BUCKET ?? "",
    prefix: process.env.S3_PREFIX ?? "",
    region: process.env.AWS_REGION ?? "eu-west-1",
    accessKeyId: process.env.AWS_ACCESS_KEY_ID,
    secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY,
    endpoint: process.env.S3_ENDPOINT || undefined,
  },
};

export const redisCfg = createRedisConfig();

// Validation
export function validateConfig(): void {
  if (!["MOCK", "HTTP"].includes(cfg.sourceAdapter)) {
    throw new ConfigError(`Unknown source adapter: ${cfg.sourceAdapter}`);
  }

  if (!["MEMORY", "SQL"].includes(cfg.storeAdapter)) {
    throw new ConfigError(`Unknown store adapter: ${cfg.storeAdapter}`);
  }

  if (!["LOCAL", "S3", "MEMORY"].includes(cfg.archiveAdapter)) {
    throw new ConfigError(`Unknown archive adapter: ${cfg.archiveAdapter}`);
  }

  if (!["LOG", "BUS"].includes(cfg.reporter)) {
    throw new ConfigError(`Unknown reporter: ${cfg.reporter}`);
  }

  if (cfg.sourceAdapter === "HTTP" && (!apiCfg.apiKey || !apiCfg.apiSecret)) {
    throw new ConfigError(
      "API_KEY and API_SECRET are required when using HTTP source"
    );
  }

  if (cfg.storeAdapter === "SQL" && !dbCfg.url && !dbCfg.host) {
    throw new ConfigError("DATABASE_URL or DB_HOST is required for SQL store");
  }

  if (cfg.archiveAdapter === "S3" && !archiveCfg.s3.bucket) {
    throw new ConfigError("S3_BUCKET is required when using S3 archive");
  }

  if (cfg.pageSize < 1 || cfg.pageSize > 50) {
    throw new ConfigError(`PAGE_SIZE must be between 1 and 50: ${cfg.pageSize}`);
  }

  if (cfg.maxPages !== undefined && cfg.maxPages < 1) {
    throw new ConfigError(`MAX_PAGES must be positive: ${cfg.maxPages}`);
  }
}
