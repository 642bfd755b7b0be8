#!/usr/bin/env node

import {
  BusPort,
  ConsoleLogger,
  createBus,
  createLogger,
  JobLifecycle,
  JobState,
} from "@listing-tracker/shared-utils";
import { PoolConfig } from "pg";
import { LocalArchive } from "../adapters/archive.local";
import { MemoryArchive } from "../adapters/archive.memory";
import { S3Archive } from "../adapters/archive.s3";
import { OAuthTokenManager } from "../adapters/auth.oauth";
import { MemoryListingStore } from "../adapters/repo.memory";
import { SqlListingStore } from "../adapters/repo.sql";
import { BusReporter } from "../adapters/reporter.bus";
import { LogReporter } from "../adapters/reporter.log";
import { HttpSearchSource } from "../adapters/source.http";
import { MockSource } from "../adapters/source.mock";
import {
  apiCfg,
  archiveCfg,
  cfg,
  dbCfg,
  redisCfg,
  validateConfig,
} from "../config/env";
import { isJobType } from "../core/jobs";
import { createJobId, runScan } from "../core/scan";

import type {
  ApiLedgerPort,
  ArchivePort,
  ListingStorePort,
  ReporterPort,
  SourcePort,
} from "../core/ports";

type Store = ListingStorePort & ApiLedgerPort;

function createStore(logger: ConsoleLogger): Store {
  switch (cfg.storeAdapter) {
    case "SQL": {
      const poolConfig: PoolConfig = dbCfg.url
        ? { connectionString: dbCfg.url }
        : {
            host: dbCfg.host,
            port: dbCfg.port,
            user: dbCfg.user,
            password: dbCfg.password,
            database: dbCfg.name,
          };
      return new SqlListingStore(poolConfig, logger.child("store"));
    }

    case "MEMORY":
    default:
      return new MemoryListingStore();
  }
}

function createSource(
  logger: ConsoleLogger,
  ledger: ApiLedgerPort,
  jobId: string
): SourcePort {
  switch (cfg.sourceAdapter) {
    case "HTTP": {
      const tokens = new OAuthTokenManager(
        {
          tokenUrl: apiCfg.tokenUrl,
          apiKey: apiCfg.apiKey,
          apiSecret: apiCfg.apiSecret,
          timeoutMs: apiCfg.timeoutMs,
        },
        { logger: logger.child("auth"), ledger, jobId }
      );
      return new HttpSearchSource(
        {
          baseUrl: apiCfg.baseUrl,
          country: apiCfg.country,
          minIntervalMs: apiCfg.minIntervalMs,
          maxAttempts: apiCfg.maxAttempts,
          timeoutMs: apiCfg.timeoutMs,
        },
        { tokens, logger: logger.child("api"), ledger, jobId }
      );
    }

    case "MOCK":
    default:
      return new MockSource();
  }
}

function createArchive(logger: ConsoleLogger): ArchivePort {
  switch (cfg.archiveAdapter) {
    case "S3":
      return new S3Archive(archiveCfg.s3, logger.child("archive"));

    case "MEMORY":
      return new MemoryArchive();

    case "LOCAL":
    default:
      return new LocalArchive(archiveCfg.localDir, logger.child("archive"));
  }
}

function createReporter(logger: ConsoleLogger, bus?: BusPort): ReporterPort {
  return bus
    ? new BusReporter(bus, logger.child("reporter"))
    : new LogReporter(logger.child("reporter"));
}

/**
 * Run the configured job once. Resolves to the process exit code.
 */
export async function main(): Promise<number> {
  const logger = createLogger(cfg.serviceName);
  const lifecycle = new JobLifecycle(30000, logger.child("lifecycle"));
  lifecycle.installSignalHandlers();

  const jobType = process.argv[2] ?? cfg.jobType;
  if (!isJobType(jobType)) {
    logger.error(
      `Unknown job type: ${jobType} (expected daily_new_listings or weekly_full_scan)`
    );
    return 1;
  }

  logger.info(
    `Starting ${jobType} in ${cfg.mode} mode (source ${cfg.sourceAdapter}, store ${cfg.storeAdapter})`
  );

  try {
    validateConfig();

    // the job id in the API ledger and in the summary share this instant
    const startedAt = new Date();
    const jobId = createJobId(jobType, startedAt);
    const store = createStore(logger);
    lifecycle.addShutdownHandler(() => store.close());

    if (cfg.migrate && store instanceof SqlListingStore) {
      await store.ensureSchema();
    }

    let bus: BusPort | undefined;
    if (cfg.reporter === "BUS") {
      bus = createBus({
        type: cfg.mode === "dev" ? "memory" : "redis",
        serviceName: cfg.serviceName,
        redisUrl: redisCfg.url,
        logger: logger.child("bus"),
      });
      const openBus = bus;
      lifecycle.addShutdownHandler(async () => {
        await openBus.close?.();
      });
    }

    lifecycle.setState(JobState.RUNNING);

    await runScan(
      {
        source: createSource(logger, store, jobId),
        store,
        archive: createArchive(logger),
        reporter: createReporter(logger, bus),
        logger: logger.child("scan"),
      },
      jobType,
      {
        locationId: apiCfg.locationId,
        pageSize: cfg.pageSize,
        maxPages: cfg.maxPages,
        startedAt,
      }
    );

    await lifecycle.shutdown("job completed");
    return 0;
  } catch (error) {
    lifecycle.handleError(error, jobType);
    try {
      await lifecycle.shutdown("job failed");
    } catch (shutdownError) {
      logger.error("Error during shutdown:", shutdownError);
    }
    return 1;
  }
}

// Run if this file is executed directly
if (require.main === module) {
  main()
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
      console.error("[collector] Unhandled error:", error);
      process.exit(1);
    });
}
