import { Logger } from "@listing-tracker/shared-utils";
import { ActionCounts, DateKey, JobType, ScanSummary, SearchPage } from "./dto";
import { JOBS, JobDefinition } from "./jobs";
import {
  ArchivePort,
  Clock,
  ListingStorePort,
  ListingTx,
  ReporterPort,
  SourcePort,
} from "./ports";
import { reconcileRecord } from "./reconcile";
import {
  addActionCounts,
  emptyActionCounts,
  formatDuration,
  toDateKey,
  toJobStamp,
} from "./utils";

export class StorageUnavailableError extends Error {
  constructor(message = "Database unavailable") {
    super(message);
    this.name = "StorageUnavailableError";
  }
}

export interface ScanDeps {
  source: SourcePort;
  store: ListingStorePort;
  archive: ArchivePort;
  reporter: ReporterPort;
  logger: Logger;
  clock?: Clock;
}

export interface ScanOptions {
  locationId: string;
  pageSize: number;
  /** Stop after this many pages even if the source reports more */
  maxPages?: number;
  /**
   * Scan start, taken by the caller before it creates anything that talks to
   * the network. Defaults to the first clock reading.
   */
  startedAt?: Date;
}

/** e.g. `weekly-20240115-030000` */
export function createJobId(jobType: JobType, at: Date): string {
  return `${JOBS[jobType].idPrefix}-${toJobStamp(at)}`;
}

/**
 * Run `fn` inside one store transaction: commit on success, roll back and
 * re-throw on failure.
 */
export async function withTransaction<T>(
  store: ListingStorePort,
  fn: (tx: ListingTx) => Promise<T>,
  logger?: Logger
): Promise<T> {
  const tx = await store.begin();
  let result: T;
  try {
    result = await fn(tx);
  } catch (error) {
    try {
      await tx.rollback();
    } catch (rollbackError) {
      logger?.error("Rollback failed:", rollbackError);
    }
    throw error;
  }
  await tx.commit();
  return result;
}

/**
 * One complete paginated sweep.
 *
 * The scan start is captured before any network call and serves as the
 * deactivation watermark: every listing observed during the sweep has
 * `lastSeenAt >= scanStart`, however long the sweep runs. Each page is
 * reconciled and committed as one transaction, so a failure loses at most
 * the page in flight.
 */
export async function runScan(
  deps: ScanDeps,
  jobType: JobType,
  options: ScanOptions
): Promise<ScanSummary> {
  const { source, store, logger } = deps;
  const clock = deps.clock ?? (() => new Date());
  const job = JOBS[jobType];

  const scanStart = options.startedAt ?? clock();
  const jobId = createJobId(jobType, scanStart);
  const dateKey = toDateKey(scanStart);

  logger.info(`Scan ${jobId} started`, {
    jobType,
    scanStart: scanStart.toISOString(),
  });

  try {
    if (!(await store.healthCheck())) {
      logger.error("Database health check failed, aborting job");
      throw new StorageUnavailableError();
    }

    const totals = emptyActionCounts();
    let totalPages = 0;
    let totalProperties = 0;

    for (let page = 1; ; page++) {
      if (options.maxPages !== undefined && page > options.maxPages) {
        logger.info(`Max pages limit reached (${options.maxPages})`);
        break;
      }

      const result = await source.search({
        ...job.query,
        locationId: options.locationId,
        pageSize: options.pageSize,
        page,
      });

      if (result.items.length === 0) {
        logger.info(`No more results at page ${page}`);
        break;
      }

      await archivePage(deps, job, dateKey, page, result);

      const pageCounts = await withTransaction(
        store,
        (tx) => reconcilePage(tx, result, clock, logger),
        logger
      );

      addActionCounts(totals, pageCounts);
      totalPages++;
      totalProperties += result.items.length;

      logger.info(`Page ${page}/${result.totalPages} committed`, pageCounts);

      if (page >= result.totalPages) {
        break;
      }
    }

    logger.info("Pagination complete", { totalPages, totalProperties });

    let deactivatedCount: number | undefined;
    if (job.deactivate) {
      const today = toDateKey(clock());
      deactivatedCount = await withTransaction(
        store,
        (tx) => tx.deactivateUnseen(scanStart, today),
        logger
      );
      logger.info(`Deactivated ${deactivatedCount} listings`, {
        scanStart: scanStart.toISOString(),
      });
    }

    const databaseStats = await store.getStatistics();
    const endTime = clock();
    const durationMs = endTime.getTime() - scanStart.getTime();

    const summary: ScanSummary = {
      jobId,
      jobType,
      startTime: scanStart.toISOString(),
      endTime: endTime.toISOString(),
      durationSeconds: durationMs / 1000,
      totalPages,
      totalProperties,
      actionCounts: totals,
      ...(job.deactivate
        ? { deactivatedCount, scanStartTimestamp: scanStart.toISOString() }
        : {}),
      databaseStats,
    };

    await archiveMetadata(deps, jobType, dateKey, summary);
    await report(deps, summary);

    logger.info(`Scan ${jobId} completed in ${formatDuration(durationMs)}`, {
      totalPages,
      totalProperties,
      actions: totals,
      deactivatedCount,
    });

    return summary;
  } catch (error) {
    logger.error(`Scan ${jobId} failed:`, error);
    try {
      await deps.reporter.reportFailure(jobId, jobType, error);
    } catch (reportError) {
      logger.warn("Failed to report scan failure:", reportError);
    }
    throw error;
  }
}

async function reconcilePage(
  tx: ListingTx,
  page: SearchPage,
  clock: Clock,
  logger: Logger
): Promise<ActionCounts> {
  const counts = emptyActionCounts();
  for (const raw of page.items) {
    const { action } = await reconcileRecord(tx, raw, clock(), logger);
    counts[action]++;
  }
  return counts;
}

// Archive and reporter failures are logged and never abort the scan

async function archivePage(
  deps: ScanDeps,
  job: JobDefinition,
  dateKey: DateKey,
  page: number,
  result: SearchPage
): Promise<void> {
  try {
    await deps.archive.archivePage(job.type, dateKey, page, result.raw);
  } catch (error) {
    deps.logger.error(`Failed to archive page ${page}:`, error);
  }
}

async function archiveMetadata(
  deps: ScanDeps,
  jobType: JobType,
  dateKey: DateKey,
  summary: ScanSummary
): Promise<void> {
  try {
    await deps.archive.archiveMetadata(jobType, dateKey, summary);
  } catch (error) {
    deps.logger.error("Failed to archive job metadata:", error);
  }
}

async function report(deps: ScanDeps, summary: ScanSummary): Promise<void> {
  try {
    await deps.reporter.report(summary);
  } catch (error) {
    deps.logger.error("Failed to report job metadata:", error);
  }
}
