import { Logger } from "@listing-tracker/shared-utils";
import { JobType, ScanSummary } from "../core/dto";
import { ReporterPort } from "../core/ports";
import { errorMessage } from "../core/utils";

/**
 * Writes job summaries to the log instead of publishing them
 */
export class LogReporter implements ReporterPort {
  constructor(private logger: Logger) {}

  async report(summary: ScanSummary): Promise<void> {
    this.logger.info(`Job ${summary.jobId} summary:`, {
      jobType: summary.jobType,
      durationSeconds: summary.durationSeconds,
      totalPages: summary.totalPages,
      totalProperties: summary.totalProperties,
      actions: summary.actionCounts,
      deactivatedCount: summary.deactivatedCount,
      databaseStats: summary.databaseStats,
    });
  }

  async reportFailure(
    jobId: string,
    jobType: JobType,
    error: unknown
  ): Promise<void> {
    this.logger.error(`Job ${jobId} (${jobType}) failed: ${errorMessage(error)}`);
  }
}
