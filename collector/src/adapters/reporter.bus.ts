import {
  BusPort,
  Logger,
  ScanCompletedEvent,
  ScanFailedEvent,
} from "@listing-tracker/shared-utils";
import { JobType, ScanSummary } from "../core/dto";
import { ReporterPort } from "../core/ports";
import { errorMessage } from "../core/utils";

/**
 * Publishes scan_completed / scan_failed events on the shared bus
 */
export class BusReporter implements ReporterPort {
  constructor(
    private bus: BusPort,
    private logger?: Logger,
    private now: () => Date = () => new Date()
  ) {}

  async report(summary: ScanSummary): Promise<void> {
    const event: ScanCompletedEvent = {
      type: "scan_completed",
      id: summary.jobId,
      timestamp: this.now().toISOString(),
      data: {
        jobId: summary.jobId,
        jobType: summary.jobType,
        durationSeconds: summary.durationSeconds,
        totalPages: summary.totalPages,
        totalProperties: summary.totalProperties,
        actionCounts: { ...summary.actionCounts },
        deactivatedCount: summary.deactivatedCount,
      },
    };

    await this.bus.publish(event);
    this.logger?.info(`Published scan_completed for ${summary.jobId}`);
  }

  async reportFailure(
    jobId: string,
    jobType: JobType,
    error: unknown
  ): Promise<void> {
    const event: ScanFailedEvent = {
      type: "scan_failed",
      id: jobId,
      timestamp: this.now().toISOString(),
      data: { jobId, jobType, error: errorMessage(error) },
    };

    await this.bus.publish(event);
    this.logger?.info(`Published scan_failed for ${jobId}`);
  }
}
