/**
 * Event types published by listing-tracker jobs
 */
export type EventType = "scan_completed" | "scan_failed";

/**
 * Base event interface that all events must implement
 */
export interface BaseEvent {
  type: EventType;
  id: string;
  timestamp: string;
  version?: string;
}

export interface ScanActionCounts {
  new: number;
  price_change: number;
  republished: number;
  active: number;
  skipped: number;
}

export interface ScanCompletedEvent extends BaseEvent {
  type: "scan_completed";
  data: {
    jobId: string;
    jobType: string;
    durationSeconds: number;
    totalPages: number;
    totalProperties: number;
    actionCounts: ScanActionCounts;
    deactivatedCount?: number;
  };
}

export interface ScanFailedEvent extends BaseEvent {
  type: "scan_failed";
  data: {
    jobId: string;
    jobType: string;
    error: string;
  };
}

/**
 * Publishing side of the event bus
 */
export interface BusPort {
  publish<T extends BaseEvent>(event: T): Promise<void>;

  /**
   * Close the bus connection and cleanup resources
   */
  close?(): Promise<void>;
}

export interface BusConfig {
  redisUrl: string;
  serviceName: string;
  retryAttempts?: number;
}
