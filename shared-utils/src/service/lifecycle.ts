import { ConsoleLogger } from "./logger";
import { JobState, Logger } from "./types";

type ShutdownHandler = () => Promise<void>;

/**
 * Lifecycle of a one-shot job process: state transitions, resource cleanup
 * and signal handling. Shutdown handlers run once, whether the job finishes
 * or the process receives a termination signal.
 */
export class JobLifecycle {
  private state: JobState = JobState.INITIALIZING;
  private shutdownHandlers: ShutdownHandler[] = [];
  private shutdownPromise?: Promise<void>;
  private logger: Logger;

  constructor(
    private shutdownTimeoutMs: number = 30000,
    logger?: Logger
  ) {
    this.logger = logger ?? new ConsoleLogger("lifecycle");
  }

  getState(): JobState {
    return this.state;
  }

  setState(newState: JobState): void {
    const oldState = this.state;
    this.state = newState;
    this.logger.debug(`State changed: ${oldState} → ${newState}`);
  }

  addShutdownHandler(handler: ShutdownHandler): void {
    this.shutdownHandlers.push(handler);
  }

  /**
   * Install SIGTERM/SIGINT handlers that run shutdown and exit with `exitCode`.
   */
  installSignalHandlers(exitCode = 130): void {
    for (const signal of ["SIGTERM", "SIGINT"] as const) {
      process.once(signal, () => {
        this.shutdown(signal)
          .catch((error: unknown) => {
            this.logger.error("Error during shutdown:", error);
          })
          .finally(() => process.exit(exitCode));
      });
    }
  }

  /**
   * Run all shutdown handlers; repeated calls share the first run.
   */
  shutdown(reason: string): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.runShutdown(reason);
    }
    return this.shutdownPromise;
  }

  private async runShutdown(reason: string): Promise<void> {
    const started = Date.now();
    this.logger.info(`Shutting down (${reason})...`);
    if (this.state !== JobState.ERROR) {
      this.setState(JobState.STOPPING);
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new Error(`Shutdown timeout after ${this.shutdownTimeoutMs}ms`));
      }, this.shutdownTimeoutMs);
    });

    try {
      await Promise.race([this.runShutdownHandlers(), timeout]);
    } finally {
      clearTimeout(timer);
    }

    if (this.state !== JobState.ERROR) {
      this.setState(JobState.STOPPED);
    }
    this.logger.info(`Shutdown completed in ${Date.now() - started}ms`);
  }

  private async runShutdownHandlers(): Promise<void> {
    const results = await Promise.allSettled(
      this.shutdownHandlers.map((handler) => handler())
    );

    const failures = results.filter(
      (result): result is PromiseRejectedResult => result.status === "rejected"
    );

    if (failures.length > 0) {
      failures.forEach((failure, index) => {
        this.logger.error(`Shutdown handler ${index} failed:`, failure.reason);
      });
      throw new Error(`${failures.length} shutdown handlers failed`);
    }
  }

  handleError(error: unknown, context?: string): void {
    this.logger.error(`Job error in ${context ?? "unknown"}:`, error);
    this.setState(JobState.ERROR);
  }
}
