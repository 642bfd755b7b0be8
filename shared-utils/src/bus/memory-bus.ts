import { ConsoleLogger } from "../service/logger";
import { Logger } from "../service/types";
import { BaseEvent, BusPort } from "./types";

/**
 * In-memory bus for tests and local runs. Published events are kept for
 * inspection.
 */
export class MemoryBus implements BusPort {
  private publishedEvents: BaseEvent[] = [];
  private logger: Logger;

  constructor(serviceName: string = "memory-bus", logger?: Logger) {
    this.logger = logger ?? new ConsoleLogger(serviceName);
  }

  async publish<T extends BaseEvent>(event: T): Promise<void> {
    this.logger.debug(`Publishing event: ${event.type} (${event.id})`);
    this.publishedEvents.push(event);
  }

  async close(): Promise<void> {
    this.publishedEvents = [];
  }

  getPublishedEvents(): BaseEvent[] {
    return [...this.publishedEvents];
  }

  clearHistory(): void {
    this.publishedEvents = [];
  }
}

export function createMemoryBus(
  serviceName?: string,
  logger?: Logger
): MemoryBus {
  return new MemoryBus(serviceName, logger);
}
