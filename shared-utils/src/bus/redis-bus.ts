import Redis from "ioredis";
import { ConsoleLogger } from "../service/logger";
import { Logger } from "../service/types";
import { BaseEvent, BusConfig, BusPort } from "./types";

/**
 * Redis pub/sub bus (ioredis), publishing side. Each event goes to the
 * channel named after its type as JSON.
 */
export class RedisBus implements BusPort {
  private publisher: Redis;
  private logger: Logger;

  constructor(config: BusConfig, logger?: Logger) {
    this.logger = logger ?? new ConsoleLogger(config.serviceName);

    this.publisher = new Redis(config.redisUrl, {
      enableReadyCheck: false,
      maxRetriesPerRequest: config.retryAttempts ?? 3,
      lazyConnect: true,
    });

    this.publisher.on("connect", () => {
      this.logger.info("Redis publisher connected");
    });

    this.publisher.on("error", (error) => {
      this.logger.error("Redis publisher error:", error);
    });
  }

  async publish<T extends BaseEvent>(event: T): Promise<void> {
    try {
      await this.publisher.publish(event.type, JSON.stringify(event));
      this.logger.debug(`Published event: ${event.type} (${event.id})`);
    } catch (error) {
      this.logger.error("Failed to publish event:", error);
      throw error;
    }
  }

  async close(): Promise<void> {
    await this.publisher.quit();
    this.logger.info("Redis bus connection closed");
  }
}

export function createRedisBus(config: BusConfig, logger?: Logger): RedisBus {
  return new RedisBus(config, logger);
}
