export type {
  BaseEvent,
  BusConfig,
  BusPort,
  EventType,
  ScanActionCounts,
  ScanCompletedEvent,
  ScanFailedEvent,
} from "./types";

export { createMemoryBus, MemoryBus } from "./memory-bus";
export { createRedisBus, RedisBus } from "./redis-bus";

import { Logger } from "../service/types";
import { createMemoryBus } from "./memory-bus";
import { createRedisBus } from "./redis-bus";
import { BusPort } from "./types";

export interface BusFactoryConfig {
  type: "redis" | "memory";
  serviceName: string;
  redisUrl?: string;
  retryAttempts?: number;
  logger?: Logger;
}

/**
 * Create the bus named by configuration
 */
export function createBus(config: BusFactoryConfig): BusPort {
  switch (config.type) {
    case "redis":
      if (!config.redisUrl) {
        throw new Error("Redis URL is required for Redis bus");
      }
      return createRedisBus(
        {
          redisUrl: config.redisUrl,
          serviceName: config.serviceName,
          retryAttempts: config.retryAttempts,
        },
        config.logger
      );

    case "memory":
      return createMemoryBus(config.serviceName, config.logger);
  }
}
