export type {
  BaseEvent,
  BusConfig,
  BusEvent,
  BusPort,
  EventHandler,
  EventMap,
  EventType,
  PropertyChangedEvent,
  PropertyUpdateRequestedEvent,
} from "./types";
export { EVENT_TYPES, isBusEvent, isEventType } from "./types";

export { createMemoryBus, MemoryBus } from "./memory-bus";
export { createRedisBus, RedisBus } from "./redis-bus";

import { Logger } from "../service/types";
import { createMemoryBus } from "./memory-bus";
import { createRedisBus } from "./redis-bus";
import { BusConfig, BusPort } from "./types";

export interface BusFactoryConfig extends Partial<BusConfig> {
  type: "redis" | "memory";
  serviceName: string;
}

/**
 * Create the bus selected by configuration
 */
export function createBus(config: BusFactoryConfig, logger?: Logger): BusPort {
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
        logger
      );

    case "memory":
      return createMemoryBus(config.serviceName, logger);
  }
}
