import Redis from "ioredis";
import { ConsoleLogger } from "../service/logger";
import { Logger } from "../service/types";
import { HandlerRegistry } from "./handlers";
import {
  BusConfig,
  BusEvent,
  BusPort,
  EventHandler,
  EventMap,
  EventType,
  isBusEvent,
} from "./types";

/**
 * Redis pub/sub bus. Publisher and subscriber use separate connections,
 * since a subscribed ioredis connection cannot issue other commands.
 */
export class RedisBus implements BusPort {
  private subscriber: Redis;
  private publisher: Redis;
  private registry: HandlerRegistry;
  private isConnected = false;
  private logger: Logger;

  constructor(config: BusConfig, logger?: Logger) {
    this.logger = logger ?? new ConsoleLogger(config.serviceName);
    this.registry = new HandlerRegistry(this.logger);
    const retryAttempts = config.retryAttempts ?? 3;

    this.subscriber = new Redis(config.redisUrl, {
      enableReadyCheck: false,
      maxRetriesPerRequest: retryAttempts,
      lazyConnect: true,
    });

    this.publisher = new Redis(config.redisUrl, {
      enableReadyCheck: false,
      maxRetriesPerRequest: retryAttempts,
      lazyConnect: true,
    });

    this.setupEventHandlers();
  }

  private setupEventHandlers(): void {
    this.subscriber.on("connect", () => {
      this.logger.info("Redis subscriber connected");
      this.isConnected = true;
    });

    this.publisher.on("connect", () => {
      this.logger.info("Redis publisher connected");
    });

    this.subscriber.on("error", (error: Error) => {
      this.logger.error("Redis subscriber error:", error);
      this.isConnected = false;
    });

    this.publisher.on("error", (error: Error) => {
      this.logger.error("Redis publisher error:", error);
    });

    this.subscriber.on("close", () => {
      this.logger.info("Redis subscriber connection closed");
      this.isConnected = false;
    });

    this.subscriber.on("message", (channel: string, message: string) => {
      this.handleMessage(channel, message).catch((error: unknown) => {
        this.logger.error(`Failed to handle message on ${channel}:`, error);
      });
    });
  }

  async subscribe<K extends EventType>(
    topic: K,
    handler: EventHandler<EventMap[K]>
  ): Promise<void> {
    if (this.registry.add(topic, handler)) {
      await this.subscriber.subscribe(topic);
      this.logger.info(`Subscribed to topic: ${topic}`);
    }
  }

  async publish(event: BusEvent): Promise<void> {
    await this.publisher.publish(event.type, JSON.stringify(event));
    this.logger.debug(`Published event: ${event.type} (${event.id})`);
  }

  private async handleMessage(channel: string, message: string): Promise<void> {
    const parsed: unknown = JSON.parse(message);

    if (!isBusEvent(parsed) || parsed.type !== channel) {
      this.logger.warn(`Dropping malformed event on ${channel}`);
      return;
    }

    this.logger.debug(`Received event: ${channel} (${parsed.id})`);
    await this.registry.dispatch(parsed.type, parsed);
  }

  async close(): Promise<void> {
    this.logger.info("Closing Redis bus connections...");
    await Promise.all([this.subscriber.quit(), this.publisher.quit()]);
    this.registry.clear();
  }

  isHealthy(): boolean {
    return this.isConnected;
  }

  getStatus() {
    return {
      connected: this.isConnected,
      subscriberStatus: this.subscriber.status,
      publisherStatus: this.publisher.status,
      subscribedTopics: this.registry.topics(),
      handlerCount: this.registry.handlerCount(),
    };
  }
}

export function createRedisBus(config: BusConfig, logger?: Logger): RedisBus {
  return new RedisBus(config, logger);
}
